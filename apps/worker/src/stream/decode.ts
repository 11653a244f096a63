/**
 * Combined-stream endpoints and payload decoding.
 *
 * Decoding never throws: a malformed payload costs one message, not the
 * worker that received it.
 */

import { z } from "zod";
import type { DepthChannelType } from "@depth-mirror/shared";
import {
    BookTickerEventSchema,
    DepthUpdateEventSchema,
    streamEnvelopeSchema,
    type DepthUpdate,
    type PriceUpdate,
} from "../binance/types.js";

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Turns one text frame into a typed update.
 */
export type FrameDecoder<T> = (text: string) => DecodeResult<T>;

const DepthEnvelopeSchema = streamEnvelopeSchema(DepthUpdateEventSchema);
const BookTickerEnvelopeSchema = streamEnvelopeSchema(BookTickerEventSchema);

function streamUrl(wsBaseUrl: string, symbol: string, channel: string): string {
    const base = wsBaseUrl.replace(/\/+$/, "");
    return `${base}/stream?streams=${symbol.toLowerCase()}@${channel}`;
}

/**
 * Diff depth stream, e.g. wss://…/stream?streams=btcusdt@depth
 */
export function depthStreamUrl(
    wsBaseUrl: string,
    symbol: string,
    channel: DepthChannelType = "depth"
): string {
    return streamUrl(wsBaseUrl, symbol, channel);
}

/**
 * Best bid/ask stream, e.g. wss://…/stream?streams=btcusdt@bookTicker
 */
export function bookTickerStreamUrl(wsBaseUrl: string, symbol: string): string {
    return streamUrl(wsBaseUrl, symbol, "bookTicker");
}

function decodeEnvelope<S extends z.ZodTypeAny>(
    text: string,
    schema: S
): DecodeResult<z.infer<S>> {
    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { ok: false, error: `Invalid JSON: ${message}` };
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? issue.path.join(".") : "";
        return { ok: false, error: `Invalid payload at "${where}": ${issue?.message ?? "unknown"}` };
    }
    return { ok: true, value: parsed.data };
}

export const decodeDepthUpdate: FrameDecoder<DepthUpdate> = (text) => {
    const result = decodeEnvelope(text, DepthEnvelopeSchema);
    if (!result.ok) return result;

    const event = result.value.data;
    return {
        ok: true,
        value: {
            firstUpdateId: event.U,
            finalUpdateId: event.u,
            bids: event.b,
            asks: event.a,
        },
    };
};

export const decodePriceUpdate: FrameDecoder<PriceUpdate> = (text) => {
    const result = decodeEnvelope(text, BookTickerEnvelopeSchema);
    if (!result.ok) return result;

    const tick = result.value.data;
    return {
        ok: true,
        value: {
            updateId: tick.u,
            bid: [tick.b, tick.B],
            ask: [tick.a, tick.A],
        },
    };
};
