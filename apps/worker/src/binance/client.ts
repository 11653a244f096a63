import { request } from "undici";
import { z } from "zod";
import { binanceRestLimiter } from "../http/limiters.js";
import { createChildLogger } from "../log/logger.js";
import { SymbolSnapshotSchema, type SymbolSnapshot } from "./types.js";

const logger = createChildLogger({ module: "binance-rest" });

/**
 * Fetches the current full state of a symbol's book.
 */
export type SnapshotFetcher = (symbol: string) => Promise<SymbolSnapshot>;

export interface FetchSnapshotOptions {
    /** REST base URL, e.g. https://api.binance.com */
    restBaseUrl: string;

    /** Levels per side to request. */
    limit?: number;
}

/**
 * Make a rate-limited GET to the Binance REST API.
 */
async function restRequest<T>(
    baseUrl: string,
    path: string,
    schema: z.ZodType<T>,
    params?: Record<string, string>
): Promise<T> {
    const url = new URL(path, baseUrl);
    if (params) {
        for (const [key, value] of Object.entries(params)) {
            url.searchParams.set(key, value);
        }
    }

    return binanceRestLimiter.schedule(async () => {
        logger.debug({ url: url.toString() }, "Binance REST request");
        const response = await request(url.toString(), {
            method: "GET",
            headers: { Accept: "application/json" },
        });

        if (response.statusCode !== 200) {
            const body = await response.body.text();
            throw new Error(`Binance API error ${response.statusCode}: ${body}`);
        }

        const json = await response.body.json();
        return schema.parse(json);
    });
}

/**
 * Fetch the depth snapshot used to bootstrap an order book.
 * Rejects on transport, status or schema failure.
 */
export async function fetchSnapshot(
    symbol: string,
    options: FetchSnapshotOptions
): Promise<SymbolSnapshot> {
    const params: Record<string, string> = {
        symbol: symbol.toUpperCase(),
    };
    if (options.limit) {
        params.limit = options.limit.toString();
    }

    const snapshot = await restRequest(
        options.restBaseUrl,
        "/api/v3/depth",
        SymbolSnapshotSchema,
        params
    );

    logger.info(
        {
            symbol: params.symbol,
            lastUpdateId: snapshot.lastUpdateId,
            bids: snapshot.bids.length,
            asks: snapshot.asks.length,
        },
        "Fetched depth snapshot"
    );

    return snapshot;
}

/**
 * Bind REST options into a SnapshotFetcher.
 */
export function createSnapshotFetcher(options: FetchSnapshotOptions): SnapshotFetcher {
    return (symbol) => fetchSnapshot(symbol, options);
}
