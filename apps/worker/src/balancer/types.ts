import type { RejectReason, SendStatus } from "@depth-mirror/shared";
import type { DepthUpdate, PriceUpdate } from "../binance/types.js";

/**
 * Result of pushing an item through a balancer.
 */
export type SendResult =
    | { status: typeof SendStatus.ACCEPTED }
    | { status: typeof SendStatus.REJECTED; reason: RejectReason }
    | { status: typeof SendStatus.SINK_GONE };

/**
 * Anything workers can push decoded updates into.
 */
export interface MessageSender<T> {
    send(item: T): Promise<SendResult>;
}

/**
 * Downstream consumer of accepted items.
 * Returns false when the consumer no longer exists.
 */
export interface MessageSink<T> {
    send(item: T): boolean | Promise<boolean>;
}

/**
 * Extracts the sequence id an item is balanced on.
 */
export type SequenceKey<T> = (item: T) => number;

/** Depth updates are ordered by the last id they cover. */
export const depthUpdateKey: SequenceKey<DepthUpdate> = (update) => update.finalUpdateId;

/** Price ticks carry a single id. */
export const priceUpdateKey: SequenceKey<PriceUpdate> = (update) => update.updateId;
