import { RejectReasons, type RejectReason } from "@depth-mirror/shared";
import { createChildLogger } from "../log/logger.js";
import type { DepthUpdate, SymbolSnapshot } from "../binance/types.js";
import { DEFAULT_TOP_DEPTH, OrderTable, type TableDisplay } from "./OrderTable.js";

const logger = createChildLogger({ module: "order-book" });

/**
 * Mode of the order book.
 *
 * SNAPSHOT: just bootstrapped, no incremental merge yet.
 * UPDATE: at least one depth update has been merged.
 */
export type OrderBookMode =
    | { kind: "SNAPSHOT"; lastUpdateId: number }
    | { kind: "UPDATE"; firstUpdateId: number; finalUpdateId: number };

/**
 * Outcome of the admission test for a depth update.
 */
export type AdmissionVerdict =
    | { accepted: true }
    | { accepted: false; reason: RejectReason };

/**
 * Copy-out view of the book for consumers. Shares nothing with live state.
 */
export interface OrderBookDisplay {
    /** Final id of the last merged update, or the snapshot id. */
    lastUpdateId: number;

    /** Bids sorted descending by price (best bid first). */
    bids: TableDisplay;

    /** Asks sorted ascending by price (best ask first). */
    asks: TableDisplay;
}

/**
 * Last sequence id the book reflects, whatever its mode.
 */
export function modeUpdateId(mode: OrderBookMode): number {
    switch (mode.kind) {
        case "SNAPSHOT":
            return mode.lastUpdateId;
        case "UPDATE":
            return mode.finalUpdateId;
    }
}

/**
 * Local replica of one symbol's book: two tables and a merge mode.
 */
export class OrderBook {
    private currentMode: OrderBookMode;
    private bids: OrderTable;
    private asks: OrderTable;

    constructor(mode: OrderBookMode, bids: OrderTable, asks: OrderTable) {
        this.currentMode = mode;
        this.bids = bids;
        this.asks = asks;
    }

    static fromSnapshot(snapshot: SymbolSnapshot): OrderBook {
        return new OrderBook(
            { kind: "SNAPSHOT", lastUpdateId: snapshot.lastUpdateId },
            OrderTable.fromOrders("BID", snapshot.bids),
            OrderTable.fromOrders("ASK", snapshot.asks)
        );
    }

    get mode(): OrderBookMode {
        return { ...this.currentMode };
    }

    /**
     * Admission test for a candidate update against the current mode.
     *
     * In SNAPSHOT mode only `finalUpdateId > lastUpdateId` is checked; whether
     * the update actually covers `lastUpdateId + 1` is not verified.
     * In UPDATE mode the update must start right after the last merged one.
     */
    checkDepthUpdate(update: DepthUpdate): AdmissionVerdict {
        const mode = this.currentMode;
        switch (mode.kind) {
            case "SNAPSHOT":
                if (update.finalUpdateId > mode.lastUpdateId) {
                    return { accepted: true };
                }
                return { accepted: false, reason: RejectReasons.BEHIND_SNAPSHOT };
            case "UPDATE":
                if (update.firstUpdateId === mode.finalUpdateId + 1) {
                    return { accepted: true };
                }
                if (update.firstUpdateId <= mode.finalUpdateId) {
                    return { accepted: false, reason: RejectReasons.STALE_UPDATE };
                }
                return { accepted: false, reason: RejectReasons.SEQUENCE_GAP };
        }
    }

    /**
     * Merge a depth update into the book.
     *
     * Returns true if the update was accepted; tables and mode change only then.
     */
    addDepthUpdate(update: DepthUpdate): boolean {
        return this.mergeDepthUpdate(update).accepted;
    }

    /**
     * Same as addDepthUpdate, but reports why an update was rejected.
     */
    mergeDepthUpdate(update: DepthUpdate): AdmissionVerdict {
        const verdict = this.checkDepthUpdate(update);
        if (!verdict.accepted) {
            logger.debug(
                {
                    mode: this.currentMode,
                    firstUpdateId: update.firstUpdateId,
                    finalUpdateId: update.finalUpdateId,
                    reason: verdict.reason,
                },
                "Depth update not merged"
            );
            return verdict;
        }

        for (const order of update.bids) {
            this.bids.updateLevel(order);
        }
        for (const order of update.asks) {
            this.asks.updateLevel(order);
        }
        this.currentMode = {
            kind: "UPDATE",
            firstUpdateId: update.firstUpdateId,
            finalUpdateId: update.finalUpdateId,
        };

        return verdict;
    }

    /**
     * Copy of the best `depth` levels on both sides.
     */
    top(depth: number = DEFAULT_TOP_DEPTH): OrderBookDisplay {
        return {
            lastUpdateId: modeUpdateId(this.currentMode),
            bids: this.bids.top(depth),
            asks: this.asks.top(depth),
        };
    }
}
