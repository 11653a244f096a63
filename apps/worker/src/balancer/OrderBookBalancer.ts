import { RejectReasons, SendStatus, type RejectReason } from "@depth-mirror/shared";
import { createChildLogger } from "../log/logger.js";
import type { DepthUpdate } from "../binance/types.js";
import type { OrderBook, OrderBookDisplay, OrderBookMode } from "../book/OrderBook.js";
import { ExclusiveLock } from "./ExclusiveLock.js";
import type { MessageSender, MessageSink, SendResult } from "./types.js";

const logger = createChildLogger({ module: "order-book-balancer" });

export interface OrderBookBalancerOptions {
    /** Levels per side in each published display. */
    displayDepth: number;

    /** Consecutive gap rejections before the book is reported stalled. */
    stallThreshold: number;
}

export interface OrderBookBalancerStats {
    mode: OrderBookMode;
    accepted: number;
    rejected: Partial<Record<RejectReason, number>>;
    sinkGone: number;
    consecutiveGaps: number;
    stalled: boolean;
    lastAcceptedAt: number | null;
    pending: number;
}

/**
 * Guarded book: the only path to a live OrderBook.
 *
 * send() runs the book's own admission test instead of a flat id comparison,
 * merges, and publishes a fresh display only when the update was accepted.
 * Check, merge and publish form one critical section.
 *
 * A sequence gap is never repaired here. Once gaps keep coming the book is
 * flagged stalled and stays stalled.
 */
export class OrderBookBalancer implements MessageSender<DepthUpdate> {
    private book: OrderBook;
    private sink: MessageSink<OrderBookDisplay>;
    private options: OrderBookBalancerOptions;
    private lock = new ExclusiveLock();

    private stats: {
        accepted: number;
        sinkGone: number;
        consecutiveGaps: number;
        lastAcceptedAt: number | null;
    } = {
        accepted: 0,
        sinkGone: 0,
        consecutiveGaps: 0,
        lastAcceptedAt: null,
    };
    private rejected: Map<RejectReason, number> = new Map();
    private stalled = false;

    constructor(
        book: OrderBook,
        sink: MessageSink<OrderBookDisplay>,
        options: OrderBookBalancerOptions
    ) {
        this.book = book;
        this.sink = sink;
        this.options = options;
    }

    send(update: DepthUpdate): Promise<SendResult> {
        return this.lock.run(async (): Promise<SendResult> => {
            const verdict = this.book.mergeDepthUpdate(update);
            if (!verdict.accepted) {
                this.recordRejection(verdict.reason, update);
                return { status: SendStatus.REJECTED, reason: verdict.reason };
            }

            this.stats.accepted++;
            this.stats.consecutiveGaps = 0;
            this.stats.lastAcceptedAt = Date.now();
            if (this.stalled) {
                this.stalled = false;
                logger.info({ finalUpdateId: update.finalUpdateId }, "Order book sequence recovered");
            }

            const delivered = await this.sink.send(this.book.top(this.options.displayDepth));
            if (!delivered) {
                this.stats.sinkGone++;
                return { status: SendStatus.SINK_GONE };
            }
            return { status: SendStatus.ACCEPTED };
        });
    }

    /**
     * Current display, read under the lock.
     */
    snapshot(): Promise<OrderBookDisplay> {
        return this.lock.run(async () => this.book.top(this.options.displayDepth));
    }

    get isStalled(): boolean {
        return this.stalled;
    }

    getStats(): OrderBookBalancerStats {
        const rejected: Partial<Record<RejectReason, number>> = {};
        for (const [reason, count] of this.rejected) {
            rejected[reason] = count;
        }

        return {
            mode: this.book.mode,
            accepted: this.stats.accepted,
            rejected,
            sinkGone: this.stats.sinkGone,
            consecutiveGaps: this.stats.consecutiveGaps,
            stalled: this.stalled,
            lastAcceptedAt: this.stats.lastAcceptedAt,
            pending: this.lock.pending(),
        };
    }

    private recordRejection(reason: RejectReason, update: DepthUpdate): void {
        this.rejected.set(reason, (this.rejected.get(reason) ?? 0) + 1);

        if (reason !== RejectReasons.SEQUENCE_GAP) return;

        this.stats.consecutiveGaps++;
        if (!this.stalled && this.stats.consecutiveGaps >= this.options.stallThreshold) {
            this.stalled = true;
            logger.warn(
                {
                    mode: this.book.mode,
                    firstUpdateId: update.firstUpdateId,
                    consecutiveGaps: this.stats.consecutiveGaps,
                },
                "Order book stalled on a sequence gap; no resync is attempted"
            );
        }
    }
}
