import { RejectReasons, SendStatus } from "@depth-mirror/shared";
import { createChildLogger } from "../log/logger.js";
import { ExclusiveLock } from "./ExclusiveLock.js";
import type { MessageSender, MessageSink, SendResult, SequenceKey } from "./types.js";

const logger = createChildLogger({ module: "message-balancer" });

/**
 * Balancer counters for health checks.
 */
export interface BalancerStats {
    lastAcceptedId: number | null;
    accepted: number;
    rejected: number;
    sinkGone: number;
    pending: number;
}

/**
 * Monotonic sequence gate in front of a sink.
 *
 * Several redundant workers push the same logical feed into one balancer;
 * only the first copy of each id, and only ids strictly greater than the last
 * accepted one, reach the sink. The comparison, the id update and the
 * forward run as one critical section.
 */
export class MessageBalancer<T> implements MessageSender<T> {
    private lastAcceptedId: number | null = null;
    private lock = new ExclusiveLock();
    private sink: MessageSink<T>;
    private keyOf: SequenceKey<T>;

    private stats = {
        accepted: 0,
        rejected: 0,
        sinkGone: 0,
    };

    constructor(sink: MessageSink<T>, keyOf: SequenceKey<T>, initialId: number | null = null) {
        this.sink = sink;
        this.keyOf = keyOf;
        this.lastAcceptedId = initialId;
    }

    send(item: T): Promise<SendResult> {
        return this.lock.run(async (): Promise<SendResult> => {
            const id = this.keyOf(item);

            if (this.lastAcceptedId !== null && id <= this.lastAcceptedId) {
                this.stats.rejected++;
                return { status: SendStatus.REJECTED, reason: RejectReasons.DUPLICATE_OR_STALE };
            }
            this.lastAcceptedId = id;

            const delivered = await this.sink.send(item);
            if (!delivered) {
                this.stats.sinkGone++;
                logger.debug({ id }, "Balanced item had no consumer");
                return { status: SendStatus.SINK_GONE };
            }

            this.stats.accepted++;
            return { status: SendStatus.ACCEPTED };
        });
    }

    getStats(): BalancerStats {
        return {
            lastAcceptedId: this.lastAcceptedId,
            ...this.stats,
            pending: this.lock.pending(),
        };
    }
}
