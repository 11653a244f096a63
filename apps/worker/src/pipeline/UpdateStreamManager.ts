/**
 * Balanced raw update streams.
 *
 * Same redundant worker fan-in as the book and price pipelines, but every
 * accepted update is queued for the consumer instead of folded into state.
 * Useful for recording or forwarding the deduplicated feed.
 */

import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "@depth-mirror/shared";
import { createChildLogger } from "../log/logger.js";
import type { DepthUpdate, PriceUpdate } from "../binance/types.js";
import { MessageBalancer } from "../balancer/MessageBalancer.js";
import { depthUpdateKey, priceUpdateKey, type SequenceKey } from "../balancer/types.js";
import { UpdateQueue } from "../channel/UpdateQueue.js";
import {
    bookTickerStreamUrl,
    decodeDepthUpdate,
    decodePriceUpdate,
    depthStreamUrl,
    type FrameDecoder,
} from "../stream/decode.js";
import type { FeedConnector, WorkerExit } from "../stream/StreamWorker.js";
import { WorkerPool } from "../stream/WorkerPool.js";

const logger = createChildLogger({ module: "update-stream-manager" });

/**
 * Receiver of a balanced stream together with the tasks feeding it.
 */
export class ControlledReceiver<T> implements AsyncIterable<T> {
    private queue: UpdateQueue<T>;
    private pool: WorkerPool;

    constructor(queue: UpdateQueue<T>, pool: WorkerPool) {
        this.queue = queue;
        this.pool = pool;
    }

    /**
     * Next balanced update, or null after finalize().
     */
    recv(): Promise<{ item: T } | null> {
        return this.queue.recv();
    }

    [Symbol.asyncIterator](): AsyncIterator<T> {
        return this.queue[Symbol.asyncIterator]();
    }

    /**
     * Abort the feeding tasks and close the queue.
     */
    finalize(): void {
        this.pool.stop();
        this.queue.close();
    }

    settled(): Promise<WorkerExit[]> {
        return this.pool.settled();
    }
}

export class UpdateStreamManager {
    private config: PipelineConfig;
    private connect: FeedConnector | undefined;

    constructor(config: Partial<PipelineConfig> = {}, connect?: FeedConnector) {
        this.config = { ...DEFAULT_PIPELINE_CONFIG, ...config };
        this.connect = connect;
    }

    /**
     * Balanced diff depth updates, strictly increasing by final update id.
     */
    depthUpdates(symbol: string): ControlledReceiver<DepthUpdate> {
        return this.start(
            "depth-stream",
            this.config.depthWorkers,
            depthStreamUrl(this.config.wsBaseUrl, symbol, this.config.depthChannel),
            decodeDepthUpdate,
            depthUpdateKey
        );
    }

    /**
     * Balanced book ticker updates, strictly increasing by update id.
     */
    priceUpdates(symbol: string): ControlledReceiver<PriceUpdate> {
        return this.start(
            "price-stream",
            this.config.priceWorkers,
            bookTickerStreamUrl(this.config.wsBaseUrl, symbol),
            decodePriceUpdate,
            priceUpdateKey
        );
    }

    private start<T>(
        label: string,
        workers: number,
        url: string,
        decode: FrameDecoder<T>,
        keyOf: SequenceKey<T>
    ): ControlledReceiver<T> {
        const queue = new UpdateQueue<T>(this.config.queueCapacity);
        const balancer = new MessageBalancer(queue, keyOf);
        const pool = new WorkerPool();

        pool.spawn(label, workers, { url, decode, sender: balancer, connect: this.connect });
        logger.info({ label, url, workers }, "Balanced update stream started");

        return new ControlledReceiver(queue, pool);
    }
}
