/**
 * Order book pipeline for one symbol.
 *
 * init(): snapshot -> OrderBook -> channel seeded with its display ->
 * guarded book balancer -> N redundant depth workers. The caller gets a
 * receiver bound to the channel and never touches the book itself.
 */

import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "@depth-mirror/shared";
import { createChildLogger } from "../log/logger.js";
import { createSnapshotFetcher, type SnapshotFetcher } from "../binance/client.js";
import { OrderBook, type OrderBookDisplay } from "../book/OrderBook.js";
import {
    OrderBookBalancer,
    type OrderBookBalancerStats,
} from "../balancer/OrderBookBalancer.js";
import { DistributionChannel, type ChannelReceiver } from "../channel/DistributionChannel.js";
import { decodeDepthUpdate, depthStreamUrl } from "../stream/decode.js";
import type { WorkerExit } from "../stream/StreamWorker.js";
import { WorkerPool } from "../stream/WorkerPool.js";
import type { PipelineDeps } from "./types.js";

const logger = createChildLogger({ module: "order-book-manager" });

export interface OrderBookManagerStats {
    symbol: string | null;
    running: boolean;
    workers: { spawned: number; running: number; exits: Partial<Record<WorkerExit, number>> };
    book: OrderBookBalancerStats | null;
}

export class OrderBookManager {
    private config: PipelineConfig;
    private deps: PipelineDeps;
    private fetchSnapshot: SnapshotFetcher;

    private symbol: string | null = null;
    private pool: WorkerPool | null = null;
    private running = false;
    private starting = false;
    private stopRequested = false;
    private channel: DistributionChannel<OrderBookDisplay> | null = null;
    private balancer: OrderBookBalancer | null = null;

    constructor(config: Partial<PipelineConfig> = {}, deps: PipelineDeps = {}) {
        this.config = { ...DEFAULT_PIPELINE_CONFIG, ...config };
        this.deps = deps;
        this.fetchSnapshot =
            deps.fetchSnapshot ??
            createSnapshotFetcher({
                restBaseUrl: this.config.restBaseUrl,
                limit: this.config.snapshotLimit,
            });
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Bootstrap the book and schedule workers. Rejects if the snapshot
     * cannot be fetched, if another init() is in flight, or if stop() was
     * called while the snapshot was pending; nothing is spawned in those cases.
     */
    async init(symbol: string): Promise<ChannelReceiver<OrderBookDisplay>> {
        if (this.running) {
            throw new Error(`Order book pipeline already running for ${this.symbol}`);
        }
        if (this.starting) {
            throw new Error("Order book pipeline already starting");
        }

        this.starting = true;
        this.stopRequested = false;
        try {
            return await this.start(symbol);
        } finally {
            this.starting = false;
        }
    }

    private async start(symbol: string): Promise<ChannelReceiver<OrderBookDisplay>> {
        const snapshot = await this.fetchSnapshot(symbol);
        if (this.stopRequested) {
            throw new Error(
                `Order book pipeline for ${symbol.toUpperCase()} stopped during bootstrap`
            );
        }

        const book = OrderBook.fromSnapshot(snapshot);

        const channel = new DistributionChannel(book.top(this.config.displayDepth));
        const receiver = channel.subscribe();

        const balancer = new OrderBookBalancer(book, channel, {
            displayDepth: this.config.displayDepth,
            stallThreshold: this.config.stallThreshold,
        });

        const pool = new WorkerPool();
        pool.spawn("depth", this.config.depthWorkers, {
            url: depthStreamUrl(this.config.wsBaseUrl, symbol, this.config.depthChannel),
            decode: decodeDepthUpdate,
            sender: balancer,
            connect: this.deps.connect,
        });

        this.symbol = symbol.toUpperCase();
        this.channel = channel;
        this.balancer = balancer;
        this.pool = pool;
        this.running = true;

        logger.info(
            {
                symbol: this.symbol,
                lastUpdateId: snapshot.lastUpdateId,
                workers: this.config.depthWorkers,
            },
            "Order book pipeline started"
        );

        return receiver;
    }

    /**
     * Additional receiver on the running pipeline's channel.
     */
    subscribe(): ChannelReceiver<OrderBookDisplay> | null {
        if (!this.running) return null;
        return this.channel?.subscribe() ?? null;
    }

    /**
     * Abort every worker and close the channel. Best-effort: sockets may
     * still be closing when this returns. Idempotent. During bootstrap the
     * pending init() is cancelled instead.
     */
    stop(): void {
        if (this.starting) {
            this.stopRequested = true;
            logger.info("Stop requested during bootstrap");
            return;
        }
        if (!this.running || !this.pool) return;
        this.running = false;

        this.pool.stop();
        this.channel?.close();
        logger.info({ symbol: this.symbol }, "Order book pipeline stopped");
    }

    /**
     * Resolves once every worker of the latest pipeline has exited.
     */
    settled(): Promise<WorkerExit[]> {
        return this.pool?.settled() ?? Promise.resolve([]);
    }

    getStats(): OrderBookManagerStats {
        return {
            symbol: this.symbol,
            running: this.isRunning,
            workers: {
                spawned: this.pool?.size ?? 0,
                running: this.pool?.running ?? 0,
                exits: this.pool?.getExitCounts() ?? {},
            },
            book: this.balancer?.getStats() ?? null,
        };
    }
}
