/**
 * Best-price pipeline for one symbol.
 *
 * Structurally the book pipeline with a flat id balancer: the snapshot seeds
 * both the balancer's last accepted id and the initial best bid/ask, then
 * redundant book-ticker workers race to advance it.
 */

import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "@depth-mirror/shared";
import { createChildLogger } from "../log/logger.js";
import { createSnapshotFetcher, type SnapshotFetcher } from "../binance/client.js";
import type { InlineOrder, PriceUpdate, SymbolSnapshot } from "../binance/types.js";
import { OrderTable } from "../book/OrderTable.js";
import { MessageBalancer, type BalancerStats } from "../balancer/MessageBalancer.js";
import { priceUpdateKey } from "../balancer/types.js";
import { DistributionChannel, type ChannelReceiver } from "../channel/DistributionChannel.js";
import { bookTickerStreamUrl, decodePriceUpdate } from "../stream/decode.js";
import type { WorkerExit } from "../stream/StreamWorker.js";
import { WorkerPool } from "../stream/WorkerPool.js";
import type { PipelineDeps } from "./types.js";

const logger = createChildLogger({ module: "price-manager" });

const EMPTY_LEVEL: InlineOrder = ["0", "0"];

export interface PriceManagerStats {
    symbol: string | null;
    running: boolean;
    workers: { spawned: number; running: number; exits: Partial<Record<WorkerExit, number>> };
    balancer: BalancerStats | null;
}

/**
 * Best bid/ask implied by a depth snapshot.
 */
export function priceFromSnapshot(snapshot: SymbolSnapshot): PriceUpdate {
    const [bid] = OrderTable.fromOrders("BID", snapshot.bids).top(1);
    const [ask] = OrderTable.fromOrders("ASK", snapshot.asks).top(1);
    return {
        updateId: snapshot.lastUpdateId,
        bid: bid ?? EMPTY_LEVEL,
        ask: ask ?? EMPTY_LEVEL,
    };
}

export class PriceManager {
    private config: PipelineConfig;
    private deps: PipelineDeps;
    private fetchSnapshot: SnapshotFetcher;

    private symbol: string | null = null;
    private pool: WorkerPool | null = null;
    private running = false;
    private starting = false;
    private stopRequested = false;
    private channel: DistributionChannel<PriceUpdate> | null = null;
    private balancer: MessageBalancer<PriceUpdate> | null = null;

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

    async init(symbol: string): Promise<ChannelReceiver<PriceUpdate>> {
        if (this.running) {
            throw new Error(`Price pipeline already running for ${this.symbol}`);
        }
        if (this.starting) {
            throw new Error("Price pipeline already starting");
        }

        this.starting = true;
        this.stopRequested = false;
        try {
            return await this.start(symbol);
        } finally {
            this.starting = false;
        }
    }

    private async start(symbol: string): Promise<ChannelReceiver<PriceUpdate>> {
        const snapshot = await this.fetchSnapshot(symbol);
        if (this.stopRequested) {
            throw new Error(`Price pipeline for ${symbol.toUpperCase()} stopped during bootstrap`);
        }

        const initial = priceFromSnapshot(snapshot);

        const channel = new DistributionChannel(initial);
        const receiver = channel.subscribe();
        const balancer = new MessageBalancer(channel, priceUpdateKey, initial.updateId);

        const pool = new WorkerPool();
        pool.spawn("price", this.config.priceWorkers, {
            url: bookTickerStreamUrl(this.config.wsBaseUrl, symbol),
            decode: decodePriceUpdate,
            sender: balancer,
            connect: this.deps.connect,
        });

        this.symbol = symbol.toUpperCase();
        this.channel = channel;
        this.balancer = balancer;
        this.pool = pool;
        this.running = true;

        logger.info(
            { symbol: this.symbol, updateId: initial.updateId, workers: this.config.priceWorkers },
            "Price pipeline started"
        );

        return receiver;
    }

    subscribe(): ChannelReceiver<PriceUpdate> | null {
        if (!this.running) return null;
        return this.channel?.subscribe() ?? null;
    }

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
        logger.info({ symbol: this.symbol }, "Price pipeline stopped");
    }

    /**
     * Resolves once every worker of the latest pipeline has exited.
     */
    settled(): Promise<WorkerExit[]> {
        return this.pool?.settled() ?? Promise.resolve([]);
    }

    getStats(): PriceManagerStats {
        return {
            symbol: this.symbol,
            running: this.isRunning,
            workers: {
                spawned: this.pool?.size ?? 0,
                running: this.pool?.running ?? 0,
                exits: this.pool?.getExitCounts() ?? {},
            },
            balancer: this.balancer?.getStats() ?? null,
        };
    }
}
