import { z } from "zod";

/**
 * Diff depth stream channel names.
 * - depth: 1000ms update speed
 * - depth@100ms: 100ms update speed
 */
export const DepthChannel = {
    DEPTH: "depth",
    DEPTH_100MS: "depth@100ms",
} as const;

export type DepthChannelType = (typeof DepthChannel)[keyof typeof DepthChannel];

/**
 * Pipeline configuration schema.
 * One pipeline instance replicates one symbol.
 */
export const PipelineConfigSchema = z.object({
    /** REST base URL used for the bootstrap snapshot */
    restBaseUrl: z.string().url().default("https://api.binance.com"),
    /** WebSocket base URL for combined streams */
    wsBaseUrl: z.string().url().default("wss://stream.binance.com:9443"),
    /** Redundant connections feeding the order book (default: 5) */
    depthWorkers: z.number().int().min(1).default(5),
    /** Redundant connections feeding the best price (default: 5) */
    priceWorkers: z.number().int().min(1).default(5),
    /** Diff depth channel */
    depthChannel: z
        .enum([DepthChannel.DEPTH, DepthChannel.DEPTH_100MS])
        .default(DepthChannel.DEPTH),
    /** Levels requested from the REST snapshot (default: 100) */
    snapshotLimit: z.number().int().min(1).max(5000).default(100),
    /** Levels per side in a published display (default: 10) */
    displayDepth: z.number().int().min(1).default(10),
    /** Consecutive gap rejections before the book is reported stalled (default: 5) */
    stallThreshold: z.number().int().min(1).default(5),
    /** Capacity of balanced raw update queues (default: 100) */
    queueCapacity: z.number().int().min(1).default(100),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/**
 * Default pipeline configuration (every field at its schema default).
 */
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = PipelineConfigSchema.parse({});
