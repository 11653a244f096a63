import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { DepthChannel, PipelineConfigSchema, type PipelineConfig } from "@depth-mirror/shared";

// Load .env from project root (four levels up from apps/worker/src/config)
const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, "../../../../.env") });

const envSchema = z.object({
    SYMBOL: z
        .string()
        .regex(/^[A-Za-z0-9]+$/)
        .transform((v) => v.toUpperCase())
        .default("BTCUSDT"),
    BINANCE_REST_BASE_URL: z.string().url().default("https://api.binance.com"),
    BINANCE_WS_BASE_URL: z.string().url().default("wss://stream.binance.com:9443"),
    DEPTH_WORKERS: z.coerce.number().int().min(1).default(5),
    PRICE_WORKERS: z.coerce.number().int().min(1).default(5),
    DEPTH_CHANNEL: z.enum([DepthChannel.DEPTH, DepthChannel.DEPTH_100MS]).default(DepthChannel.DEPTH),
    SNAPSHOT_LIMIT: z.coerce.number().int().min(1).max(5000).default(100),
    DISPLAY_DEPTH: z.coerce.number().int().min(1).default(10),
    STALL_THRESHOLD: z.coerce.number().int().min(1).default(5),
    SUMMARY_INTERVAL_MS: z.coerce.number().int().min(100).default(1000),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
    WORKER_PORT: z.coerce.number().default(8081),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
        console.error("❌ Invalid environment variables:");
        console.error(result.error.format());
        process.exit(1);
    }
    return result.data;
}

export const env = loadEnv();

/**
 * Map environment variables onto the shared pipeline config.
 */
export function toPipelineConfig(source: Env = env): PipelineConfig {
    return PipelineConfigSchema.parse({
        restBaseUrl: source.BINANCE_REST_BASE_URL,
        wsBaseUrl: source.BINANCE_WS_BASE_URL,
        depthWorkers: source.DEPTH_WORKERS,
        priceWorkers: source.PRICE_WORKERS,
        depthChannel: source.DEPTH_CHANNEL,
        snapshotLimit: source.SNAPSHOT_LIMIT,
        displayDepth: source.DISPLAY_DEPTH,
        stallThreshold: source.STALL_THRESHOLD,
    });
}
