/**
 * Unit tests for environment-to-pipeline config mapping.
 */

import { describe, it, expect } from "vitest";
import { env, toPipelineConfig } from "./env.js";

describe("toPipelineConfig", () => {
    it("maps environment values onto the pipeline config", () => {
        const config = toPipelineConfig({
            ...env,
            BINANCE_WS_BASE_URL: "wss://stream.test",
            DEPTH_WORKERS: 3,
            PRICE_WORKERS: 2,
            DEPTH_CHANNEL: "depth@100ms",
            DISPLAY_DEPTH: 20,
        });

        expect(config.wsBaseUrl).toBe("wss://stream.test");
        expect(config.depthWorkers).toBe(3);
        expect(config.priceWorkers).toBe(2);
        expect(config.depthChannel).toBe("depth@100ms");
        expect(config.displayDepth).toBe(20);
        expect(config.queueCapacity).toBe(100);
    });

    it("rejects an out-of-range snapshot limit", () => {
        expect(() => toPipelineConfig({ ...env, SNAPSHOT_LIMIT: 6000 })).toThrow();
    });
});
