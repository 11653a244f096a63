import { describe, it, expect } from "vitest";
import { DEFAULT_PIPELINE_CONFIG, PipelineConfigSchema } from "./config.js";

describe("PipelineConfigSchema", () => {
    it("fills every default", () => {
        expect(DEFAULT_PIPELINE_CONFIG).toEqual({
            restBaseUrl: "https://api.binance.com",
            wsBaseUrl: "wss://stream.binance.com:9443",
            depthWorkers: 5,
            priceWorkers: 5,
            depthChannel: "depth",
            snapshotLimit: 100,
            displayDepth: 10,
            stallThreshold: 5,
            queueCapacity: 100,
        });
    });

    it("rejects zero workers", () => {
        expect(PipelineConfigSchema.safeParse({ depthWorkers: 0 }).success).toBe(false);
    });

    it("rejects an unknown depth channel", () => {
        expect(PipelineConfigSchema.safeParse({ depthChannel: "depth@500ms" }).success).toBe(false);
    });
});
