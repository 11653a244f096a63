/**
 * Unit tests for the Binance REST client.
 *
 * undici is mocked; no network.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const mockRequest = vi.hoisted(() => vi.fn());

vi.mock("undici", () => ({
    request: mockRequest,
}));

import { createSnapshotFetcher, fetchSnapshot } from "./client.js";

// Helper to create an undici-shaped response
function createResponse(statusCode: number, payload: unknown) {
    return {
        statusCode,
        body: {
            json: async () => payload,
            text: async () => (typeof payload === "string" ? payload : JSON.stringify(payload)),
        },
    };
}

const snapshot = {
    lastUpdateId: 5001,
    bids: [["25.10", "3.5"]],
    asks: [["25.20", "1.25"]],
};

describe("fetchSnapshot", () => {
    beforeEach(() => {
        mockRequest.mockReset();
    });

    it("requests the depth endpoint with an uppercased symbol and limit", async () => {
        mockRequest.mockResolvedValueOnce(createResponse(200, snapshot));

        const result = await fetchSnapshot("btcusdt", {
            restBaseUrl: "https://api.test",
            limit: 5,
        });

        expect(result).toEqual(snapshot);
        expect(mockRequest).toHaveBeenCalledWith(
            "https://api.test/api/v3/depth?symbol=BTCUSDT&limit=5",
            { method: "GET", headers: { Accept: "application/json" } }
        );
    });

    it("omits the limit when none is configured", async () => {
        mockRequest.mockResolvedValueOnce(createResponse(200, snapshot));

        const fetcher = createSnapshotFetcher({ restBaseUrl: "https://api.test" });
        await fetcher("ETHUSDT");

        expect(mockRequest).toHaveBeenCalledWith(
            "https://api.test/api/v3/depth?symbol=ETHUSDT",
            { method: "GET", headers: { Accept: "application/json" } }
        );
    });

    it("rejects on a non-200 status", async () => {
        mockRequest.mockResolvedValueOnce(createResponse(429, "Too many requests"));

        await expect(
            fetchSnapshot("BTCUSDT", { restBaseUrl: "https://api.test" })
        ).rejects.toThrow("Binance API error 429: Too many requests");
    });

    it("rejects a payload that does not match the snapshot shape", async () => {
        mockRequest.mockResolvedValueOnce(
            createResponse(200, { lastUpdateId: "1", bids: [], asks: [] })
        );

        await expect(
            fetchSnapshot("BTCUSDT", { restBaseUrl: "https://api.test" })
        ).rejects.toThrow();
    });
});
