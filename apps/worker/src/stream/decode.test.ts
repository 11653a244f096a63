/**
 * Unit tests for stream URLs and frame decoding.
 */

import { describe, it, expect } from "vitest";
import {
    bookTickerStreamUrl,
    decodeDepthUpdate,
    decodePriceUpdate,
    depthStreamUrl,
} from "./decode.js";

describe("stream urls", () => {
    it("builds the depth stream url from a lowercased symbol", () => {
        expect(depthStreamUrl("wss://stream.test:9443", "BTCUSDT")).toBe(
            "wss://stream.test:9443/stream?streams=btcusdt@depth"
        );
        expect(depthStreamUrl("wss://stream.test:9443/", "ethusdt", "depth@100ms")).toBe(
            "wss://stream.test:9443/stream?streams=ethusdt@depth@100ms"
        );
    });

    it("builds the book ticker stream url", () => {
        expect(bookTickerStreamUrl("wss://stream.test", "BtcUsdt")).toBe(
            "wss://stream.test/stream?streams=btcusdt@bookTicker"
        );
    });
});

describe("decodeDepthUpdate", () => {
    it("maps an enveloped depth event", () => {
        const text = JSON.stringify({
            stream: "btcusdt@depth",
            data: {
                e: "depthUpdate",
                E: 1700000000000,
                s: "BTCUSDT",
                U: 201,
                u: 204,
                b: [["30000.50", "0.25"]],
                a: [
                    ["30001.00", "1.5"],
                    ["30002.00", "0"],
                ],
            },
        });

        expect(decodeDepthUpdate(text)).toEqual({
            ok: true,
            value: {
                firstUpdateId: 201,
                finalUpdateId: 204,
                bids: [["30000.50", "0.25"]],
                asks: [
                    ["30001.00", "1.5"],
                    ["30002.00", "0"],
                ],
            },
        });
    });

    it("reports invalid JSON", () => {
        const result = decodeDepthUpdate("not json");

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.startsWith("Invalid JSON: ")).toBe(true);
        }
    });

    it("reports a missing envelope", () => {
        expect(decodeDepthUpdate(JSON.stringify({ U: 1, u: 2, b: [], a: [] }))).toEqual({
            ok: false,
            error: 'Invalid payload at "data": Required',
        });
    });

    it("rejects numeric prices", () => {
        const text = JSON.stringify({ data: { U: 1, u: 2, b: [[30000, "1"]], a: [] } });

        expect(decodeDepthUpdate(text)).toEqual({
            ok: false,
            error: 'Invalid payload at "data.b.0.0": Expected string, received number',
        });
    });

    it("rejects an inverted id range", () => {
        const text = JSON.stringify({ data: { U: 200, u: 150, b: [], a: [] } });

        expect(decodeDepthUpdate(text)).toEqual({
            ok: false,
            error: 'Invalid payload at "data.U": First update id exceeds final update id',
        });
    });

    it("accepts a single-id range", () => {
        const result = decodeDepthUpdate(JSON.stringify({ data: { U: 150, u: 150, b: [], a: [] } }));

        expect(result.ok).toBe(true);
    });
});

describe("decodePriceUpdate", () => {
    it("maps an enveloped book ticker event", () => {
        const text = JSON.stringify({
            stream: "btcusdt@bookTicker",
            data: {
                u: 7001,
                s: "BTCUSDT",
                b: "30000.10",
                B: "2.00",
                a: "30000.20",
                A: "0.75",
            },
        });

        expect(decodePriceUpdate(text)).toEqual({
            ok: true,
            value: {
                updateId: 7001,
                bid: ["30000.10", "2.00"],
                ask: ["30000.20", "0.75"],
            },
        });
    });

    it("rejects an event without an update id", () => {
        const text = JSON.stringify({
            data: { b: "1", B: "1", a: "2", A: "1" },
        });

        expect(decodePriceUpdate(text)).toEqual({
            ok: false,
            error: 'Invalid payload at "data.u": Required',
        });
    });
});
