/**
 * Unit tests for OrderBookBalancer.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { OrderBookBalancer } from "./OrderBookBalancer.js";
import { OrderBook, type OrderBookDisplay } from "../book/OrderBook.js";
import { DistributionChannel, type ChannelReceiver } from "../channel/DistributionChannel.js";
import type { DepthUpdate } from "../binance/types.js";

// Helper to create an empty depth update
function createUpdate(firstUpdateId: number, finalUpdateId: number): DepthUpdate {
    return { firstUpdateId, finalUpdateId, bids: [], asks: [] };
}

describe("OrderBookBalancer", () => {
    let book: OrderBook;
    let channel: DistributionChannel<OrderBookDisplay>;
    let receiver: ChannelReceiver<OrderBookDisplay>;
    let balancer: OrderBookBalancer;

    beforeEach(() => {
        book = OrderBook.fromSnapshot({
            lastUpdateId: 100,
            bids: [["10.0", "1"]],
            asks: [["10.1", "1"]],
        });
        channel = new DistributionChannel(book.top(10));
        receiver = channel.subscribe();
        balancer = new OrderBookBalancer(book, channel, { displayDepth: 10, stallThreshold: 2 });
    });

    it("merges an admitted update and publishes the new display", async () => {
        const result = await balancer.send({
            firstUpdateId: 95,
            finalUpdateId: 101,
            bids: [["10.0", "0"]],
            asks: [],
        });

        expect(result).toEqual({ status: "ACCEPTED" });
        expect(receiver.hasChanged()).toBe(true);
        expect(receiver.borrowAndUpdate()).toEqual({
            lastUpdateId: 101,
            bids: [],
            asks: [["10.1", "1"]],
        });
        expect(book.mode).toEqual({ kind: "UPDATE", firstUpdateId: 95, finalUpdateId: 101 });
    });

    it("does not publish a rejected update", async () => {
        const result = await balancer.send(createUpdate(90, 100));

        expect(result).toEqual({ status: "REJECTED", reason: "BEHIND_SNAPSHOT" });
        expect(channel.version).toBe(0);
        expect(receiver.hasChanged()).toBe(false);
    });

    it("merges concurrent copies of one update once", async () => {
        const results = await Promise.all(
            Array.from({ length: 5 }, () => balancer.send(createUpdate(95, 101)))
        );

        expect(results.filter((result) => result.status === "ACCEPTED").length).toBe(1);
        expect(channel.version).toBe(1);
        expect(balancer.getStats().rejected).toEqual({ STALE_UPDATE: 4 });
    });

    it("reports SINK_GONE once every receiver is closed", async () => {
        receiver.close();

        const result = await balancer.send(createUpdate(95, 101));

        expect(result).toEqual({ status: "SINK_GONE" });
        expect(balancer.getStats().sinkGone).toBe(1);
        expect(book.mode).toEqual({ kind: "UPDATE", firstUpdateId: 95, finalUpdateId: 101 });
    });

    it("flags a stall after consecutive gaps and clears it on recovery", async () => {
        await balancer.send(createUpdate(95, 101));

        await balancer.send(createUpdate(105, 106));
        expect(balancer.isStalled).toBe(false);

        const gap = await balancer.send(createUpdate(105, 106));
        expect(gap).toEqual({ status: "REJECTED", reason: "SEQUENCE_GAP" });
        expect(balancer.isStalled).toBe(true);

        // Stale rejections neither add to nor reset the gap count
        await balancer.send(createUpdate(100, 101));
        expect(balancer.getStats().consecutiveGaps).toBe(2);

        await balancer.send(createUpdate(102, 103));
        const stats = balancer.getStats();
        expect(stats.stalled).toBe(false);
        expect(stats.consecutiveGaps).toBe(0);
        expect(stats.accepted).toBe(2);
        expect(stats.rejected).toEqual({ SEQUENCE_GAP: 2, STALE_UPDATE: 1 });
        expect(stats.mode).toEqual({ kind: "UPDATE", firstUpdateId: 102, finalUpdateId: 103 });
    });

    it("snapshot() returns the current display", async () => {
        await balancer.send({
            firstUpdateId: 95,
            finalUpdateId: 101,
            bids: [],
            asks: [["10.2", "4"]],
        });

        expect(await balancer.snapshot()).toEqual({
            lastUpdateId: 101,
            bids: [["10.0", "1"]],
            asks: [
                ["10.1", "1"],
                ["10.2", "4"],
            ],
        });
    });
});
