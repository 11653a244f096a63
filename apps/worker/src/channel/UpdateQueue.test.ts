/**
 * Unit tests for UpdateQueue.
 */

import { describe, it, expect } from "vitest";
import { UpdateQueue } from "./UpdateQueue.js";

describe("UpdateQueue", () => {
    it("rejects a non-positive capacity", () => {
        expect(() => new UpdateQueue(0)).toThrow("Queue capacity must be a positive integer, got 0");
        expect(() => new UpdateQueue(1.5)).toThrow(
            "Queue capacity must be a positive integer, got 1.5"
        );
    });

    it("delivers items in order", async () => {
        const queue = new UpdateQueue<number>(10);

        await queue.send(1);
        await queue.send(2);

        expect(queue.size).toBe(2);
        expect(await queue.recv()).toEqual({ item: 1 });
        expect(await queue.recv()).toEqual({ item: 2 });
    });

    it("makes send() wait while full", async () => {
        const queue = new UpdateQueue<number>(1);
        await queue.send(1);

        let sent = false;
        const blocked = queue.send(2).then((result) => {
            sent = true;
            return result;
        });
        await new Promise((resolve) => setTimeout(resolve, 5));
        expect(sent).toBe(false);

        expect(await queue.recv()).toEqual({ item: 1 });
        expect(await blocked).toBe(true);
        expect(await queue.recv()).toEqual({ item: 2 });
    });

    it("releases waiting senders and receivers on close", async () => {
        const queue = new UpdateQueue<number>(1);
        await queue.send(1);
        const blocked = queue.send(2);

        queue.close();

        expect(await blocked).toBe(false);
        expect(await queue.recv()).toBeNull();
        expect(await queue.send(3)).toBe(false);

        const empty = new UpdateQueue<number>(1);
        const waiting = empty.recv();
        empty.close();
        expect(await waiting).toBeNull();
    });

    it("iterates until closed", async () => {
        const queue = new UpdateQueue<number>(10);
        const collected: number[] = [];

        const consumer = (async () => {
            for await (const item of queue) {
                collected.push(item);
                if (collected.length === 3) queue.close();
            }
        })();

        await queue.send(1);
        await queue.send(2);
        await queue.send(3);
        await consumer;

        expect(collected).toEqual([1, 2, 3]);
    });
});
