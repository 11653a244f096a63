import { describe, it, expect } from "vitest";
import { ExclusiveLock } from "./ExclusiveLock.js";

describe("ExclusiveLock", () => {
    it("runs sections one at a time in submission order", async () => {
        const lock = new ExclusiveLock();
        const events: string[] = [];

        const section = (name: string, delayMs: number) => async () => {
            events.push(`${name}:start`);
            await new Promise((resolve) => setTimeout(resolve, delayMs));
            events.push(`${name}:end`);
            return name;
        };

        const results = await Promise.all([
            lock.run(section("a", 10)),
            lock.run(section("b", 1)),
            lock.run(section("c", 5)),
        ]);

        expect(results).toEqual(["a", "b", "c"]);
        expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
        expect(lock.pending()).toBe(0);
    });

    it("propagates a failing section and keeps serving", async () => {
        const lock = new ExclusiveLock();

        await expect(lock.run(async () => Promise.reject(new Error("nope")))).rejects.toThrow("nope");
        expect(await lock.run(async () => 42)).toBe(42);
    });
});
