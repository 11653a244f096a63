import type { MessageSink } from "../balancer/types.js";

/**
 * Bounded FIFO between a balancer and a consumer that needs every accepted
 * item, not just the latest.
 *
 * send() suspends while the queue is full, so a slow consumer back-pressures
 * the balancer (and every worker queued on its lock).
 */
export class UpdateQueue<T> implements MessageSink<T>, AsyncIterable<T> {
    private items: Array<{ item: T }> = [];
    private capacity: number;
    private closed = false;
    private spaceWaiters: Array<() => void> = [];
    private itemWaiters: Array<() => void> = [];

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`Queue capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
    }

    get size(): number {
        return this.items.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Enqueue an item, waiting for space. Returns false once closed.
     */
    async send(item: T): Promise<boolean> {
        while (!this.closed && this.items.length >= this.capacity) {
            await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
        }
        if (this.closed) return false;

        this.items.push({ item });
        this.itemWaiters.shift()?.();
        return true;
    }

    /**
     * Next item, or null once the queue is closed.
     */
    async recv(): Promise<{ item: T } | null> {
        for (;;) {
            const next = this.items.shift();
            if (next) {
                this.spaceWaiters.shift()?.();
                return next;
            }
            if (this.closed) return null;
            await new Promise<void>((resolve) => this.itemWaiters.push(resolve));
        }
    }

    /**
     * Stop accepting items, drop what is buffered and wake every waiter.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.items = [];
        for (const wake of [...this.spaceWaiters, ...this.itemWaiters]) {
            wake();
        }
        this.spaceWaiters = [];
        this.itemWaiters = [];
    }

    async *[Symbol.asyncIterator](): AsyncIterator<T> {
        for (;;) {
            const next = await this.recv();
            if (!next) return;
            yield next.item;
        }
    }
}
