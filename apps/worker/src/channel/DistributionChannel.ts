/**
 * Single-slot "latest value wins" publish point.
 *
 * Producers overwrite the current value and never wait; a slow consumer
 * misses superseded values and only ever sees the newest one. Receivers get
 * the value by reference to an immutable copy produced upstream, so readers
 * share no lock with writers.
 */

import { EventEmitter } from "events";

/**
 * Consumer handle bound to a channel.
 */
export class ChannelReceiver<T> {
    private channel: DistributionChannel<T>;
    private seenVersion: number;
    private closed = false;

    constructor(channel: DistributionChannel<T>, seenVersion: number) {
        this.channel = channel;
        this.seenVersion = seenVersion;
    }

    /**
     * Current value, without marking it seen.
     */
    borrow(): T {
        return this.channel.current;
    }

    /**
     * Current value, marking it seen.
     */
    borrowAndUpdate(): T {
        this.seenVersion = this.channel.version;
        return this.channel.current;
    }

    /**
     * Whether a value newer than the last seen one has been published.
     */
    hasChanged(): boolean {
        return this.channel.version > this.seenVersion;
    }

    /**
     * Wait for a value newer than the last seen one and mark it seen.
     * Resolves false once the channel is closed or this receiver is closed.
     */
    async changed(): Promise<boolean> {
        if (this.closed) return false;

        if (this.hasChanged()) {
            this.seenVersion = this.channel.version;
            return true;
        }
        if (this.channel.isClosed) return false;

        await new Promise<void>((resolve) => {
            const onSettle = () => {
                this.channel.off("publish", onSettle);
                this.channel.off("close", onSettle);
                this.channel.off("release", onRelease);
                resolve();
            };
            const onRelease = (receiver: ChannelReceiver<T>) => {
                if (receiver === this) onSettle();
            };
            this.channel.on("publish", onSettle);
            this.channel.on("close", onSettle);
            this.channel.on("release", onRelease);
        });

        if (this.closed || !this.hasChanged()) return false;
        this.seenVersion = this.channel.version;
        return true;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Drop this receiver. Once every receiver is closed, producers see the
     * sink as gone.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.channel.release(this);
    }
}

/**
 * Events:
 * - 'publish': a new value was stored (value)
 * - 'release': a receiver was closed (receiver)
 * - 'close': the channel was closed
 */
export class DistributionChannel<T> extends EventEmitter {
    private value: T;
    private currentVersion = 0;
    private closed = false;
    private receivers: Set<ChannelReceiver<T>> = new Set();

    constructor(initial: T) {
        super();
        this.value = initial;
        // Every waiting receiver holds one listener per event
        this.setMaxListeners(0);
    }

    get current(): T {
        return this.value;
    }

    get version(): number {
        return this.currentVersion;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    get receiverCount(): number {
        return this.receivers.size;
    }

    /**
     * New receiver; the current value counts as already seen.
     */
    subscribe(): ChannelReceiver<T> {
        const receiver = new ChannelReceiver(this, this.currentVersion);
        if (!this.closed) {
            this.receivers.add(receiver);
        }
        return receiver;
    }

    /**
     * Replace the current value. Never blocks.
     * Returns false (value dropped) when closed or nobody is subscribed.
     */
    send(value: T): boolean {
        if (this.closed || this.receivers.size === 0) {
            return false;
        }

        this.value = value;
        this.currentVersion++;
        this.emit("publish", value);
        return true;
    }

    /**
     * Close the channel and wake every waiting receiver.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.receivers.clear();
        this.emit("close");
    }

    /** @internal */
    release(receiver: ChannelReceiver<T>): void {
        this.receivers.delete(receiver);
        this.emit("release", receiver);
    }
}
