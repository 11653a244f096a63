import { EventEmitter } from "events";
import type { FeedConnector, FeedSocket } from "./StreamWorker.js";

/**
 * In-process stand-in for a stream socket. Tests drive it by emitting the
 * same events a ws WebSocket would.
 */
export class FakeSocket extends EventEmitter implements FeedSocket {
    readonly url: string;
    closeCalls: Array<{ code?: number; reason?: string }> = [];

    constructor(url: string) {
        super();
        this.url = url;
    }

    close(code?: number, reason?: string): void {
        this.closeCalls.push({ code, reason });
    }

    /** Deliver a text frame. */
    text(payload: unknown): void {
        const body = typeof payload === "string" ? payload : JSON.stringify(payload);
        this.emit("message", Buffer.from(body), false);
    }

    /** Server-side close. */
    end(code = 1006, reason = ""): void {
        this.emit("close", code, Buffer.from(reason));
    }
}

/**
 * Connector that records every socket it opens.
 */
export function createFakeConnector(): { connect: FeedConnector; sockets: FakeSocket[] } {
    const sockets: FakeSocket[] = [];
    return {
        sockets,
        connect: (url) => {
            const socket = new FakeSocket(url);
            sockets.push(socket);
            return socket;
        },
    };
}
