/**
 * One realtime stream task.
 *
 * Connects to a combined-stream endpoint, decodes every text frame and
 * pushes the result into a shared sender (a balancer). The task never
 * coordinates with its siblings and never reconnects: once the transport
 * fails or the consumer disappears it exits and stays down.
 */

import type { EventEmitter } from "events";
import WebSocket from "ws";
import { SendStatus } from "@depth-mirror/shared";
import type { Logger } from "pino";
import { createChildLogger } from "../log/logger.js";
import type { MessageSender } from "../balancer/types.js";
import type { FrameDecoder } from "./decode.js";

const defaultLogger = createChildLogger({ module: "stream-worker" });

/**
 * Why a worker task stopped.
 * - ABORTED: cancelled by its owner
 * - SINK_GONE: the consumer behind the balancer is gone
 * - TRANSPORT_ERROR: connection or protocol failure
 * - STREAM_ENDED: the server closed the stream
 * - FAILED: the sender threw
 */
export type WorkerExit = "ABORTED" | "SINK_GONE" | "TRANSPORT_ERROR" | "STREAM_ENDED" | "FAILED";

/**
 * Minimal socket surface the worker drives. `ws` WebSocket satisfies it.
 *
 * Events used: 'open', 'message' (data, isBinary), 'error' (err),
 * 'close' (code, reason).
 */
export interface FeedSocket extends EventEmitter {
    close(code?: number, reason?: string): void;
}

/**
 * Opens a socket to a stream URL.
 */
export type FeedConnector = (url: string) => FeedSocket;

export const connectWebSocket: FeedConnector = (url) => new WebSocket(url);

export interface StreamWorkerOptions<T> {
    /** Full combined-stream URL. */
    url: string;

    /** Frame decoder for this stream. */
    decode: FrameDecoder<T>;

    /** Shared balancer. */
    sender: MessageSender<T>;

    /** Cancellation token owned by the pool. */
    signal: AbortSignal;

    /** Socket factory. Default: ws. */
    connect?: FeedConnector;

    /** Logger with task bindings. */
    logger?: Logger;
}

function rawDataToString(data: WebSocket.RawData): string {
    if (Buffer.isBuffer(data)) return data.toString("utf8");
    if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
    return Buffer.from(data).toString("utf8");
}

/**
 * Run one stream task until it exits. Never rejects.
 */
export function runStreamWorker<T>(options: StreamWorkerOptions<T>): Promise<WorkerExit> {
    const { url, decode, sender, signal } = options;
    const connect = options.connect ?? connectWebSocket;
    const logger = options.logger ?? defaultLogger;

    return new Promise<WorkerExit>((resolve) => {
        if (signal.aborted) {
            resolve("ABORTED");
            return;
        }

        let settled = false;
        let closing = false;
        // Sends are chained so this worker forwards updates in receive order
        let pending: Promise<void> = Promise.resolve();
        let socket: FeedSocket;

        const settle = (exit: WorkerExit) => {
            if (settled) return;
            settled = true;
            signal.removeEventListener("abort", onAbort);
            if (exit !== "STREAM_ENDED") {
                try {
                    socket.close(1000, "Worker stopping");
                } catch (err) {
                    logger.debug({ err }, "Socket close failed");
                }
            }
            logger.info({ exit }, "Stream worker exited");
            resolve(exit);
        };

        const onAbort = () => settle("ABORTED");

        try {
            socket = connect(url);
        } catch (err) {
            const errorMessage = err instanceof Error ? err.message : String(err);
            logger.error({ err: errorMessage, url }, "Failed to open stream");
            resolve("TRANSPORT_ERROR");
            return;
        }

        signal.addEventListener("abort", onAbort, { once: true });

        socket.on("open", () => {
            logger.info({ url }, "Stream connected");
        });

        socket.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
            if (settled || closing) return;
            if (isBinary) {
                logger.trace("Skipping binary frame");
                return;
            }

            const decoded = decode(rawDataToString(data));
            if (!decoded.ok) {
                logger.warn({ error: decoded.error }, "Failed to decode stream message");
                return;
            }

            const item = decoded.value;
            pending = pending
                .then(async () => {
                    if (settled) return;
                    const result = await sender.send(item);
                    switch (result.status) {
                        case SendStatus.ACCEPTED:
                            logger.trace("Update accepted");
                            break;
                        case SendStatus.REJECTED:
                            logger.debug({ reason: result.reason }, "Update rejected");
                            break;
                        case SendStatus.SINK_GONE:
                            logger.info("Consumer gone, stopping worker");
                            settle("SINK_GONE");
                            break;
                    }
                })
                .catch((err: unknown) => {
                    logger.error({ err }, "Sender failed");
                    settle("FAILED");
                });
        });

        socket.on("error", (err: Error) => {
            if (settled) return;
            logger.error({ err: err.message }, "Stream transport error");
            closing = true;
            void pending.then(() => settle("TRANSPORT_ERROR"));
        });

        socket.on("close", (code: number, reason: Buffer) => {
            if (settled || closing) return;
            logger.warn({ code, reason: reason.toString() }, "Stream closed");
            closing = true;
            void pending.then(() => settle("STREAM_ENDED"));
        });
    });
}
