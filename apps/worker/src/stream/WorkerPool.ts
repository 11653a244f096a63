import type { Logger } from "pino";
import { createChildLogger } from "../log/logger.js";
import type { MessageSender } from "../balancer/types.js";
import type { FrameDecoder } from "./decode.js";
import { runStreamWorker, type FeedConnector, type WorkerExit } from "./StreamWorker.js";

const logger = createChildLogger({ module: "worker-pool" });

/**
 * A spawned stream task and its cancellation token.
 */
export interface StreamTask {
    readonly label: string;
    readonly index: number;
    readonly done: Promise<WorkerExit>;
    abort(): void;
}

export interface SpawnOptions<T> {
    url: string;
    decode: FrameDecoder<T>;
    sender: MessageSender<T>;
    connect?: FeedConnector;
}

/**
 * Owns every task spawned for a pipeline so they can be torn down together.
 */
export class WorkerPool {
    private tasks: StreamTask[] = [];
    private exits: Map<WorkerExit, number> = new Map();
    private stopped = false;

    /**
     * Start `count` independent tasks against the same endpoint and sender.
     */
    spawn<T>(label: string, count: number, options: SpawnOptions<T>): StreamTask[] {
        if (this.stopped) {
            throw new Error("Worker pool already stopped");
        }

        const spawned: StreamTask[] = [];
        for (let index = 0; index < count; index++) {
            const controller = new AbortController();
            const taskLogger: Logger = logger.child({ worker: label, index });

            const done = runStreamWorker({
                ...options,
                signal: controller.signal,
                logger: taskLogger,
            }).then((exit) => {
                this.exits.set(exit, (this.exits.get(exit) ?? 0) + 1);
                return exit;
            });

            const task: StreamTask = {
                label,
                index,
                done,
                abort: () => controller.abort(),
            };
            spawned.push(task);
            taskLogger.debug("Initialised stream worker");
        }

        this.tasks.push(...spawned);
        return spawned;
    }

    get size(): number {
        return this.tasks.length;
    }

    /**
     * Tasks that have not exited yet.
     */
    get running(): number {
        let exited = 0;
        for (const count of this.exits.values()) exited += count;
        return this.tasks.length - exited;
    }

    /**
     * Exit reasons counted so far.
     */
    getExitCounts(): Partial<Record<WorkerExit, number>> {
        const counts: Partial<Record<WorkerExit, number>> = {};
        for (const [exit, count] of this.exits) {
            counts[exit] = count;
        }
        return counts;
    }

    /**
     * Abort every task. Does not wait for in-flight work; idempotent.
     */
    stop(): void {
        if (this.stopped) return;
        this.stopped = true;

        for (const task of this.tasks) {
            task.abort();
        }
        logger.info({ tasks: this.tasks.length }, "Worker pool stopped");
    }

    /**
     * Resolves once every spawned task has exited.
     */
    settled(): Promise<WorkerExit[]> {
        return Promise.all(this.tasks.map((task) => task.done));
    }
}
