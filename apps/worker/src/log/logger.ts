import pino, { type Logger } from "pino";
import { env } from "../config/env.js";

const pretty = env.NODE_ENV === "development";

/**
 * Process-wide logger. Every line carries the replicated symbol so output
 * from several replicator processes can share one sink.
 */
export const logger: Logger = pino({
    level: env.LOG_LEVEL,
    transport: pretty
        ? {
            target: "pino-pretty",
            options: {
                colorize: true,
                translateTime: "SYS:HH:MM:ss.l",
                ignore: "pid,hostname,service",
            },
        }
        : undefined,
    base: {
        service: "depth-mirror",
        symbol: env.SYMBOL,
    },
    serializers: {
        err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Bindings every component logger carries.
 */
export interface ComponentBindings {
    module: string;
    [key: string]: unknown;
}

export function createChildLogger(bindings: ComponentBindings): Logger {
    return logger.child(bindings);
}
