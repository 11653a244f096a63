import Bottleneck from "bottleneck";
import { logger } from "../log/logger.js";

/**
 * Binance REST rate limiter.
 *
 * The depth snapshot costs up to 50 request weight at the largest limits and
 * the IP budget is 6000 weight per minute, so snapshot fetches are spaced
 * conservatively. Only bootstrap traffic goes through here.
 */
export const binanceRestLimiter = new Bottleneck({
    minTime: 250, // ~4 rps
    maxConcurrent: 2,
});

binanceRestLimiter.on("failed", (error, jobInfo) => {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warn(
        { error: errorMessage, jobId: jobInfo.options.id },
        "Binance REST request failed"
    );
});
