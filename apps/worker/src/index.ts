import type { Server } from "http";
import { logger } from "./log/logger.js";
import { env, toPipelineConfig } from "./config/env.js";
import { startHealthServer } from "./health/server.js";
import { OrderBookManager, PriceManager } from "./pipeline/index.js";
import { formatBookSummary, formatPriceSummary } from "./book/format.js";
import type { OrderBookDisplay } from "./book/OrderBook.js";
import type { PriceUpdate } from "./binance/types.js";
import type { ChannelReceiver } from "./channel/DistributionChannel.js";

async function main() {
    const symbol = (process.argv[2] ?? env.SYMBOL).toUpperCase();
    const config = toPipelineConfig();

    logger.info({ symbol, config }, "Replicator starting...");

    const bookManager = new OrderBookManager(config);
    const priceManager = new PriceManager(config);

    let book: ChannelReceiver<OrderBookDisplay>;
    let price: ChannelReceiver<PriceUpdate>;
    try {
        price = await priceManager.init(symbol);
        book = await bookManager.init(symbol);
    } catch (err) {
        logger.fatal({ err, symbol }, "Failed to bootstrap pipelines");
        priceManager.stop();
        bookManager.stop();
        process.exit(1);
    }

    const startedAt = Date.now();

    // Start status server
    const server: Server = startHealthServer(
        {
            symbol,
            startedAt,
            currentBook: () => (bookManager.isRunning ? book.borrow() : null),
            currentPrice: () => (priceManager.isRunning ? price.borrow() : null),
            bookStats: () => bookManager.getStats(),
            priceStats: () => priceManager.getStats(),
        },
        env.WORKER_PORT
    );

    // Periodic summary of the latest published state
    const summaryInterval = setInterval(() => {
        if (book.hasChanged()) {
            logger.info({ symbol }, `book ${formatBookSummary(book.borrowAndUpdate())}`);
        }
        if (price.hasChanged()) {
            logger.info({ symbol }, `price ${formatPriceSummary(price.borrowAndUpdate())}`);
        }
    }, env.SUMMARY_INTERVAL_MS);

    logger.info("Replicator started successfully");

    // Graceful shutdown
    const shutdown = () => {
        logger.info("Shutting down...");
        clearInterval(summaryInterval);
        bookManager.stop();
        priceManager.stop();
        server.close(() => process.exit(0));
    };

    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);
}

main().catch((err) => {
    logger.fatal({ err }, "Replicator crashed");
    process.exit(1);
});
