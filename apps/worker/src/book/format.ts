import type { InlineOrder, PriceUpdate } from "../binance/types.js";
import type { OrderBookDisplay } from "./OrderBook.js";

function formatLevel(level: InlineOrder | undefined): string {
    return level ? `${level[0]}x${level[1]}` : "-";
}

/**
 * Format book summary for logging.
 */
export function formatBookSummary(book: OrderBookDisplay): string {
    return `id=${book.lastUpdateId} bid=${formatLevel(book.bids[0])} ask=${formatLevel(book.asks[0])} bids=${book.bids.length} asks=${book.asks.length}`;
}

/**
 * Format best price for logging.
 */
export function formatPriceSummary(price: PriceUpdate): string {
    return `id=${price.updateId} bid=${formatLevel(price.bid)} ask=${formatLevel(price.ask)}`;
}
