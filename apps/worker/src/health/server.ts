import { createServer, IncomingMessage, ServerResponse, type Server } from "http";
import { logger } from "../log/logger.js";
import type { OrderBookDisplay } from "../book/OrderBook.js";
import type { PriceUpdate } from "../binance/types.js";
import type { OrderBookManagerStats } from "../pipeline/OrderBookManager.js";
import type { PriceManagerStats } from "../pipeline/PriceManager.js";

/**
 * Read-only view of the running pipelines the status server reports on.
 */
export interface StatusSources {
    symbol: string;
    startedAt: number;
    currentBook: () => OrderBookDisplay | null;
    currentPrice: () => PriceUpdate | null;
    bookStats: () => OrderBookManagerStats;
    priceStats: () => PriceManagerStats;
}

export interface HealthStatus {
    status: "ok" | "degraded" | "stalled";
    timestamp: string;
    symbol: string;
    uptimeMs: number;
    book: OrderBookManagerStats;
    price: PriceManagerStats;
}

export interface RouteResult {
    statusCode: number;
    body: unknown;
}

export function getHealthStatus(sources: StatusSources, now: number = Date.now()): HealthStatus {
    const book = sources.bookStats();
    const price = sources.priceStats();

    let status: HealthStatus["status"] = "ok";
    if (book.book?.stalled) {
        status = "stalled";
    } else if (book.workers.running === 0 || price.workers.running === 0) {
        status = "degraded";
    }

    return {
        status,
        timestamp: new Date(now).toISOString(),
        symbol: sources.symbol,
        uptimeMs: now - sources.startedAt,
        book,
        price,
    };
}

/**
 * Resolve a request to a JSON response.
 */
export function routeRequest(
    method: string | undefined,
    url: string | undefined,
    sources: StatusSources
): RouteResult {
    if (method !== "GET") {
        return { statusCode: 405, body: { error: "Method not allowed" } };
    }

    const path = (url ?? "/").split("?")[0];
    switch (path) {
        case "/health": {
            const health = getHealthStatus(sources);
            return { statusCode: health.status === "stalled" ? 503 : 200, body: health };
        }
        case "/book": {
            const book = sources.currentBook();
            return book
                ? { statusCode: 200, body: book }
                : { statusCode: 503, body: { error: "Order book not ready" } };
        }
        case "/price": {
            const price = sources.currentPrice();
            return price
                ? { statusCode: 200, body: price }
                : { statusCode: 503, body: { error: "Price not ready" } };
        }
        default:
            return { statusCode: 404, body: { error: "Not found" } };
    }
}

function handleRequest(sources: StatusSources, req: IncomingMessage, res: ServerResponse) {
    try {
        const result = routeRequest(req.method, req.url, sources);
        res.writeHead(result.statusCode, { "Content-Type": "application/json" });
        res.end(JSON.stringify(result.body));
    } catch (err) {
        logger.error({ err }, "Status request failed");
        res.writeHead(500, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ status: "error", error: String(err) }));
    }
}

export function startHealthServer(sources: StatusSources, port: number): Server {
    const server = createServer((req, res) => handleRequest(sources, req, res));
    server.listen(port, () => {
        logger.info({ port }, "Status server started");
    });
    return server;
}
