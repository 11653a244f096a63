import type { InlineOrder, PriceLevel, Qty } from "../binance/types.js";
import { isZeroQuantity, parseDecimal } from "./decimal.js";

/**
 * Side of the book a table holds.
 * Bids are best when highest, asks when lowest.
 */
export type BookSide = "BID" | "ASK";

/** Ordered copy of a table's best levels. */
export type TableDisplay = InlineOrder[];

/** Default number of levels returned by top(). */
export const DEFAULT_TOP_DEPTH = 10;

/**
 * One side of an order book: price level -> quantity.
 *
 * Levels are keyed by fixed-point price so equal prices with different text
 * ("10.0", "10.00") collapse into one level. A zero quantity is never stored.
 */
export class OrderTable {
    readonly side: BookSide;
    private levels: Map<bigint, InlineOrder> = new Map();

    constructor(side: BookSide) {
        this.side = side;
    }

    /**
     * Build a table from a snapshot or update payload.
     * Later entries for the same level overwrite earlier ones.
     */
    static fromOrders(side: BookSide, orders: readonly InlineOrder[]): OrderTable {
        const table = new OrderTable(side);
        for (const order of orders) {
            table.updateLevel(order);
        }
        return table;
    }

    get size(): number {
        return this.levels.size;
    }

    /**
     * Quantity resting at a price, or undefined if the level is absent.
     */
    get(price: PriceLevel): Qty | undefined {
        return this.levels.get(parseDecimal(price))?.[1];
    }

    /**
     * Make the level satisfy the given order: remove it on zero quantity,
     * insert or overwrite otherwise.
     */
    updateLevel(order: InlineOrder): void {
        const [price, qty] = order;
        const key = parseDecimal(price);

        if (isZeroQuantity(qty)) {
            this.levels.delete(key);
            return;
        }

        this.levels.set(key, [price, qty]);
    }

    /**
     * Best `depth` levels, best price first.
     */
    top(depth: number = DEFAULT_TOP_DEPTH): TableDisplay {
        const keys = [...this.levels.keys()].sort((a, b) => {
            if (a === b) return 0;
            const ascending = a < b ? -1 : 1;
            return this.side === "BID" ? -ascending : ascending;
        });

        const result: TableDisplay = [];
        for (const key of keys.slice(0, depth)) {
            const level = this.levels.get(key);
            if (level) {
                result.push([level[0], level[1]]);
            }
        }
        return result;
    }
}
