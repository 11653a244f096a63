import { z } from "zod";

/**
 * Decimal amounts arrive as text and stay text; 18 fractional digits is the
 * widest scale the order tables key on.
 */
export const DecimalTextSchema = z
    .string()
    .regex(/^\d+(\.\d{0,18})?$/, "Expected unsigned decimal text");

/** Price level as received from the exchange. */
export type PriceLevel = string;

/** Quantity as received from the exchange. */
export type Qty = string;

/**
 * A single level entry: [price, quantity].
 */
export type InlineOrder = readonly [price: PriceLevel, qty: Qty];

export const InlineOrderSchema = z.tuple([DecimalTextSchema, DecimalTextSchema]);

const UpdateIdSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

/**
 * REST /api/v3/depth response.
 */
export const SymbolSnapshotSchema = z.object({
    lastUpdateId: UpdateIdSchema,
    bids: z.array(InlineOrderSchema),
    asks: z.array(InlineOrderSchema),
});

export type SymbolSnapshot = z.infer<typeof SymbolSnapshotSchema>;

/**
 * Diff depth event payload (`<symbol>@depth`).
 */
export const DepthUpdateEventSchema = z.object({
    e: z.literal("depthUpdate").optional(),
    E: z.number().optional(),
    s: z.string().optional(),
    U: UpdateIdSchema,
    u: UpdateIdSchema,
    b: z.array(InlineOrderSchema),
    a: z.array(InlineOrderSchema),
}).refine((event) => event.U <= event.u, {
    message: "First update id exceeds final update id",
    path: ["U"],
});

/**
 * Book ticker event payload (`<symbol>@bookTicker`).
 */
export const BookTickerEventSchema = z.object({
    u: UpdateIdSchema,
    s: z.string().optional(),
    b: DecimalTextSchema,
    B: DecimalTextSchema,
    a: DecimalTextSchema,
    A: DecimalTextSchema,
});

/**
 * Combined stream envelope: { stream, data }.
 */
export function streamEnvelopeSchema<T extends z.ZodTypeAny>(data: T) {
    return z.object({
        stream: z.string().optional(),
        data,
    });
}

/**
 * Incremental order book change covering ids [firstUpdateId, finalUpdateId].
 */
export interface DepthUpdate {
    firstUpdateId: number;
    finalUpdateId: number;
    bids: InlineOrder[];
    asks: InlineOrder[];
}

/**
 * Best bid/ask tick.
 */
export interface PriceUpdate {
    updateId: number;
    bid: InlineOrder;
    ask: InlineOrder;
}
