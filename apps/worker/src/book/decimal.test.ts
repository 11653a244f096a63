/**
 * Unit tests for fixed-point decimal helpers.
 */

import { describe, it, expect } from "vitest";
import { isZeroQuantity, parseDecimal } from "./decimal.js";

describe("parseDecimal", () => {
    it("scales integers and fractions to 18 places", () => {
        expect(parseDecimal("1")).toBe(1_000_000_000_000_000_000n);
        expect(parseDecimal("10.5")).toBe(10_500_000_000_000_000_000n);
        expect(parseDecimal("0.000000000000000001")).toBe(1n);
    });

    it("treats trailing zeros as the same value", () => {
        expect(parseDecimal("10.0")).toBe(parseDecimal("10.00"));
        expect(parseDecimal("10.")).toBe(parseDecimal("10"));
        expect(parseDecimal("1.5000000000000000000")).toBe(1_500_000_000_000_000_000n);
    });

    it("rejects malformed text", () => {
        expect(() => parseDecimal("")).toThrow('Invalid decimal: ""');
        expect(() => parseDecimal("-1")).toThrow('Invalid decimal: "-1"');
        expect(() => parseDecimal("1e5")).toThrow('Invalid decimal: "1e5"');
    });

    it("rejects precision beyond the scale", () => {
        expect(() => parseDecimal("0.0000000000000000001")).toThrow(
            'Decimal "0.0000000000000000001" exceeds 18 fractional digits'
        );
    });
});

describe("isZeroQuantity", () => {
    it("recognises zero in any notation", () => {
        expect(isZeroQuantity("0")).toBe(true);
        expect(isZeroQuantity("0.00000000")).toBe(true);
        expect(isZeroQuantity("000.")).toBe(true);
    });

    it("recognises non-zero quantities", () => {
        expect(isZeroQuantity("0.00000001")).toBe(false);
        expect(isZeroQuantity("10")).toBe(false);
    });
});
