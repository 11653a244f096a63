/**
 * Exact fixed-point handling of decimal text.
 *
 * Exchange prices are not fixed-width ("9.5" vs "10.00"), so string order is
 * not price order. Levels are keyed by an integer scaled by 10^18 instead.
 */

/** Fractional digits carried by a fixed-point key. */
export const DECIMAL_SCALE = 18;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d*))?$/;

/**
 * Convert unsigned decimal text to a bigint scaled by 10^DECIMAL_SCALE.
 * Throws on malformed text or excess precision.
 */
export function parseDecimal(text: string): bigint {
    const match = DECIMAL_PATTERN.exec(text);
    if (!match) {
        throw new Error(`Invalid decimal: "${text}"`);
    }

    const integerPart = match[1] ?? "0";
    const fractionPart = (match[2] ?? "").replace(/0+$/, "");
    if (fractionPart.length > DECIMAL_SCALE) {
        throw new Error(`Decimal "${text}" exceeds ${DECIMAL_SCALE} fractional digits`);
    }

    return BigInt(integerPart + fractionPart.padEnd(DECIMAL_SCALE, "0"));
}

/**
 * True when every character is '0' or '.', i.e. "0", "0.00000000", "0.".
 */
export function isZeroQuantity(text: string): boolean {
    for (const char of text) {
        if (char !== "0" && char !== ".") return false;
    }
    return true;
}
