/**
 * Shared utility functions used across the codebase
 */

// =============================================================================
// Math utilities
// =============================================================================

// Widest precision toFixed accepts; enough to expand a score exactly
const EXACT_DIGITS = 100;

/**
 * Round to a fixed number of decimal digits, the way printf("%.5f") does:
 * the exact binary value is rounded, and an exact tie goes to the even digit.
 * toFixed alone would round a tie away from zero (1/64 -> 0.01563).
 */
export function roundTo(value: number, digits: number): number {
    const expanded = Math.abs(value).toFixed(EXACT_DIGITS);
    const cut = expanded.indexOf(".") + 1 + digits;
    const rest = expanded.slice(cut);

    if (/^50*$/.test(rest)) {
        const kept = expanded.slice(0, cut);
        const lastDigit = Number(kept.replace(".", "").slice(-1));
        if (lastDigit % 2 === 0) {
            return Math.sign(value) * Number(kept);
        }
    }
    return Number(value.toFixed(digits));
}

/** Divide, returning 0 when the denominator is 0 */
export function safeDivide(numerator: number, denominator: number): number {
    return denominator !== 0 ? numerator / denominator : 0;
}

export function sum(values: Iterable<number>): number {
    let total = 0;
    for (const value of values) {
        total += value;
    }
    return total;
}

// =============================================================================
// String utilities
// =============================================================================

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8");

export function utf8ByteLength(text: string): number {
    return encoder.encode(text).length;
}

/**
 * Cut a string to at most `maxBytes` UTF-8 bytes.
 * Backs off to the previous character boundary rather than splitting a
 * multi-byte sequence.
 */
export function truncateUtf8(text: string, maxBytes: number): string {
    const bytes = encoder.encode(text);
    if (bytes.length <= maxBytes) return text;

    let cut = Math.max(0, maxBytes);
    // Continuation bytes look like 10xxxxxx
    while (cut > 0 && ((bytes[cut] ?? 0) & 0xc0) === 0x80) {
        cut--;
    }
    return decoder.decode(bytes.subarray(0, cut));
}

/**
 * Truncate text to maxLen characters, adding ellipsis if truncated
 */
export function truncateText(text: string, maxLen: number = 100): string {
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen) + "...";
}
