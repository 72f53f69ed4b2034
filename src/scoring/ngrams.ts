import type { NgramCounts, TokenizedText } from "../types";
import { sum } from "../utils/shared";

/** Separator between the tokens of an n-gram identity */
export const NGRAM_SEPARATOR = " ";

/**
 * Flatten sentences into one token stream. N-grams cross sentence boundaries.
 */
export function flattenTokens(text: TokenizedText): string[] {
    return text.flat();
}

/**
 * All n-grams of a token stream, in order
 */
export function buildNgrams(tokens: readonly string[], n: number): string[] {
    const ngrams: string[] = [];
    for (let i = 0; i + n <= tokens.length; i++) {
        ngrams.push(tokens.slice(i, i + n).join(NGRAM_SEPARATOR));
    }
    return ngrams;
}

export function countNgrams(ngrams: readonly string[]): NgramCounts {
    const counts: NgramCounts = new Map();
    for (const ngram of ngrams) {
        counts.set(ngram, (counts.get(ngram) ?? 0) + 1);
    }
    return counts;
}

/**
 * N-gram count table of a tokenized text for one n
 */
export function ngramCounts(text: TokenizedText, n: number): NgramCounts {
    return countNgrams(buildNgrams(flattenTokens(text), n));
}

/** Total number of n-grams in a table, repeats included */
export function totalCount(counts: NgramCounts): number {
    return sum(counts.values());
}

/**
 * Size of the multiset intersection: sum over shared n-grams of the smaller count
 */
export function countMatches(candidate: NgramCounts, reference: NgramCounts): number {
    let matches = 0;
    for (const [ngram, count] of candidate) {
        const referenceCount = reference.get(ngram);
        if (referenceCount !== undefined) {
            matches += Math.min(count, referenceCount);
        }
    }
    return matches;
}
