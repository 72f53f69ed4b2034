import type { IncrementalScores, IncrementalSession, IncrementalStep, NgramCounts } from "../types";
import { metricLabel } from "../types";
import type { Tokenizer } from "../preprocessing/tokenize";
import { buildNgrams, flattenTokens, ngramCounts, totalCount } from "./ngrams";
import { safeDivide, sum } from "../utils/shared";

/**
 * Build a fresh incremental session from the reference texts.
 *
 * The carry-over starts as maxN - 1 empty placeholders so the first increment
 * can form windows of every size. An empty token never occurs in a reference,
 * so n-grams that include a placeholder never match.
 */
export function createIncrementalSession(
    tokenizer: Tokenizer,
    references: readonly string[],
    maxN: number
): IncrementalSession {
    const tokenizedReferences = references.map((reference) => tokenizer.tokenizeText(reference));

    const referenceCounts: NgramCounts[][] = [];
    const referenceTotals: number[] = [];
    for (let n = 1; n <= maxN; n++) {
        const tables = tokenizedReferences.map((reference) => ngramCounts(reference, n));
        referenceCounts.push(tables);
        referenceTotals.push(sum(tables.map(totalCount)));
    }

    return {
        maxN,
        referenceCounts,
        referenceTotals,
        carryOver: new Array<string>(maxN - 1).fill(""),
    };
}

function emptyIncrement(maxN: number): IncrementalScores {
    const scores: IncrementalScores = {};
    for (let n = 1; n <= maxN; n++) {
        scores[metricLabel(n)] = { R: null };
    }
    return scores;
}

/**
 * Recall contributed by one more piece of text (a sentence, a word, ...).
 *
 * Only n-grams ending inside the new tokens are scored, each counted once
 * for every reference that contains it. Summed over increments, the
 * numerators add up to the recall numerator of the whole text under
 * average scoring.
 */
export function scoreIncrement(
    tokenizer: Tokenizer,
    session: IncrementalSession,
    text: string
): IncrementalStep {
    const newTokens = flattenTokens(tokenizer.tokenizeText(text));
    if (newTokens.length === 0) {
        return { scores: emptyIncrement(session.maxN), session };
    }

    const buffer = [...session.carryOver, ...newTokens];
    const scores: IncrementalScores = {};

    for (let n = 1; n <= session.maxN; n++) {
        const window = buffer.slice(buffer.length - (newTokens.length + n - 1));
        const tables = session.referenceCounts[n - 1] ?? [];

        let matches = 0;
        for (const ngram of buildNgrams(window, n)) {
            for (const table of tables) {
                if (table.has(ngram)) {
                    matches++;
                }
            }
        }

        scores[metricLabel(n)] = { R: safeDivide(matches, session.referenceTotals[n - 1] ?? 0) };
    }

    return {
        scores,
        session: {
            ...session,
            carryOver: buffer.slice(buffer.length - (session.maxN - 1)),
        },
    };
}
