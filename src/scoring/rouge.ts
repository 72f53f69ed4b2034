import type {
    IncrementalSession,
    IncrementalStep,
    MatchCounts,
    NgramCounts,
    RougeScores,
    ScoreTriple,
    ScoringMode,
    TokenizedText,
} from "../types";
import { metricLabel } from "../types";
import { createRouge155Tokenizer, type Tokenizer } from "../preprocessing/tokenize";
import { exceptionsDirFor, parseRouge155Args, stopwordsPathFor, DEFAULT_DATA_DIR, type Rouge155ArgsInput } from "../config";
import { countMatches, ngramCounts, totalCount } from "./ngrams";
import { ConfigurationError } from "../errors";
import { createIncrementalSession, scoreIncrement } from "./incremental";
import { roundTo, safeDivide } from "../utils/shared";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

// Batch scores are reported with this many decimals
const SCORE_DIGITS = 5;

export interface RougeConfig {
    /** Compute ROUGE-1 up to ROUGE-n */
    n: number;
    /** A = average over references, B = best reference */
    scoring: ScoringMode;
    /** Recall/precision weight of the F-score */
    alpha: number;
}

export interface RougeScorer {
    config: RougeConfig;
    tokenizer: Tokenizer;
    nScore: (candidate: string, references: readonly string[]) => RougeScores;
    resetIncremental: (references: readonly string[]) => IncrementalSession;
    nScoreIncremental: (session: IncrementalSession, text: string) => IncrementalStep;
}

/**
 * Combine per-reference counts into one triple.
 * A sums every component; B keeps the first reference with the highest
 * match / reference ratio.
 */
export function aggregateCounts(perReference: readonly MatchCounts[], mode: ScoringMode): MatchCounts {
    if (mode === "A") {
        return perReference.reduce<MatchCounts>(
            (acc, counts) => ({
                candidateCount: acc.candidateCount + counts.candidateCount,
                referenceCount: acc.referenceCount + counts.referenceCount,
                matchCount: acc.matchCount + counts.matchCount,
            }),
            { candidateCount: 0, referenceCount: 0, matchCount: 0 }
        );
    }

    let best: MatchCounts | undefined;
    let bestRatio = -Infinity;
    for (const counts of perReference) {
        const ratio = safeDivide(counts.matchCount, counts.referenceCount);
        if (ratio > bestRatio) {
            best = counts;
            bestRatio = ratio;
        }
    }
    return best ?? { candidateCount: 0, referenceCount: 0, matchCount: 0 };
}

/**
 * Weighted harmonic mean of precision and recall; 0 without matches
 */
export function computeFScore(precision: number, recall: number, matches: number, alpha: number): number {
    if (matches === 0) return 0;
    return (precision * recall) / ((1 - alpha) * precision + alpha * recall);
}

/**
 * Recall, precision and F-score of an aggregated triple, rounded
 */
export function computeScores(counts: MatchCounts, alpha: number): ScoreTriple {
    const recall = safeDivide(counts.matchCount, counts.referenceCount);
    const precision = safeDivide(counts.matchCount, counts.candidateCount);
    const fscore = computeFScore(precision, recall, counts.matchCount, alpha);

    return {
        R: roundTo(recall, SCORE_DIGITS),
        P: roundTo(precision, SCORE_DIGITS),
        F: roundTo(fscore, SCORE_DIGITS),
    };
}

/**
 * Per-reference match statistics of a candidate for one n
 */
export function matchCounts(candidate: NgramCounts, references: readonly NgramCounts[]): MatchCounts[] {
    const candidateCount = totalCount(candidate);
    return references.map((reference) => ({
        candidateCount,
        referenceCount: totalCount(reference),
        matchCount: countMatches(candidate, reference),
    }));
}

/**
 * Create a ROUGE-N scorer on top of a tokenizer
 */
export function createRougeScorer(tokenizer: Tokenizer, config: RougeConfig): RougeScorer {
    const { n: maxN, scoring, alpha } = config;

    function nScore(candidate: string, references: readonly string[]): RougeScores {
        if (references.length === 0) {
            throw new Error("nScore requires at least one reference text");
        }

        const candidateTokens = logger.time("tokenize", () => tokenizer.tokenizeText(candidate));
        const referenceTokens: TokenizedText[] = logger.time("tokenize", () =>
            references.map((reference) => tokenizer.tokenizeText(reference))
        );

        const results: RougeScores = {};
        for (let n = 1; n <= maxN; n++) {
            const counts = logger.time("count", () =>
                matchCounts(
                    ngramCounts(candidateTokens, n),
                    referenceTokens.map((reference) => ngramCounts(reference, n))
                )
            );
            results[metricLabel(n)] = computeScores(aggregateCounts(counts, scoring), alpha);
        }

        return results;
    }

    function resetIncremental(references: readonly string[]): IncrementalSession {
        return logger.time("reset", () => createIncrementalSession(tokenizer, references, maxN));
    }

    function nScoreIncremental(session: IncrementalSession, text: string): IncrementalStep {
        if (session.maxN !== maxN) {
            throw new Error(`Session was created for ROUGE-${session.maxN}, scorer computes ROUGE-${maxN}`);
        }
        return logger.time("increment", () => scoreIncrement(tokenizer, session, text));
    }

    return {
        config: { n: maxN, scoring, alpha },
        tokenizer,
        nScore,
        resetIncremental,
        nScoreIncremental,
    };
}

/**
 * Create a scorer configured like the ROUGE-1.5.5 script.
 * Defaults: no truncation, no stemming, no stopword removal, ROUGE-1..4,
 * average scoring, alpha 0.5. Sentences are split on newlines.
 * Stemming (-m) needs a ROUGE data directory (-e) holding the WordNet 2.0
 * exception files; without -e the bundled stopword list is used.
 */
export function createRougeScorerFromRouge155Args(input: Rouge155ArgsInput = {}): RougeScorer {
    const args = parseRouge155Args(input);

    if (args.m && args.e === null) {
        throw new ConfigurationError("Stemming (-m) requires the ROUGE data directory (-e) with WordNet-2.0-Exceptions");
    }
    const dataDir = args.e ?? DEFAULT_DATA_DIR;
    // -v applies to this scorer only
    const verbose = args.v || logger.isVerbose();

    logger.debug(
        `ROUGE options: n=${args.n} f=${args.f} p=${args.p} m=${args.m} s=${args.s} b=${args.b} l=${args.l}`,
        verbose
    );

    const tokenizer = createRouge155Tokenizer({
        byteLimit: args.b,
        wordLimit: args.l,
        stem: args.m,
        removeStopwords: args.s,
        sentenceSplit: "SPL",
        stopwordsPath: stopwordsPathFor(dataDir),
        exceptionsDir: exceptionsDirFor(dataDir),
        verbose,
    });

    return createRougeScorer(tokenizer, { n: args.n, scoring: args.f, alpha: args.p });
}
