/** A sentence is the ordered list of tokens that survived normalization */
export type TokenizedSentence = string[];

/** Tokenized form of one input text: ordered sentences of ordered tokens */
export type TokenizedText = TokenizedSentence[];

/** N-gram identity (tokens joined by a single space) to occurrence count */
export type NgramCounts = Map<string, number>;

export type ScoringMode = "A" | "B";

export type MetricLabel = `ROUGE-${number}`;

export interface ScoreTriple {
    R: number;
    P: number;
    F: number;
}

export type RougeScores = Record<MetricLabel, ScoreTriple>;

/** `R` is null when the increment contributed no tokens */
export interface IncrementalRecall {
    R: number | null;
}

export type IncrementalScores = Record<MetricLabel, IncrementalRecall>;

/** Per-reference statistics for a single n */
export interface MatchCounts {
    candidateCount: number;
    referenceCount: number;
    matchCount: number;
}

export interface IncrementalSession {
    maxN: number;
    /** Per n (index n - 1): one n-gram table per reference */
    referenceCounts: NgramCounts[][];
    /** Per n (index n - 1): summed n-gram total over all references */
    referenceTotals: number[];
    /** Last maxN - 1 tokens seen, padded with empty strings */
    carryOver: string[];
}

export interface IncrementalStep {
    scores: IncrementalScores;
    session: IncrementalSession;
}

export function metricLabel(n: number): MetricLabel {
    return `ROUGE-${n}`;
}
