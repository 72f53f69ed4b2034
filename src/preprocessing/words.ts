import { stemmer } from "stemmer";

export type StopwordStrategy =
    | { kind: "keep" }
    | { kind: "remove"; stopwords: ReadonlySet<string> };

export type StemmingStrategy =
    | { kind: "none" }
    | { kind: "porter"; exceptions: ReadonlyMap<string, string> };

export const KEEP_STOPWORDS: StopwordStrategy = { kind: "keep" };
export const NO_STEMMING: StemmingStrategy = { kind: "none" };

// A surviving word must start with one of these
const WORD_START = /^[a-z0-9$]/;

/**
 * Returns null when the word is a stopword and stopwords are being removed
 */
export function removeStopword(strategy: StopwordStrategy, word: string): string | null {
    switch (strategy.kind) {
        case "keep":
            return word;
        case "remove":
            return strategy.stopwords.has(word) ? null : word;
    }
}

/**
 * Stem a word. Irregular forms listed in the exception table are replaced by
 * their base form first, and the base form is then stemmed as well.
 */
export function stemWord(strategy: StemmingStrategy, word: string): string {
    switch (strategy.kind) {
        case "none":
            return word;
        case "porter":
            return stemmer(strategy.exceptions.get(word) ?? word);
    }
}

/**
 * Word-level normalization: lowercase, stopword removal, leading character
 * check, stemming. Returns null for a dropped word.
 */
export function preprocessWord(
    word: string,
    stopwords: StopwordStrategy,
    stemming: StemmingStrategy
): string | null {
    const kept = removeStopword(stopwords, word.toLowerCase());
    if (kept === null || kept === "" || !WORD_START.test(kept)) {
        return null;
    }
    return stemWord(stemming, kept);
}
