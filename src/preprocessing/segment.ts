import { ConfigurationError, NotImplementedFeatureError } from "../errors";

/**
 * Sentence split modes of ROUGE-1.5.5.
 * - none: the whole text is one sentence
 * - SPL: one sentence per line
 * - SEE: sentences are the anchor texts of a SEE-formatted HTML summary
 * - ISI, SIMPLE: declared, not implemented
 */
export type SentenceSplitMode = "none" | "SPL" | "SEE" | "ISI" | "SIMPLE";

export const SENTENCE_SPLIT_MODES: readonly SentenceSplitMode[] = ["none", "SPL", "SEE", "ISI", "SIMPLE"];

export type SentenceSplitter = (text: string) => string[];

// <a name="1">[1]</a> <a href="#1" id=1>Sentence text
// Groups 2 and 4 hold the sentence text of the two alternatives.
const SEE_PATTERN =
    /<a size="[0-9]+" name="[0-9]+">\[([0-9]+)\]<\/a>\s+<a href="#[0-9]+" id=[0-9]+>([^<]+)|<a name="[0-9]+">\[([0-9]+)\]<\/a>\s+<a href="#[0-9]+" id=[0-9]+>([^<]+)/g;

export function isSentenceSplitMode(value: string): value is SentenceSplitMode {
    return (SENTENCE_SPLIT_MODES as readonly string[]).includes(value);
}

export function splitLines(text: string): string[] {
    return text.split("\n");
}

/**
 * Extract sentence texts from SEE markup
 */
export function extractSeeSentences(html: string): string[] {
    const sentences: string[] = [];
    for (const match of html.matchAll(SEE_PATTERN)) {
        sentences.push(match[2] ?? match[4] ?? "");
    }
    return sentences;
}

/**
 * Resolve the splitter for a mode. Unimplemented and unknown modes fail here,
 * at construction time, rather than when text is split.
 */
export function createSentenceSplitter(mode: string): SentenceSplitter {
    if (!isSentenceSplitMode(mode)) {
        throw new ConfigurationError(
            `Invalid sentence split mode "${mode}", must be one of: ${SENTENCE_SPLIT_MODES.join(", ")}`
        );
    }

    switch (mode) {
        case "none":
            return (text) => [text];
        case "SPL":
            return splitLines;
        case "SEE":
            return extractSeeSentences;
        case "ISI":
        case "SIMPLE":
            throw new NotImplementedFeatureError(`${mode} sentence splitting`);
    }
}
