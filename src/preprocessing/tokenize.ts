import type { TokenizedText } from "../types";
import { DEFAULT_DATA_DIR, stopwordsPathFor } from "../config";
import { ConfigurationError } from "../errors";
import { createSentenceSplitter, type SentenceSplitMode, type SentenceSplitter } from "./segment";
import { loadStemmingExceptions, loadStopwords } from "./resources";
import { truncateBytes, truncateWords } from "./truncate";
import {
    KEEP_STOPWORDS,
    NO_STEMMING,
    preprocessWord,
    type StemmingStrategy,
    type StopwordStrategy,
} from "./words";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

/**
 * Anything that turns a text into sentences of tokens can drive the scorer.
 * Substitutes need not stem, remove stopwords or truncate, but their scores
 * will not match ROUGE-1.5.5.
 */
export interface Tokenizer {
    tokenizeText: (text: string) => TokenizedText;
}

export interface Rouge155TokenizerOptions {
    /** Keep only the first N bytes (0 = unlimited) */
    byteLimit?: number;
    /** Keep only the first N words (0 = unlimited) */
    wordLimit?: number;
    /** Needs `exceptionsDir` */
    stem?: boolean;
    removeStopwords?: boolean;
    sentenceSplit?: SentenceSplitMode;
    stopwordsPath?: string;
    /** Directory holding adj.exc, adv.exc, noun.exc and verb.exc */
    exceptionsDir?: string;
    verbose?: boolean;
}

export interface Rouge155Tokenizer extends Tokenizer {
    byteLimit: number;
    wordLimit: number;
    stopwords: StopwordStrategy;
    stemming: StemmingStrategy;
    splitSentences: SentenceSplitter;
}

/**
 * Sentence-level normalization: isolate hyphens, blank out every other
 * non-alphanumeric character, trim and collapse whitespace
 */
export function preprocessText(sentence: string): string {
    return sentence
        .replace(/-/g, " - ")
        .replace(/[^A-Za-z0-9-]/g, " ")
        .replace(/^\s+/, "")
        .replace(/\s+$/, "")
        .replace(/\s+/g, " ");
}

/**
 * Split a normalized sentence into words and normalize each one,
 * dropping words that normalize to nothing
 */
export function tokenizeSentence(
    sentence: string,
    stopwords: StopwordStrategy,
    stemming: StemmingStrategy
): string[] {
    const tokens: string[] = [];
    for (const word of preprocessText(sentence).split(" ")) {
        if (word === "") continue;
        const token = preprocessWord(word, stopwords, stemming);
        if (token !== null && token !== "") {
            tokens.push(token);
        }
    }
    return tokens;
}

/**
 * Create the ROUGE-1.5.5 compatible tokenizer.
 * Data files are read once here; a missing file fails construction.
 * The stopword list is bundled; the WordNet exception files are not, so
 * stemming is off unless asked for together with `exceptionsDir`.
 */
export function createRouge155Tokenizer(options: Rouge155TokenizerOptions = {}): Rouge155Tokenizer {
    const {
        byteLimit = 0,
        wordLimit = 0,
        stem = false,
        removeStopwords = true,
        sentenceSplit = "SPL",
        stopwordsPath = stopwordsPathFor(DEFAULT_DATA_DIR),
        exceptionsDir,
        verbose = logger.isVerbose(),
    } = options;

    let stopwords: StopwordStrategy = KEEP_STOPWORDS;
    if (removeStopwords) {
        const words = loadStopwords(stopwordsPath);
        logger.debug(`Loaded ${words.size} stopwords from ${stopwordsPath}`, verbose);
        stopwords = { kind: "remove", stopwords: words };
    }

    let stemming: StemmingStrategy = NO_STEMMING;
    if (stem) {
        if (exceptionsDir === undefined) {
            throw new ConfigurationError("Stemming requires exceptionsDir, the WordNet 2.0 exception directory");
        }
        const exceptions = loadStemmingExceptions(exceptionsDir);
        logger.debug(`Loaded ${exceptions.size} stemming exceptions from ${exceptionsDir}`, verbose);
        stemming = { kind: "porter", exceptions };
    }

    const splitSentences = createSentenceSplitter(sentenceSplit);

    function tokenizeText(text: string): TokenizedText {
        let tokenized: TokenizedText = splitSentences(text).map((sentence) =>
            tokenizeSentence(sentence, stopwords, stemming)
        );

        if (byteLimit > 0) {
            tokenized = truncateBytes(tokenized, byteLimit);
        }
        if (wordLimit > 0) {
            tokenized = truncateWords(tokenized, wordLimit);
        }
        return tokenized;
    }

    return {
        byteLimit,
        wordLimit,
        stopwords,
        stemming,
        splitSentences,
        tokenizeText,
    };
}
