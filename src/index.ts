export type {
    IncrementalRecall,
    IncrementalScores,
    IncrementalSession,
    IncrementalStep,
    MatchCounts,
    MetricLabel,
    NgramCounts,
    RougeScores,
    ScoreTriple,
    ScoringMode,
    TokenizedSentence,
    TokenizedText,
} from "./types";
export { metricLabel } from "./types";
export { ConfigurationError, NotImplementedFeatureError } from "./errors";
export {
    DEFAULT_DATA_DIR,
    Rouge155ArgsSchema,
    parseRouge155Args,
    type Rouge155Args,
    type Rouge155ArgsInput,
} from "./config";
export {
    createRouge155Tokenizer,
    preprocessText,
    type Rouge155Tokenizer,
    type Rouge155TokenizerOptions,
    type Tokenizer,
} from "./preprocessing/tokenize";
export { createSentenceSplitter, type SentenceSplitMode } from "./preprocessing/segment";
export { truncateBytes, truncateWords } from "./preprocessing/truncate";
export { loadStemmingExceptions, loadStopwords } from "./preprocessing/resources";
export type { StemmingStrategy, StopwordStrategy } from "./preprocessing/words";
export { buildNgrams, countMatches, ngramCounts } from "./scoring/ngrams";
export {
    createRougeScorer,
    createRougeScorerFromRouge155Args,
    type RougeConfig,
    type RougeScorer,
} from "./scoring/rouge";
export { formatIncremental, formatScores } from "./output/report";
export { default as Logger } from "./utils/logger";
