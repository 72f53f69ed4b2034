/**
 * Handlers behind the MCP tools. Kept apart from the server so they can be
 * exercised without a transport.
 */

import { z } from "zod";
import { createRougeScorerFromRouge155Args, type RougeScorer } from "../scoring/rouge";
import type { IncrementalScores, IncrementalSession, RougeScores } from "../types";
import { truncateText } from "../utils/shared";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export const ScoringOptionsSchema = z.object({
    n: z.number().int().min(1).max(9).optional().describe("Compute ROUGE-1 up to ROUGE-n (default: 4)"),
    scoring: z.enum(["A", "B"]).optional().describe("A = average over references, B = best reference (default: A)"),
    alpha: z.number().min(0).max(1).optional().describe("Recall/precision weight of the F-score (default: 0.5)"),
    stem: z.boolean().optional().describe("Apply the Porter stemmer; needs dataDir (default: false)"),
    removeStopwords: z.boolean().optional().describe("Remove stopwords (default: false)"),
    byteLimit: z.number().int().min(0).optional().describe("Only use the first N bytes of each text (default: 0 = all)"),
    wordLimit: z.number().int().min(0).optional().describe("Only use the first N words of each text (default: 0 = all)"),
    dataDir: z
        .string()
        .optional()
        .describe("ROUGE data directory with smart_common_words.txt and WordNet-2.0-Exceptions/"),
});

export type ScoringOptions = z.infer<typeof ScoringOptionsSchema>;

export function createScorer(options: ScoringOptions = {}): RougeScorer {
    return createRougeScorerFromRouge155Args({
        ...(options.n !== undefined && { n: options.n }),
        ...(options.scoring !== undefined && { f: options.scoring }),
        ...(options.alpha !== undefined && { p: options.alpha }),
        ...(options.stem !== undefined && { m: options.stem }),
        ...(options.removeStopwords !== undefined && { s: options.removeStopwords }),
        ...(options.byteLimit !== undefined && { b: options.byteLimit }),
        ...(options.wordLimit !== undefined && { l: options.wordLimit }),
        ...(options.dataDir !== undefined && { e: options.dataDir }),
    });
}

export function scoreTexts(candidate: string, references: string[], options: ScoringOptions = {}): RougeScores {
    logger.debug(`Scoring "${truncateText(candidate, 60)}" against ${references.length} reference(s)`);
    return createScorer(options).nScore(candidate, references);
}

interface SessionEntry {
    scorer: RougeScorer;
    session: IncrementalSession;
}

/** Sessions kept at once; starting another drops the least recently used */
export const MAX_SESSIONS = 64;

/**
 * Incremental scoring sessions keyed by a caller-chosen session key.
 * Every key owns its own scorer and session, so keys never share state.
 */
export class IncrementalSessionStore {
    private sessions = new Map<string, SessionEntry>();

    constructor(private readonly maxSessions: number = MAX_SESSIONS) {}

    /** Start (or restart) the session for a key */
    reset(sessionKey: string, references: string[], options: ScoringOptions = {}): void {
        const scorer = createScorer(options);
        this.sessions.delete(sessionKey);
        this.sessions.set(sessionKey, { scorer, session: scorer.resetIncremental(references) });
        this.evict();
        logger.debug(`Reset incremental session "${sessionKey}" with ${references.length} reference(s)`);
    }

    score(sessionKey: string, text: string): IncrementalScores {
        const entry = this.sessions.get(sessionKey);
        if (entry === undefined) {
            throw new Error(`No incremental session "${sessionKey}"; call rouge_incremental_reset first`);
        }
        const step = entry.scorer.nScoreIncremental(entry.session, text);
        entry.session = step.session;
        // Map order doubles as recency
        this.sessions.delete(sessionKey);
        this.sessions.set(sessionKey, entry);
        return step.scores;
    }

    /** Drop a session; returns false when there was none */
    end(sessionKey: string): boolean {
        return this.sessions.delete(sessionKey);
    }

    has(sessionKey: string): boolean {
        return this.sessions.has(sessionKey);
    }

    get size(): number {
        return this.sessions.size;
    }

    private evict(): void {
        for (const key of this.sessions.keys()) {
            if (this.sessions.size <= this.maxSessions) break;
            this.sessions.delete(key);
            logger.debug(`Dropped incremental session "${key}"`);
        }
    }
}
