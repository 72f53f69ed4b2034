/**
 * MCP Server entry point
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { IncrementalSessionStore, ScoringOptionsSchema, scoreTexts } from "./tools";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

const sessions = new IncrementalSessionStore();

function textResult(value: unknown) {
    return {
        content: [
            {
                type: "text" as const,
                text: JSON.stringify(value, null, 2),
            },
        ],
    };
}

function errorResult(error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return {
        isError: true,
        content: [
            {
                type: "text" as const,
                text: message,
            },
        ],
    };
}

// Create MCP server
const server = new McpServer({
    name: "rouge_n",
    version: "0.1.0",
});

server.tool(
    "rouge_n_score",
    `Score a candidate summary against one or more reference summaries with ROUGE-N.

Tokenization matches the ROUGE-1.5.5 script: sentences are split on newlines, non-alphanumeric characters are dropped, words are lowercased, and stopword removal and Porter stemming are optional.

RETURNS: JSON object keyed "ROUGE-1" .. "ROUGE-n", each with recall (R), precision (P) and F-score (F) rounded to 5 decimals.`,
    {
        candidate: z.string().describe("The summary being evaluated"),
        references: z.array(z.string()).min(1).describe("Reference summaries"),
        options: ScoringOptionsSchema.optional(),
    },
    async ({ candidate, references, options }) => {
        try {
            return textResult(scoreTexts(candidate, references, options ?? {}));
        } catch (error) {
            logger.error(`rouge_n_score failed: ${error}`);
            return errorResult(error);
        }
    }
);

server.tool(
    "rouge_incremental_reset",
    `Start an incremental ROUGE-N recall session for a set of reference summaries.

Use the same sessionKey with rouge_incremental_score to feed text one piece at a time. Calling reset again with the same key discards the previous session.`,
    {
        sessionKey: z.string().describe("Name of the session"),
        references: z.array(z.string()).min(1).describe("Reference summaries"),
        options: ScoringOptionsSchema.optional(),
    },
    async ({ sessionKey, references, options }) => {
        try {
            sessions.reset(sessionKey, references, options ?? {});
            return textResult({ sessionKey, ready: true });
        } catch (error) {
            logger.error(`rouge_incremental_reset failed: ${error}`);
            return errorResult(error);
        }
    }
);

server.tool(
    "rouge_incremental_score",
    `Add text (e.g. one sentence) to an incremental session and return the recall it contributes.

RETURNS: JSON object keyed "ROUGE-1" .. "ROUGE-n" with the added recall (R), or null when the text contained no scorable words. Recall values summed over all increments equal the recall of the whole text.`,
    {
        sessionKey: z.string().describe("Session created with rouge_incremental_reset"),
        text: z.string().describe("Text to append"),
    },
    async ({ sessionKey, text }) => {
        try {
            return textResult(sessions.score(sessionKey, text));
        } catch (error) {
            logger.error(`rouge_incremental_score failed: ${error}`);
            return errorResult(error);
        }
    }
);

server.tool(
    "rouge_incremental_end",
    `End an incremental session and free its reference tables.

Sessions are also dropped, least recently used first, once too many are open.`,
    {
        sessionKey: z.string().describe("Session created with rouge_incremental_reset"),
    },
    async ({ sessionKey }) => {
        return textResult({ sessionKey, ended: sessions.end(sessionKey) });
    }
);

// Start the server
async function main() {
    const transport = new StdioServerTransport();
    await server.connect(transport);
}

main().catch((error) => {
    logger.error(`Fatal error: ${error}`);
    process.exit(1);
});
