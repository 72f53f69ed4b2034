#!/usr/bin/env node

import * as fs from "fs";
import { parseScoreArgs, UsageError, type ScoreCommandArgs } from "./args";
import { createRougeScorerFromRouge155Args } from "./scoring/rouge";
import { formatIncremental, formatScores } from "./output/report";
import { splitLines } from "./preprocessing/segment";
import type { IncrementalScores } from "./types";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
rouge-n - ROUGE-N scores compatible with ROUGE-1.5.5

COMMANDS:
  score [options]          Score a candidate summary against references
  incremental [options]    Feed the candidate one line at a time and print
                           the recall each line adds
  mcp                      Start the MCP server (called by MCP clients)
  help, --help             Show this help message

OPTIONS:
  --candidate <file>       Candidate (system/peer) summary, one sentence per line
  --reference <file>       Reference (model) summary; repeat for several
  -n <n>                   Compute ROUGE-1 up to ROUGE-n (default: 4)
  -f <A|B>                 Scoring formula: A = model average, B = best model
  -p <alpha>               Relative importance of recall and precision (default: 0.5)
  -m                       Stem with the Porter stemmer (needs -e)
  -s                       Remove stopwords
  -b <bytes>               Only use the first n bytes of each text
  -l <words>               Only use the first n words of each text
  -e <dir>                 ROUGE data directory holding smart_common_words.txt
                           and WordNet-2.0-Exceptions/
  -v                       Verbose debug output on stderr
  --json                   Print JSON instead of the ROUGE-1.5.5 layout
  --timing                 Print a timing summary on stderr

EXAMPLES:
  rouge-n score --candidate system.txt --reference model1.txt --reference model2.txt -s
  rouge-n score --candidate system.txt --reference model.txt -n 2 -f B --json
  rouge-n incremental --candidate system.txt --reference model.txt -n 2
  rouge-n score --candidate system.txt --reference model.txt -m -e ~/ROUGE-1.5.5/data
`;

function readText(filePath: string): string {
    if (!fs.existsSync(filePath)) {
        throw new UsageError(`File not found: ${filePath}`);
    }
    return fs.readFileSync(filePath, "utf8");
}

function runScore(options: ScoreCommandArgs): void {
    const scorer = createRougeScorerFromRouge155Args(options.rouge);
    const candidate = readText(options.candidatePath);
    const references = options.referencePaths.map(readText);

    logger.debug(`Candidate: ${options.candidatePath}`);
    logger.debug(`References: ${options.referencePaths.join(", ")}`);

    const scores = scorer.nScore(candidate, references);

    if (options.json) {
        console.log(JSON.stringify(scores, null, 2));
    } else {
        console.log(formatScores(scores));
    }
}

function runIncremental(options: ScoreCommandArgs): void {
    const scorer = createRougeScorerFromRouge155Args(options.rouge);
    const references = options.referencePaths.map(readText);

    let session = scorer.resetIncremental(references);
    const steps: IncrementalScores[] = [];
    for (const line of splitLines(readText(options.candidatePath))) {
        const step = scorer.nScoreIncremental(session, line);
        session = step.session;
        steps.push(step.scores);
    }

    if (options.json) {
        console.log(JSON.stringify(steps, null, 2));
    } else {
        console.log(formatIncremental(steps));
    }
}

async function main(): Promise<void> {
    // Filter out standalone "--" which package managers pass through
    const args = process.argv.slice(2).filter((a) => a !== "--");
    const command = args[0];

    switch (command) {
        case "score":
        case "incremental": {
            const options = parseScoreArgs(args.slice(1));
            if (options.rouge.v) {
                logger.setVerbose(true);
            }
            if (options.timing) {
                logger.setTimingEnabled(true);
            }
            if (command === "score") {
                runScore(options);
            } else {
                runIncremental(options);
            }
            if (options.timing) {
                logger.printTimings();
            }
            break;
        }

        case "mcp": {
            // Dynamically import and run MCP server
            await import("./mcp/server");
            break;
        }

        case "--help":
        case "-h":
        case "help":
        case undefined: {
            console.log(HELP_TEXT);
            break;
        }

        default: {
            console.log(`Unknown command: ${command}`);
            console.log("Run 'rouge-n --help' for usage.\n");
            process.exit(1);
        }
    }
}

main().catch((err) => {
    if (err instanceof UsageError) {
        logger.error(err.message);
        console.log("Run 'rouge-n --help' for usage.\n");
    } else {
        logger.error(err instanceof Error ? `${err.name}: ${err.message}` : `Unexpected error: ${err}`);
    }
    process.exit(1);
});
