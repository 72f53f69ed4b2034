import * as path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { ConfigurationError } from "./errors";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Bundled data directory. It holds the SMART stopword list only; the WordNet
 * 2.0 exception files come from a ROUGE data directory given with -e.
 */
export const DEFAULT_DATA_DIR = path.resolve(__dirname, "..", "data");

export const STOPWORDS_FILE = "smart_common_words.txt";
export const EXCEPTIONS_DIR = "WordNet-2.0-Exceptions";

export function stopwordsPathFor(dataDir: string): string {
    return path.join(dataDir, STOPWORDS_FILE);
}

export function exceptionsDirFor(dataDir: string): string {
    return path.join(dataDir, EXCEPTIONS_DIR);
}

/**
 * Options of the ROUGE-1.5.5 script, keyed by their flag letter.
 * Flags for ROUGE-L/W/S/BE, bootstrap resampling and file integration are
 * accepted so existing argument sets validate, but they have no effect.
 * Unknown keys are dropped.
 */
export const Rouge155ArgsSchema = z.object({
    b: z.number().int().min(0).default(0).describe("Only use the first b bytes of each text (0 = all)"),
    l: z.number().int().min(0).default(0).describe("Only use the first l words of each text (0 = all)"),
    m: z.boolean().default(false).describe("Stem with the Porter stemmer"),
    s: z.boolean().default(false).describe("Remove stopwords"),
    n: z.number().int().min(1).default(4).describe("Compute ROUGE-1 up to ROUGE-n"),
    f: z.enum(["A", "B"]).default("A").describe("Scoring formula: A = model average, B = best model"),
    p: z.number().min(0).max(1).default(0.5).describe("Relative importance of recall and precision"),
    e: z.string().nullable().default(null).describe("ROUGE data directory"),
    v: z.boolean().default(false).describe("Verbose debug output"),

    // Accepted, no effect
    x: z.boolean().default(false),
    c: z.number().default(0.95),
    r: z.number().int().default(1000),
    d: z.boolean().default(true),
    w: z.number().nullable().default(null),
    z: z.string().nullable().default(null),
    t: z.number().nullable().default(null),
});

export type Rouge155ArgsInput = z.input<typeof Rouge155ArgsSchema>;
export type Rouge155Args = z.output<typeof Rouge155ArgsSchema>;

/**
 * Validate ROUGE-1.5.5 style options, filling in the script's defaults
 */
export function parseRouge155Args(input: Rouge155ArgsInput = {}): Rouge155Args {
    const result = Rouge155ArgsSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `-${issue.path.join(".") || "?"}: ${issue.message}`)
            .join("; ");
        throw new ConfigurationError(`Invalid ROUGE options: ${issues}`);
    }
    return result.data;
}
