import * as fs from "fs";
import * as path from "path";
import { ConfigurationError } from "../errors";

/** Part-of-speech exception files, applied in this order (later files win) */
export const EXCEPTION_FILES = ["adj.exc", "adv.exc", "noun.exc", "verb.exc"] as const;

/**
 * Load a newline-separated stopword list
 */
export function loadStopwords(stopwordsPath: string): Set<string> {
    if (!fs.existsSync(stopwordsPath)) {
        throw new ConfigurationError(`Stopword file ${stopwordsPath} not found`);
    }

    const words = fs
        .readFileSync(stopwordsPath, "utf8")
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);

    if (words.length === 0) {
        throw new ConfigurationError(`Stopword file ${stopwordsPath} is empty`);
    }

    return new Set(words);
}

/**
 * Parse the lines of one WordNet exception file.
 * Each line is `inflected base [base ...]`; only the first base form is used.
 */
export function parseExceptionLines(content: string): Array<[string, string]> {
    const entries: Array<[string, string]> = [];
    for (const line of content.split(/\r?\n/)) {
        const [inflected, base] = line.trim().split(/\s+/);
        if (inflected === undefined || inflected === "" || base === undefined) continue;
        entries.push([inflected, base]);
    }
    return entries;
}

/**
 * Load the four WordNet exception files into one inflected -> base lookup
 */
export function loadStemmingExceptions(exceptionsDir: string): Map<string, string> {
    if (!fs.existsSync(exceptionsDir) || !fs.statSync(exceptionsDir).isDirectory()) {
        throw new ConfigurationError(
            `Exception directory ${exceptionsDir} not found; stemming needs the WordNet 2.0 exception files ` +
                `(${EXCEPTION_FILES.join(", ")}) in a WordNet-2.0-Exceptions directory under the ROUGE data directory (-e)`
        );
    }

    const found = fs
        .readdirSync(exceptionsDir)
        .filter((name) => name.endsWith(".exc"))
        .sort();

    const missing = EXCEPTION_FILES.filter((name) => !found.includes(name));
    if (found.length !== EXCEPTION_FILES.length || missing.length > 0) {
        throw new ConfigurationError(
            `Exception files needed: [${EXCEPTION_FILES.join(", ")}]; found: [${found.join(", ")}]`
        );
    }

    const exceptions = new Map<string, string>();
    for (const name of EXCEPTION_FILES) {
        const content = fs.readFileSync(path.join(exceptionsDir, name), "utf8");
        for (const [inflected, base] of parseExceptionLines(content)) {
            exceptions.set(inflected, base);
        }
    }
    return exceptions;
}
