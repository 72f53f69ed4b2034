import type { Rouge155ArgsInput } from "./config";

export interface ScoreCommandArgs {
    candidatePath: string;
    referencePaths: string[];
    rouge: Rouge155ArgsInput;
    json: boolean;
    timing: boolean;
}

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

function parseInteger(flag: string, value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new UsageError(`${flag} expects an integer, got "${value}"`);
    }
    return parsed;
}

function parseNumber(flag: string, value: string): number {
    const parsed = Number(value);
    if (value.trim() === "" || Number.isNaN(parsed)) {
        throw new UsageError(`${flag} expects a number, got "${value}"`);
    }
    return parsed;
}

/**
 * Parse the arguments of the `score` and `incremental` commands.
 * Single-letter options are ROUGE-1.5.5 flags with the same meaning; their
 * values are validated later by the options schema. Options of this tool
 * are spelled out, since ROUGE-1.5.5 already uses -c, -r and -t.
 */
export function parseScoreArgs(args: readonly string[]): ScoreCommandArgs {
    let candidatePath = "";
    const referencePaths: string[] = [];
    const rouge: Rouge155ArgsInput = {};
    let json = false;
    let timing = false;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const nextArg = args[i + 1];

        if (arg === "--candidate" && nextArg !== undefined) {
            candidatePath = nextArg;
            i++;
        } else if (arg === "--reference" && nextArg !== undefined) {
            referencePaths.push(nextArg);
            i++;
        } else if (arg === "-n" && nextArg !== undefined) {
            rouge.n = parseInteger(arg, nextArg);
            i++;
        } else if (arg === "-f" && nextArg !== undefined) {
            if (nextArg !== "A" && nextArg !== "B") {
                throw new UsageError(`-f expects A or B, got "${nextArg}"`);
            }
            rouge.f = nextArg;
            i++;
        } else if (arg === "-p" && nextArg !== undefined) {
            rouge.p = parseNumber(arg, nextArg);
            i++;
        } else if (arg === "-b" && nextArg !== undefined) {
            rouge.b = parseInteger(arg, nextArg);
            i++;
        } else if (arg === "-l" && nextArg !== undefined) {
            rouge.l = parseInteger(arg, nextArg);
            i++;
        } else if (arg === "-e" && nextArg !== undefined) {
            rouge.e = nextArg;
            i++;
        } else if (arg === "-m") {
            rouge.m = true;
        } else if (arg === "-s") {
            rouge.s = true;
        } else if (arg === "-v") {
            rouge.v = true;
        } else if (arg === "--json") {
            json = true;
        } else if (arg === "--timing") {
            timing = true;
        } else {
            throw new UsageError(`Unknown or incomplete option: ${arg}`);
        }
    }

    if (candidatePath === "") {
        throw new UsageError("--candidate <file> is required");
    }
    if (referencePaths.length === 0) {
        throw new UsageError("at least one --reference <file> is required");
    }

    return { candidatePath, referencePaths, rouge, json, timing };
}
