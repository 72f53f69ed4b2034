import type { IncrementalScores, RougeScores } from "../types";

export interface ReportOptions {
    /** Leading column, e.g. the system id */
    systemId?: string;
}

function formatValue(value: number): string {
    return value.toFixed(5);
}

/**
 * Format batch scores in the layout of ROUGE-1.5.5's summary lines,
 * without confidence intervals:
 *
 *   X ROUGE-1 Average_R: 0.66667
 */
export function formatScores(scores: RougeScores, options: ReportOptions = {}): string {
    const { systemId = "X" } = options;
    const lines: string[] = [];

    for (const [metric, triple] of Object.entries(scores)) {
        lines.push("-".repeat(43));
        for (const key of ["R", "P", "F"] as const) {
            lines.push(`${systemId} ${metric} Average_${key}: ${formatValue(triple[key])}`);
        }
    }
    if (lines.length > 0) {
        lines.push("-".repeat(43));
    }

    return lines.join("\n");
}

/**
 * One line per increment: the increment number followed by each metric's
 * recall, or "-" when the increment added no tokens
 */
export function formatIncremental(steps: readonly IncrementalScores[]): string {
    const lines: string[] = [];

    steps.forEach((scores, index) => {
        const cells = Object.entries(scores).map(([metric, recall]) => {
            const value = recall.R === null ? "-" : recall.R.toFixed(5);
            return `${metric}=${value}`;
        });
        lines.push(`${String(index + 1).padStart(4)}  ${cells.join("  ")}`);
    });

    return lines.join("\n");
}
