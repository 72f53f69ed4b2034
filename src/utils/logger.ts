export interface TimingResult {
    label: string;
    durationMs: number;
}

class Logger {
    private static instance: Logger;
    private timings: TimingResult[] = [];
    private timingEnabled: boolean = false;
    private verbose: boolean = false;

    private constructor() {
        // Private constructor to prevent direct instantiation
    }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public error(message: string) {
        console.error(`[${new Date().toISOString()}] [ERROR] ${message}`);
    }

    /**
     * Debug lines go to stderr so they never mix with score output on stdout.
     * Printed when `enabled` is true or verbose mode is on.
     */
    public debug(message: string, enabled: boolean = this.verbose): void {
        if (enabled) {
            console.error(`[${new Date().toISOString()}] [DEBUG] ${message}`);
        }
    }

    public setVerbose(verbose: boolean): void {
        this.verbose = verbose;
    }

    public isVerbose(): boolean {
        return this.verbose;
    }

    /**
     * Enable or disable timing collection
     */
    public setTimingEnabled(enabled: boolean): void {
        this.timingEnabled = enabled;
        if (enabled) {
            this.timings = [];
        }
    }

    /**
     * Time a synchronous function and record the result
     */
    public time<T>(label: string, fn: () => T): T {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        const result = fn();
        const durationMs = performance.now() - start;
        this.timings.push({ label, durationMs });
        return result;
    }

    /**
     * Print timing summary to stderr, one line per label with its total
     */
    public printTimings(): void {
        if (this.timings.length === 0) {
            console.error("[TIMING] No timings recorded");
            return;
        }

        const totals = new Map<string, number>();
        for (const timing of this.timings) {
            totals.set(timing.label, (totals.get(timing.label) ?? 0) + timing.durationMs);
        }

        console.error("\n[TIMING] === Performance Summary ===");
        const total = this.timings.reduce((sum, t) => sum + t.durationMs, 0);

        for (const [label, durationMs] of totals) {
            const pct = total > 0 ? ((durationMs / total) * 100).toFixed(1) : "0.0";
            console.error(`[TIMING] ${label.padEnd(30)} ${durationMs.toFixed(2).padStart(8)}ms (${pct.padStart(5)}%)`);
        }

        console.error(`[TIMING] ${"TOTAL".padEnd(30)} ${total.toFixed(2).padStart(8)}ms`);
        console.error("[TIMING] ================================\n");
    }
}

export default Logger;
