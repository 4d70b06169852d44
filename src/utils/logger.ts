export interface TimingResult {
    label: string;
    durationMs: number;
    calls: number;
}

class Logger {
    private static instance: Logger;
    private timings = new Map<string, TimingResult>();
    private timingEnabled: boolean = false;

    private constructor() {
        // Private constructor to prevent direct instantiation
    }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public log(message: string) {
        console.log(`[${new Date().toISOString()}] [INFO] ${message}`);
    }

    public warn(message: string) {
        console.error(`[${new Date().toISOString()}] [WARN] ${message}`);
    }

    public error(message: string) {
        console.error(`[${new Date().toISOString()}] [ERROR] ${message}`);
    }

    /**
     * Enable or disable timing collection
     */
    public setTimingEnabled(enabled: boolean): void {
        this.timingEnabled = enabled;
        if (enabled) {
            this.timings.clear();
        }
    }

    public isTimingEnabled(): boolean {
        return this.timingEnabled;
    }

    /**
     * Time a synchronous function and add its duration to the label's total
     */
    public time<T>(label: string, fn: () => T): T {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        const result = fn();
        this.recordTiming(label, performance.now() - start);
        return result;
    }

    /**
     * Time an async function and add its duration to the label's total
     */
    public async timeAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        const result = await fn();
        this.recordTiming(label, performance.now() - start);
        return result;
    }

    /**
     * Get recorded timings, one entry per label in first-seen order
     */
    public getTimings(): TimingResult[] {
        return [...this.timings.values()].map(t => ({ ...t }));
    }

    public clearTimings(): void {
        this.timings.clear();
    }

    /**
     * Record a timing directly (useful for manual timing measurements)
     */
    public recordTiming(label: string, durationMs: number): void {
        if (!this.timingEnabled) return;
        const existing = this.timings.get(label);
        if (existing) {
            existing.durationMs += durationMs;
            existing.calls++;
        } else {
            this.timings.set(label, { label, durationMs, calls: 1 });
        }
    }

    /**
     * Print timing summary to stderr
     */
    public printTimings(): void {
        if (this.timings.size === 0) {
            console.error("[TIMING] No timings recorded");
            return;
        }

        console.error("\n[TIMING] === Performance Summary ===");
        const timings = this.getTimings();
        const total = timings.reduce((sum, t) => sum + t.durationMs, 0);

        for (const timing of timings) {
            const pct = total > 0 ? ((timing.durationMs / total) * 100).toFixed(1) : "0.0";
            console.error(
                `[TIMING] ${timing.label.padEnd(30)} ${timing.durationMs.toFixed(2).padStart(8)}ms ` +
                `(${pct.padStart(5)}%) x${timing.calls}`
            );
        }

        console.error(`[TIMING] ${"TOTAL".padEnd(30)} ${total.toFixed(2).padStart(8)}ms`);
        console.error("[TIMING] ================================\n");
    }
}

export default Logger;
