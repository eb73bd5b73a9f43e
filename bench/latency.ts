import type { LatencyStats, OperationType, OperationLatencies } from "./types";
import { mean } from "./utils";

const DEFAULT_STATS: LatencyStats = {
    p05: 0,
    p25: 0,
    p50: 0,
    p75: 0,
    p90: 0,
    p95: 0,
    p99: 0,
    p999: 0,
    max: 0,
    mean: 0,
    count: 0,
};

/**
 * Latency histogram for tracking operation latencies and calculating percentiles.
 *
 * Stores raw samples and computes percentiles on demand.
 */
export class LatencyHistogram {
    private samples: bigint[] = [];
    private sorted = false;

    /**
     * @param nanos - Latency in nanoseconds (from process.hrtime.bigint())
     */
    record(nanos: bigint): void {
        this.samples.push(nanos);
        this.sorted = false;
    }

    count(): number {
        return this.samples.length;
    }

    reset(): void {
        this.samples = [];
        this.sorted = false;
    }

    /**
     * @param p - Percentile (0.50 for p50, 0.95 for p95, etc.)
     * @returns Latency in nanoseconds
     */
    percentile(p: number): number {
        if (this.samples.length === 0) return 0;

        this.ensureSorted();

        const index = Math.ceil(p * this.samples.length) - 1;
        const clampedIndex = Math.max(0, Math.min(index, this.samples.length - 1));

        return Number(this.samples[clampedIndex]);
    }

    max(): number {
        if (this.samples.length === 0) return 0;
        this.ensureSorted();
        return Number(this.samples[this.samples.length - 1]);
    }

    mean(): number {
        return mean(this.getSamples());
    }

    stats(): LatencyStats {
        if (this.samples.length === 0) return { ...DEFAULT_STATS };

        return {
            p05: this.percentile(0.05),
            p25: this.percentile(0.25),
            p50: this.percentile(0.50),
            p75: this.percentile(0.75),
            p90: this.percentile(0.90),
            p95: this.percentile(0.95),
            p99: this.percentile(0.99),
            p999: this.percentile(0.999),
            max: this.max(),
            mean: this.mean(),
            count: this.count(),
        };
    }

    getSamples(): number[] {
        return this.samples.map((s) => Number(s));
    }

    private ensureSorted(): void {
        if (this.sorted) return;

        this.samples.sort((a, b) => {
            if (a < b) return -1;
            if (a > b) return 1;
            return 0;
        });

        this.sorted = true;
    }
}

/**
 * Per-operation-type latency tracking
 */
export class MultiHistogram {
    private readonly histograms = new Map<OperationType, LatencyHistogram>([
        ["turn", new LatencyHistogram()],
        ["churn", new LatencyHistogram()],
    ]);
    private readonly total = new LatencyHistogram();

    record(operation: OperationType, nanos: bigint): void {
        this.histograms.get(operation)?.record(nanos);
        this.total.record(nanos);
    }

    getStats(operation: OperationType): LatencyStats {
        return this.histograms.get(operation)?.stats() ?? { ...DEFAULT_STATS };
    }

    /**
     * Stats for every operation type, plus combined "total" stats
     */
    getAllStats(): OperationLatencies {
        return {
            turn: this.getStats("turn"),
            churn: this.getStats("churn"),
            total: this.total.stats(),
        };
    }

    reset(): void {
        for (const histogram of this.histograms.values()) {
            histogram.reset();
        }
        this.total.reset();
    }
}
