/**
 * Triangular delay distribution, in ticks
 */
export interface DelayConfig {
    min: number;
    peak: number;
    max: number;
}

/**
 * Workload configuration parameters
 */
export interface WorkloadConfig {
    name: string;
    description: string;

    actors: number;          // Entries kept on the queue at all times
    turns: number;           // Operations to perform
    churnPercent: number;    // 0-100, share of operations that cancel and re-add an actor

    delay: DelayConfig;
    bufferSize: number;      // Wheel buckets; ignored by queues without a horizon

    // Reproducibility
    seed: number;
}

/**
 * Single operation to execute
 */
export type Operation =
    | { type: "turn"; delay: number }
    | { type: "churn"; id: string; delay: number };

export type OperationType = Operation["type"];

export interface ScheduledTurn {
    id: string;
    tick: number;
}

/**
 * Common interface for all turn queues in benchmarks
 */
export interface TurnQueue {
    /** Tick of the last turn handed out. */
    now(): number;
    schedule(id: string, tick: number): void;
    remove(id: string): boolean;
    /** Remove and return the earliest turn, moving time forward to it. */
    next(): ScheduledTurn | undefined;
    size(): number;
}

/**
 * Latency statistics (in nanoseconds)
 */
export interface LatencyStats {
    p05: number;
    p25: number;
    p50: number;
    p75: number;
    p90: number;
    p95: number;
    p99: number;
    p999: number;
    max: number;
    mean: number;
    count: number;
}

/**
 * Per-operation latency breakdown
 */
export type OperationLatencies = Record<OperationType | "total", LatencyStats>;

/**
 * Result from a single benchmark run
 */
export interface BenchmarkResult {
    implementation: string;
    workload: string;

    // Throughput
    totalOps: number;
    durationMs: number;
    opsPerSec: number;

    latencies: OperationLatencies;

    finalTick: number;
    finalSize: number;
}

/**
 * Full benchmark suite results
 */
export interface BenchmarkSuiteResult {
    workload: WorkloadConfig;
    timestamp: Date;
    results: BenchmarkResult[];
    winner?: string;  // Implementation with the best composite latency
}

/**
 * Runner options
 */
export interface RunnerOptions {
    warmupOps?: number;
    verbose?: boolean;
}
