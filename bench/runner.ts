import type {
    BenchmarkResult,
    Operation,
    TurnQueue,
    WorkloadConfig,
    RunnerOptions,
} from "./types";
import { MultiHistogram } from "./latency";
import { actorId } from "./workloads";

/**
 * Run a benchmark for a single turn queue implementation
 *
 * @param queue - Fresh queue, not yet populated
 * @param placement - Initial delay of every actor
 * @param operations - Pre-generated operation sequence
 */
export function runBenchmark(
    workload: WorkloadConfig,
    queue: TurnQueue,
    implName: string,
    placement: number[],
    operations: Operation[],
    options: RunnerOptions = {}
): BenchmarkResult {
    const { warmupOps = 5000, verbose = false } = options;

    if (verbose) {
        console.error(`  Running ${implName}...`);
    }

    placement.forEach((delay, index) => queue.schedule(actorId(index), delay));

    // Phase 1: Warmup (no measurement)
    const warmupCount = Math.min(warmupOps, operations.length);
    for (let i = 0; i < warmupCount; i++) {
        apply(queue, operations[i]);
    }

    if (typeof global.gc === "function") {
        global.gc();
    }

    // Phase 2: Measurement
    const histogram = new MultiHistogram();
    const startTime = Date.now();

    for (let i = warmupCount; i < operations.length; i++) {
        const op = operations[i];
        const start = process.hrtime.bigint();
        apply(queue, op);
        histogram.record(op.type, process.hrtime.bigint() - start);
    }

    const durationMs = Math.max(Date.now() - startTime, 1);
    const measuredOps = operations.length - warmupCount;

    return {
        implementation: implName,
        workload: workload.name,
        totalOps: measuredOps,
        durationMs,
        opsPerSec: (measuredOps / durationMs) * 1000,
        latencies: histogram.getAllStats(),
        finalTick: queue.now(),
        finalSize: queue.size(),
    };
}

/**
 * Execute one operation. A turn hands out the earliest actor and puts it back `delay` ticks later.
 */
function apply(queue: TurnQueue, op: Operation): void {
    if (op.type === "turn") {
        const turn = queue.next();
        if (turn === undefined) {
            throw new Error("Queue ran empty during a turn");
        }
        queue.schedule(turn.id, turn.tick + op.delay);
    } else if (queue.remove(op.id)) {
        queue.schedule(op.id, queue.now() + op.delay);
    }
}

/**
 * Determine the winner based on a composite latency score
 *
 * Score = p50 * 0.3 + p99 * 0.7
 */
export function determineWinner(results: BenchmarkResult[]): string | undefined {
    let best: BenchmarkResult | undefined;
    let bestScore = Infinity;

    for (const result of results) {
        const latency = result.latencies.total;
        const score = latency.p50 * 0.3 + latency.p99 * 0.7;

        if (score < bestScore) {
            best = result;
            bestScore = score;
        }
    }

    return best?.implementation;
}
