#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import fs from "node:fs";
import type { BenchmarkResult, BenchmarkSuiteResult, TurnQueue, WorkloadConfig } from "./types";
import { WORKLOADS, generateOperations, generatePlacement } from "./workloads";
import { SortedArrayTurnQueue, TimeWheelTurnQueue } from "./baselines";
import { runBenchmark, determineWinner } from "./runner";
import { formatLatency, formatNumber } from "./utils";

/**
 * Available implementations
 */
const IMPLEMENTATIONS: Record<string, new (config: WorkloadConfig) => TurnQueue> = {
    "time-wheel": TimeWheelTurnQueue,
    "sorted-array": SortedArrayTurnQueue,
};

interface CliOptions {
    workload?: string;
    implementations: string;
    output?: string;
    turns?: number;
    actors?: number;
    warmup: number;
    seed?: number;
    quiet: boolean;
}

function parseCount(value: string): number {
    const n = Number(value);
    if (!Number.isSafeInteger(n) || n < 0) {
        throw new InvalidArgumentError("Expected a non-negative integer.");
    }
    return n;
}

const program = new Command();

program
    .name("bench")
    .description("Turn queue benchmark suite - outputs JSON latency percentiles")
    .version("0.1.0")
    .option("-w, --workload <name>", "Run specific workload (default: all)")
    .option(
        "-i, --implementations <list>",
        `Comma-separated list: ${Object.keys(IMPLEMENTATIONS).join(",")}`,
        Object.keys(IMPLEMENTATIONS).join(",")
    )
    .option("-o, --output <file>", "Output file path (default: stdout)")
    .option("--turns <number>", "Override operations per workload", parseCount)
    .option("--actors <number>", "Override actor count", parseCount)
    .option("--warmup <number>", "Unmeasured warmup operations", parseCount, 5000)
    .option("--seed <number>", "Random seed for reproducibility", parseCount)
    .option("--quiet", "Suppress progress output", false)
    .parse();

const options = program.opts<CliOptions>();

/**
 * Log to stderr (so stdout is clean JSON)
 */
function log(...args: unknown[]): void {
    if (!options.quiet) {
        console.error(...args);
    }
}

function fail(message: string): never {
    console.error(`❌ ${message}`);
    process.exit(1);
}

function main(): void {
    log("Turn queue benchmark suite");
    log("");

    const implNames = options.implementations.split(",").map((s) => s.trim());
    for (const name of implNames) {
        if (!(name in IMPLEMENTATIONS)) {
            fail(`Unknown implementation: ${name} (available: ${Object.keys(IMPLEMENTATIONS).join(", ")})`);
        }
    }

    let workloadsToRun: WorkloadConfig[];
    if (options.workload !== undefined) {
        const workload = WORKLOADS.get(options.workload);
        if (workload === undefined) {
            fail(`Unknown workload: ${options.workload} (available: ${[...WORKLOADS.keys()].join(", ")})`);
        }
        workloadsToRun = [workload];
    } else {
        workloadsToRun = [...WORKLOADS.values()];
    }

    workloadsToRun = workloadsToRun.map((workload) => ({
        ...workload,
        turns: options.turns ?? workload.turns,
        actors: options.actors ?? workload.actors,
        seed: options.seed ?? workload.seed,
    }));

    const suiteResults: BenchmarkSuiteResult[] = [];
    let completedCount = 0;
    const totalRuns = workloadsToRun.length * implNames.length;

    for (const workload of workloadsToRun) {
        log(`📊 Workload: ${workload.name}`);
        log(`   ${workload.description}`);

        // Same sequence for all implementations
        const placement = generatePlacement(workload);
        const operations = generateOperations(workload);

        const results: BenchmarkResult[] = [];

        for (const implName of implNames) {
            completedCount++;
            log(`   [${completedCount}/${totalRuns}] Running ${implName}...`);

            const Queue = IMPLEMENTATIONS[implName];
            const result = runBenchmark(workload, new Queue(workload), implName, placement, operations, {
                warmupOps: options.warmup,
            });
            log(`      ${formatNumber(Math.round(result.opsPerSec))} ops/s, p99 ${formatLatency(result.latencies.total.p99)}`);

            results.push(result);
        }

        suiteResults.push({
            workload,
            timestamp: new Date(),
            results,
            winner: determineWinner(results),
        });
        log("");
    }

    const output = JSON.stringify(suiteResults, null, 2);

    if (options.output !== undefined) {
        fs.writeFileSync(options.output, output, "utf-8");
        log(`✓ Results written to ${options.output}`);
    } else {
        console.log(output);
    }

    log("✓ Benchmark complete!");
}

try {
    main();
} catch (error) {
    fail(error instanceof Error ? error.stack ?? error.message : String(error));
}
