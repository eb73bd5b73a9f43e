import type { Operation, WorkloadConfig } from "./types";
import { seededRandom, triangular, type RandomSource } from "../src/random";
import { HOURS_PER_DAY } from "../src/config";

/**
 * Default seed for reproducibility
 */
const DEFAULT_SEED = 42;

/**
 * Campaign: hourly ticks, actors acting every 1 to 180 days.
 * Every delay fits inside the wheel horizon.
 */
export const CAMPAIGN: WorkloadConfig = {
    name: "campaign",
    description: "1k actors, 1-180 day delays on hourly ticks, no overflow",
    actors: 1_000,
    turns: 200_000,
    churnPercent: 2,
    delay: { min: HOURS_PER_DAY, peak: 90 * HOURS_PER_DAY, max: 180 * HOURS_PER_DAY },
    bufferSize: 180 * HOURS_PER_DAY + 1,
    seed: DEFAULT_SEED,
};

/**
 * Skirmish: many actors on a short horizon, heavy cancellation.
 */
export const SKIRMISH: WorkloadConfig = {
    name: "skirmish",
    description: "10k actors, 1-48 tick delays, 10% cancel and re-add",
    actors: 10_000,
    turns: 200_000,
    churnPercent: 10,
    delay: { min: 1, peak: 12, max: 48 },
    bufferSize: 64,
    seed: DEFAULT_SEED,
};

/**
 * Far horizon: most delays exceed the wheel, exercising the overflow list.
 */
export const FAR_HORIZON: WorkloadConfig = {
    name: "far-horizon",
    description: "1k actors, delays up to a year on a 30 day wheel - overflow stress test",
    actors: 1_000,
    turns: 100_000,
    churnPercent: 2,
    delay: { min: HOURS_PER_DAY, peak: 180 * HOURS_PER_DAY, max: 365 * HOURS_PER_DAY },
    bufferSize: 30 * HOURS_PER_DAY,
    seed: DEFAULT_SEED,
};

/**
 * Map of all workloads by name
 */
export const WORKLOADS = new Map<string, WorkloadConfig>([
    [CAMPAIGN.name, CAMPAIGN],
    [SKIRMISH.name, SKIRMISH],
    [FAR_HORIZON.name, FAR_HORIZON],
]);

export function actorId(index: number): string {
    return `actor_${index}`;
}

function drawDelay(rng: RandomSource, config: WorkloadConfig): number {
    const { min, peak, max } = config.delay;
    return Math.floor(triangular(rng, min, peak, max));
}

/**
 * Initial delay of every actor, in actor order
 */
export function generatePlacement(config: WorkloadConfig): number[] {
    const rng = seededRandom(config.seed);
    return Array.from({ length: config.actors }, () => drawDelay(rng, config));
}

/**
 * Generate operation sequence for a workload
 * Pre-generates all operations so every implementation sees the same sequence
 */
export function generateOperations(config: WorkloadConfig): Operation[] {
    const ops: Operation[] = [];
    const rng = seededRandom(config.seed + 1);

    for (let i = 0; i < config.turns; i++) {
        const isChurn = rng() * 100 < config.churnPercent;
        const delay = drawDelay(rng, config);

        if (isChurn) {
            ops.push({ type: "churn", id: actorId(Math.floor(rng() * config.actors)), delay });
        } else {
            ops.push({ type: "turn", delay });
        }
    }

    return ops;
}
