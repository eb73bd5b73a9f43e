import { InvalidArgumentError } from "./errors";

export interface SchedulerConfig {
    /** Buckets in the wheel; the largest delay held without the overflow list is bufferSize - 1. */
    readonly bufferSize: number;
    /** Empty ticks one turn may advance through before giving up. */
    readonly stallLimitTicks: number;
    /** Executed turns kept in the history (0 disables it). */
    readonly historyLimit: number;
}

export type SchedulerConfigOverrides = Partial<SchedulerConfig>;

export const HOURS_PER_DAY = 24;

export function createSchedulerConfig(overrides: SchedulerConfigOverrides = {}): SchedulerConfig {
    const config: SchedulerConfig = {
        bufferSize: overrides.bufferSize ?? 180 * HOURS_PER_DAY,
        stallLimitTicks: overrides.stallLimitTicks ?? 365 * HOURS_PER_DAY,
        historyLimit: overrides.historyLimit ?? 1_000,
    };

    const issues: string[] = [];
    if (!isPositiveInteger(config.bufferSize)) {
        issues.push(`bufferSize must be a positive integer (got ${config.bufferSize})`);
    }
    if (!isPositiveInteger(config.stallLimitTicks)) {
        issues.push(`stallLimitTicks must be a positive integer (got ${config.stallLimitTicks})`);
    }
    if (!Number.isSafeInteger(config.historyLimit) || config.historyLimit < 0) {
        issues.push(`historyLimit must be a non-negative integer (got ${config.historyLimit})`);
    }
    if (issues.length > 0) {
        throw new InvalidArgumentError(`Invalid scheduler config: ${issues.join("; ")}`);
    }

    return Object.freeze(config);
}

function isPositiveInteger(n: number): boolean {
    return Number.isSafeInteger(n) && n > 0;
}
