import { InvalidArgumentError } from "./errors";

/**
 * Discrete clock consumed by the wheel. The core does not know what a tick stands for.
 */
export interface TimeSource {
    currentTick(): number;
    advanceOneTick(): void;
}

/**
 * In-memory tick counter.
 * tick = startTick + number of advanceOneTick() calls
 */
export class TickCounter implements TimeSource {
    private tick: number;

    constructor(opts: { startTick?: number } = {}) {
        const startTick = opts.startTick ?? 0;
        if (!Number.isSafeInteger(startTick) || startTick < 0) {
            throw new InvalidArgumentError(`startTick must be a non-negative integer (got ${startTick})`);
        }
        this.tick = startTick;
    }

    currentTick(): number {
        return this.tick;
    }

    advanceOneTick(): void {
        this.tick++;
    }
}
