import type { Deactivatable, Schedulable } from "./schedulable";
import { triangular, type RandomSource } from "./random";
import { InvalidArgumentError } from "./errors";

/**
 * Runs its action once and is never rescheduled.
 */
export class OneShotEvent<R = void> implements Schedulable<R> {
    readonly kind: string = "one-shot";

    constructor(
        readonly id: string,
        readonly name: string,
        private readonly action: () => R,
    ) {}

    execute(): R {
        return this.action();
    }

    calculateNextTick(now: number): number {
        return now;
    }

    shouldReschedule(): boolean {
        return false;
    }
}

export interface RecurringEventOptions<R> {
    id: string;
    name: string;
    intervalTicks: number;
    /** Stop after this many runs. Unlimited when omitted. */
    maxRuns?: number;
    action: (run: number) => R;
}

/**
 * Fires every `intervalTicks` ticks, e.g. a season change or a market day.
 */
export class RecurringEvent<R = void> implements Schedulable<R> {
    readonly kind: string = "recurring";
    readonly id: string;
    readonly name: string;

    private readonly intervalTicks: number;
    private readonly maxRuns: number;
    private readonly action: (run: number) => R;
    private runs = 0;

    constructor(opts: RecurringEventOptions<R>) {
        if (!Number.isSafeInteger(opts.intervalTicks) || opts.intervalTicks <= 0) {
            throw new InvalidArgumentError(`intervalTicks must be a positive integer (got ${opts.intervalTicks})`);
        }
        if (opts.maxRuns !== undefined && (!Number.isSafeInteger(opts.maxRuns) || opts.maxRuns <= 0)) {
            throw new InvalidArgumentError(`maxRuns must be a positive integer (got ${opts.maxRuns})`);
        }

        this.id = opts.id;
        this.name = opts.name;
        this.intervalTicks = opts.intervalTicks;
        this.maxRuns = opts.maxRuns ?? Infinity;
        this.action = opts.action;
    }

    get runCount(): number {
        return this.runs;
    }

    execute(): R {
        this.runs++;
        return this.action(this.runs);
    }

    calculateNextTick(now: number): number {
        return now + this.intervalTicks;
    }

    shouldReschedule(): boolean {
        return this.runs < this.maxRuns;
    }
}

export interface ActionDelay {
    minTicks: number;
    peakTicks: number;
    maxTicks: number;
}

export interface ActorOptions {
    id: string;
    name: string;
    faction?: string;
    /** Defaults to 1 to 180 days of hourly ticks, peaking at 90. */
    delay?: ActionDelay;
    actions?: readonly string[];
    random?: RandomSource;
}

export interface ActorTurn {
    actor: string;
    faction: string;
    action: string;
}

export const DEFAULT_ACTION_DELAY: ActionDelay = {
    minTicks: 24,
    peakTicks: 90 * 24,
    maxTicks: 180 * 24,
};

const DEFAULT_ACTIONS = ["attack", "defend", "use skill", "move", "observe", "rest", "counter", "charge"] as const;

/**
 * A character that acts at irregular intervals until deactivated.
 */
export class Actor implements Schedulable<ActorTurn | undefined>, Deactivatable {
    readonly kind: string = "actor";
    readonly id: string;
    readonly name: string;
    readonly faction: string;

    private readonly delay: ActionDelay;
    private readonly actions: readonly string[];
    private readonly random: RandomSource;
    private active = true;

    constructor(opts: ActorOptions) {
        const delay = opts.delay ?? DEFAULT_ACTION_DELAY;
        if (!Number.isSafeInteger(delay.minTicks) || delay.minTicks < 1
            || !(delay.minTicks <= delay.peakTicks && delay.peakTicks <= delay.maxTicks)) {
            throw new InvalidArgumentError(
                `delay must satisfy 1 <= minTicks <= peakTicks <= maxTicks (got ${delay.minTicks}, ${delay.peakTicks}, ${delay.maxTicks})`
            );
        }
        const actions = opts.actions ?? DEFAULT_ACTIONS;
        if (actions.length === 0) {
            throw new InvalidArgumentError("actions must not be empty");
        }

        this.id = opts.id;
        this.name = opts.name;
        this.faction = opts.faction ?? "neutral";
        this.delay = delay;
        this.actions = actions;
        this.random = opts.random ?? Math.random;
    }

    /**
     * Picks an action at random. Inactive actors do nothing.
     */
    execute(): ActorTurn | undefined {
        if (!this.active) return undefined;

        const index = Math.min(Math.floor(this.random() * this.actions.length), this.actions.length - 1);
        return { actor: this.id, faction: this.faction, action: this.actions[index] };
    }

    calculateNextTick(now: number): number {
        const { minTicks, peakTicks, maxTicks } = this.delay;
        return now + Math.floor(triangular(this.random, minTicks, peakTicks, maxTicks));
    }

    shouldReschedule(): boolean {
        return this.active;
    }

    isActive(): boolean {
        return this.active;
    }

    setActive(active: boolean): void {
        this.active = active;
    }
}
