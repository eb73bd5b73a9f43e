import { TimeWheel, type UpcomingEvent } from "./time-wheel";
import type { TimeSource } from "./time-source";
import { isDeactivatable, type Schedulable } from "./schedulable";
import { createSchedulerConfig, type SchedulerConfig } from "./config";
import { silentLogger, type Logger } from "./logger";
import {
    DuplicateKeyError,
    InvalidArgumentError,
    PreconditionViolatedError,
    SchedulerStalledError,
} from "./errors";

export type SchedulerState = "idle" | "running";

export interface TurnResult<R = unknown> {
    type: "executed";
    ticksAdvanced: number;
    id: string;
    name: string;
    kind: string;
    /** Tick at which the entry ran. */
    tick: number;
    result: R;
    /** Tick of the follow-up run, undefined when not rescheduled. */
    nextTick: number | undefined;
}

export interface ExecutedEvent<R = unknown> {
    schedulable: Schedulable<R>;
    turn: TurnResult<R>;
}

export type ExecutedListener<R = unknown> = (event: ExecutedEvent<R>) => void;

export interface ActionRecord {
    id: string;
    name: string;
    kind: string;
    tick: number;
}

export interface UpcomingTurn {
    id: string;
    name: string;
    kind: string;
    triggerTick: number;
    inTicks: number;
}

export interface ScheduleInfo {
    id: string;
    name: string;
    kind: string;
    shouldReschedule: boolean;
    /** Pending trigger tick, undefined when not scheduled. */
    nextTick: number | undefined;
    inTicks: number | undefined;
}

export interface SchedulerStatus {
    state: SchedulerState;
    initialized: boolean;
    currentTick: number;
    registered: number;
    active: number;
    scheduled: number;
    next: UpcomingTurn | undefined;
}

export interface SchedulerOptions<R = unknown> {
    timeSource: TimeSource;
    config?: SchedulerConfig;
    logger?: Logger;
    onExecuted?: ExecutedListener<R>;
}

/**
 * Drives the turn loop: advances the wheel to the next non-empty tick, runs one due
 * schedulable per call, and puts it back on the wheel when it asks to run again.
 */
export class Scheduler<R = unknown> {
    readonly config: SchedulerConfig;

    private readonly wheel: TimeWheel<string, Schedulable<R>>;
    private readonly logger: Logger;
    private readonly registry = new Map<string, Schedulable<R>>();
    private readonly records: ActionRecord[] = [];
    private listener: ExecutedListener<R> | undefined;
    private initialized = false;
    private turnInProgress = false;
    private runningId: string | undefined;
    private runningRemoved = false;

    constructor(opts: SchedulerOptions<R>) {
        this.config = opts.config ?? createSchedulerConfig();
        this.logger = opts.logger ?? silentLogger;
        this.listener = opts.onExecuted;
        this.wheel = new TimeWheel({
            bufferSize: this.config.bufferSize,
            timeSource: opts.timeSource,
        });
    }

    // ---- registration ----

    register(schedulable: Schedulable<R>): void {
        if (schedulable.id.length === 0) {
            throw new InvalidArgumentError("Schedulable id must not be empty");
        }
        if (this.registry.has(schedulable.id)) {
            throw new DuplicateKeyError(schedulable.id);
        }

        this.registry.set(schedulable.id, schedulable);
        this.logger.debug("registered", { id: schedulable.id, kind: schedulable.kind });
    }

    /**
     * Drop a registration together with any pending run. Removing the entry whose execute() is
     * running also cancels its follow-up run.
     * Returns false when the id was neither registered, scheduled nor running.
     */
    remove(id: string): boolean {
        const wasRegistered = this.registry.delete(id);
        const wasScheduled = this.wheel.remove(id) !== undefined;
        const wasRunning = id === this.runningId && !this.runningRemoved;
        if (wasRunning) {
            this.runningRemoved = true;
        }

        const removed = wasRegistered || wasScheduled || wasRunning;
        if (removed) {
            this.logger.debug("removed", { id });
        }
        return removed;
    }

    /** Same as remove(). */
    unregister(id: string): boolean {
        return this.remove(id);
    }

    get(id: string): Schedulable<R> | undefined {
        return this.registry.get(id);
    }

    registered(): Schedulable<R>[] {
        return [...this.registry.values()];
    }

    /**
     * Give every registered schedulable that wants to run, and is not already pending, its first slot.
     * Returns how many were scheduled.
     */
    initialize(): number {
        const now = this.wheel.currentTick();
        let scheduled = 0;

        for (const schedulable of this.registry.values()) {
            if (this.wheel.contains(schedulable.id) || !schedulable.shouldReschedule()) continue;
            if (this.schedule(schedulable, schedulable.calculateNextTick(now))) {
                scheduled++;
            }
        }

        this.initialized = true;
        this.logger.info("initialized", { tick: now, scheduled });
        return scheduled;
    }

    // ---- scheduling ----

    /**
     * Schedule under the schedulable's own id. Returns false for a tick in the past.
     */
    schedule(schedulable: Schedulable<R>, triggerTick: number): boolean {
        if (this.wheel.contains(schedulable.id)) {
            throw new DuplicateKeyError(schedulable.id);
        }
        if (triggerTick < this.wheel.currentTick()) {
            this.logger.warn("refused to schedule in the past", {
                id: schedulable.id,
                triggerTick,
                now: this.wheel.currentTick(),
            });
            return false;
        }
        this.wheel.scheduleAtAbsoluteTick(schedulable.id, schedulable, triggerTick);
        return true;
    }

    /**
     * Returns false for a negative delay. Duplicate keys still throw.
     */
    scheduleWithDelay(key: string, schedulable: Schedulable<R>, delay: number): boolean {
        if (this.wheel.contains(key)) {
            throw new DuplicateKeyError(key);
        }
        if (delay < 0) {
            this.logger.warn("refused negative delay", { key, delay });
            return false;
        }
        this.wheel.scheduleWithDelay(key, schedulable, delay);
        return true;
    }

    isScheduled(id: string): boolean {
        return this.wheel.contains(id);
    }

    // ---- turn loop ----

    /**
     * Advance to the next tick holding a due entry, run exactly one entry and return what happened.
     *
     * Throws SchedulerStalledError once more than `stallLimitTicks` empty ticks have gone by in this call.
     * Errors from execute() propagate; the entry is then not rescheduled.
     */
    processNextTurn(): TurnResult<R> {
        if (this.turnInProgress) {
            throw new PreconditionViolatedError("processNextTurn() called from inside a running turn");
        }

        this.turnInProgress = true;
        try {
            return this.runTurn();
        } finally {
            this.turnInProgress = false;
        }
    }

    runTurns(count: number): TurnResult<R>[] {
        if (!Number.isSafeInteger(count) || count < 0) {
            throw new InvalidArgumentError(`count must be a non-negative integer (got ${count})`);
        }

        const results: TurnResult<R>[] = [];
        for (let i = 0; i < count; i++) {
            results.push(this.processNextTurn());
        }
        return results;
    }

    /**
     * Switch a deactivatable schedulable on or off. Off drops its pending run; on schedules a fresh
     * one if none is pending. Returns false for unknown or non-deactivatable ids.
     */
    setActive(id: string, active: boolean): boolean {
        const schedulable = this.registry.get(id);
        if (schedulable === undefined || !isDeactivatable(schedulable)) {
            return false;
        }

        schedulable.setActive(active);

        if (!active) {
            this.wheel.remove(id);
        } else if (!this.wheel.contains(id)) {
            this.schedule(schedulable, schedulable.calculateNextTick(this.wheel.currentTick()));
        }

        this.logger.debug(active ? "activated" : "deactivated", { id });
        return true;
    }

    setExecutedListener(listener: ExecutedListener<R> | undefined): void {
        this.listener = listener;
    }

    // ---- inspection ----

    state(): SchedulerState {
        return this.wheel.hasAnyEvents() ? "running" : "idle";
    }

    isInitialized(): boolean {
        return this.initialized;
    }

    currentTick(): number {
        return this.wheel.currentTick();
    }

    history(): readonly ActionRecord[] {
        return [...this.records];
    }

    /**
     * Display-only preview of the next `count` ticks; see TimeWheel.peekUpcoming().
     */
    upcoming(count: number, maxEvents?: number): UpcomingTurn[] {
        const now = this.wheel.currentTick();
        return this.wheel.peekUpcoming(count, maxEvents).map((event) => toUpcomingTurn(event, now));
    }

    /**
     * Pending tick of a scheduled id, or undefined.
     */
    nextTickOf(id: string): number | undefined {
        return this.wheel.triggerTickOf(id);
    }

    /**
     * One line per registered schedulable, in registration order.
     */
    info(): ScheduleInfo[] {
        const now = this.wheel.currentTick();
        return this.registered().map((schedulable) => {
            const nextTick = this.wheel.triggerTickOf(schedulable.id);
            return {
                id: schedulable.id,
                name: schedulable.name,
                kind: schedulable.kind,
                shouldReschedule: schedulable.shouldReschedule(),
                nextTick,
                inTicks: nextTick === undefined ? undefined : nextTick - now,
            };
        });
    }

    status(): SchedulerStatus {
        let active = 0;
        for (const schedulable of this.registry.values()) {
            if (schedulable.shouldReschedule()) active++;
        }

        const [next] = this.upcoming(this.config.bufferSize, 1);
        return {
            state: this.state(),
            initialized: this.initialized,
            currentTick: this.wheel.currentTick(),
            registered: this.registry.size,
            active,
            scheduled: this.wheel.count(),
            next,
        };
    }

    describeStatus(): string {
        if (!this.initialized) {
            return "Scheduler not initialized";
        }

        const status = this.status();
        const lines = [
            "=== Scheduler status ===",
            `  Current tick: ${status.currentTick}`,
            `  Registered: ${status.registered}`,
            `  Active: ${status.active}`,
            `  Scheduled: ${status.scheduled}`,
        ];

        if (status.next === undefined) {
            lines.push("  Next turn: (none)");
        } else if (status.next.inTicks <= 0) {
            lines.push(`  Next turn: now (${status.next.name})`);
        } else {
            lines.push(`  Next turn: in ${status.next.inTicks} ticks (${status.next.name})`);
        }

        return lines.join("\n");
    }

    // ---- internals ----

    private runTurn(): TurnResult<R> {
        let ticksAdvanced = 0;
        while (this.wheel.isCurrentSlotEmpty()) {
            if (ticksAdvanced > this.config.stallLimitTicks) {
                const error = new SchedulerStalledError(ticksAdvanced, this.wheel.currentTick());
                this.logger.error(error.message, { scheduled: this.wheel.count() });
                throw error;
            }
            this.wheel.advance();
            ticksAdvanced++;
        }

        const due = this.wheel.popDueEvent();
        if (due === undefined) {
            throw new PreconditionViolatedError("Current slot was not empty, but nothing could be popped");
        }

        const schedulable = due.value;
        const tick = this.wheel.currentTick();
        this.runningId = schedulable.id;
        this.runningRemoved = false;
        try {
            return this.complete(schedulable, tick, ticksAdvanced);
        } finally {
            this.runningId = undefined;
            this.runningRemoved = false;
        }
    }

    private complete(schedulable: Schedulable<R>, tick: number, ticksAdvanced: number): TurnResult<R> {
        let result: R;
        try {
            result = schedulable.execute();
        } catch (error) {
            this.logger.error("execute() failed", { id: schedulable.id, tick, error });
            throw error;
        }

        this.record({ id: schedulable.id, name: schedulable.name, kind: schedulable.kind, tick });
        const nextTick = this.reschedule(schedulable, tick);

        const turn: TurnResult<R> = {
            type: "executed",
            ticksAdvanced,
            id: schedulable.id,
            name: schedulable.name,
            kind: schedulable.kind,
            tick,
            result,
            nextTick,
        };

        try {
            this.listener?.({ schedulable, turn });
        } catch (error) {
            this.logger.error("executed listener failed", { id: schedulable.id, tick, error });
            throw error;
        }
        return turn;
    }

    private reschedule(schedulable: Schedulable<R>, now: number): number | undefined {
        if (this.runningRemoved || !schedulable.shouldReschedule()) return undefined;

        const nextTick = schedulable.calculateNextTick(now);
        if (!this.schedule(schedulable, nextTick)) {
            this.logger.warn("dropped reschedule", { id: schedulable.id, nextTick, now });
            return undefined;
        }
        return nextTick;
    }

    private record(entry: ActionRecord): void {
        if (this.config.historyLimit === 0) return;
        this.records.push(entry);
        if (this.records.length > this.config.historyLimit) {
            this.records.shift();
        }
    }
}

function toUpcomingTurn<R>(event: UpcomingEvent<string, Schedulable<R>>, now: number): UpcomingTurn {
    return {
        id: event.key,
        name: event.value.name,
        kind: event.value.kind,
        triggerTick: event.triggerTick,
        inTicks: event.triggerTick - now,
    };
}
