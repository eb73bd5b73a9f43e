import type { ScheduledTurn, TurnQueue, WorkloadConfig } from "./types";
import { TimeWheel } from "../src/time-wheel";
import { TickCounter } from "../src/time-source";

/**
 * TimeWheel benchmark adapter
 */
export class TimeWheelTurnQueue implements TurnQueue {
    private readonly wheel: TimeWheel<string, string>;

    constructor(config: WorkloadConfig) {
        this.wheel = new TimeWheel({
            bufferSize: config.bufferSize,
            timeSource: new TickCounter(),
            initialCapacity: config.actors,
        });
    }

    now(): number {
        return this.wheel.currentTick();
    }

    schedule(id: string, tick: number): void {
        this.wheel.scheduleAtAbsoluteTick(id, id, tick);
    }

    remove(id: string): boolean {
        return this.wheel.remove(id) !== undefined;
    }

    next(): ScheduledTurn | undefined {
        if (!this.wheel.hasAnyEvents()) return undefined;

        while (this.wheel.isCurrentSlotEmpty()) {
            this.wheel.advance();
        }

        const due = this.wheel.popDueEvent();
        return due && { id: due.key, tick: due.triggerTick };
    }

    size(): number {
        return this.wheel.count();
    }
}

/**
 * Sorted array baseline (insert by linear search, pop from the front)
 */
export class SortedArrayTurnQueue implements TurnQueue {
    private readonly turns: ScheduledTurn[] = [];
    private tick = 0;

    constructor(_config: WorkloadConfig) {}

    now(): number {
        return this.tick;
    }

    schedule(id: string, tick: number): void {
        // After every entry with the same tick, so equal ticks stay FIFO
        const index = this.turns.findIndex((turn) => turn.tick > tick);
        if (index === -1) {
            this.turns.push({ id, tick });
        } else {
            this.turns.splice(index, 0, { id, tick });
        }
    }

    remove(id: string): boolean {
        const index = this.turns.findIndex((turn) => turn.id === id);
        if (index === -1) return false;
        this.turns.splice(index, 1);
        return true;
    }

    next(): ScheduledTurn | undefined {
        const turn = this.turns.shift();
        if (turn !== undefined) this.tick = turn.tick;
        return turn;
    }

    size(): number {
        return this.turns.length;
    }
}
