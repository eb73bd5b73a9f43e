import { NodeStore, type NodeHandle } from "./node-store";
import { NodeList } from "./node-list";
import { NIL, SLOT_OVERFLOW } from "./constants";
import type { TimeSource } from "./time-source";
import { DuplicateKeyError, InvalidArgumentError, PreconditionViolatedError } from "./errors";

export type WheelKey = string | number;

export interface TimeWheelOptions {
    bufferSize: number;
    timeSource: TimeSource;
    initialCapacity?: number; // initial node arena size, grows by doubling
}

export interface DueEvent<K, V> {
    key: K;
    value: V;
    triggerTick: number;
}

export interface UpcomingEvent<K, V> {
    readonly key: K;
    readonly value: V;
    readonly triggerTick: number;
}

export interface TimeWheelStats {
    nowTick: number;
    offset: number;
    bufferSize: number;
    scheduled: number;
    overflowCount: number;
}

/**
 * Circular wheel of FIFO tick buckets with a sorted overflow list for entries beyond the horizon.
 *
 * The bucket at `offset` holds the events due at the current tick. Callers drain it with
 * popDueEvent() and only then call advance(), which moves both the wheel and its TimeSource
 * one tick forward. The wheel is the only writer of its TimeSource's tick.
 *
 * Not safe for interleaved writers: every method runs to completion synchronously, so readers on
 * the same event loop always observe a consistent state. peekUpcoming() is for display only.
 */
export class TimeWheel<K extends WheelKey, V extends {}> {
    readonly bufferSize: number;

    private readonly store: NodeStore<K, V>;
    private readonly timeSource: TimeSource;
    private readonly buckets: NodeList<K, V>[];
    private readonly overflow: NodeList<K, V>;
    private readonly index = new Map<K, NodeHandle>();

    private offset = 0;
    private nowTick: number;

    constructor(opts: TimeWheelOptions) {
        if (!Number.isSafeInteger(opts.bufferSize) || opts.bufferSize <= 0) {
            throw new InvalidArgumentError(`bufferSize must be a positive integer (got ${opts.bufferSize})`);
        }

        this.bufferSize = opts.bufferSize;
        this.timeSource = opts.timeSource;
        this.store = new NodeStore<K, V>({ initialCap: opts.initialCapacity });

        this.buckets = [];
        for (let i = 0; i < this.bufferSize; i++) {
            this.buckets.push(new NodeList(this.store));
        }
        this.overflow = new NodeList(this.store);

        this.nowTick = this.timeSource.currentTick();
    }

    /**
     * Schedule `value` under `key` to become due `delay` ticks from now.
     * delay 0 lands in the current bucket, behind anything already due.
     */
    scheduleWithDelay(key: K, value: V, delay: number): void {
        assertValidKey(key);
        if (this.index.has(key)) {
            throw new DuplicateKeyError(key);
        }
        if (!Number.isSafeInteger(delay) || delay < 0) {
            throw new InvalidArgumentError(`delay must be a non-negative integer (got ${delay})`);
        }

        const triggerTick = this.nowTick + delay;
        const handle = this.store.alloc(key, value, triggerTick);

        if (delay >= this.bufferSize) {
            this.linkOverflow(handle, triggerTick);
        } else {
            this.linkBucket(handle, (this.offset + delay) % this.bufferSize);
        }

        this.index.set(key, handle);
    }

    /**
     * A key that is already scheduled fails with DuplicateKeyError before the tick is checked.
     */
    scheduleAtAbsoluteTick(key: K, value: V, tick: number): void {
        assertValidKey(key);
        if (this.index.has(key)) {
            throw new DuplicateKeyError(key);
        }
        if (!Number.isSafeInteger(tick)) {
            throw new InvalidArgumentError(`tick must be an integer (got ${tick})`);
        }
        if (tick < this.nowTick) {
            throw new InvalidArgumentError(`Cannot schedule in the past: tick=${tick}, nowTick=${this.nowTick}`);
        }
        this.scheduleWithDelay(key, value, tick - this.nowTick);
    }

    /**
     * Remove and return the oldest entry of the current bucket. O(1).
     */
    popDueEvent(): DueEvent<K, V> | undefined {
        const handle = this.buckets[this.offset].shift();
        if (handle === NIL) return undefined;

        const event = this.read(handle);
        this.index.delete(event.key);
        this.store.free(handle);
        return event;
    }

    /**
     * Move to the next tick. Fails if the current bucket still holds due events.
     *
     * Overflow entries whose trigger is exactly the new horizon boundary
     * (now + bufferSize - 1) move into the farthest bucket.
     */
    advance(): void {
        if (!this.buckets[this.offset].isEmpty()) {
            throw new PreconditionViolatedError(
                `Cannot advance past tick ${this.nowTick}: ${this.buckets[this.offset].size()} due event(s) not popped`
            );
        }

        const expectedTick = this.nowTick + 1;
        this.timeSource.advanceOneTick();
        this.offset = (this.offset + 1) % this.bufferSize;
        this.nowTick = expectedTick;

        const observedTick = this.timeSource.currentTick();
        if (observedTick !== expectedTick) {
            throw new PreconditionViolatedError(
                `Time source moved outside the wheel: expected tick ${expectedTick}, got ${observedTick}`
            );
        }

        this.migrateOverflow();
    }

    /**
     * Remove an entry wherever it lives. O(bucket) / O(overflow) to unlink, O(1) to find.
     * Returns undefined when the key is not scheduled.
     */
    remove(key: K): V | undefined {
        const handle = this.index.get(key);
        if (handle === undefined) return undefined;

        const { value } = this.read(handle);
        this.listOf(handle).unlink(handle);
        this.index.delete(key);
        this.store.free(handle);
        return value;
    }

    /**
     * Preview entries in the next `count` buckets, current bucket first, at most `maxEvents` of them.
     *
     * Display only. Overflow entries are never included, so the result may be incomplete and
     * must not drive execution order.
     */
    peekUpcoming(count: number, maxEvents?: number): UpcomingEvent<K, V>[] {
        if (!Number.isSafeInteger(count) || count < 0) {
            throw new InvalidArgumentError(`count must be a non-negative integer (got ${count})`);
        }
        if (maxEvents !== undefined && (!Number.isSafeInteger(maxEvents) || maxEvents < 0)) {
            throw new InvalidArgumentError(`maxEvents must be a non-negative integer (got ${maxEvents})`);
        }

        const limit = maxEvents ?? Infinity;
        const events: UpcomingEvent<K, V>[] = [];
        const span = Math.min(count, this.bufferSize);

        for (let i = 0; i < span && events.length < limit; i++) {
            let cursor = this.buckets[(this.offset + i) % this.bufferSize].getHead();
            while (cursor !== NIL && events.length < limit) {
                events.push(Object.freeze(this.read(cursor)));
                cursor = this.store.next[cursor];
            }
        }

        return events;
    }

    contains(key: K): boolean {
        return this.index.has(key);
    }

    get(key: K): V | undefined {
        const handle = this.index.get(key);
        return handle === undefined ? undefined : this.read(handle).value;
    }

    triggerTickOf(key: K): number | undefined {
        const handle = this.index.get(key);
        return handle === undefined ? undefined : this.store.triggerTick[handle];
    }

    count(): number {
        return this.index.size;
    }

    hasAnyEvents(): boolean {
        return this.index.size > 0;
    }

    isCurrentSlotEmpty(): boolean {
        return this.buckets[this.offset].isEmpty();
    }

    currentTick(): number {
        return this.nowTick;
    }

    stats(): TimeWheelStats {
        return {
            nowTick: this.nowTick,
            offset: this.offset,
            bufferSize: this.bufferSize,
            scheduled: this.index.size,
            overflowCount: this.overflow.size(),
        };
    }

    /**
     * Drop every entry. Time does not move.
     */
    clear(): void {
        for (const bucket of this.buckets) bucket.reset();
        this.overflow.reset();
        this.index.clear();
        this.store.reset();
    }

    // ---- internals ----

    private read(handle: NodeHandle): DueEvent<K, V> {
        const key = this.store.keyRef[handle];
        const value = this.store.valRef[handle];
        if (key === undefined || value === undefined) {
            throw new PreconditionViolatedError(`Node ${handle} is not live`);
        }
        return { key, value, triggerTick: this.store.triggerTick[handle] };
    }

    private listOf(handle: NodeHandle): NodeList<K, V> {
        const slot = this.store.slotIndex[handle];
        return slot === SLOT_OVERFLOW ? this.overflow : this.buckets[slot];
    }

    private linkBucket(handle: NodeHandle, slot: number): void {
        this.store.slotIndex[handle] = slot;
        this.buckets[slot].linkTail(handle);
    }

    /**
     * Sorted insert, scanning from the tail: far-future entries mostly arrive in trigger order.
     * Equal triggers keep insertion order.
     */
    private linkOverflow(handle: NodeHandle, triggerTick: number): void {
        let cursor = this.overflow.getTail();
        while (cursor !== NIL && this.store.triggerTick[cursor] > triggerTick) {
            cursor = this.store.prev[cursor];
        }

        this.store.slotIndex[handle] = SLOT_OVERFLOW;
        this.overflow.linkAfter(cursor, handle);
    }

    private migrateOverflow(): void {
        const boundary = this.nowTick + this.bufferSize - 1;
        const farthestSlot = (this.offset - 1 + this.bufferSize) % this.bufferSize;

        let head = this.overflow.getHead();
        while (head !== NIL) {
            const triggerTick = this.store.triggerTick[head];
            if (triggerTick > boundary) break;
            if (triggerTick < boundary) {
                throw new PreconditionViolatedError(
                    `Overflow entry due at tick ${triggerTick} missed its migration (boundary ${boundary})`
                );
            }

            this.overflow.unlink(head);
            this.linkBucket(head, farthestSlot);
            head = this.overflow.getHead();
        }
    }
}

function assertValidKey(key: WheelKey): void {
    if (typeof key === "string" ? key.length === 0 : !Number.isFinite(key)) {
        throw new InvalidArgumentError(`key must be a non-empty string or a finite number (got ${String(key)})`);
    }
}
