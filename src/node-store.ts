import { NIL, SLOT_NONE } from "./constants";

export type NodeHandle = number;

export interface NodeStoreDebug {
    cap: number;
    sizeAllocated: number;
    freeCount: number;
}

/** Handles are Int32 list links. */
const MAX_CAP = 2 ** 30;

/**
 * NodeStore = SoA storage for wheel nodes + handle allocator + free list + growth.
 *
 * Conventions:
 * - handle: integer in [0, cap-1]
 * - free slot: keyRef[handle] === undefined (source of truth)
 * - slotIndex: bucket index, SLOT_OVERFLOW, or SLOT_NONE when free
 * - list pointers: NIL means null pointer
 */
export class NodeStore<K, V> {
    private cap: number;
    private sizeAllocated: number; // next fresh handle
    private freeList: Int32Array; // LIFO stack of free handles
    private freeCount: number;

    // SoA refs
    public readonly keyRef: Array<K | undefined>;
    public readonly valRef: Array<V | undefined>;

    // SoA metadata
    public triggerTick: Float64Array;
    public slotIndex: Int32Array;
    public next: Int32Array;
    public prev: Int32Array;

    constructor(opts: { initialCap?: number } = {}) {
        const initialCap = opts.initialCap ?? 256;
        if (!Number.isInteger(initialCap) || initialCap <= 0 || initialCap > MAX_CAP) {
            throw new Error(`initialCap must be an integer in [1, ${MAX_CAP}]`);
        }

        this.cap = initialCap;
        this.sizeAllocated = 0;
        this.freeList = new Int32Array(this.cap);
        this.freeCount = 0;

        this.keyRef = new Array<K | undefined>(this.cap);
        this.valRef = new Array<V | undefined>(this.cap);

        this.triggerTick = new Float64Array(this.cap);
        this.slotIndex = new Int32Array(this.cap).fill(SLOT_NONE);
        this.next = new Int32Array(this.cap).fill(NIL);
        this.prev = new Int32Array(this.cap).fill(NIL);
    }

    debug(): NodeStoreDebug {
        return {
            cap: this.cap,
            sizeAllocated: this.sizeAllocated,
            freeCount: this.freeCount,
        };
    }

    /**
     * Allocate a node for key/value. Reuses the most recently freed handle first.
     */
    alloc(key: K, value: V, triggerTick: number): NodeHandle {
        let handle: NodeHandle;
        if (this.freeCount > 0) {
            handle = this.freeList[--this.freeCount];
        } else {
            handle = this.sizeAllocated++;
            if (handle >= this.cap) {
                this.ensureCapacity(handle + 1);
            }
        }

        this.resetSlot(handle);
        this.keyRef[handle] = key;
        this.valRef[handle] = value;
        this.triggerTick[handle] = triggerTick;
        return handle;
    }

    /**
     * Free a handle back to the free list. Throws on double-free.
     */
    free(handle: NodeHandle): void {
        if (!this.isLive(handle)) {
            throw new Error(`double-free or invalid handle: ${handle}`);
        }

        this.resetSlot(handle);
        this.freeList[this.freeCount++] = handle;
    }

    isLive(handle: NodeHandle): boolean {
        return Number.isInteger(handle) && handle >= 0 && handle < this.cap && this.keyRef[handle] !== undefined;
    }

    /**
     * Drop every node and start allocating from handle 0 again.
     */
    reset(): void {
        for (let handle = 0; handle < this.sizeAllocated; handle++) {
            this.resetSlot(handle);
        }
        this.sizeAllocated = 0;
        this.freeCount = 0;
    }

    private resetSlot(handle: NodeHandle): void {
        this.keyRef[handle] = undefined;
        this.valRef[handle] = undefined;
        this.triggerTick[handle] = 0;
        this.slotIndex[handle] = SLOT_NONE;
        this.next[handle] = NIL;
        this.prev[handle] = NIL;
    }

    /**
     * Growth strategy: doubling. Copies typed arrays.
     */
    private ensureCapacity(required: number): void {
        if (required <= this.cap) return;
        if (required > MAX_CAP) {
            throw new Error(`cannot grow capacity to ${required} (max ${MAX_CAP})`);
        }

        let newCap = this.cap;
        while (newCap < required) {
            newCap = Math.min(newCap * 2, MAX_CAP);
        }

        this.keyRef.length = newCap;
        this.valRef.length = newCap;

        const oldTrigger = this.triggerTick;
        this.triggerTick = new Float64Array(newCap);
        this.triggerTick.set(oldTrigger);

        this.slotIndex = grow(this.slotIndex, newCap, SLOT_NONE);
        this.next = grow(this.next, newCap, NIL);
        this.prev = grow(this.prev, newCap, NIL);

        const oldFree = this.freeList;
        this.freeList = new Int32Array(newCap);
        this.freeList.set(oldFree);

        this.cap = newCap;
    }
}

function grow(arr: Int32Array, newCap: number, fill: number): Int32Array {
    const out = new Int32Array(newCap).fill(fill);
    out.set(arr);
    return out;
}
