import { describe, it, expect } from "vitest";
import { NodeStore, type NodeHandle } from "../src/node-store";
import { NIL, SLOT_NONE } from "../src/constants";

describe("NodeStore", () => {
    describe("Construction", () => {
        it("should default initialCap to 256", () => {
            const store = new NodeStore<string, number>();
            expect(store.debug()).toEqual({ cap: 256, sizeAllocated: 0, freeCount: 0 });
        });

        it("should respect custom initialCap", () => {
            const store = new NodeStore<string, number>({ initialCap: 8 });
            expect(store.debug().cap).toBe(8);
        });

        it("should throw on invalid initialCap", () => {
            expect(() => new NodeStore({ initialCap: 0 })).toThrow(/initialCap/);
            expect(() => new NodeStore({ initialCap: -1 })).toThrow(/initialCap/);
            expect(() => new NodeStore({ initialCap: 1.5 })).toThrow(/initialCap/);
        });
    });

    describe("alloc", () => {
        it("should hand out handles sequentially starting from 0", () => {
            const store = new NodeStore<string, number>({ initialCap: 4 });

            expect(store.alloc("a", 1, 10)).toBe(0);
            expect(store.alloc("b", 2, 20)).toBe(1);
            expect(store.alloc("c", 3, 30)).toBe(2);
            expect(store.debug().sizeAllocated).toBe(3);
        });

        it("should store key, value and trigger tick with cleared links", () => {
            const store = new NodeStore<string, number>({ initialCap: 4 });
            const id = store.alloc("a", 42, 7);

            expect(store.keyRef[id]).toBe("a");
            expect(store.valRef[id]).toBe(42);
            expect(store.triggerTick[id]).toBe(7);
            expect(store.slotIndex[id]).toBe(SLOT_NONE);
            expect(store.next[id]).toBe(NIL);
            expect(store.prev[id]).toBe(NIL);
            expect(store.isLive(id)).toBe(true);
        });
    });

    describe("free", () => {
        it("should reuse freed handles in LIFO order", () => {
            const store = new NodeStore<string, number>({ initialCap: 4 });
            const a = store.alloc("a", 1, 0);
            store.alloc("b", 2, 0);
            const c = store.alloc("c", 3, 0);

            store.free(a);
            store.free(c);
            expect(store.debug().freeCount).toBe(2);

            expect(store.alloc("d", 4, 0)).toBe(c);
            expect(store.alloc("e", 5, 0)).toBe(a);
            expect(store.debug().freeCount).toBe(0);
            expect(store.debug().sizeAllocated).toBe(3);
        });

        it("should clear the slot", () => {
            const store = new NodeStore<string, number>({ initialCap: 4 });
            const id = store.alloc("a", 1, 99);
            store.slotIndex[id] = 3;
            store.next[id] = 2;

            store.free(id);

            expect(store.isLive(id)).toBe(false);
            expect(store.keyRef[id]).toBeUndefined();
            expect(store.valRef[id]).toBeUndefined();
            expect(store.triggerTick[id]).toBe(0);
            expect(store.slotIndex[id]).toBe(SLOT_NONE);
            expect(store.next[id]).toBe(NIL);
        });

        it("should throw on double-free", () => {
            const store = new NodeStore<string, number>({ initialCap: 4 });
            const id = store.alloc("a", 1, 0);
            store.free(id);

            expect(() => store.free(id)).toThrow(/double-free/);
        });

        it("should throw on a handle that was never allocated", () => {
            const store = new NodeStore<string, number>({ initialCap: 4 });
            expect(() => store.free(3)).toThrow(/invalid handle/);
            expect(() => store.free(-1)).toThrow(/invalid handle/);
        });
    });

    describe("Capacity Growth", () => {
        it("should double capacity and keep existing nodes", () => {
            const store = new NodeStore<string, number>({ initialCap: 2 });
            const ids: NodeHandle[] = [];
            for (let i = 0; i < 5; i++) {
                ids.push(store.alloc(`k${i}`, i, i * 10));
            }

            expect(store.debug().cap).toBe(8);
            expect(ids).toEqual([0, 1, 2, 3, 4]);
            for (let i = 0; i < 5; i++) {
                expect(store.keyRef[i]).toBe(`k${i}`);
                expect(store.valRef[i]).toBe(i);
                expect(store.triggerTick[i]).toBe(i * 10);
            }
            expect(store.slotIndex[7]).toBe(SLOT_NONE);
            expect(store.next[7]).toBe(NIL);
        });

        it("should keep the free list across growth", () => {
            const store = new NodeStore<string, number>({ initialCap: 2 });
            const a = store.alloc("a", 1, 0);
            store.alloc("b", 2, 0);
            store.alloc("c", 3, 0); // grows to 4
            store.free(a);

            expect(store.alloc("d", 4, 0)).toBe(a);
        });
    });

    describe("reset", () => {
        it("should forget every node", () => {
            const store = new NodeStore<string, number>({ initialCap: 4 });
            store.alloc("a", 1, 0);
            const b = store.alloc("b", 2, 0);
            store.free(b);

            store.reset();

            expect(store.debug()).toEqual({ cap: 4, sizeAllocated: 0, freeCount: 0 });
            expect(store.isLive(0)).toBe(false);
            expect(store.alloc("c", 3, 0)).toBe(0);
        });
    });
});
