import { describe, it, expect } from "vitest";
import { NodeList } from "../src/node-list";
import { NodeStore, type NodeHandle } from "../src/node-store";
import { NIL } from "../src/constants";

function setup(count: number): { store: NodeStore<string, number>; list: NodeList<string, number>; ids: NodeHandle[] } {
    const store = new NodeStore<string, number>({ initialCap: 8 });
    const list = new NodeList(store);
    const ids: NodeHandle[] = [];
    for (let i = 0; i < count; i++) {
        ids.push(store.alloc(`k${i}`, i, 0));
    }
    return { store, list, ids };
}

function toArray(store: NodeStore<string, number>, list: NodeList<string, number>): NodeHandle[] {
    const out: NodeHandle[] = [];
    let cursor = list.getHead();
    while (cursor !== NIL) {
        out.push(cursor);
        cursor = store.next[cursor];
    }
    return out;
}

describe("NodeList", () => {
    describe("Construction and Initialization", () => {
        it("should start empty", () => {
            const { list } = setup(0);
            expect(list.isEmpty()).toBe(true);
            expect(list.size()).toBe(0);
            expect(list.getHead()).toBe(NIL);
            expect(list.getTail()).toBe(NIL);
        });
    });

    describe("linkTail", () => {
        it("should keep insertion order", () => {
            const { store, list, ids } = setup(3);
            for (const id of ids) list.linkTail(id);

            expect(toArray(store, list)).toEqual([0, 1, 2]);
            expect(list.getHead()).toBe(0);
            expect(list.getTail()).toBe(2);
            expect(list.size()).toBe(3);
            expect(store.prev[0]).toBe(NIL);
            expect(store.prev[2]).toBe(1);
        });
    });

    describe("linkAfter", () => {
        it("should link at the head when prev is NIL", () => {
            const { store, list } = setup(3);
            list.linkTail(0);
            list.linkTail(1);
            list.linkAfter(NIL, 2);

            expect(toArray(store, list)).toEqual([2, 0, 1]);
            expect(list.getHead()).toBe(2);
        });

        it("should link in the middle", () => {
            const { store, list } = setup(4);
            list.linkTail(0);
            list.linkTail(1);
            list.linkTail(2);
            list.linkAfter(1, 3);

            expect(toArray(store, list)).toEqual([0, 1, 3, 2]);
            expect(store.prev[2]).toBe(3);
            expect(list.getTail()).toBe(2);
        });

        it("should update the tail when linking after it", () => {
            const { list } = setup(2);
            list.linkTail(0);
            list.linkAfter(0, 1);

            expect(list.getTail()).toBe(1);
        });
    });

    describe("unlink", () => {
        it("should unlink from the head, middle and tail", () => {
            const { store, list } = setup(5);
            for (let i = 0; i < 5; i++) list.linkTail(i);

            list.unlink(0);
            expect(toArray(store, list)).toEqual([1, 2, 3, 4]);

            list.unlink(2);
            expect(toArray(store, list)).toEqual([1, 3, 4]);

            list.unlink(4);
            expect(toArray(store, list)).toEqual([1, 3]);
            expect(list.getTail()).toBe(3);
            expect(list.size()).toBe(2);
        });

        it("should clear the unlinked node's pointers", () => {
            const { store, list } = setup(3);
            for (let i = 0; i < 3; i++) list.linkTail(i);

            list.unlink(1);
            expect(store.next[1]).toBe(NIL);
            expect(store.prev[1]).toBe(NIL);
        });

        it("should leave an empty list after removing the only node", () => {
            const { list } = setup(1);
            list.linkTail(0);
            list.unlink(0);

            expect(list.isEmpty()).toBe(true);
            expect(list.getTail()).toBe(NIL);
        });
    });

    describe("shift", () => {
        it("should pop nodes from the head in order", () => {
            const { list } = setup(3);
            for (let i = 0; i < 3; i++) list.linkTail(i);

            expect(list.shift()).toBe(0);
            expect(list.shift()).toBe(1);
            expect(list.shift()).toBe(2);
            expect(list.shift()).toBe(NIL);
            expect(list.size()).toBe(0);
        });
    });

    describe("reset", () => {
        it("should empty the list", () => {
            const { list } = setup(2);
            list.linkTail(0);
            list.linkTail(1);
            list.reset();

            expect(list.isEmpty()).toBe(true);
            expect(list.size()).toBe(0);
            expect(list.getTail()).toBe(NIL);
        });
    });
});
