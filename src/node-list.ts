import { NodeStore, type NodeHandle } from "./node-store";
import { NIL } from "./constants";

/**
 * NodeList manages a doubly-linked list of node handles.
 * Uses the NodeStore's next and prev arrays, so a node can be linked in at most one list.
 */
export class NodeList<K, V> {
    private readonly store: NodeStore<K, V>;
    private head: NodeHandle;
    private tail: NodeHandle;
    private length: number;

    constructor(store: NodeStore<K, V>) {
        this.store = store;
        this.head = NIL;
        this.tail = NIL;
        this.length = 0;
    }

    /**
     * Append a node after the current tail.
     */
    linkTail(id: NodeHandle): void {
        this.linkAfter(this.tail, id);
    }

    /**
     * Link a node directly after `prevId`. NIL links at the head.
     */
    linkAfter(prevId: NodeHandle, id: NodeHandle): void {
        const nextId = prevId === NIL ? this.head : this.store.next[prevId];

        this.store.prev[id] = prevId;
        this.store.next[id] = nextId;

        if (prevId !== NIL) {
            this.store.next[prevId] = id;
        } else {
            this.head = id;
        }

        if (nextId !== NIL) {
            this.store.prev[nextId] = id;
        } else {
            this.tail = id;
        }

        this.length++;
    }

    /**
     * Remove a node from the list. O(1).
     */
    unlink(id: NodeHandle): void {
        const prev = this.store.prev[id];
        const next = this.store.next[id];

        if (prev !== NIL) {
            this.store.next[prev] = next;
        } else {
            this.head = next;
        }

        if (next !== NIL) {
            this.store.prev[next] = prev;
        } else {
            this.tail = prev;
        }

        this.store.next[id] = NIL;
        this.store.prev[id] = NIL;
        this.length--;
    }

    /**
     * Unlink and return the head, or NIL when empty.
     */
    shift(): NodeHandle {
        const id = this.head;
        if (id !== NIL) this.unlink(id);
        return id;
    }

    getHead(): NodeHandle {
        return this.head;
    }

    getTail(): NodeHandle {
        return this.tail;
    }

    isEmpty(): boolean {
        return this.head === NIL;
    }

    size(): number {
        return this.length;
    }

    /**
     * Forget all links. Nodes themselves are left to the store.
     */
    reset(): void {
        this.head = NIL;
        this.tail = NIL;
        this.length = 0;
    }
}
