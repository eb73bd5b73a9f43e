import { describe, it, expect } from "vitest";
import { TickCounter } from "../src/time-source";

describe("TickCounter", () => {
    it("should start at tick 0 by default", () => {
        expect(new TickCounter().currentTick()).toBe(0);
    });

    it("should start at a custom tick", () => {
        expect(new TickCounter({ startTick: 720 }).currentTick()).toBe(720);
    });

    it("should advance one tick at a time", () => {
        const time = new TickCounter();
        time.advanceOneTick();
        time.advanceOneTick();

        expect(time.currentTick()).toBe(2);
    });

    it("should throw on an invalid start tick", () => {
        expect(() => new TickCounter({ startTick: -1 })).toThrow(/non-negative integer/);
        expect(() => new TickCounter({ startTick: 0.5 })).toThrow(/non-negative integer/);
    });
});
