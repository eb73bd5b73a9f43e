import { describe, it, expect, vi } from "vitest";
import { Actor, DEFAULT_ACTION_DELAY, OneShotEvent, RecurringEvent } from "../src/events";
import { isDeactivatable } from "../src/schedulable";
import { InvalidArgumentError } from "../src/errors";

describe("OneShotEvent", () => {
    it("should run its action and never reschedule", () => {
        const action = vi.fn(() => 42);
        const event = new OneShotEvent("once", "Once", action);

        expect(event.execute()).toBe(42);
        expect(action).toHaveBeenCalledTimes(1);
        expect(event.shouldReschedule()).toBe(false);
        expect(event.calculateNextTick(17)).toBe(17);
        expect(event.kind).toBe("one-shot");
        expect(isDeactivatable(event)).toBe(false);
    });
});

describe("RecurringEvent", () => {
    it("should pass the run number and stop after maxRuns", () => {
        const runs: number[] = [];
        const event = new RecurringEvent({
            id: "tide",
            name: "Tide",
            intervalTicks: 12,
            maxRuns: 2,
            action: (run) => runs.push(run),
        });

        expect(event.shouldReschedule()).toBe(true);
        event.execute();
        expect(event.shouldReschedule()).toBe(true);
        event.execute();
        expect(event.shouldReschedule()).toBe(false);

        expect(runs).toEqual([1, 2]);
        expect(event.runCount).toBe(2);
        expect(event.calculateNextTick(100)).toBe(112);
    });

    it("should recur forever without maxRuns", () => {
        const event = new RecurringEvent({ id: "r", name: "R", intervalTicks: 1, action: () => undefined });
        for (let i = 0; i < 50; i++) event.execute();

        expect(event.shouldReschedule()).toBe(true);
    });

    it("should validate its options", () => {
        const action = (): void => undefined;
        expect(() => new RecurringEvent({ id: "r", name: "R", intervalTicks: 0, action })).toThrow(InvalidArgumentError);
        expect(() => new RecurringEvent({ id: "r", name: "R", intervalTicks: 1.5, action })).toThrow(/intervalTicks/);
        expect(() => new RecurringEvent({ id: "r", name: "R", intervalTicks: 1, maxRuns: 0, action })).toThrow(/maxRuns/);
    });
});

describe("Actor", () => {
    it("should be deactivatable", () => {
        const actor = new Actor({ id: "a", name: "A" });

        expect(isDeactivatable(actor)).toBe(true);
        expect(actor.isActive()).toBe(true);
        expect(actor.shouldReschedule()).toBe(true);

        actor.setActive(false);
        expect(actor.shouldReschedule()).toBe(false);
        expect(actor.execute()).toBeUndefined();
    });

    it("should draw its delay from the triangular distribution", () => {
        const actor = new Actor({
            id: "a",
            name: "A",
            delay: { minTicks: 10, peakTicks: 20, maxTicks: 30 },
            random: () => 0.5,
        });

        expect(actor.calculateNextTick(100)).toBe(120);
    });

    it("should pick an action from its repertoire", () => {
        const actor = new Actor({
            id: "a",
            name: "A",
            faction: "north",
            actions: ["wait", "strike"],
            random: () => 0.5,
        });

        expect(actor.execute()).toEqual({ actor: "a", faction: "north", action: "strike" });
    });

    it("should use the default repertoire and faction", () => {
        const actor = new Actor({ id: "a", name: "A", random: () => 0.5 });
        expect(actor.execute()).toEqual({ actor: "a", faction: "neutral", action: "observe" });
    });

    it("should keep default delays within one to one hundred eighty days", () => {
        const actor = new Actor({ id: "a", name: "A", random: () => 0.999999 });
        const next = actor.calculateNextTick(0);

        expect(next).toBeGreaterThanOrEqual(DEFAULT_ACTION_DELAY.minTicks);
        expect(next).toBeLessThanOrEqual(DEFAULT_ACTION_DELAY.maxTicks);
    });

    it("should validate its options", () => {
        expect(() => new Actor({ id: "a", name: "A", delay: { minTicks: 0, peakTicks: 1, maxTicks: 2 } })).toThrow(InvalidArgumentError);
        expect(() => new Actor({ id: "a", name: "A", delay: { minTicks: 5, peakTicks: 4, maxTicks: 9 } })).toThrow(/minTicks <= peakTicks/);
        expect(() => new Actor({ id: "a", name: "A", actions: [] })).toThrow(/actions/);
    });
});
