/**
 * Anything the Scheduler can place on the wheel. The core dispatches through
 * these members only and never inspects the concrete type.
 */
export interface Schedulable<R = unknown> {
    readonly id: string;
    readonly name: string;
    /** Type label for history and logs. */
    readonly kind: string;

    execute(): R;
    /** Absolute tick of the next run, given the current tick. */
    calculateNextTick(now: number): number;
    shouldReschedule(): boolean;
}

/**
 * Schedulables that can be switched off without being unregistered.
 */
export interface Deactivatable {
    isActive(): boolean;
    setActive(active: boolean): void;
}

export function isDeactivatable<R>(s: Schedulable<R>): s is Schedulable<R> & Deactivatable {
    return "isActive" in s && typeof s.isActive === "function"
        && "setActive" in s && typeof s.setActive === "function";
}
