export type SchedulingErrorCode =
    | "INVALID_ARGUMENT"
    | "DUPLICATE_KEY"
    | "PRECONDITION_VIOLATED"
    | "SCHEDULER_STALLED";

export abstract class SchedulingError extends Error {
    abstract readonly code: SchedulingErrorCode;
}

/** Negative delay, empty key, tick in the past, or a malformed option. */
export class InvalidArgumentError extends SchedulingError {
    readonly code = "INVALID_ARGUMENT";

    constructor(message: string) {
        super(message);
        this.name = "InvalidArgumentError";
    }
}

export class DuplicateKeyError extends SchedulingError {
    readonly code = "DUPLICATE_KEY";

    constructor(public readonly key: string | number) {
        super(`Key already scheduled: ${String(key)}`);
        this.name = "DuplicateKeyError";
    }
}

/**
 * An internal contract was broken, e.g. advancing past a bucket that still holds due events.
 * Not recoverable in the call path that raised it.
 */
export class PreconditionViolatedError extends SchedulingError {
    readonly code = "PRECONDITION_VIOLATED";

    constructor(message: string) {
        super(message);
        this.name = "PreconditionViolatedError";
    }
}

export class SchedulerStalledError extends SchedulingError {
    readonly code = "SCHEDULER_STALLED";

    constructor(
        public readonly ticksAdvanced: number,
        public readonly tick: number,
    ) {
        super(`Advanced ${ticksAdvanced} ticks without finding an event (now at tick ${tick})`);
        this.name = "SchedulerStalledError";
    }
}
