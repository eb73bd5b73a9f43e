export { TimeWheel } from "./time-wheel";
export type { DueEvent, TimeWheelOptions, TimeWheelStats, UpcomingEvent, WheelKey } from "./time-wheel";
export { Scheduler } from "./scheduler";
export type {
    ActionRecord,
    ExecutedEvent,
    ExecutedListener,
    ScheduleInfo,
    SchedulerOptions,
    SchedulerState,
    SchedulerStatus,
    TurnResult,
    UpcomingTurn,
} from "./scheduler";
export { isDeactivatable } from "./schedulable";
export type { Deactivatable, Schedulable } from "./schedulable";
export { Actor, DEFAULT_ACTION_DELAY, OneShotEvent, RecurringEvent } from "./events";
export type { ActionDelay, ActorOptions, ActorTurn, RecurringEventOptions } from "./events";
export { TickCounter } from "./time-source";
export type { TimeSource } from "./time-source";
export { createSchedulerConfig, HOURS_PER_DAY } from "./config";
export type { SchedulerConfig, SchedulerConfigOverrides } from "./config";
export { createConsoleLogger, silentLogger } from "./logger";
export type { Logger } from "./logger";
export { seededRandom, triangular } from "./random";
export type { RandomSource } from "./random";
export {
    DuplicateKeyError,
    InvalidArgumentError,
    PreconditionViolatedError,
    SchedulerStalledError,
    SchedulingError,
} from "./errors";
export type { SchedulingErrorCode } from "./errors";
