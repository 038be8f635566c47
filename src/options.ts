// Option constructors consumed by `Schedule.create` and `Schedule#set`.

import { Temporal } from "@js-temporal/polyfill";
import type { Logger } from "pino";
import type {
  AfterNextHook,
  BeforeNextHook,
  IntervalUnit,
  ScheduleOption,
  Weekday,
} from "./types.js";

export type TimeInput = Temporal.PlainTime | Temporal.PlainTimeLike | string;
export type DateTimeInput = Temporal.ZonedDateTime | string;

function toPlainTime(t: TimeInput | null): Temporal.PlainTime | null {
  return t === null ? null : Temporal.PlainTime.from(t);
}

function toZoned(dt: DateTimeInput | null): Temporal.ZonedDateTime | null {
  return dt === null ? null : Temporal.ZonedDateTime.from(dt);
}

/**
 * Daily window start. Only the wall-clock fields are used. Pass null to
 * remove the window.
 */
export function startTime(t: TimeInput | null): ScheduleOption {
  const value = toPlainTime(t);
  return (config) => {
    config.startTime = value;
  };
}

/** Daily window end. Defaults to 23:59:59.999999999 when unset. */
export function endTime(t: TimeInput | null): ScheduleOption {
  const value = toPlainTime(t);
  return (config) => {
    config.endTime = value;
  };
}

/** The schedule stays inactive before this instant. */
export function startDate(dt: DateTimeInput | null): ScheduleOption {
  const value = toZoned(dt);
  return (config) => {
    config.startDate = value;
  };
}

/**
 * Restrict runs to the given weekdays. Called with no days, it clears any
 * restriction.
 */
export function allowedWeekdays(...days: Weekday[]): ScheduleOption {
  return (config) => {
    config.allowedWeekdays = days.length === 0 ? null : new Set(days);
  };
}

export function interval(n: number): ScheduleOption {
  return (config) => {
    config.interval = n;
  };
}

export function intervalUnit(unit: IntervalUnit): ScheduleOption {
  return (config) => {
    config.unit = unit;
  };
}

/** Hook run before every `next()`. It may call `set` on the schedule it receives. */
export function beforeNext(hook: BeforeNextHook | null): ScheduleOption {
  return (config) => {
    config.beforeNext = hook;
  };
}

export function afterNext(hook: AfterNextHook | null): ScheduleOption {
  return (config) => {
    config.afterNext = hook;
  };
}

export function enable(): ScheduleOption {
  return (config) => {
    config.enabled = true;
  };
}

/** While disabled, `next()` answers `now + 5 minutes` so the driver keeps polling. */
export function disable(): ScheduleOption {
  return (config) => {
    config.enabled = false;
  };
}

/**
 * Precision mode (the default): steps are taken from the query time and a
 * step that leaves the window moves to the next day's window start.
 */
export function enablePrecision(): ScheduleOption {
  return (config) => {
    config.precision = true;
  };
}

/** Runs align to a grid anchored at the window start instead of the query time. */
export function disablePrecision(): ScheduleOption {
  return (config) => {
    config.precision = false;
  };
}

/**
 * Override the cached next run. While it lies after the query time, `next()`
 * returns it verbatim, which pauses the schedule until then.
 */
export function nextRun(dt: DateTimeInput | null): ScheduleOption {
  const value = toZoned(dt);
  return (config) => {
    config.nextRun = value;
  };
}

/** Logger receiving hook-fault warnings. */
export function logger(log: Logger): ScheduleOption {
  return (config) => {
    config.logger = log;
  };
}
