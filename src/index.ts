// tickwindow: public API

import type { Temporal } from "@js-temporal/polyfill";
import { applyOptions, newScheduleConfig } from "./config.js";
import { display } from "./display.js";
import type { ScheduleError } from "./error.js";
import { computeNext } from "./eval.js";
import { FALLBACK_STEP } from "./interval.js";
import type {
  IntervalUnit,
  ScheduleConfig,
  ScheduleOption,
  Weekday,
} from "./types.js";
import { validate } from "./validate.js";
import { sortWeekdays } from "./weekday.js";
import { isAfter } from "./window.js";

type HookName = "beforeNext" | "afterNext";

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * A recurring schedule that answers "when should the job run next?".
 *
 * `next()` and `set()` run synchronously to completion, so a hook that calls
 * `set()` during `next()` always sees and leaves a validated configuration.
 */
export class Schedule {
  private config: ScheduleConfig;

  private constructor(config: ScheduleConfig) {
    this.config = config;
  }

  /**
   * Build a schedule stepping every `interval` `unit`s, with options applied
   * in argument order. Throws a `ScheduleError` if the result is invalid.
   */
  static create(
    interval: number,
    unit: IntervalUnit,
    ...options: ScheduleOption[]
  ): Schedule {
    const config = applyOptions(newScheduleConfig(interval, unit), options);
    const err = validate(config);
    if (err !== null) {
      throw err;
    }
    return new Schedule(config);
  }

  /** Check a configuration without building a schedule. */
  static validate(
    interval: number,
    unit: IntervalUnit,
    ...options: ScheduleOption[]
  ): ScheduleError | null {
    return validate(applyOptions(newScheduleConfig(interval, unit), options));
  }

  /**
   * Compute the next run after `now`.
   *
   * A disabled schedule answers `now + 5 minutes` without caching it. A
   * cached run still after `now` is returned as is. Otherwise the result is
   * computed, passed to the after-hook and cached.
   */
  next(now: Temporal.ZonedDateTime): Temporal.ZonedDateTime {
    const before = this.config.beforeNext;
    if (before !== null) {
      this.runHook("beforeNext", () => before(this));
    }

    // The before-hook may have replaced the configuration.
    const config = this.config;
    if (!config.enabled) {
      return now.add(FALLBACK_STEP);
    }
    if (config.nextRun !== null && isAfter(config.nextRun, now)) {
      return config.nextRun;
    }

    const next = computeNext(config, now);

    const after = config.afterNext;
    if (after !== null) {
      this.runHook("afterNext", () => after(next));
    }

    this.config.nextRun = next;
    return next;
  }

  /**
   * Apply options atomically. The options run against a copy which is
   * validated and committed only when valid; on error the schedule is left
   * untouched and the error is returned.
   */
  set(...options: ScheduleOption[]): ScheduleError | null {
    const candidate = applyOptions(this.config, options);
    const err = validate(candidate);
    if (err !== null) {
      return err;
    }
    this.config = candidate;
    return null;
  }

  private runHook(name: HookName, hook: () => unknown): void {
    const log = this.config.logger;
    try {
      const result = hook();
      if (isPromiseLike(result)) {
        void Promise.resolve(result).catch((err: unknown) => {
          log.warn({ err, hook: name }, `${name} hook rejected`);
        });
      }
    } catch (err) {
      log.warn({ err, hook: name }, `${name} hook threw`);
    }
  }

  get interval(): number {
    return this.config.interval;
  }

  get unit(): IntervalUnit {
    return this.config.unit;
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  get precision(): boolean {
    return this.config.precision;
  }

  get startDate(): Temporal.ZonedDateTime | null {
    return this.config.startDate;
  }

  get startTime(): Temporal.PlainTime | null {
    return this.config.startTime;
  }

  get endTime(): Temporal.PlainTime | null {
    return this.config.endTime;
  }

  /** Allowed weekdays, Monday first, or null when every day is allowed. */
  get allowedWeekdays(): Weekday[] | null {
    const days = this.config.allowedWeekdays;
    return days === null ? null : sortWeekdays(days);
  }

  /** The cached (or manually set) next run. */
  get nextRun(): Temporal.ZonedDateTime | null {
    return this.config.nextRun;
  }

  /** Render as a one-line description. */
  toString(): string {
    return display(this.config);
  }
}

export { Temporal } from "@js-temporal/polyfill";
export type { ScheduleErrorKind } from "./error.js";
export { ScheduleError } from "./error.js";
export type { Logger } from "./logger.js";
export { makeLogger, makeNoopLogger } from "./logger.js";
export type { DateTimeInput, TimeInput } from "./options.js";
export {
  afterNext,
  allowedWeekdays,
  beforeNext,
  disable,
  disablePrecision,
  enable,
  enablePrecision,
  endTime,
  interval,
  intervalUnit,
  logger,
  nextRun,
  startDate,
  startTime,
} from "./options.js";
export type {
  AfterNextHook,
  BeforeNextHook,
  IntervalUnit,
  ScheduleConfig,
  ScheduleOption,
  Weekday,
} from "./types.js";
export { WEEKDAYS, WEEKEND } from "./types.js";
export { parseWeekday } from "./weekday.js";
