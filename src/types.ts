// Configuration types for tickwindow schedules.

import type { Temporal } from "@js-temporal/polyfill";
import type { Logger } from "pino";
import type { Schedule } from "./index.js";

export type Weekday =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

export type IntervalUnit =
  | "second"
  | "minute"
  | "hour"
  | "day"
  | "week"
  | "month"
  | "year";

/**
 * Called before every `next()` computation with the owning schedule. A
 * returned promise is not awaited; a rejection is logged.
 */
export type BeforeNextHook = (schedule: Schedule) => void | Promise<void>;

/** Called with every freshly computed run time, before it is cached. */
export type AfterNextHook = (
  next: Temporal.ZonedDateTime,
) => void | Promise<void>;

// --- Schedule configuration (the mutable aggregate) ---

export interface ScheduleConfig {
  startDate: Temporal.ZonedDateTime | null;
  startTime: Temporal.PlainTime | null;
  endTime: Temporal.PlainTime | null;
  allowedWeekdays: Set<Weekday> | null;
  enabled: boolean;
  interval: number;
  unit: IntervalUnit;
  precision: boolean;
  nextRun: Temporal.ZonedDateTime | null;
  beforeNext: BeforeNextHook | null;
  afterNext: AfterNextHook | null;
  logger: Logger;
}

/** A mutation applied by `Schedule.create` and `Schedule#set`. Never fails on its own. */
export type ScheduleOption = (config: ScheduleConfig) => void;

// --- Helper functions ---

/** ISO 8601 day number: Monday=1, Sunday=7. */
export function weekdayNumber(day: Weekday): number {
  const map: Record<Weekday, number> = {
    monday: 1,
    tuesday: 2,
    wednesday: 3,
    thursday: 4,
    friday: 5,
    saturday: 6,
    sunday: 7,
  };
  return map[day];
}

/** Weekdays indexed by ISO day number minus one. */
export const ISO_WEEKDAYS: readonly Weekday[] = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
];

export const WEEKDAYS: Weekday[] = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
];

export const WEEKEND: Weekday[] = ["saturday", "sunday"];

/** Units whose single step spans a week or more. */
export const MULTI_DAY_UNITS: ReadonlySet<IntervalUnit> = new Set<IntervalUnit>([
  "week",
  "month",
  "year",
]);
