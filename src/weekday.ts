// Weekday filter: membership test and forward search for the next allowed day.

import type { Temporal } from "@js-temporal/polyfill";
import { ScheduleError } from "./error.js";
import type { ScheduleConfig, Weekday } from "./types.js";
import { ISO_WEEKDAYS, weekdayNumber } from "./types.js";
import { withTimeOfDay } from "./window.js";

type ZDT = Temporal.ZonedDateTime;

// Any non-empty restriction admits a day within 7; 14 leaves margin.
const MAX_DAY_SEARCH = 14;

export function parseWeekday(s: string): Weekday {
  const map: Record<string, Weekday> = {
    monday: "monday",
    mon: "monday",
    tuesday: "tuesday",
    tue: "tuesday",
    wednesday: "wednesday",
    wed: "wednesday",
    thursday: "thursday",
    thu: "thursday",
    friday: "friday",
    fri: "friday",
    saturday: "saturday",
    sat: "saturday",
    sunday: "sunday",
    sun: "sunday",
  };
  const day = map[s.trim().toLowerCase()];
  if (day === undefined) {
    throw ScheduleError.invalidWeekday(s);
  }
  return day;
}

export function weekdayOf(dt: ZDT): Weekday {
  return ISO_WEEKDAYS[dt.dayOfWeek - 1];
}

/** True when no restriction is configured or `dt` falls on an allowed day. */
export function isDayAllowed(config: ScheduleConfig, dt: ZDT): boolean {
  if (config.allowedWeekdays === null) return true;
  return config.allowedWeekdays.has(weekdayOf(dt));
}

/**
 * Scan forward from `from` (inclusive) for the first allowed day.
 *
 * With `preserveTimeOfDay` and a configured start time, the result sits at
 * the start time on the matching day; otherwise `from` is advanced in whole
 * calendar days and keeps its own time of day. Returns `from` unchanged when
 * there is no restriction or no match within the search bound.
 */
export function advanceToAllowedDay(
  config: ScheduleConfig,
  from: ZDT,
  preserveTimeOfDay: boolean,
): ZDT {
  if (config.allowedWeekdays === null) return from;

  const startTime = preserveTimeOfDay ? config.startTime : null;
  let current = from;
  for (let i = 0; i < MAX_DAY_SEARCH; i++) {
    if (isDayAllowed(config, current)) {
      return startTime === null ? current : withTimeOfDay(current, startTime);
    }
    current = current.add({ days: 1 });
  }
  return from;
}

/** Allowed days in Monday-first order, for display and getters. */
export function sortWeekdays(days: Iterable<Weekday>): Weekday[] {
  return [...days].sort((a, b) => weekdayNumber(a) - weekdayNumber(b));
}
