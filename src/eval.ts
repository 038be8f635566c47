// Evaluator: computes the next run time for an enabled schedule.

import type { Temporal } from "@js-temporal/polyfill";
import { step, stepPast } from "./interval.js";
import type { ScheduleConfig } from "./types.js";
import { advanceToAllowedDay, isDayAllowed } from "./weekday.js";
import type { TimeWindow } from "./window.js";
import {
  atTimeOnDate,
  isAfter,
  isBefore,
  isSameDay,
  windowFor,
} from "./window.js";

type ZDT = Temporal.ZonedDateTime;

// =============================================================================
// Evaluation order
// =============================================================================
// Disabled schedules and a cached next run are handled by the caller. This
// module resolves, in order:
//
// 1. Future start date: the start date (at the window start when one is set).
// 2. Daily window: the window start, a step inside the window, or the next
//    allowed day's window start.
// 3. No window: one step from `now`, skipping disallowed days.
//
// All wall-clock reads happen in `now`'s time zone.
// =============================================================================

/** Compute the next run strictly after `now`. */
export function computeNext(config: ScheduleConfig, now: ZDT): ZDT {
  const fromStartDate = nextFromStartDate(config, now);
  if (fromStartDate !== null) return fromStartDate;

  const window = windowFor(config, now);
  if (window !== null) {
    return nextInWindow(config, now, window);
  }

  return nextWithoutWindow(config, now);
}

function nextFromStartDate(config: ScheduleConfig, now: ZDT): ZDT | null {
  const { startDate, startTime } = config;
  if (startDate === null || !isBefore(now, startDate)) return null;

  if (startTime !== null) {
    const combined = atTimeOnDate(
      startDate.toPlainDate(),
      startTime,
      now.timeZoneId,
    );
    if (isAfter(combined, now)) return combined;
  }
  return startDate.withTimeZone(now.timeZoneId);
}

/** First allowed day on or after the day following `window.start`. */
function nextWindowStart(config: ScheduleConfig, window: TimeWindow): ZDT {
  return advanceToAllowedDay(config, window.start.add({ days: 1 }), true);
}

function nextInWindow(
  config: ScheduleConfig,
  now: ZDT,
  window: TimeWindow,
): ZDT {
  if (!isDayAllowed(config, now)) {
    return nextWindowStart(config, window);
  }

  if (config.precision) {
    if (isBefore(now, window.start)) return window.start;
    if (isAfter(now, window.end)) return nextWindowStart(config, window);

    const next = step(now, config.interval, config.unit);
    if (isAfter(next, window.end)) return nextWindowStart(config, window);
    return next;
  }

  // Non-precision: align to the grid anchored at today's window start.
  const next = stepPast(window.start, now, config.interval, config.unit);

  if (!isSameDay(next, now)) {
    return advanceToAllowedDay(config, next, true);
  }
  return next;
}

function nextWithoutWindow(config: ScheduleConfig, now: ZDT): ZDT {
  const next = step(now, config.interval, config.unit);
  if (!isSameDay(next, now)) {
    return advanceToAllowedDay(config, next, false);
  }
  return next;
}
