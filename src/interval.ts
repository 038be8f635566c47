// Interval stepping: advance an instant by one configured interval.

import { Temporal } from "@js-temporal/polyfill";
import type { IntervalUnit } from "./types.js";

type ZDT = Temporal.ZonedDateTime;

/** Tick used when a schedule is disabled or the unit is unrecognized. */
export const FALLBACK_STEP: Temporal.DurationLike = { minutes: 5 };

/**
 * Add `duration`, or the fallback tick when the result falls outside the
 * range Temporal can represent.
 */
function addOrFallback(dt: ZDT, duration: Temporal.DurationLike): ZDT {
  try {
    return dt.add(duration);
  } catch (err) {
    if (err instanceof RangeError) {
      return dt.add(FALLBACK_STEP);
    }
    throw err;
  }
}

/**
 * Second, minute and hour steps add exact time. Day and week steps add
 * calendar days and keep the wall-clock time across DST changes. Month and
 * year steps clamp to the last valid day of the target month. A step beyond
 * the representable range becomes the fallback tick.
 */
export function step(dt: ZDT, interval: number, unit: IntervalUnit): ZDT {
  switch (unit) {
    case "second":
      return addOrFallback(dt, { seconds: interval });
    case "minute":
      return addOrFallback(dt, { minutes: interval });
    case "hour":
      return addOrFallback(dt, { hours: interval });
    case "day":
      return addOrFallback(dt, { days: interval });
    case "week":
      return addOrFallback(dt, { days: interval * 7 });
    case "month":
      return addOrFallback(dt, { months: interval });
    case "year":
      return addOrFallback(dt, { years: interval });
    default:
      return dt.add(FALLBACK_STEP);
  }
}

const EXACT_UNIT_SECONDS: Partial<Record<IntervalUnit, number>> = {
  second: 1,
  minute: 60,
  hour: 3600,
};

/**
 * First point on the grid `anchor + k * interval` (k >= 0) that lies strictly
 * after `now`. Exact units jump straight to the slot; calendar units walk.
 * An unrepresentable slot yields `now` plus the fallback tick.
 */
export function stepPast(
  anchor: ZDT,
  now: ZDT,
  interval: number,
  unit: IntervalUnit,
): ZDT {
  if (Temporal.ZonedDateTime.compare(anchor, now) > 0) return anchor;

  const unitSeconds = EXACT_UNIT_SECONDS[unit];
  if (unitSeconds !== undefined) {
    const stepSeconds = interval * unitSeconds;
    const elapsed = now.epochNanoseconds - anchor.epochNanoseconds;
    const slots = elapsed / (BigInt(stepSeconds) * 1_000_000_000n) + 1n;
    try {
      return anchor.add({ seconds: Number(slots) * stepSeconds });
    } catch (err) {
      // The slot lies beyond the representable range.
      if (err instanceof RangeError) {
        return now.add(FALLBACK_STEP);
      }
      throw err;
    }
  }

  let next = anchor;
  while (Temporal.ZonedDateTime.compare(next, now) <= 0) {
    next = step(next, interval, unit);
  }
  return next;
}
