// Daily time window: wall-clock [start, end] bounds projected onto a date.

import { Temporal } from "@js-temporal/polyfill";
import type { ScheduleConfig } from "./types.js";

type ZDT = Temporal.ZonedDateTime;

/** Window end used when only a start time is configured. */
export const END_OF_DAY: Temporal.PlainTime = Temporal.PlainTime.from({
  hour: 23,
  minute: 59,
  second: 59,
  millisecond: 999,
  microsecond: 999,
  nanosecond: 999,
});

export interface TimeWindow {
  start: ZDT;
  end: ZDT;
}

/** Whole seconds since midnight; sub-second fields are ignored. */
export function secondsOfDay(t: Temporal.PlainTime): number {
  return t.hour * 3600 + t.minute * 60 + t.second;
}

/** Combine a calendar date with a wall-clock time in the given zone. */
export function atTimeOnDate(
  date: Temporal.PlainDate,
  time: Temporal.PlainTime,
  tz: string,
): ZDT {
  return date.toPlainDateTime(time).toZonedDateTime(tz, {
    disambiguation: "compatible",
  });
}

/** Same calendar day as `dt`, with the time of day replaced. */
export function withTimeOfDay(dt: ZDT, time: Temporal.PlainTime): ZDT {
  return atTimeOnDate(dt.toPlainDate(), time, dt.timeZoneId);
}

/**
 * Today's window for `now`, or null when no start time is configured.
 * Both bounds are read in `now`'s time zone.
 */
export function windowFor(config: ScheduleConfig, now: ZDT): TimeWindow | null {
  if (config.startTime === null) return null;
  return {
    start: withTimeOfDay(now, config.startTime),
    end: withTimeOfDay(now, config.endTime ?? END_OF_DAY),
  };
}

export function isBefore(a: ZDT, b: ZDT): boolean {
  return Temporal.ZonedDateTime.compare(a, b) < 0;
}

export function isAfter(a: ZDT, b: ZDT): boolean {
  return Temporal.ZonedDateTime.compare(a, b) > 0;
}

export function isSameDay(a: ZDT, b: ZDT): boolean {
  return Temporal.PlainDate.compare(a.toPlainDate(), b.toPlainDate()) === 0;
}
