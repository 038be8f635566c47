// Display (toString) for schedule configurations.

import type { Temporal } from "@js-temporal/polyfill";
import type { IntervalUnit, ScheduleConfig, Weekday } from "./types.js";
import { WEEKDAYS, WEEKEND } from "./types.js";
import { sortWeekdays } from "./weekday.js";

/** Render a configuration as a one-line human-readable description. */
export function display(config: ScheduleConfig): string {
  let out = `every ${config.interval} ${unitDisplay(config.interval, config.unit)}`;

  if (config.startTime !== null) {
    out += ` from ${formatTime(config.startTime)}`;
    if (config.endTime !== null) {
      out += ` to ${formatTime(config.endTime)}`;
    }
  }

  if (config.allowedWeekdays !== null) {
    out += ` on ${displayDays(sortWeekdays(config.allowedWeekdays))}`;
  }

  if (config.startDate !== null) {
    out += ` starting ${config.startDate.toString()}`;
  }

  if (!config.precision) {
    out += " aligned";
  }

  if (!config.enabled) {
    out += " (disabled)";
  }

  return out;
}

function displayDays(days: Weekday[]): string {
  if (sameDays(days, WEEKDAYS)) return "weekdays";
  if (sameDays(days, WEEKEND)) return "weekends";
  return days.join(", ");
}

function sameDays(a: Weekday[], b: Weekday[]): boolean {
  return a.length === b.length && a.every((d, i) => d === b[i]);
}

function formatTime(t: Temporal.PlainTime): string {
  const hm = `${String(t.hour).padStart(2, "0")}:${String(t.minute).padStart(2, "0")}`;
  return t.second === 0 ? hm : `${hm}:${String(t.second).padStart(2, "0")}`;
}

function unitDisplay(interval: number, unit: IntervalUnit): string {
  return interval === 1 ? unit : `${unit}s`;
}
