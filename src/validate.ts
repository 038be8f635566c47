// Configuration validation. Pure: never mutates its input.

import { ScheduleError } from "./error.js";
import type { ScheduleConfig } from "./types.js";
import { MULTI_DAY_UNITS } from "./types.js";
import { secondsOfDay } from "./window.js";

/** Returns the first consistency violation in `config`, or null when valid. */
export function validate(config: ScheduleConfig): ScheduleError | null {
  if (!Number.isInteger(config.interval) || config.interval < 1) {
    return ScheduleError.invalidInterval(config.interval);
  }

  const { startTime, endTime } = config;
  if (startTime !== null && endTime !== null) {
    if (secondsOfDay(startTime) >= secondsOfDay(endTime)) {
      return ScheduleError.invalidTimeWindow(
        startTime.toString(),
        endTime.toString(),
      );
    }
  }

  if (config.allowedWeekdays !== null) {
    if (config.allowedWeekdays.size === 0) {
      return ScheduleError.emptyWeekdaySet();
    }
    if (MULTI_DAY_UNITS.has(config.unit)) {
      return ScheduleError.incompatibleMultiUnitWeekdayFilter(config.unit);
    }
  }

  return null;
}
