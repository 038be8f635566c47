// Default construction and copying of schedule configurations.

import { defaultLogger } from "./logger.js";
import type { IntervalUnit, ScheduleConfig, ScheduleOption } from "./types.js";

export function newScheduleConfig(
  interval: number,
  unit: IntervalUnit,
): ScheduleConfig {
  return {
    startDate: null,
    startTime: null,
    endTime: null,
    allowedWeekdays: null,
    enabled: true,
    interval,
    unit,
    precision: true,
    nextRun: null,
    beforeNext: null,
    afterNext: null,
    logger: defaultLogger,
  };
}

/**
 * Independent copy of `config`. Temporal values are immutable and shared;
 * the weekday set is the only mutable field and is copied.
 */
export function cloneConfig(config: ScheduleConfig): ScheduleConfig {
  return {
    ...config,
    allowedWeekdays:
      config.allowedWeekdays === null ? null : new Set(config.allowedWeekdays),
  };
}

/** Apply options in order to a copy of `config`; the input is untouched. */
export function applyOptions(
  config: ScheduleConfig,
  options: readonly ScheduleOption[],
): ScheduleConfig {
  const candidate = cloneConfig(config);
  for (const option of options) {
    option(candidate);
  }
  return candidate;
}
