/**
 * Building blocks below `Schedule`: weekday search, interval stepping,
 * validation of raw configurations, and display.
 */

import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it } from "vitest";
import { newScheduleConfig } from "../src/config.js";
import { ScheduleError } from "../src/error.js";
import {
  allowedWeekdays,
  disable,
  disablePrecision,
  endTime,
  Schedule,
  startDate,
  startTime,
  WEEKDAYS,
  WEEKEND,
} from "../src/index.js";
import { step, stepPast } from "../src/interval.js";
import type { IntervalUnit, ScheduleConfig, Weekday } from "../src/types.js";
import { validate } from "../src/validate.js";
import {
  advanceToAllowedDay,
  isDayAllowed,
  parseWeekday,
  weekdayOf,
} from "../src/weekday.js";
import { secondsOfDay, windowFor } from "../src/window.js";

function utc(s: string): Temporal.ZonedDateTime {
  return Temporal.ZonedDateTime.from(`${s.replace(" ", "T")}+00:00[UTC]`);
}

function configWith(overrides: Partial<ScheduleConfig>): ScheduleConfig {
  return { ...newScheduleConfig(1, "day"), ...overrides };
}

// =============================================================================
// Weekdays
// =============================================================================

describe("parseWeekday", () => {
  it("accepts full names and abbreviations in any case", () => {
    expect(parseWeekday("Mon")).toBe("monday");
    expect(parseWeekday(" FRIDAY ")).toBe("friday");
    expect(parseWeekday("sun")).toBe("sunday");
  });

  it("rejects unknown names", () => {
    expect(() => parseWeekday("funday")).toThrow(ScheduleError);
    expect(() => parseWeekday("funday")).toThrow('unknown weekday: "funday"');
  });
});

describe("weekdayOf", () => {
  it("names the ISO day of the week", () => {
    expect(weekdayOf(utc("2024-03-11 10:00:00"))).toBe("monday");
    expect(weekdayOf(utc("2024-03-17 10:00:00"))).toBe("sunday");
  });
});

describe("advanceToAllowedDay", () => {
  const mwf = new Set<Weekday>(["monday", "wednesday", "friday"]);

  it("returns the input when there is no restriction", () => {
    const from = utc("2024-03-12 10:30:00");
    const result = advanceToAllowedDay(configWith({}), from, true);
    expect(result.toString()).toBe("2024-03-12T10:30:00+00:00[UTC]");
  });

  it("returns an allowed day unchanged without a start time", () => {
    const from = utc("2024-03-13 10:30:00");
    const result = advanceToAllowedDay(
      configWith({ allowedWeekdays: mwf }),
      from,
      true,
    );
    expect(result.toString()).toBe("2024-03-13T10:30:00+00:00[UTC]");
  });

  it("keeps the time of day of the seed when not preserving", () => {
    const config = configWith({
      allowedWeekdays: mwf,
      startTime: Temporal.PlainTime.from("08:00"),
    });
    const result = advanceToAllowedDay(config, utc("2024-03-12 10:30:00"), false);
    expect(result.toString()).toBe("2024-03-13T10:30:00+00:00[UTC]");
  });

  it("moves to the start time when preserving", () => {
    const config = configWith({
      allowedWeekdays: mwf,
      startTime: Temporal.PlainTime.from("08:00"),
    });
    const result = advanceToAllowedDay(config, utc("2024-03-16 10:30:00"), true);
    expect(result.toString()).toBe("2024-03-18T08:00:00+00:00[UTC]");
  });

  it("falls back to the seed when nothing matches within the bound", () => {
    const config = configWith({ allowedWeekdays: new Set<Weekday>() });
    const from = utc("2024-03-12 10:30:00");
    expect(advanceToAllowedDay(config, from, false).toString()).toBe(
      "2024-03-12T10:30:00+00:00[UTC]",
    );
  });

  it("membership follows the date in the instant's own zone", () => {
    const config = configWith({ allowedWeekdays: new Set<Weekday>(["tuesday"]) });
    // Monday 23:00 in UTC is already Tuesday in Tokyo.
    const tokyo = utc("2024-03-11 23:00:00").withTimeZone("Asia/Tokyo");
    expect(isDayAllowed(config, utc("2024-03-11 23:00:00"))).toBe(false);
    expect(isDayAllowed(config, tokyo)).toBe(true);
  });
});

// =============================================================================
// Interval stepping
// =============================================================================

describe("step", () => {
  it("adds calendar weeks", () => {
    expect(step(utc("2024-03-11 10:00:00"), 2, "week").toString()).toBe(
      "2024-03-25T10:00:00+00:00[UTC]",
    );
  });

  it("clamps yearly steps from a leap day", () => {
    expect(step(utc("2024-02-29 06:00:00"), 1, "year").toString()).toBe(
      "2025-02-28T06:00:00+00:00[UTC]",
    );
  });

  it("uses the 5-minute tick for an unrecognized unit", () => {
    // Units arriving from untyped input bypass the union.
    const unit: IntervalUnit = JSON.parse('"fortnight"');
    expect(step(utc("2024-03-11 10:00:00"), 1, unit).toString()).toBe(
      "2024-03-11T10:05:00+00:00[UTC]",
    );
  });

  it("uses the 5-minute tick when the result is out of range", () => {
    expect(step(utc("2024-03-11 10:00:00"), 1e15, "year").toString()).toBe(
      "2024-03-11T10:05:00+00:00[UTC]",
    );
    expect(step(utc("2024-03-11 10:00:00"), 1e15, "second").toString()).toBe(
      "2024-03-11T10:05:00+00:00[UTC]",
    );
  });
});

describe("stepPast", () => {
  const anchor = utc("2024-03-11 09:00:00");

  it("returns the anchor when it is still ahead", () => {
    const result = stepPast(anchor, utc("2024-03-11 08:00:00"), 2, "second");
    expect(result.toString()).toBe("2024-03-11T09:00:00+00:00[UTC]");
  });

  it("jumps to the first slot strictly after now", () => {
    expect(
      stepPast(anchor, utc("2024-03-11 10:00:01"), 2, "second").toString(),
    ).toBe("2024-03-11T10:00:02+00:00[UTC]");
    expect(
      stepPast(anchor, utc("2024-03-11 10:00:00"), 2, "second").toString(),
    ).toBe("2024-03-11T10:00:02+00:00[UTC]");
    expect(
      stepPast(anchor, utc("2024-03-11 11:10:00"), 45, "minute").toString(),
    ).toBe("2024-03-11T11:15:00+00:00[UTC]");
  });

  it("falls back to now plus 5 minutes for an unreachable slot", () => {
    expect(
      stepPast(anchor, utc("2024-03-11 10:02:00"), 1e15, "hour").toString(),
    ).toBe("2024-03-11T10:07:00+00:00[UTC]");
  });

  it("walks calendar units", () => {
    expect(
      stepPast(anchor, utc("2024-03-13 09:00:00"), 1, "day").toString(),
    ).toBe("2024-03-14T09:00:00+00:00[UTC]");
  });
});

// =============================================================================
// Time window
// =============================================================================

describe("windowFor", () => {
  it("is null without a start time", () => {
    expect(windowFor(configWith({}), utc("2024-03-11 10:00:00"))).toBeNull();
  });

  it("defaults the end to the last nanosecond of the day", () => {
    const window = windowFor(
      configWith({ startTime: Temporal.PlainTime.from("09:00") }),
      utc("2024-03-11 10:00:00"),
    );
    expect(window?.start.toString()).toBe("2024-03-11T09:00:00+00:00[UTC]");
    expect(window?.end.toString()).toBe(
      "2024-03-11T23:59:59.999999999+00:00[UTC]",
    );
  });

  it("measures seconds of day without sub-second fields", () => {
    expect(secondsOfDay(Temporal.PlainTime.from("09:30:15.5"))).toBe(34215);
  });
});

// =============================================================================
// Validation of raw configurations
// =============================================================================

describe("validate", () => {
  it("rejects an explicitly empty weekday set", () => {
    const err = validate(configWith({ allowedWeekdays: new Set<Weekday>() }));
    expect(err?.kind).toBe("emptyWeekdaySet");
  });

  it("accepts an already valid configuration again", () => {
    const config = configWith({
      startTime: Temporal.PlainTime.from("09:00"),
      endTime: Temporal.PlainTime.from("17:00"),
      allowedWeekdays: new Set<Weekday>(WEEKDAYS),
    });
    expect(validate(config)).toBeNull();
    expect(validate(config)).toBeNull();
  });

  it("does not mutate its input", () => {
    const config = configWith({ interval: 0 });
    validate(config);
    expect(config.interval).toBe(0);
  });
});

// =============================================================================
// Display
// =============================================================================

describe("toString", () => {
  it("renders a business-hours window", () => {
    const schedule = Schedule.create(
      2,
      "second",
      startTime("09:00"),
      endTime("17:00"),
      allowedWeekdays(...WEEKDAYS),
    );
    expect(schedule.toString()).toBe(
      "every 2 seconds from 09:00 to 17:00 on weekdays",
    );
  });

  it("renders weekends and single units", () => {
    const schedule = Schedule.create(1, "hour", allowedWeekdays(...WEEKEND));
    expect(schedule.toString()).toBe("every 1 hour on weekends");
  });

  it("lists other days Monday first", () => {
    const schedule = Schedule.create(
      15,
      "minute",
      allowedWeekdays("friday", "monday"),
    );
    expect(schedule.toString()).toBe("every 15 minutes on monday, friday");
  });

  it("renders seconds, start date and modes", () => {
    const schedule = Schedule.create(
      1,
      "day",
      startTime("02:30:15"),
      startDate("2024-03-20T12:00:00+00:00[UTC]"),
      disablePrecision(),
      disable(),
    );
    expect(schedule.toString()).toBe(
      "every 1 day from 02:30:15 starting 2024-03-20T12:00:00+00:00[UTC] aligned (disabled)",
    );
  });
});
