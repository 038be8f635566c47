// Logger factory: pino, JSON to stdout, silenced under test tooling.

import { pino } from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = process.env.LOG_LEVEL ?? "info";

  return pino({
    level,
    enabled: !(isVitest || nodeEnv === "test"),
    base: { ...bindings, lib: "tickwindow" },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** For tests: keeps the Logger type, emits nothing. */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/** Shared default for schedules built without a `logger` option. */
export const defaultLogger: Logger = makeLogger({ module: "schedule" });
