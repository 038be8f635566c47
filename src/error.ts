export type ScheduleErrorKind =
  | "invalidInterval"
  | "invalidTimeWindow"
  | "emptyWeekdaySet"
  | "incompatibleMultiUnitWeekdayFilter"
  | "invalidWeekday";

/** All errors produced by tickwindow. */
export class ScheduleError extends Error {
  readonly kind: ScheduleErrorKind;

  constructor(kind: ScheduleErrorKind, message: string) {
    super(message);
    this.name = "ScheduleError";
    this.kind = kind;
  }

  static invalidInterval(interval: number): ScheduleError {
    return new ScheduleError(
      "invalidInterval",
      `invalid interval ${interval}: interval cannot be less than 1`,
    );
  }

  static invalidTimeWindow(start: string, end: string): ScheduleError {
    return new ScheduleError(
      "invalidTimeWindow",
      `invalid time window ${start}-${end}: start time must be before end time`,
    );
  }

  static emptyWeekdaySet(): ScheduleError {
    return new ScheduleError(
      "emptyWeekdaySet",
      "allowed weekdays must contain at least one day",
    );
  }

  static incompatibleMultiUnitWeekdayFilter(unit: string): ScheduleError {
    return new ScheduleError(
      "incompatibleMultiUnitWeekdayFilter",
      `weekday restrictions cannot be combined with ${unit} intervals`,
    );
  }

  static invalidWeekday(input: string): ScheduleError {
    return new ScheduleError("invalidWeekday", `unknown weekday: "${input}"`);
  }

  /** Narrow an unknown thrown value to a ScheduleError, optionally of one kind. */
  static is(err: unknown, kind?: ScheduleErrorKind): err is ScheduleError {
    return (
      err instanceof ScheduleError && (kind === undefined || err.kind === kind)
    );
  }
}
