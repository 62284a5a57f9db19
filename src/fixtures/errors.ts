import type { ValidationError } from "./validate.js";

export type FixtureErrorCode =
  | "MissingInput"
  | "Shortfall"
  | "ScheduleConflict"
  | "InvalidOptions"
  | "Config"
  | "Interrupted";

/** Base class for every error the generators raise on purpose. */
export class FixtureError extends Error {
  public readonly code: FixtureErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: FixtureErrorCode,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "FixtureError";
    this.code = code;
    this.context = context;
  }
}

/** A required upstream input could not be resolved. Raised before any output. */
export class MissingInputError extends FixtureError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "MissingInput", context);
    this.name = "MissingInputError";
  }
}

/** The attempt budget ran out before the requested row count was reached. */
export class ShortfallError extends FixtureError {
  public readonly requested: number;
  public readonly produced: number;

  constructor(entity: string, requested: number, produced: number) {
    super(
      `Only ${produced} of ${requested} ${entity} rows could be generated within the attempt budget`,
      "Shortfall",
      { entity, requested, produced }
    );
    this.name = "ShortfallError";
    this.requested = requested;
    this.produced = produced;
  }
}

/** No free slot was found in a room within the slot-attempt cap. */
export class ScheduleConflictError extends FixtureError {
  constructor(roomId: string, attempts: number) {
    super(
      `No non-overlapping slot found for room ${roomId} after ${attempts} attempts`,
      "ScheduleConflict",
      { roomId, attempts }
    );
    this.name = "ScheduleConflictError";
  }
}

export class InvalidOptionsError extends FixtureError {
  public readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    super(
      errors.map((e) => e.message).join("; "),
      "InvalidOptions",
      { rules: errors.map((e) => e.rule) }
    );
    this.name = "InvalidOptionsError";
    this.errors = errors;
  }
}

export class ConfigError extends FixtureError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "Config", context);
    this.name = "ConfigError";
  }
}

/** The run was interrupted before its output was written. */
export class InterruptedError extends FixtureError {
  constructor() {
    super("Interrupted", "Interrupted");
    this.name = "InterruptedError";
  }
}
