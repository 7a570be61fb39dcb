import type { FieldName } from "./field.js";

export type CronErrorKind = "invalid-argument" | "invalid-recurrence" | "no-match";

/** All errors produced by cron-nearest. */
export class CronError extends Error {
  readonly kind: CronErrorKind;
  readonly field?: FieldName;

  constructor(
    kind: CronErrorKind,
    message: string,
    field?: FieldName,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "CronError";
    this.kind = kind;
    this.field = field;
  }

  static invalidArgument(message: string, cause?: unknown): CronError {
    return new CronError("invalid-argument", message, undefined, cause);
  }

  static invalidRecurrence(message: string, field?: FieldName): CronError {
    return new CronError("invalid-recurrence", message, field);
  }

  /** Search-internal: a field has no legal value to offer. */
  static noMatch(message: string, field?: FieldName): CronError {
    return new CronError("no-match", message, field);
  }

  static isNoMatch(err: unknown): err is CronError {
    return err instanceof CronError && err.kind === "no-match";
  }
}
