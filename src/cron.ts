// Recurrence model: a dialect plus one validated expression per field.

import type { CronDefinition, FieldDefinition } from "./definition.js";
import { allowsMarker } from "./definition.js";
import { CronError } from "./error.js";
import type { FieldExpression } from "./expression.js";
import { requiredMarker } from "./expression.js";
import type { FieldName } from "./field.js";
import { FIELD_NAMES, isDayField } from "./field.js";

export type CronFields = Partial<Record<FieldName, FieldExpression>>;

export class Cron {
  readonly definition: CronDefinition;
  private readonly fields: ReadonlyMap<FieldName, FieldExpression>;

  private constructor(
    definition: CronDefinition,
    fields: ReadonlyMap<FieldName, FieldExpression>,
  ) {
    this.definition = definition;
    this.fields = fields;
  }

  /** Validate `fields` against `definition` and build a recurrence. */
  static of(definition: CronDefinition, fields: CronFields): Cron {
    const resolved = new Map<FieldName, FieldExpression>();

    for (const name of FIELD_NAMES) {
      const expr = fields[name];
      const field = definition.fields.find((f) => f.name === name);
      if (expr === undefined) {
        if (field && !field.optional) {
          throw CronError.invalidRecurrence(
            `${definition.name}: missing required field ${name}`,
            name,
          );
        }
        continue;
      }
      if (!field) {
        throw CronError.invalidRecurrence(
          `${definition.name}: field ${name} is not part of this dialect`,
          name,
        );
      }
      validateExpression(definition, field, expr);
      resolved.set(name, expr);
    }

    if (
      resolved.get("dayOfMonth")?.type === "questionMark" &&
      resolved.get("dayOfWeek")?.type === "questionMark"
    ) {
      throw CronError.invalidRecurrence(
        `${definition.name}: '?' cannot be used for both day-of-month and day-of-week`,
        "dayOfWeek",
      );
    }

    return new Cron(definition, resolved);
  }

  /** Expression for a field, if the recurrence has one. */
  field(name: FieldName): FieldExpression | undefined {
    return this.fields.get(name);
  }

  /** Present fields, coarsest first. */
  retrieveFields(): Array<[FieldName, FieldExpression]> {
    const result: Array<[FieldName, FieldExpression]> = [];
    for (const name of FIELD_NAMES) {
      const expr = this.fields.get(name);
      if (expr) result.push([name, expr]);
    }
    return result;
  }
}

function validateExpression(
  definition: CronDefinition,
  field: FieldDefinition,
  expr: FieldExpression,
): void {
  const { name } = field;
  const fail = (message: string): never => {
    throw CronError.invalidRecurrence(`${name}: ${message}`, name);
  };

  const marker = requiredMarker(expr);
  if (marker !== null && !allowsMarker(definition, name, marker)) {
    fail(`'${marker}' is not supported by the ${definition.name} dialect`);
  }

  const inRange = (value: number, what: string): void => {
    if (!Number.isInteger(value)) {
      fail(`${what} must be an integer, got ${value}`);
    }
    if (value < field.min || value > field.max) {
      fail(`${what} must be ${field.min}-${field.max}, got ${value}`);
    }
  };

  const positiveStep = (step: number): void => {
    if (!Number.isInteger(step) || step < 1) {
      fail(`step must be a positive integer, got ${step}`);
    }
  };

  switch (expr.type) {
    case "always":
      return;
    case "questionMark":
      if (!isDayField(name)) fail("'?' only applies to day fields");
      return;
    case "on":
      inRange(expr.value, "value");
      return;
    case "between":
      inRange(expr.from, "range start");
      inRange(expr.to, "range end");
      if (expr.from > expr.to) {
        fail(`range start must be <= end: ${expr.from}-${expr.to}`);
      }
      positiveStep(expr.step);
      return;
    case "every":
      if (expr.start !== null) inRange(expr.start, "start");
      positiveStep(expr.step);
      return;
    case "and":
      if (expr.expressions.length === 0) fail("list must not be empty");
      for (const e of expr.expressions) {
        if (e.type === "questionMark") fail("'?' cannot appear in a list");
        validateExpression(definition, field, e);
      }
      return;
    case "lastDay":
      if (name !== "dayOfMonth") fail("'L' offset only applies to day-of-month");
      if (!Number.isInteger(expr.offset) || expr.offset < 0 || expr.offset > 30) {
        fail(`last-day offset must be 0-30, got ${expr.offset}`);
      }
      return;
    case "lastWeekdayOfMonth":
      if (name !== "dayOfMonth") fail("'LW' only applies to day-of-month");
      return;
    case "nearestWeekday":
      if (name !== "dayOfMonth") fail("'W' only applies to day-of-month");
      inRange(expr.day, "W day");
      return;
    case "lastDayOfWeek":
      if (name !== "dayOfWeek") fail("'L' weekday only applies to day-of-week");
      inRange(expr.weekday, "weekday");
      return;
    case "nthDayOfWeek":
      if (name !== "dayOfWeek") fail("'#' only applies to day-of-week");
      inRange(expr.weekday, "weekday");
      if (!Number.isInteger(expr.nth) || expr.nth < 1 || expr.nth > 5) {
        fail(`nth must be 1-5, got ${expr.nth}`);
      }
      return;
  }
}
