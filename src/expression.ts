// Field expressions: the per-field rule before it is expanded into integers.

import type { SpecialMarker } from "./field.js";

export type FieldExpression =
  | { type: "always" }
  | { type: "questionMark" }
  | { type: "on"; value: number }
  | { type: "between"; from: number; to: number; step: number }
  | { type: "every"; start: number | null; step: number }
  | { type: "and"; expressions: FieldExpression[] }
  // --- day-of-month only ---
  | { type: "lastDay"; offset: number }
  | { type: "lastWeekdayOfMonth" }
  | { type: "nearestWeekday"; day: number }
  // --- day-of-week only ---
  | { type: "lastDayOfWeek"; weekday: number }
  | { type: "nthDayOfWeek"; weekday: number; nth: number };

export type FieldExpressionType = FieldExpression["type"];

// --- Factories ---

export function always(): FieldExpression {
  return { type: "always" };
}

export function questionMark(): FieldExpression {
  return { type: "questionMark" };
}

export function on(value: number): FieldExpression {
  return { type: "on", value };
}

export function between(from: number, to: number, step = 1): FieldExpression {
  return { type: "between", from, to, step };
}

/** Every `step` values from `start`, or from the field minimum when omitted. */
export function every(step: number, start?: number): FieldExpression {
  return { type: "every", start: start ?? null, step };
}

export function and(...expressions: FieldExpression[]): FieldExpression {
  return { type: "and", expressions };
}

export function lastDay(offset = 0): FieldExpression {
  return { type: "lastDay", offset };
}

export function lastWeekdayOfMonth(): FieldExpression {
  return { type: "lastWeekdayOfMonth" };
}

export function nearestWeekday(day: number): FieldExpression {
  return { type: "nearestWeekday", day };
}

export function lastDayOfWeek(weekday: number): FieldExpression {
  return { type: "lastDayOfWeek", weekday };
}

export function nthDayOfWeek(weekday: number, nth: number): FieldExpression {
  return { type: "nthDayOfWeek", weekday, nth };
}

// --- Capability queries ---

export function isAlwaysMatch(expr: FieldExpression): boolean {
  return expr.type === "always";
}

export function isUnspecifiedMarker(expr: FieldExpression): boolean {
  return expr.type === "questionMark";
}

/** Marker a dialect must permit for this expression, or null for plain kinds. */
export function requiredMarker(expr: FieldExpression): SpecialMarker | null {
  switch (expr.type) {
    case "questionMark":
      return "?";
    case "lastDay":
    case "lastDayOfWeek":
      return "L";
    case "lastWeekdayOfMonth":
      return "LW";
    case "nearestWeekday":
      return "W";
    case "nthDayOfWeek":
      return "#";
    default:
      return null;
  }
}

/**
 * Numeric membership test for the plain kinds. Calendar-dependent kinds
 * (`lastDay`, `nthDayOfWeek`, ...) never match here; their generators
 * resolve them against a concrete month.
 */
export function matchesValue(
  expr: FieldExpression,
  value: number,
  min: number,
  max: number,
): boolean {
  if (value < min || value > max) return false;
  switch (expr.type) {
    case "always":
    case "questionMark":
      return true;
    case "on":
      return value === expr.value;
    case "between":
      return (
        value >= expr.from &&
        value <= expr.to &&
        (value - expr.from) % expr.step === 0
      );
    case "every": {
      const start = expr.start ?? min;
      return value >= start && (value - start) % expr.step === 0;
    }
    case "and":
      return expr.expressions.some((e) => matchesValue(e, value, min, max));
    default:
      return false;
  }
}
