// Field value generators: expand an expression into legal integers.

import { Temporal } from "@js-temporal/polyfill";
import { CronError } from "./error.js";
import type { FieldExpression } from "./expression.js";
import { matchesValue } from "./expression.js";
import type { FieldConstraints, FieldName } from "./field.js";

type PD = Temporal.PlainDate;

export interface FieldValueGenerator {
  /** Sorted, deduplicated legal values in `[start, end]`. May be empty. */
  generateCandidates(start: number, end: number): number[];
  /** Smallest legal value strictly above `reference`. */
  generateNextValue(reference: number): number;
  /** Largest legal value strictly below `reference`. */
  generatePreviousValue(reference: number): number;
  isMatch(value: number): boolean;
}

/** Generator over a fixed domain driven by a membership predicate. */
class PredicateGenerator implements FieldValueGenerator {
  constructor(
    private readonly field: FieldName,
    private readonly domain: FieldConstraints,
    private readonly predicate: (value: number) => boolean,
  ) {}

  generateCandidates(start: number, end: number): number[] {
    const from = Math.max(start, this.domain.min);
    const to = Math.min(end, this.domain.max);
    const result: number[] = [];
    for (let v = from; v <= to; v++) {
      if (this.predicate(v)) result.push(v);
    }
    return result;
  }

  generateNextValue(reference: number): number {
    const from = Math.max(reference + 1, this.domain.min);
    for (let v = from; v <= this.domain.max; v++) {
      if (this.predicate(v)) return v;
    }
    throw CronError.noMatch(
      `no ${this.field} value after ${reference}`,
      this.field,
    );
  }

  generatePreviousValue(reference: number): number {
    const from = Math.min(reference - 1, this.domain.max);
    for (let v = from; v >= this.domain.min; v--) {
      if (this.predicate(v)) return v;
    }
    throw CronError.noMatch(
      `no ${this.field} value before ${reference}`,
      this.field,
    );
  }

  isMatch(value: number): boolean {
    return (
      value >= this.domain.min &&
      value <= this.domain.max &&
      this.predicate(value)
    );
  }
}

/** Generator for fields whose legality does not depend on the calendar. */
export function createFieldGenerator(
  field: FieldName,
  expr: FieldExpression,
  constraints: FieldConstraints,
): FieldValueGenerator {
  const { min, max } = constraints;
  return new PredicateGenerator(field, constraints, (v) =>
    matchesValue(expr, v, min, max),
  );
}

// --- Month layout helpers ---

function firstOfMonth(year: number, month: number): PD {
  return Temporal.PlainDate.from({ year, month, day: 1 });
}

export function daysInMonth(year: number, month: number): number {
  return firstOfMonth(year, month).daysInMonth;
}

function lastWeekdayOfMonth(year: number, month: number): number {
  let d = firstOfMonth(year, month);
  d = d.with({ day: d.daysInMonth });
  while (d.dayOfWeek === 6 || d.dayOfWeek === 7) {
    d = d.subtract({ days: 1 });
  }
  return d.day;
}

/**
 * Monday-to-Friday nearest to `targetDay` without leaving the month.
 * Null when the month is shorter than `targetDay`.
 */
function nearestWeekday(
  year: number,
  month: number,
  targetDay: number,
): number | null {
  const lastDay = daysInMonth(year, month);
  if (targetDay > lastDay) return null;

  const date = Temporal.PlainDate.from({ year, month, day: targetDay });
  const dow = date.dayOfWeek;
  if (dow <= 5) return targetDay;

  if (dow === 6) {
    // Saturday: Friday before, or Monday after when the 1st
    return targetDay === 1 ? targetDay + 2 : targetDay - 1;
  }
  // Sunday: Monday after, or Friday before when the last day
  return targetDay >= lastDay ? targetDay - 2 : targetDay + 1;
}

function nthWeekdayOfMonth(
  year: number,
  month: number,
  isoWeekday: number,
  n: number,
): number | null {
  let d = firstOfMonth(year, month);
  while (d.dayOfWeek !== isoWeekday) {
    d = d.add({ days: 1 });
  }
  d = d.add({ days: 7 * (n - 1) });
  if (d.month !== month) return null;
  return d.day;
}

function lastWeekdayInMonth(
  year: number,
  month: number,
  isoWeekday: number,
): number {
  let d = firstOfMonth(year, month);
  d = d.with({ day: d.daysInMonth });
  while (d.dayOfWeek !== isoWeekday) {
    d = d.subtract({ days: 1 });
  }
  return d.day;
}

// --- Day of month ---

function dayOfMonthCandidates(
  expr: FieldExpression,
  year: number,
  month: number,
): Set<number> {
  const lastDay = daysInMonth(year, month);
  const days = new Set<number>();
  switch (expr.type) {
    case "lastDay": {
      const day = lastDay - expr.offset;
      if (day >= 1) days.add(day);
      break;
    }
    case "lastWeekdayOfMonth":
      days.add(lastWeekdayOfMonth(year, month));
      break;
    case "nearestWeekday": {
      const day = nearestWeekday(year, month, expr.day);
      if (day !== null) days.add(day);
      break;
    }
    case "and":
      for (const e of expr.expressions) {
        for (const d of dayOfMonthCandidates(e, year, month)) days.add(d);
      }
      break;
    default:
      for (let d = 1; d <= lastDay; d++) {
        if (matchesValue(expr, d, 1, 31)) days.add(d);
      }
  }
  return days;
}

/** Legal days of `year-month` for a day-of-month expression. */
export function createDayOfMonthGenerator(
  expr: FieldExpression,
  year: number,
  month: number,
): FieldValueGenerator {
  const days = dayOfMonthCandidates(expr, year, month);
  return new PredicateGenerator(
    "dayOfMonth",
    { min: 1, max: daysInMonth(year, month) },
    (d) => days.has(d),
  );
}

// --- Day of week ---

/** How a dialect numbers weekdays. */
export interface WeekdayNumbering extends FieldConstraints {
  mondayValue: number;
}

/** ISO weekday (Monday = 1 ... Sunday = 7) a dialect value stands for. */
export function toIsoWeekday(value: number, mondayValue: number): number {
  return ((((value - mondayValue) % 7) + 7) % 7) + 1;
}

function dayOfWeekMatches(
  expr: FieldExpression,
  date: PD,
  numbering: WeekdayNumbering,
): boolean {
  const { min, max, mondayValue } = numbering;
  switch (expr.type) {
    case "lastDayOfWeek":
      return (
        date.day ===
        lastWeekdayInMonth(
          date.year,
          date.month,
          toIsoWeekday(expr.weekday, mondayValue),
        )
      );
    case "nthDayOfWeek":
      return (
        date.day ===
        nthWeekdayOfMonth(
          date.year,
          date.month,
          toIsoWeekday(expr.weekday, mondayValue),
          expr.nth,
        )
      );
    case "and":
      return expr.expressions.some((e) => dayOfWeekMatches(e, date, numbering));
    default:
      // 0 and 7 can both mean Sunday: any dialect value for this weekday counts
      for (let v = min; v <= max; v++) {
        if (
          toIsoWeekday(v, mondayValue) === date.dayOfWeek &&
          matchesValue(expr, v, min, max)
        ) {
          return true;
        }
      }
      return false;
  }
}

/** Legal days of `year-month` for a day-of-week expression. */
export function createDayOfWeekGenerator(
  expr: FieldExpression,
  year: number,
  month: number,
  numbering: WeekdayNumbering,
): FieldValueGenerator {
  const first = firstOfMonth(year, month);
  const days = new Set<number>();
  for (let d = first; d.month === month; d = d.add({ days: 1 })) {
    if (dayOfWeekMatches(expr, d, numbering)) days.add(d.day);
  }
  return new PredicateGenerator(
    "dayOfWeek",
    { min: 1, max: first.daysInMonth },
    (d) => days.has(d),
  );
}
