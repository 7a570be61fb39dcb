// Execution-time search: nearest matching instant around a reference.

import { Temporal } from "@js-temporal/polyfill";
import type { ResolvedFields } from "./builder.js";
import { ExecutionTimeBuilder } from "./builder.js";
import type { Cron } from "./cron.js";
import type { DayFields } from "./days.js";
import { classifyDayFields, reconcileDays } from "./days.js";
import { fieldConstraints } from "./definition.js";
import { CronError } from "./error.js";
import type { FieldExpression } from "./expression.js";
import type { FieldName } from "./field.js";
import type { FieldValueGenerator } from "./generator.js";
import { createFieldGenerator } from "./generator.js";
import { TimeNode } from "./nearest.js";

type ZDT = Temporal.ZonedDateTime;
type PDT = Temporal.PlainDateTime;

// =============================================================================
// Search
// =============================================================================
// The search walks year, month, day, hour, minute, second. At the first
// field whose value is not legal it asks that field's TimeNode for the
// nearest legal value:
//
//   shifts == 0  the field takes that value, finer fields take their
//                lowest (highest, backwards) legal value, done.
//   shifts > 0   the parent field moves by `shifts` units through calendar
//                arithmetic, this field and everything finer reset to the
//                range bounds, and the walk starts over from the year.
//
// The year has no modulus to wrap within. When the reference year is not
// legal the walk jumps directly to the next (previous) legal year.
//
// A month with no legal day carries into the following (preceding) month.
//
// MAX_ITERATIONS bounds the restarts. An unsatisfiable recurrence normally
// stops sooner, once the year generator has no year left to offer.
// =============================================================================

const MAX_ITERATIONS = 10_000;

type Step = { type: "match"; date: PDT } | { type: "carry"; date: PDT };

function match(date: PDT): Step {
  return { type: "match", date };
}

function carry(date: PDT): Step {
  return { type: "carry", date };
}

function at(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
): PDT {
  return Temporal.PlainDateTime.from(
    { year, month, day, hour, minute, second },
    { overflow: "reject" },
  );
}

/** 23:59:59 on the last day of the month `months` before `year-month`. */
function endOfMonthBefore(year: number, month: number, months: number): PDT {
  const first = at(year, month, 1, 23, 59, 59).subtract({ months });
  return first.with({ day: first.daysInMonth });
}

/** Wall-clock fields of `date`, sub-second part dropped. */
function wallClock(date: ZDT): PDT {
  return date
    .toPlainDateTime()
    .round({ smallestUnit: "second", roundingMode: "trunc" });
}

/**
 * Instants a wall-clock time stands for in the reference's time zone,
 * earliest first: two inside a fold, one otherwise. A time inside a gap
 * moves forward.
 */
function instantsAt(reference: ZDT, date: PDT): ZDT[] {
  const fields = {
    year: date.year,
    month: date.month,
    day: date.day,
    hour: date.hour,
    minute: date.minute,
    second: date.second,
    millisecond: 0,
    microsecond: 0,
    nanosecond: 0,
  };
  const earlier = reference.with(fields, {
    disambiguation: "earlier",
    offset: "ignore",
  });
  const later = reference.with(fields, {
    disambiguation: "later",
    offset: "ignore",
  });
  const exact = [earlier, later].filter((z) =>
    z.toPlainDateTime().equals(date),
  );
  if (exact.length === 0) {
    return [
      reference.with(fields, { disambiguation: "compatible", offset: "ignore" }),
    ];
  }
  if (exact.length === 2 && exact[0].equals(exact[1])) return [exact[0]];
  return exact;
}

/**
 * Wall clock of the reference read at the offset the zone has one hour
 * away in `direction`, when that hour crosses back over repeated wall
 * times. Null when it does not.
 */
function foldedWallClock(reference: ZDT, direction: 1 | -1): PDT | null {
  const neighbour = reference.add({ hours: direction });
  const shift = neighbour.offsetNanoseconds - reference.offsetNanoseconds;
  if (shift * direction >= 0) return null;
  return wallClock(reference).add({ nanoseconds: shift });
}

function fieldNode(
  resolved: ResolvedFields,
  name: FieldName,
  expr: FieldExpression,
): TimeNode {
  const { min, max } = fieldConstraints(resolved.definition, name);
  const generator = createFieldGenerator(name, expr, { min, max });
  return new TimeNode(name, generator.generateCandidates(min, max));
}

/** Computes execution times for a recurrence. Immutable once built. */
export class ExecutionTime {
  private readonly years: FieldValueGenerator;
  private readonly days: DayFields;
  private readonly months: TimeNode;
  private readonly hours: TimeNode;
  private readonly minutes: TimeNode;
  private readonly seconds: TimeNode;

  constructor(resolved: ResolvedFields) {
    this.years = createFieldGenerator(
      "year",
      resolved.year,
      fieldConstraints(resolved.definition, "year"),
    );
    this.days = classifyDayFields(
      resolved.definition,
      resolved.dayOfMonth,
      resolved.dayOfWeek,
    );
    this.months = fieldNode(resolved, "month", resolved.month);
    this.hours = fieldNode(resolved, "hour", resolved.hour);
    this.minutes = fieldNode(resolved, "minute", resolved.minute);
    this.seconds = fieldNode(resolved, "second", resolved.second);
  }

  /** Creates the execution time for a validated recurrence. */
  static forCron(cron: Cron): ExecutionTime {
    const builder = new ExecutionTimeBuilder(cron.definition);
    for (const [name, expr] of cron.retrieveFields()) {
      switch (name) {
        case "second":
          builder.forSecondsMatching(expr);
          break;
        case "minute":
          builder.forMinutesMatching(expr);
          break;
        case "hour":
          builder.forHoursMatching(expr);
          break;
        case "dayOfWeek":
          builder.forDaysOfWeekMatching(expr);
          break;
        case "dayOfMonth":
          builder.forDaysOfMonthMatching(expr);
          break;
        case "month":
          builder.forMonthsMatching(expr);
          break;
        case "year":
          builder.forYearsMatching(expr);
          break;
      }
    }
    return new ExecutionTime(builder.build());
  }

  /**
   * Nearest execution strictly after `date`, in `date`'s time zone.
   * Throws `invalid-argument` for a missing date or an unsatisfiable recurrence.
   */
  nextExecution(date: ZDT | null | undefined): ZDT {
    const reference = requireDate(date);
    return this.reportingNoMatch(() => {
      const next = this.nextFrom(reference, wallClock(reference));
      // inside a fold the repeated wall times come around again
      const folded = foldedWallClock(reference, 1);
      if (folded === null) return next;
      const alternative = this.nextFrom(reference, folded);
      return Temporal.ZonedDateTime.compare(alternative, next) < 0
        ? alternative
        : next;
    });
  }

  /**
   * Nearest execution strictly before `date`, in `date`'s time zone.
   * Throws `invalid-argument` for a missing date or an unsatisfiable recurrence.
   */
  lastExecution(date: ZDT | null | undefined): ZDT {
    const reference = requireDate(date);
    return this.reportingNoMatch(() => {
      const last = this.lastFrom(reference, wallClock(reference));
      const folded = foldedWallClock(reference, -1);
      if (folded === null) return last;
      const alternative = this.lastFrom(reference, folded);
      return Temporal.ZonedDateTime.compare(alternative, last) > 0
        ? alternative
        : last;
    });
  }

  /** Time from `date` until the next execution. */
  timeToNextExecution(date: ZDT | null | undefined): Temporal.Duration {
    const reference = requireDate(date);
    return reference.until(this.nextExecution(reference));
  }

  /** Time elapsed since the last execution before `date`. */
  timeFromLastExecution(date: ZDT | null | undefined): Temporal.Duration {
    const reference = requireDate(date);
    return this.lastExecution(reference).until(reference);
  }

  /** Whether the wall-clock fields of `date` (to the second) are all legal. */
  isMatch(date: ZDT): boolean {
    return (
      this.years.isMatch(date.year) &&
      this.months.contains(date.month) &&
      this.daysOf(date.year, date.month).contains(date.day) &&
      this.hours.contains(date.hour) &&
      this.minutes.contains(date.minute) &&
      this.seconds.contains(date.second)
    );
  }

  /**
   * Lazy iterator of executions strictly after `from`. Ends once the year
   * domain runs out, and is otherwise unbounded: the caller decides when to
   * stop.
   */
  *occurrences(from: ZDT): Generator<ZDT, void, unknown> {
    let current = from;
    let yielded = false;
    for (;;) {
      try {
        current = this.nextExecution(current);
      } catch (err) {
        // a recurrence limited to some years ends after its last one
        if (yielded && isYearExhausted(err)) return;
        throw err;
      }
      yielded = true;
      yield current;
    }
  }

  /** Executions where `from < execution <= to`. */
  *between(from: ZDT, to: ZDT): Generator<ZDT, void, unknown> {
    for (const dt of this.occurrences(from)) {
      if (Temporal.ZonedDateTime.compare(dt, to) > 0) return;
      yield dt;
    }
  }

  /** `date` itself when it matches, otherwise the nearest match after it. */
  nextClosestMatch(date: PDT): PDT {
    let current = date;
    for (let i = 0; i < MAX_ITERATIONS; i++) {
      const step = this.nextStep(current);
      if (step.type === "match") return step.date;
      current = step.date;
    }
    throw CronError.noMatch(`no match within ${MAX_ITERATIONS} steps of ${date}`);
  }

  /** `date` itself when it matches, otherwise the nearest match before it. */
  previousClosestMatch(date: PDT): PDT {
    let current = date;
    for (let i = 0; i < MAX_ITERATIONS; i++) {
      const step = this.previousStep(current);
      if (step.type === "match") return step.date;
      current = step.date;
    }
    throw CronError.noMatch(`no match within ${MAX_ITERATIONS} steps of ${date}`);
  }

  private nextStep(date: PDT): Step {
    const { year, month, day, hour, minute, second } = date;

    if (this.years.generateCandidates(year, year).length === 0) {
      const nextYear = this.years.generateNextValue(year);
      const firstMonth = this.months.first();
      const days = this.daysOf(nextYear, firstMonth);
      return carry(
        at(
          nextYear,
          firstMonth,
          days.isEmpty() ? 1 : days.first(),
          this.hours.first(),
          this.minutes.first(),
          this.seconds.first(),
        ),
      );
    }

    if (!this.months.contains(month)) {
      const nearest = this.months.nextValue(month, 0);
      if (nearest.shifts > 0) {
        return carry(at(year, 1, 1, 0, 0, 0).add({ years: nearest.shifts }));
      }
      const days = this.daysOf(year, nearest.value);
      if (days.isEmpty()) {
        return carry(at(year, nearest.value, 1, 0, 0, 0).add({ months: 1 }));
      }
      return match(
        at(
          year,
          nearest.value,
          days.first(),
          this.hours.first(),
          this.minutes.first(),
          this.seconds.first(),
        ),
      );
    }

    const days = this.daysOf(year, month);
    if (days.isEmpty()) {
      return carry(at(year, month, 1, 0, 0, 0).add({ months: 1 }));
    }
    if (!days.contains(day)) {
      const nearest = days.nextValue(day, 0);
      if (nearest.shifts > 0) {
        return carry(at(year, month, 1, 0, 0, 0).add({ months: nearest.shifts }));
      }
      return match(
        at(
          year,
          month,
          nearest.value,
          this.hours.first(),
          this.minutes.first(),
          this.seconds.first(),
        ),
      );
    }

    if (!this.hours.contains(hour)) {
      const nearest = this.hours.nextValue(hour, 0);
      if (nearest.shifts > 0) {
        return carry(at(year, month, day, 0, 0, 0).add({ days: nearest.shifts }));
      }
      return match(
        at(
          year,
          month,
          day,
          nearest.value,
          this.minutes.first(),
          this.seconds.first(),
        ),
      );
    }

    if (!this.minutes.contains(minute)) {
      const nearest = this.minutes.nextValue(minute, 0);
      if (nearest.shifts > 0) {
        return carry(
          at(year, month, day, hour, 0, 0).add({ hours: nearest.shifts }),
        );
      }
      return match(
        at(year, month, day, hour, nearest.value, this.seconds.first()),
      );
    }

    if (!this.seconds.contains(second)) {
      const nearest = this.seconds.nextValue(second, 0);
      if (nearest.shifts > 0) {
        return carry(
          at(year, month, day, hour, minute, 0).add({
            minutes: nearest.shifts,
          }),
        );
      }
      return match(at(year, month, day, hour, minute, nearest.value));
    }

    return match(date);
  }

  private previousStep(date: PDT): Step {
    const { year, month, day, hour, minute, second } = date;

    if (this.years.generateCandidates(year, year).length === 0) {
      const previousYear = this.years.generatePreviousValue(year);
      const lastMonth = this.months.last();
      const days = this.daysOf(previousYear, lastMonth);
      const lastDay = endOfMonthBefore(previousYear, lastMonth, 0).day;
      return carry(
        at(
          previousYear,
          lastMonth,
          days.isEmpty() ? lastDay : days.last(),
          this.hours.last(),
          this.minutes.last(),
          this.seconds.last(),
        ),
      );
    }

    if (!this.months.contains(month)) {
      const nearest = this.months.previousValue(month, 0);
      if (nearest.shifts > 0) {
        return carry(
          at(year, 12, 31, 23, 59, 59).subtract({ years: nearest.shifts }),
        );
      }
      const days = this.daysOf(year, nearest.value);
      if (days.isEmpty()) {
        return carry(endOfMonthBefore(year, nearest.value, 1));
      }
      return match(
        at(
          year,
          nearest.value,
          days.last(),
          this.hours.last(),
          this.minutes.last(),
          this.seconds.last(),
        ),
      );
    }

    const days = this.daysOf(year, month);
    if (days.isEmpty()) {
      return carry(endOfMonthBefore(year, month, 1));
    }
    if (!days.contains(day)) {
      const nearest = days.previousValue(day, 0);
      if (nearest.shifts > 0) {
        return carry(endOfMonthBefore(year, month, nearest.shifts));
      }
      return match(
        at(
          year,
          month,
          nearest.value,
          this.hours.last(),
          this.minutes.last(),
          this.seconds.last(),
        ),
      );
    }

    if (!this.hours.contains(hour)) {
      const nearest = this.hours.previousValue(hour, 0);
      if (nearest.shifts > 0) {
        return carry(
          at(year, month, day, 23, 59, 59).subtract({ days: nearest.shifts }),
        );
      }
      return match(
        at(
          year,
          month,
          day,
          nearest.value,
          this.minutes.last(),
          this.seconds.last(),
        ),
      );
    }

    if (!this.minutes.contains(minute)) {
      const nearest = this.minutes.previousValue(minute, 0);
      if (nearest.shifts > 0) {
        return carry(
          at(year, month, day, hour, 59, 59).subtract({
            hours: nearest.shifts,
          }),
        );
      }
      return match(
        at(year, month, day, hour, nearest.value, this.seconds.last()),
      );
    }

    if (!this.seconds.contains(second)) {
      const nearest = this.seconds.previousValue(second, 0);
      if (nearest.shifts > 0) {
        return carry(
          at(year, month, day, hour, minute, 59).subtract({
            minutes: nearest.shifts,
          }),
        );
      }
      return match(at(year, month, day, hour, minute, nearest.value));
    }

    return match(date);
  }

  /** First instant after `reference` whose wall clock matches, searching from `start`. */
  private nextFrom(reference: ZDT, start: PDT): ZDT {
    let candidate = this.nextClosestMatch(start);
    for (let i = 0; i < MAX_ITERATIONS; i++) {
      const found = instantsAt(reference, candidate).find(
        (z) => Temporal.ZonedDateTime.compare(z, reference) > 0,
      );
      if (found) return found;
      candidate = this.nextClosestMatch(candidate.add({ seconds: 1 }));
    }
    throw CronError.noMatch(`no execution after ${reference}`);
  }

  /** Last instant before `reference` whose wall clock matches, searching from `start`. */
  private lastFrom(reference: ZDT, start: PDT): ZDT {
    let candidate = this.previousClosestMatch(start);
    for (let i = 0; i < MAX_ITERATIONS; i++) {
      const found = instantsAt(reference, candidate)
        .reverse()
        .find((z) => Temporal.ZonedDateTime.compare(z, reference) < 0);
      if (found) return found;
      candidate = this.previousClosestMatch(candidate.subtract({ seconds: 1 }));
    }
    throw CronError.noMatch(`no execution before ${reference}`);
  }

  /** Rebuilt for every step: legal days depend on the year and month. */
  private daysOf(year: number, month: number): TimeNode {
    return reconcileDays(this.days, year, month);
  }

  private reportingNoMatch<T>(search: () => T): T {
    try {
      return search();
    } catch (err) {
      if (CronError.isNoMatch(err)) {
        throw CronError.invalidArgument(
          `recurrence cannot be satisfied: ${err.message}`,
          err,
        );
      }
      throw err;
    }
  }
}

function requireDate(date: ZDT | null | undefined): ZDT {
  if (date === null || date === undefined) {
    throw CronError.invalidArgument("reference date is required");
  }
  return date;
}

function isYearExhausted(err: unknown): boolean {
  return (
    err instanceof CronError &&
    CronError.isNoMatch(err.cause) &&
    err.cause.field === "year"
  );
}
