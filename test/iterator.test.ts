/**
 * Iterator tests for `occurrences()` and `between()`.
 *
 * - Laziness (generators don't evaluate eagerly)
 * - Early termination
 * - Iterator protocol (Symbol.iterator)
 * - Integration with Array.from and spread operator
 */

import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it } from "vitest";
import {
  Cron,
  CronDefinitions,
  ExecutionTime,
  always,
  on,
  questionMark,
} from "../src/index.js";

function parseZoned(s: string): Temporal.ZonedDateTime {
  return Temporal.ZonedDateTime.from(s);
}

/** Daily at 09:00:00. */
function daily(): ExecutionTime {
  return ExecutionTime.forCron(
    Cron.of(CronDefinitions.quartz, {
      second: on(0),
      minute: on(0),
      hour: on(9),
      dayOfMonth: always(),
      month: always(),
      dayOfWeek: questionMark(),
    }),
  );
}

describe("laziness", () => {
  it("occurrences does not evaluate an unbounded recurrence", () => {
    const iter = daily().occurrences(parseZoned("2026-02-01T00:00:00+00:00[UTC]"));

    const results: Temporal.ZonedDateTime[] = [];
    for (const dt of iter) {
      results.push(dt);
      if (results.length >= 1) break;
    }
    expect(results.length).toBe(1);
  });

  it("between stops at the first execution past the end", () => {
    const iter = daily().between(
      parseZoned("2026-02-01T00:00:00+00:00[UTC]"),
      parseZoned("2026-12-31T23:59:00+00:00[UTC]"),
    );

    const results: Temporal.ZonedDateTime[] = [];
    for (const dt of iter) {
      results.push(dt);
      if (results.length >= 3) break;
    }
    expect(results.map((dt) => dt.toString())).toEqual([
      "2026-02-01T09:00:00+00:00[UTC]",
      "2026-02-02T09:00:00+00:00[UTC]",
      "2026-02-03T09:00:00+00:00[UTC]",
    ]);
  });
});

describe("early termination", () => {
  it("occurrences terminates with conditional break", () => {
    const cutoff = parseZoned("2026-02-05T00:00:00+00:00[UTC]");

    const results: Temporal.ZonedDateTime[] = [];
    for (const dt of daily().occurrences(
      parseZoned("2026-02-01T00:00:00+00:00[UTC]"),
    )) {
      if (Temporal.ZonedDateTime.compare(dt, cutoff) >= 0) break;
      results.push(dt);
    }

    // Feb 1, 2, 3, 4 at 09:00
    expect(results.length).toBe(4);
  });
});

describe("iterator protocol", () => {
  it("occurrences returns iterable", () => {
    const iter = daily().occurrences(parseZoned("2026-02-01T00:00:00+00:00[UTC]"));
    expect(typeof iter[Symbol.iterator]).toBe("function");
  });

  it("works with spread operator", () => {
    const results = [
      ...daily().between(
        parseZoned("2026-02-01T00:00:00+00:00[UTC]"),
        parseZoned("2026-02-05T00:00:00+00:00[UTC]"),
      ),
    ];

    expect(results.length).toBe(4);
    expect(results[0].day).toBe(1);
  });

  it("between includes an execution equal to the end", () => {
    const results = Array.from(
      daily().between(
        parseZoned("2026-02-01T09:00:00+00:00[UTC]"),
        parseZoned("2026-02-03T09:00:00+00:00[UTC]"),
      ),
    );

    expect(results.map((dt) => dt.toString())).toEqual([
      "2026-02-02T09:00:00+00:00[UTC]",
      "2026-02-03T09:00:00+00:00[UTC]",
    ]);
  });

  it("ends after the last legal year", () => {
    const onlyIn2030 = ExecutionTime.forCron(
      Cron.of(CronDefinitions.quartz, {
        second: on(0),
        minute: on(0),
        hour: on(0),
        dayOfMonth: on(1),
        month: on(1),
        dayOfWeek: questionMark(),
        year: on(2030),
      }),
    );
    const results = [
      ...onlyIn2030.between(
        parseZoned("2029-06-01T00:00:00+00:00[UTC]"),
        parseZoned("2040-01-01T00:00:00+00:00[UTC]"),
      ),
    ];
    expect(results.map((dt) => dt.toString())).toEqual([
      "2030-01-01T00:00:00+00:00[UTC]",
    ]);
  });

  it("errors from the search surface from the iterator", () => {
    const never = ExecutionTime.forCron(
      Cron.of(CronDefinitions.unix, {
        minute: on(0),
        hour: on(0),
        dayOfMonth: on(31),
        month: on(2),
        dayOfWeek: always(),
      }),
    );
    const iter = never.occurrences(parseZoned("2026-02-01T00:00:00+00:00[UTC]"));
    expect(() => iter.next()).toThrow(/cannot be satisfied/);
  });
});
