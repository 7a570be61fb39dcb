import { describe, expect, it } from "vitest";
import { classifyDayFields, daySource, reconcileDays } from "../src/days.js";
import {
  CronDefinitions,
  type FieldExpression,
  always,
  and,
  between,
  lastDayOfWeek,
  nthDayOfWeek,
  on,
  questionMark,
} from "../src/index.js";

function unixDays(dayOfMonth: FieldExpression, dayOfWeek: FieldExpression) {
  return classifyDayFields(CronDefinitions.unix, dayOfMonth, dayOfWeek);
}

function quartzDays(dayOfMonth: FieldExpression, dayOfWeek: FieldExpression) {
  return classifyDayFields(CronDefinitions.quartz, dayOfMonth, dayOfWeek);
}

describe("daySource without '?'", () => {
  it("uses day-of-month when both fields are always", () => {
    expect(daySource(unixDays(always(), always()))).toBe("dayOfMonth");
  });

  it("defers to the constrained field", () => {
    expect(daySource(unixDays(always(), on(1)))).toBe("dayOfWeek");
    expect(daySource(unixDays(on(1), always()))).toBe("dayOfMonth");
  });

  it("combines two constrained fields", () => {
    expect(daySource(unixDays(on(1), on(1)))).toBe("union");
  });
});

describe("daySource with '?'", () => {
  it("lets always on either field decide by day-of-month", () => {
    expect(daySource(quartzDays(always(), nthDayOfWeek(2, 1)))).toBe(
      "dayOfMonth",
    );
    expect(daySource(quartzDays(on(10), always()))).toBe("dayOfMonth");
  });

  it("suppresses the field marked '?'", () => {
    expect(daySource(quartzDays(questionMark(), lastDayOfWeek(6)))).toBe(
      "dayOfWeek",
    );
    expect(daySource(quartzDays(on(10), questionMark()))).toBe("dayOfMonth");
  });

  it("combines two constrained fields", () => {
    expect(daySource(quartzDays(on(10), on(2)))).toBe("union");
  });
});

describe("reconcileDays", () => {
  it("unions both fields", () => {
    // January 2026 Mondays: 5, 12, 19, 26
    const days = reconcileDays(unixDays(and(on(1), on(15)), on(1)), 2026, 1);
    expect(days.getValues()).toEqual([1, 5, 12, 15, 19, 26]);
  });

  it("takes weekdays alone when day-of-month is always", () => {
    const days = reconcileDays(unixDays(always(), between(1, 5)), 2026, 10);
    expect(days.getValues().slice(0, 5)).toEqual([1, 2, 5, 6, 7]);
    expect(days.last()).toBe(30);
  });

  it("stays inside the month", () => {
    const days = reconcileDays(quartzDays(always(), questionMark()), 2026, 2);
    expect(days.first()).toBe(1);
    expect(days.last()).toBe(28);
  });

  it("is empty for a day the month lacks", () => {
    const days = reconcileDays(unixDays(on(31), always()), 2026, 2);
    expect(days.isEmpty()).toBe(true);
  });
});
