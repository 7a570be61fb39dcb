import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it } from "vitest";
import {
  CronDefinitions,
  ExecutionTime,
  ExecutionTimeBuilder,
  always,
  every,
  on,
} from "../src/index.js";

describe("ExecutionTimeBuilder", () => {
  it("pins fields finer than the finest assigned one to their minimum", () => {
    const resolved = new ExecutionTimeBuilder(CronDefinitions.quartz)
      .forHoursMatching(on(9))
      .build();
    expect(resolved.year).toEqual(always());
    expect(resolved.month).toEqual(always());
    expect(resolved.dayOfMonth).toEqual(always());
    expect(resolved.dayOfWeek).toEqual(always());
    expect(resolved.hour).toEqual(on(9));
    expect(resolved.minute).toEqual(on(0));
    expect(resolved.second).toEqual(on(0));
  });

  it("pins seconds for dialects without a second field", () => {
    const resolved = new ExecutionTimeBuilder(CronDefinitions.unix)
      .forMinutesMatching(every(5))
      .build();
    expect(resolved.hour).toEqual(always());
    expect(resolved.second).toEqual(on(0));
  });

  it("uses the dialect's own minimum", () => {
    const resolved = new ExecutionTimeBuilder(CronDefinitions.quartz)
      .forMonthsMatching(on(6))
      .build();
    expect(resolved.year).toEqual(always());
    expect(resolved.hour).toEqual(on(0));
  });

  it("later assignments replace earlier ones", () => {
    const resolved = new ExecutionTimeBuilder(CronDefinitions.quartz)
      .forSecondsMatching(on(5))
      .forSecondsMatching(on(10))
      .build();
    expect(resolved.second).toEqual(on(10));
  });

  it("pins every field but the year and days when nothing is assigned", () => {
    const resolved = new ExecutionTimeBuilder(CronDefinitions.quartz).build();
    expect(resolved.month).toEqual(on(1));
    expect(resolved.dayOfMonth).toEqual(always());
    expect(resolved.second).toEqual(on(0));
  });

  it("drives an execution time", () => {
    const et = new ExecutionTime(
      new ExecutionTimeBuilder(CronDefinitions.quartz)
        .forHoursMatching(on(9))
        .build(),
    );
    const ref = Temporal.ZonedDateTime.from("2026-10-19T10:00:00+00:00[UTC]");
    expect(et.nextExecution(ref).toString()).toBe(
      "2026-10-20T09:00:00+00:00[UTC]",
    );
  });
});
