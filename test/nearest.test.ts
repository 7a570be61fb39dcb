import { describe, expect, it } from "vitest";
import { CronError, TimeNode } from "../src/index.js";

describe("TimeNode", () => {
  const node = new TimeNode("minute", [45, 0, 15, 30, 15]);

  it("sorts and deduplicates its values", () => {
    expect(node.getValues()).toEqual([0, 15, 30, 45]);
    expect(node.first()).toBe(0);
    expect(node.last()).toBe(45);
  });

  it("returns the reference itself when it is legal", () => {
    expect(node.nextValue(30, 0)).toEqual({ value: 30, shifts: 0 });
    expect(node.previousValue(30, 0)).toEqual({ value: 30, shifts: 0 });
  });

  it("finds the closest legal value in each direction", () => {
    expect(node.nextValue(16, 0)).toEqual({ value: 30, shifts: 0 });
    expect(node.previousValue(16, 0)).toEqual({ value: 15, shifts: 0 });
  });

  it("wraps past the top of the range with one more shift", () => {
    expect(node.nextValue(50, 0)).toEqual({ value: 0, shifts: 1 });
    expect(node.nextValue(50, 2)).toEqual({ value: 0, shifts: 3 });
  });

  it("wraps past the bottom of the range with one more shift", () => {
    const hours = new TimeNode("hour", [9, 17]);
    expect(hours.previousValue(8, 0)).toEqual({ value: 17, shifts: 1 });
  });

  it("contains", () => {
    expect(node.contains(15)).toBe(true);
    expect(node.contains(16)).toBe(false);
  });

  describe("empty", () => {
    const empty = new TimeNode("dayOfMonth", []);

    it("reports itself empty", () => {
      expect(empty.isEmpty()).toBe(true);
    });

    it("throws a no-match error on every lookup", () => {
      for (const lookup of [
        () => empty.first(),
        () => empty.last(),
        () => empty.nextValue(1, 0),
        () => empty.previousValue(1, 0),
      ]) {
        try {
          lookup();
          expect.unreachable("lookup should throw");
        } catch (err) {
          expect(CronError.isNoMatch(err)).toBe(true);
          if (err instanceof CronError) expect(err.field).toBe("dayOfMonth");
        }
      }
    });
  });
});
