// Day reconciliation: merge day-of-month and day-of-week into legal days.

import type { CronDefinition } from "./definition.js";
import { fieldConstraints, supportsQuestionMark } from "./definition.js";
import type { FieldExpression } from "./expression.js";
import { isAlwaysMatch, isUnspecifiedMarker } from "./expression.js";
import {
  createDayOfMonthGenerator,
  createDayOfWeekGenerator,
  daysInMonth,
  type WeekdayNumbering,
} from "./generator.js";
import { TimeNode } from "./nearest.js";

/** Both day expressions, classified once when the engine is built. */
export interface DayFields {
  dayOfMonth: FieldExpression;
  dayOfWeek: FieldExpression;
  dayOfMonthAlways: boolean;
  dayOfWeekAlways: boolean;
  dayOfMonthUnspecified: boolean;
  dayOfWeekUnspecified: boolean;
  questionMarkSupported: boolean;
  numbering: WeekdayNumbering;
}

export function classifyDayFields(
  definition: CronDefinition,
  dayOfMonth: FieldExpression,
  dayOfWeek: FieldExpression,
): DayFields {
  const { min, max } = fieldConstraints(definition, "dayOfWeek");
  return {
    dayOfMonth,
    dayOfWeek,
    dayOfMonthAlways: isAlwaysMatch(dayOfMonth),
    dayOfWeekAlways: isAlwaysMatch(dayOfWeek),
    dayOfMonthUnspecified: isUnspecifiedMarker(dayOfMonth),
    dayOfWeekUnspecified: isUnspecifiedMarker(dayOfWeek),
    questionMarkSupported: supportsQuestionMark(definition),
    numbering: { min, max, mondayValue: definition.mondayValue },
  };
}

type DaySource = "dayOfMonth" | "dayOfWeek" | "union";

/**
 * Which candidate set decides the legal days.
 *
 * Without `?`, "always" on one field defers to the other and two
 * constrained fields combine as a union. With `?`, "always" on either
 * field hands the decision to day-of-month, and `?` suppresses its own field.
 */
export function daySource(fields: DayFields): DaySource {
  if (!fields.questionMarkSupported) {
    if (fields.dayOfMonthAlways && fields.dayOfWeekAlways) return "dayOfMonth";
    if (fields.dayOfMonthAlways) return "dayOfWeek";
    if (fields.dayOfWeekAlways) return "dayOfMonth";
    return "union";
  }
  if (fields.dayOfMonthAlways || fields.dayOfWeekAlways) return "dayOfMonth";
  if (fields.dayOfMonthUnspecified) return "dayOfWeek";
  if (fields.dayOfWeekUnspecified) return "dayOfMonth";
  return "union";
}

/** Legal days of `year-month`, scoped to `[1, daysInMonth]`. */
export function reconcileDays(
  fields: DayFields,
  year: number,
  month: number,
): TimeNode {
  const lastDay = daysInMonth(year, month);
  const fromMonth = () =>
    createDayOfMonthGenerator(fields.dayOfMonth, year, month).generateCandidates(
      1,
      lastDay,
    );
  const fromWeek = () =>
    createDayOfWeekGenerator(
      fields.dayOfWeek,
      year,
      month,
      fields.numbering,
    ).generateCandidates(1, lastDay);

  switch (daySource(fields)) {
    case "dayOfMonth":
      return new TimeNode("dayOfMonth", fromMonth());
    case "dayOfWeek":
      return new TimeNode("dayOfMonth", fromWeek());
    case "union":
      return new TimeNode("dayOfMonth", [...fromMonth(), ...fromWeek()]);
  }
}
