// cron-nearest: public API

export { Temporal } from "@js-temporal/polyfill";
export { ExecutionTimeBuilder } from "./builder.js";
export type { ResolvedFields } from "./builder.js";
export { Cron } from "./cron.js";
export type { CronFields } from "./cron.js";
export { CronDefinitions, defineCron, supportsQuestionMark } from "./definition.js";
export type {
  CronDefinition,
  CronDefinitionOptions,
  FieldDefinition,
  FieldOptions,
} from "./definition.js";
export type { CronErrorKind } from "./error.js";
export { CronError } from "./error.js";
export { ExecutionTime } from "./execution-time.js";
export {
  always,
  and,
  between,
  every,
  isAlwaysMatch,
  isUnspecifiedMarker,
  lastDay,
  lastDayOfWeek,
  lastWeekdayOfMonth,
  nearestWeekday,
  nthDayOfWeek,
  on,
  questionMark,
} from "./expression.js";
export type { FieldExpression, FieldExpressionType } from "./expression.js";
export type { FieldConstraints, FieldName, SpecialMarker } from "./field.js";
export type { FieldValueGenerator, WeekdayNumbering } from "./generator.js";
export type { NearestValue } from "./nearest.js";
export { TimeNode } from "./nearest.js";
