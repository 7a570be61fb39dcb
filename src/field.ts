// Field names and their natural ranges.

export type FieldName =
  | "second"
  | "minute"
  | "hour"
  | "dayOfMonth"
  | "month"
  | "dayOfWeek"
  | "year";

/** Special markers a dialect may permit on a field. */
export type SpecialMarker = "?" | "L" | "W" | "LW" | "#";

export interface FieldConstraints {
  min: number;
  max: number;
}

/** Coarsest to finest. Both day fields share the "day" level. */
export const FIELD_NAMES: readonly FieldName[] = [
  "year",
  "month",
  "dayOfMonth",
  "dayOfWeek",
  "hour",
  "minute",
  "second",
];

export const DEFAULT_CONSTRAINTS: Readonly<Record<FieldName, FieldConstraints>> = {
  second: { min: 0, max: 59 },
  minute: { min: 0, max: 59 },
  hour: { min: 0, max: 23 },
  dayOfMonth: { min: 1, max: 31 },
  month: { min: 1, max: 12 },
  dayOfWeek: { min: 0, max: 7 },
  year: { min: 1970, max: 2099 },
};

export function isDayField(name: FieldName): boolean {
  return name === "dayOfMonth" || name === "dayOfWeek";
}

/** Position of a field from coarsest (0) to finest, day fields sharing one level. */
export function fieldLevel(name: FieldName): number {
  switch (name) {
    case "year":
      return 0;
    case "month":
      return 1;
    case "dayOfMonth":
    case "dayOfWeek":
      return 2;
    case "hour":
      return 3;
    case "minute":
      return 4;
    case "second":
      return 5;
  }
}
