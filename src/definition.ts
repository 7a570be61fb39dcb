// Dialect definitions: which fields a recurrence has, their ranges and markers.

import { CronError } from "./error.js";
import type { FieldConstraints, FieldName, SpecialMarker } from "./field.js";
import { DEFAULT_CONSTRAINTS } from "./field.js";

export interface FieldDefinition extends FieldConstraints {
  name: FieldName;
  optional: boolean;
  specials: readonly SpecialMarker[];
}

export interface CronDefinition {
  name: string;
  fields: readonly FieldDefinition[];
  /** Day-of-week integer this dialect uses for Monday. */
  mondayValue: number;
}

export interface FieldOptions {
  min?: number;
  max?: number;
  optional?: boolean;
  specials?: readonly SpecialMarker[];
}

export interface CronDefinitionOptions {
  name: string;
  fields: Partial<Record<FieldName, FieldOptions>>;
  mondayValue?: number;
}

const MARKERS_BY_FIELD: Readonly<Record<FieldName, readonly SpecialMarker[]>> = {
  second: [],
  minute: [],
  hour: [],
  dayOfMonth: ["?", "L", "W", "LW"],
  month: [],
  dayOfWeek: ["?", "L", "#"],
  year: [],
};

/** Build and validate a dialect definition. */
export function defineCron(options: CronDefinitionOptions): CronDefinition {
  const fields: FieldDefinition[] = [];
  for (const [key, opts] of Object.entries(options.fields)) {
    const name = fieldNameOf(key);
    if (!opts) continue;
    const defaults = DEFAULT_CONSTRAINTS[name];
    const field: FieldDefinition = {
      name,
      min: opts.min ?? defaults.min,
      max: opts.max ?? defaults.max,
      optional: opts.optional ?? false,
      specials: opts.specials ?? [],
    };
    if (!Number.isInteger(field.min) || !Number.isInteger(field.max)) {
      throw CronError.invalidRecurrence(
        `${options.name}: ${name} bounds must be integers`,
        name,
      );
    }
    if (name !== "year" && (field.min < defaults.min || field.max > defaults.max)) {
      throw CronError.invalidRecurrence(
        `${options.name}: ${name} bounds must lie within ${defaults.min}-${defaults.max}, got ${field.min}-${field.max}`,
        name,
      );
    }
    if (field.min > field.max) {
      throw CronError.invalidRecurrence(
        `${options.name}: ${name} range is empty (${field.min} > ${field.max})`,
        name,
      );
    }
    for (const marker of field.specials) {
      if (!MARKERS_BY_FIELD[name].includes(marker)) {
        throw CronError.invalidRecurrence(
          `${options.name}: '${marker}' is not applicable to ${name}`,
          name,
        );
      }
    }
    fields.push(field);
  }

  if (fields.length === 0) {
    throw CronError.invalidRecurrence(`${options.name}: no fields defined`);
  }

  const mondayValue = options.mondayValue ?? 1;
  const dow = fields.find((f) => f.name === "dayOfWeek");
  const dowRange = dow ?? DEFAULT_CONSTRAINTS.dayOfWeek;
  if (mondayValue < dowRange.min || mondayValue > dowRange.max) {
    throw CronError.invalidRecurrence(
      `${options.name}: monday value ${mondayValue} is outside day-of-week range ${dowRange.min}-${dowRange.max}`,
      "dayOfWeek",
    );
  }
  if (dowRange.max - dowRange.min < 6) {
    throw CronError.invalidRecurrence(
      `${options.name}: day-of-week range must cover all seven weekdays`,
      "dayOfWeek",
    );
  }

  return { name: options.name, fields, mondayValue };
}

function fieldNameOf(key: string): FieldName {
  switch (key) {
    case "second":
    case "minute":
    case "hour":
    case "dayOfMonth":
    case "month":
    case "dayOfWeek":
    case "year":
      return key;
    default:
      throw CronError.invalidRecurrence(`unknown field: ${key}`);
  }
}

export function fieldDefinition(
  definition: CronDefinition,
  name: FieldName,
): FieldDefinition | undefined {
  return definition.fields.find((f) => f.name === name);
}

/** Range of a field under this dialect, falling back to the natural range. */
export function fieldConstraints(
  definition: CronDefinition,
  name: FieldName,
): FieldConstraints {
  const field = fieldDefinition(definition, name);
  if (!field) return DEFAULT_CONSTRAINTS[name];
  return { min: field.min, max: field.max };
}

export function allowsMarker(
  definition: CronDefinition,
  name: FieldName,
  marker: SpecialMarker,
): boolean {
  return fieldDefinition(definition, name)?.specials.includes(marker) ?? false;
}

/** Whether day-of-week accepts the unspecified marker `?`. */
export function supportsQuestionMark(definition: CronDefinition): boolean {
  return allowsMarker(definition, "dayOfWeek", "?");
}

// --- Presets ---

export const CronDefinitions = {
  unix: defineCron({
    name: "unix",
    fields: {
      minute: {},
      hour: {},
      dayOfMonth: {},
      month: {},
      dayOfWeek: { min: 0, max: 7 },
    },
    mondayValue: 1,
  }),

  cron4j: defineCron({
    name: "cron4j",
    fields: {
      minute: {},
      hour: {},
      dayOfMonth: { specials: ["L"] },
      month: {},
      dayOfWeek: { min: 0, max: 6 },
    },
    mondayValue: 1,
  }),

  quartz: defineCron({
    name: "quartz",
    fields: {
      second: {},
      minute: {},
      hour: {},
      dayOfMonth: { specials: ["?", "L", "W", "LW"] },
      month: {},
      dayOfWeek: { min: 1, max: 7, specials: ["?", "L", "#"] },
      year: { min: 1970, max: 2099, optional: true },
    },
    mondayValue: 2,
  }),

  spring: defineCron({
    name: "spring",
    fields: {
      second: {},
      minute: {},
      hour: {},
      dayOfMonth: { specials: ["?", "L", "W", "LW"] },
      month: {},
      dayOfWeek: { min: 0, max: 7, specials: ["?", "L", "#"] },
    },
    mondayValue: 1,
  }),
} as const satisfies Record<string, CronDefinition>;
