// Collects field expressions and fills in the ones a recurrence leaves out.

import type { CronDefinition } from "./definition.js";
import { fieldConstraints } from "./definition.js";
import type { FieldExpression } from "./expression.js";
import { always, on } from "./expression.js";
import type { FieldName } from "./field.js";
import { fieldLevel } from "./field.js";

export interface ResolvedFields {
  definition: CronDefinition;
  year: FieldExpression;
  month: FieldExpression;
  dayOfMonth: FieldExpression;
  dayOfWeek: FieldExpression;
  hour: FieldExpression;
  minute: FieldExpression;
  second: FieldExpression;
}

export class ExecutionTimeBuilder {
  private readonly definition: CronDefinition;
  private readonly assigned = new Map<FieldName, FieldExpression>();

  constructor(definition: CronDefinition) {
    this.definition = definition;
  }

  forYearsMatching(expr: FieldExpression): this {
    return this.assign("year", expr);
  }

  forMonthsMatching(expr: FieldExpression): this {
    return this.assign("month", expr);
  }

  forDaysOfMonthMatching(expr: FieldExpression): this {
    return this.assign("dayOfMonth", expr);
  }

  forDaysOfWeekMatching(expr: FieldExpression): this {
    return this.assign("dayOfWeek", expr);
  }

  forHoursMatching(expr: FieldExpression): this {
    return this.assign("hour", expr);
  }

  forMinutesMatching(expr: FieldExpression): this {
    return this.assign("minute", expr);
  }

  forSecondsMatching(expr: FieldExpression): this {
    return this.assign("second", expr);
  }

  /**
   * Missing year and day fields, and fields coarser than the finest assigned one match
   * always; missing fields finer than it are pinned to their minimum.
   */
  build(): ResolvedFields {
    let finest = -1;
    for (const name of this.assigned.keys()) {
      finest = Math.max(finest, fieldLevel(name));
    }

    const resolve = (name: FieldName): FieldExpression => {
      const expr = this.assigned.get(name);
      if (expr) return expr;
      if (name === "year" || name === "dayOfMonth" || name === "dayOfWeek") {
        return always();
      }
      if (fieldLevel(name) < finest) return always();
      return on(fieldConstraints(this.definition, name).min);
    };

    return {
      definition: this.definition,
      year: resolve("year"),
      month: resolve("month"),
      dayOfMonth: resolve("dayOfMonth"),
      dayOfWeek: resolve("dayOfWeek"),
      hour: resolve("hour"),
      minute: resolve("minute"),
      second: resolve("second"),
    };
  }

  private assign(name: FieldName, expr: FieldExpression): this {
    this.assigned.set(name, expr);
    return this;
  }
}
