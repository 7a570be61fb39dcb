// Nearest-value search over one field's legal values.

import { CronError } from "./error.js";
import type { FieldName } from "./field.js";

/**
 * A resolved legal value plus the number of times the search wrapped past
 * the range boundary to find it. Each wrap is one unit of carry into the
 * parent field.
 */
export interface NearestValue {
  value: number;
  shifts: number;
}

export class TimeNode {
  private readonly values: readonly number[];
  private readonly field: FieldName;

  /** `values` need not be sorted or unique. */
  constructor(field: FieldName, values: Iterable<number>) {
    this.field = field;
    this.values = [...new Set(values)].sort((a, b) => a - b);
  }

  getValues(): readonly number[] {
    return this.values;
  }

  contains(value: number): boolean {
    return this.values.includes(value);
  }

  isEmpty(): boolean {
    return this.values.length === 0;
  }

  first(): number {
    this.assertNotEmpty();
    return this.values[0];
  }

  last(): number {
    this.assertNotEmpty();
    return this.values[this.values.length - 1];
  }

  /** Smallest value >= `reference`, else the minimum with one more shift. */
  nextValue(reference: number, shifts: number): NearestValue {
    this.assertNotEmpty();
    const found = this.values.find((v) => v >= reference);
    if (found !== undefined) {
      return { value: found, shifts };
    }
    return { value: this.values[0], shifts: shifts + 1 };
  }

  /** Largest value <= `reference`, else the maximum with one more shift. */
  previousValue(reference: number, shifts: number): NearestValue {
    this.assertNotEmpty();
    for (let i = this.values.length - 1; i >= 0; i--) {
      if (this.values[i] <= reference) {
        return { value: this.values[i], shifts };
      }
    }
    return { value: this.values[this.values.length - 1], shifts: shifts + 1 };
  }

  private assertNotEmpty(): void {
    if (this.values.length === 0) {
      throw CronError.noMatch(`no legal ${this.field} value`, this.field);
    }
  }
}
