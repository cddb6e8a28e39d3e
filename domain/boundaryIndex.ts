/**
 * Boundary indexes — first step of each new calendar month / year.
 * Append-only. Step indices are strictly ascending.
 */

import type { Granularity, Instant, StepIndex } from "./core.js";
import { calendarDateOf } from "./calendar.js";
import { invariant } from "./validation.js";

/** First index i with values[i] >= value, or values.length if none. */
export function lowerBound(values: readonly number[], value: number): number {
  let lo = 0;
  let hi = values.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((values[mid] ?? Infinity) < value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Position of value in an ascending sequence, or -1 if absent. */
export function positionOf(values: readonly number[], value: number): number {
  const pos = lowerBound(values, value);
  return values[pos] === value ? pos : -1;
}

export class BoundaryIndex {
  private readonly months: StepIndex[] = [];
  private readonly years: StepIndex[] = [];
  private lastRecorded = 0;

  /**
   * Records step as a month and/or year boundary when its end instant falls in
   * a different calendar month / year than the previous instant.
   * Months are compared by number only: Jan -> Jan of the next year is a year
   * boundary, not a month boundary.
   */
  record(step: StepIndex, previous: Instant, next: Instant): void {
    invariant(step > this.lastRecorded, "Boundary steps must be recorded in ascending order");
    this.lastRecorded = step;

    const before = calendarDateOf(previous);
    const after = calendarDateOf(next);
    if (after.month !== before.month) this.months.push(step);
    if (after.year !== before.year) this.years.push(step);
  }

  /** Live read-only view; callers that keep it should copy. */
  firstStepsOf(granularity: Granularity): readonly StepIndex[] {
    return granularity === "year" ? this.years : this.months;
  }
}
