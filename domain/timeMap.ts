/**
 * Time map — append-only timeline of report-step instants.
 * Owns the timeline and its month/year boundary indexes.
 * Mutated only while it is being built; read-only afterwards.
 */

import {
  asSeconds,
  asStepIndex,
  type Granularity,
  type Instant,
  type Seconds,
  type StepIndex,
} from "./core.js";
import { BoundaryIndex } from "./boundaryIndex.js";
import { forward, isRepresentable } from "./calendar.js";
import { InvalidCalendarDateError, NonMonotonicTimeError } from "./errors.js";
import { isPeriodicBoundary, periodicBoundaries } from "./periodic.js";
import { assertIndex, invariant } from "./validation.js";

export class TimeMap {
  private readonly times: Instant[];
  private readonly boundaries = new BoundaryIndex();

  constructor(start: Instant) {
    if (!isRepresentable(start)) {
      throw new InvalidCalendarDateError("Start instant outside representable date range", { start });
    }
    this.times = [start];
  }

  /**
   * Appends newTime as the end of the next step.
   * Throws NonMonotonicTimeError (leaving the map untouched) unless newTime is
   * strictly after the current last instant, and InvalidCalendarDateError when
   * it has no calendar date.
   */
  addTime(newTime: Instant): void {
    const lastTime = this.endTime();
    if (!(newTime > lastTime)) {
      throw new NonMonotonicTimeError("Times added must be in strictly increasing order", {
        step: this.times.length,
        lastTime,
        newTime,
      });
    }
    if (!isRepresentable(newTime)) {
      throw new InvalidCalendarDateError("Instant outside representable date range", {
        step: this.times.length,
        newTime,
      });
    }
    this.boundaries.record(asStepIndex(this.times.length), lastTime, newTime);
    this.times.push(newTime);
  }

  /** Appends last instant + seconds. */
  addStep(seconds: number): void {
    this.addTime(forward(this.endTime(), seconds));
  }

  /** Number of instants, start included. */
  size(): number {
    return this.times.length;
  }

  numSteps(): number {
    return this.times.length - 1;
  }

  /** Index of the last step (same as numSteps). */
  lastStep(): StepIndex {
    return asStepIndex(this.numSteps());
  }

  instantAt(index: number): Instant {
    assertIndex(index, this.times.length);
    const time = this.times[index];
    invariant(time !== undefined, "Checked index must hold an instant");
    return time;
  }

  /** Start instant of step index + 1, i.e. the instant at position index. */
  startTimeOf(index: number): Instant {
    return this.instantAt(index);
  }

  startTime(): Instant {
    return this.instantAt(0);
  }

  endTime(): Instant {
    return this.instantAt(this.times.length - 1);
  }

  /** Seconds from the start instant to the instant at index. */
  elapsedSinceStart(index: number): Seconds {
    return asSeconds(this.instantAt(index) - this.startTime());
  }

  /** Length of the step that starts at index; requires index < numSteps(). */
  stepDuration(index: number): Seconds {
    assertIndex(index, this.numSteps(), "Step index");
    return asSeconds(this.instantAt(index + 1) - this.instantAt(index));
  }

  totalDuration(): Seconds {
    if (this.times.length < 2) return asSeconds(0);
    return asSeconds(this.endTime() - this.startTime());
  }

  /** Copy of the timeline. */
  instants(): Instant[] {
    return this.times.slice();
  }

  /** Copy of the steps that open a new calendar month. */
  firstStepsOfMonths(): StepIndex[] {
    return this.boundaries.firstStepsOf("month").slice();
  }

  /** Copy of the steps that open a new calendar year. */
  firstStepsOfYears(): StepIndex[] {
    return this.boundaries.firstStepsOf("year").slice();
  }

  /**
   * Is queryStep the frequency-th month/year boundary counted from anchorStep?
   * An anchor that is not itself a boundary moves forward to the next one.
   */
  isPeriodicBoundary(
    queryStep: number,
    granularity: Granularity,
    anchorStep: number,
    frequency: number
  ): boolean {
    return isPeriodicBoundary(this.boundaries.firstStepsOf(granularity), queryStep, anchorStep, frequency);
  }

  /** Every step for which isPeriodicBoundary holds, ascending. */
  periodicBoundarySteps(granularity: Granularity, anchorStep: number, frequency: number): StepIndex[] {
    return periodicBoundaries(this.boundaries.firstStepsOf(granularity), anchorStep, frequency).map(asStepIndex);
  }
}
