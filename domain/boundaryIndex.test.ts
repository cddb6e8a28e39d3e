import { describe, expect, it } from "vitest";
import { BoundaryIndex, lowerBound, positionOf } from "./boundaryIndex.js";
import { makeDate } from "./calendar.js";
import { asStepIndex } from "./core.js";

describe("lowerBound / positionOf", () => {
  const values = [2, 5, 8, 11];

  it("lowerBound finds the first element >= value", () => {
    expect(lowerBound(values, 0)).toBe(0);
    expect(lowerBound(values, 5)).toBe(1);
    expect(lowerBound(values, 6)).toBe(2);
    expect(lowerBound(values, 12)).toBe(4);
    expect(lowerBound([], 1)).toBe(0);
  });

  it("positionOf only matches present values", () => {
    expect(positionOf(values, 8)).toBe(2);
    expect(positionOf(values, 9)).toBe(-1);
    expect(positionOf([], 1)).toBe(-1);
  });
});

describe("BoundaryIndex", () => {
  it("records month and year changes", () => {
    const index = new BoundaryIndex();
    index.record(asStepIndex(1), makeDate(2020, 12, 1), makeDate(2020, 12, 31));
    index.record(asStepIndex(2), makeDate(2020, 12, 31), makeDate(2021, 1, 1));
    index.record(asStepIndex(3), makeDate(2021, 1, 1), makeDate(2021, 2, 1));
    expect(index.firstStepsOf("month")).toEqual([2, 3]);
    expect(index.firstStepsOf("year")).toEqual([2]);
  });

  it("refuses steps out of order", () => {
    const index = new BoundaryIndex();
    index.record(asStepIndex(2), makeDate(2020, 1, 1), makeDate(2020, 1, 2));
    expect(() => index.record(asStepIndex(2), makeDate(2020, 1, 2), makeDate(2020, 2, 1))).toThrow(
      "Boundary steps must be recorded in ascending order"
    );
  });
});
