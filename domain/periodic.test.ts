import { describe, expect, it } from "vitest";
import { isPeriodicBoundary, periodicBoundaries, resolveAnchorPosition } from "./periodic.js";

const B = [2, 5, 8, 11];

describe("resolveAnchorPosition", () => {
  it("anchor on a boundary uses its own position", () => {
    expect(resolveAnchorPosition(B, 5)).toBe(1);
  });

  it("anchor between boundaries moves to the next boundary", () => {
    expect(resolveAnchorPosition([2, 5, 8], 3)).toBe(1);
    expect(resolveAnchorPosition([2, 5, 8], 0)).toBe(0);
  });

  it("anchor past the last boundary resolves to none", () => {
    expect(resolveAnchorPosition([2, 5, 8], 9)).toBe(-1);
    expect(resolveAnchorPosition([], 0)).toBe(-1);
  });
});

describe("isPeriodicBoundary", () => {
  it("non-boundary steps are never accepted", () => {
    for (const freq of [0, 1, 2, 3]) {
      for (const anchor of [0, 2, 3, 11, 20]) {
        expect(isPeriodicBoundary(B, 3, anchor, freq)).toBe(false);
        expect(isPeriodicBoundary(B, 12, anchor, freq)).toBe(false);
      }
    }
  });

  it("frequency <= 1 accepts every boundary regardless of anchor", () => {
    expect(isPeriodicBoundary(B, 2, 11, 1)).toBe(true);
    expect(isPeriodicBoundary(B, 8, 100, 0)).toBe(true);
    expect(isPeriodicBoundary(B, 11, 0, -3)).toBe(true);
  });

  it("every second boundary counted from the anchor", () => {
    expect(isPeriodicBoundary(B, 8, 5, 2)).toBe(true);
    expect(isPeriodicBoundary(B, 11, 5, 2)).toBe(false);
  });

  it("the anchor itself is not selected when frequency > 1", () => {
    expect(isPeriodicBoundary(B, 5, 5, 2)).toBe(false);
    expect(isPeriodicBoundary(B, 5, 5, 3)).toBe(false);
  });

  it("boundaries before the anchor are rejected", () => {
    expect(isPeriodicBoundary(B, 2, 5, 2)).toBe(false);
  });

  it("non-boundary anchor resolves forward", () => {
    // anchor 3 -> 5 (position 1); 8 is the 2nd boundary counted from there
    expect(isPeriodicBoundary([2, 5, 8], 8, 3, 2)).toBe(true);
    expect(isPeriodicBoundary([2, 5, 8], 5, 3, 2)).toBe(false);
  });

  it("anchor past the last boundary rejects everything", () => {
    for (const q of [2, 5, 8]) {
      expect(isPeriodicBoundary([2, 5, 8], q, 9, 2)).toBe(false);
    }
  });

  it("counts positions, not step values", () => {
    // Wide gaps between steps must not change the count.
    const sparse = [1, 100, 101, 5000];
    expect(isPeriodicBoundary(sparse, 101, 1, 3)).toBe(true);
    expect(isPeriodicBoundary(sparse, 5000, 1, 3)).toBe(false);
    expect(isPeriodicBoundary(sparse, 5000, 100, 3)).toBe(true);
  });
});

describe("periodicBoundaries", () => {
  it("selects every third boundary from the anchor", () => {
    const months = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
    expect(periodicBoundaries(months, 2, 3)).toEqual([4, 7, 10]);
  });

  it("frequency 1 returns all boundaries", () => {
    expect(periodicBoundaries(B, 50, 1)).toEqual(B);
  });
});
