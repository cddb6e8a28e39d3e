/**
 * Periodic membership over a boundary index.
 * Counting is by position in the boundary sequence, never by step value.
 */

import { lowerBound, positionOf } from "./boundaryIndex.js";

/**
 * Position in boundaries where periodic counting starts for anchorStep:
 * the anchor itself if it is a boundary, else the first boundary after it.
 * -1 when the anchor lies past the last boundary.
 */
export function resolveAnchorPosition(boundaries: readonly number[], anchorStep: number): number {
  const pos = lowerBound(boundaries, anchorStep);
  return pos < boundaries.length ? pos : -1;
}

/**
 * True when queryStep is a boundary and, counting the resolved anchor as
 * boundary number 1, is a multiple of frequency.
 * frequency <= 1 accepts every boundary, whatever the anchor.
 *
 * @example boundaries [2, 5, 8, 11], anchor 5, frequency 2 → true for 8 only.
 */
export function isPeriodicBoundary(
  boundaries: readonly number[],
  queryStep: number,
  anchorStep: number,
  frequency: number
): boolean {
  const queryPos = positionOf(boundaries, queryStep);
  if (queryPos < 0) return false;
  if (frequency <= 1) return true;

  const anchorPos = resolveAnchorPosition(boundaries, anchorStep);
  if (anchorPos < 0 || queryPos < anchorPos) return false;

  return (queryPos - anchorPos + 1) % frequency === 0;
}

/** All boundary steps accepted by isPeriodicBoundary, ascending. */
export function periodicBoundaries(
  boundaries: readonly number[],
  anchorStep: number,
  frequency: number
): number[] {
  return boundaries.filter((step) => isPeriodicBoundary(boundaries, step, anchorStep, frequency));
}
