/**
 * Domain validation — assertions and invariants.
 * Framework-independent. No business logic.
 */

import { IndexOutOfRangeError } from "./errors.js";

/** Throws if condition is falsy. TypeScript narrows after a successful call. */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new Error(message);
  }
}

/** Throws IndexOutOfRangeError unless 0 <= index < size and index is an integer. */
export function assertIndex(index: number, size: number, what = "Index"): void {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new IndexOutOfRangeError(`${what} out of range`, { index, size });
  }
}
