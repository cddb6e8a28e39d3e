/**
 * Result type for callers that prefer explicit error values over exceptions.
 */

import { isTimelineError, type TimelineError } from "./errors.js";

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Runs fn and captures timeline errors as values.
 * Anything that is not a TimelineError is a bug and is rethrown.
 */
export function attempt<T>(fn: () => T): Result<T, TimelineError> {
  try {
    return ok(fn());
  } catch (e: unknown) {
    if (isTimelineError(e)) return err(e);
    throw e;
  }
}
