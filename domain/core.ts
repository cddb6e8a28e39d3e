/**
 * Domain core — structural primitives only.
 * Framework-independent. No calendar logic.
 */

// --- Branded scalars (safer than plain numbers) ---

export type Brand<T, B extends string> = T & { readonly __brand: B };

/** Point in time (whole seconds since 1970-01-01T00:00:00, no time zone). */
export type Instant = Brand<number, "InstantSec">;

/** Span of time in seconds. */
export type Seconds = Brand<number, "Seconds">;

/** Position in a timeline. 0 is the start instant; step i ends at position i. */
export type StepIndex = Brand<number, "StepIndex">;

// --- Constructors (no validation yet) ---

export const asInstant = (sec: number) => sec as Instant;
export const asSeconds = (sec: number) => sec as Seconds;
export const asStepIndex = (n: number) => n as StepIndex;

// --- Granularity ---

/** Calendar field tracked by the boundary indexes. */
export type Granularity = "month" | "year";

export const SECONDS_PER_MINUTE = 60;
export const SECONDS_PER_HOUR = 60 * SECONDS_PER_MINUTE;
export const SECONDS_PER_DAY = 24 * SECONDS_PER_HOUR;
