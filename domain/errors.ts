/**
 * Domain error model — base and concrete error types.
 * Framework-independent. No business logic.
 */

/** Optional metadata attached to domain errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all domain errors. Preserves prototype chain for instanceof. */
export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a value or input fails validation. */
export class ValidationError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

// --- Timeline errors ---

export type TimelineErrorCode =
  | "NON_MONOTONIC_TIME"
  | "INVALID_CALENDAR_DATE"
  | "INDEX_OUT_OF_RANGE"
  | "UNKNOWN_MONTH_NAME"
  | "WRONG_DIRECTIVE_KIND";

/** New instant is not strictly after the last one in the timeline. */
export class NonMonotonicTimeError extends DomainError {
  readonly code = "NON_MONOTONIC_TIME" as const;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Calendar fields did not survive the round trip (e.g. February 30). */
export class InvalidCalendarDateError extends DomainError {
  readonly code = "INVALID_CALENDAR_DATE" as const;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Step index past the end of the timeline. */
export class IndexOutOfRangeError extends DomainError {
  readonly code = "INDEX_OUT_OF_RANGE" as const;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

export class UnknownMonthNameError extends DomainError {
  readonly code = "UNKNOWN_MONTH_NAME" as const;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** A directive was routed to the wrong handler for its keyword. */
export class WrongDirectiveKindError extends DomainError {
  readonly code = "WRONG_DIRECTIVE_KIND" as const;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

export type TimelineError =
  | NonMonotonicTimeError
  | InvalidCalendarDateError
  | IndexOutOfRangeError
  | UnknownMonthNameError
  | WrongDirectiveKindError;

export function isTimelineError(err: unknown): err is TimelineError {
  return (
    err instanceof NonMonotonicTimeError ||
    err instanceof InvalidCalendarDateError ||
    err instanceof IndexOutOfRangeError ||
    err instanceof UnknownMonthNameError ||
    err instanceof WrongDirectiveKindError
  );
}
