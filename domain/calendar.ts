/**
 * domain/calendar.ts
 * Proleptic Gregorian calendar over naive UTC seconds.
 *
 * - makeInstant: calendar fields -> Instant, with round-trip check of the date
 * - calendarDateOf: Instant -> (year, month, day)
 * - forward: plain second arithmetic
 *
 * No time zones. Date is only used as the UTC conversion engine.
 */

import {
  asInstant,
  SECONDS_PER_HOUR,
  SECONDS_PER_MINUTE,
  type Instant,
} from "./core.js";
import { InvalidCalendarDateError } from "./errors.js";

export type DateKey = string; // "YYYY-MM-DD"

/** Calendar date part of an instant. month is 1-based. */
export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

const MS_PER_SECOND = 1000;

/* -------------------------
 * Date key helpers
 * ------------------------- */

export function parseDateKey(date: DateKey): { y: number; m: number; d: number } {
  const [ys, ms, ds] = date.split("-");
  return { y: Number(ys), m: Number(ms), d: Number(ds) };
}

export function formatDateKey(y: number, m: number, d: number): DateKey {
  return `${String(y).padStart(4, "0")}-${String(m).padStart(2, "0")}-${String(d).padStart(2, "0")}`;
}

/* -------------------------
 * Instant construction
 * ------------------------- */

function toUtcDate(instant: Instant): Date {
  return new Date(instant * MS_PER_SECOND);
}

/**
 * Builds the instant for the given UTC calendar fields.
 *
 * The forward conversion happily wraps dates like January 33 or February 30,
 * so the (year, month, day) of the result is read back and compared with the
 * input. Any mismatch throws InvalidCalendarDateError. Time-of-day overflow
 * that stays on the same date is not detected.
 */
export function makeInstant(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0
): Instant {
  const fields = { year, month, day, hour, minute, second };
  if (!Object.values(fields).every(Number.isInteger)) {
    throw new InvalidCalendarDateError("Calendar fields must be integers", fields);
  }

  // setUTCFullYear keeps years 0-99 literal (Date.UTC maps them to 19xx).
  const dt = new Date(0);
  dt.setUTCFullYear(year, month - 1, day);
  dt.setUTCHours(hour, minute, second, 0);

  const ms = dt.getTime();
  if (Number.isNaN(ms)) {
    throw new InvalidCalendarDateError("Date outside representable range", fields);
  }

  if (
    dt.getUTCFullYear() !== year ||
    dt.getUTCMonth() + 1 !== month ||
    dt.getUTCDate() !== day
  ) {
    throw new InvalidCalendarDateError(
      `Invalid date ${formatDateKey(year, month, day)}`,
      { ...fields, normalized: dt.toISOString() }
    );
  }

  return asInstant(Math.floor(ms / MS_PER_SECOND));
}

/** Midnight of the given date. */
export function makeDate(year: number, month: number, day: number): Instant {
  return makeInstant(year, month, day, 0, 0, 0);
}

/** False for instants outside the range Date can convert (about ±275,000 years). */
export function isRepresentable(instant: number): boolean {
  return !Number.isNaN(new Date(instant * MS_PER_SECOND).getTime());
}

export function calendarDateOf(instant: Instant): CalendarDate {
  const dt = toUtcDate(instant);
  return {
    year: dt.getUTCFullYear(),
    month: dt.getUTCMonth() + 1,
    day: dt.getUTCDate(),
  };
}

/* -------------------------
 * Arithmetic + formatting
 * ------------------------- */

export function forward(instant: Instant, seconds: number): Instant {
  return asInstant(instant + seconds);
}

export function forwardBy(
  instant: Instant,
  by: { readonly hours?: number; readonly minutes?: number; readonly seconds?: number }
): Instant {
  const { hours = 0, minutes = 0, seconds = 0 } = by;
  return forward(instant, hours * SECONDS_PER_HOUR + minutes * SECONDS_PER_MINUTE + seconds);
}

/** "YYYY-MM-DDTHH:MM:SSZ" */
export function formatInstant(instant: Instant): string {
  const iso = toUtcDate(instant).toISOString(); // YYYY-MM-DDTHH:MM:SS.sssZ
  return `${iso.slice(0, 19)}Z`;
}
