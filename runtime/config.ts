/**
 * Runtime configuration — read from environment variables.
 *
 * TIMELINE_LOG_LEVEL      silent | error | warn | info | debug   (default warn)
 * TIMELINE_DEFAULT_START  YYYY-MM-DD, start when none is given   (default 1983-01-01)
 */

import type { Instant } from "../domain/core.js";
import { makeDate, parseDateKey } from "../domain/calendar.js";
import { InvalidCalendarDateError, ValidationError } from "../domain/errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export interface TimelineConfig {
  readonly logLevel: LogLevel;
  readonly defaultStart: Instant;
}

/** Start date assumed when a schedule has no explicit start. */
export const DEFAULT_START_DATE = "1983-01-01";
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/;

function parseStart(value: string): Instant {
  if (!DATE_KEY.test(value)) {
    throw new ValidationError("TIMELINE_DEFAULT_START must be YYYY-MM-DD", { value });
  }
  const { y, m, d } = parseDateKey(value);
  try {
    return makeDate(y, m, d);
  } catch (err: unknown) {
    if (err instanceof InvalidCalendarDateError) {
      throw new ValidationError("TIMELINE_DEFAULT_START is not a calendar date", { value });
    }
    throw err;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TimelineConfig {
  const level = env.TIMELINE_LOG_LEVEL ?? DEFAULT_LOG_LEVEL;
  if (!isLogLevel(level)) {
    throw new ValidationError("TIMELINE_LOG_LEVEL is not a known level", { value: level });
  }
  return {
    logLevel: level,
    defaultStart: parseStart(env.TIMELINE_DEFAULT_START ?? DEFAULT_START_DATE),
  };
}
