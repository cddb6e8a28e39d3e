/**
 * Schedule builder — time map from a start record and a keyword list.
 * Injected deps for testability; defaults read the environment.
 */

import { formatInstant } from "../domain/calendar.js";
import {
  applyDirective,
  classifyKeyword,
  directivesFromKeywords,
  startInstant,
  type DateRecord,
  type ScheduleKeyword,
} from "../domain/directives.js";
import { isTimelineError, type TimelineError } from "../domain/errors.js";
import { attempt, type Result } from "../domain/result.js";
import { TimeMap } from "../domain/timeMap.js";
import { loadConfig, type TimelineConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";

export interface ScheduleInput {
  /** START record. Falls back to config.defaultStart. */
  readonly start?: DateRecord;
  readonly keywords: readonly ScheduleKeyword[];
}

export interface ScheduleDeps {
  config: TimelineConfig;
  logger: Logger;
}

export function defaultScheduleDeps(): ScheduleDeps {
  const config = loadConfig();
  return { config, logger: createLogger(config.logLevel) };
}

/** Builds the time map. Timeline errors are logged and rethrown unchanged. */
export function buildTimeMap(input: ScheduleInput, deps: ScheduleDeps = defaultScheduleDeps()): TimeMap {
  const { config, logger } = deps;

  for (const kw of input.keywords) {
    if (classifyKeyword(kw.name) === undefined) {
      logger.debug("Ignoring keyword", { keyword: kw.name });
    }
  }

  try {
    const map = new TimeMap(startInstant(input.start, config.defaultStart));
    for (const directive of directivesFromKeywords(input.keywords)) {
      applyDirective(map, directive);
    }
    if (logger.isEnabled("info")) {
      logger.info("Timeline built", {
        steps: map.numSteps(),
        start: formatInstant(map.startTime()),
        end: formatInstant(map.endTime()),
        monthBoundaries: map.firstStepsOfMonths().length,
        yearBoundaries: map.firstStepsOfYears().length,
      });
    }
    return map;
  } catch (e: unknown) {
    if (isTimelineError(e)) {
      logger.error(`Timeline construction failed: ${e.message}`, { code: e.code, ...e.metadata });
    }
    throw e;
  }
}

/** Same as buildTimeMap, with timeline errors returned instead of thrown. */
export function tryBuildTimeMap(
  input: ScheduleInput,
  deps: ScheduleDeps = defaultScheduleDeps()
): Result<TimeMap, TimelineError> {
  return attempt(() => buildTimeMap(input, deps));
}
