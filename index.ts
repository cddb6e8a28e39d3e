/**
 * Public API.
 */

export * from "./domain/core.js";
export * from "./domain/errors.js";
export * from "./domain/result.js";
export * from "./domain/calendar.js";
export { MONTH_INDICES, monthIndex } from "./domain/monthNames.js";
export { lowerBound, positionOf } from "./domain/boundaryIndex.js";
export { isPeriodicBoundary, periodicBoundaries, resolveAnchorPosition } from "./domain/periodic.js";
export { TimeMap } from "./domain/timeMap.js";
export * from "./domain/directives.js";
export { loadConfig, DEFAULT_START_DATE, type TimelineConfig } from "./runtime/config.js";
export { createLogger, type Logger, type LogLevel } from "./runtime/logger.js";
export {
  buildTimeMap,
  tryBuildTimeMap,
  defaultScheduleDeps,
  type ScheduleDeps,
  type ScheduleInput,
} from "./runtime/schedule.js";
