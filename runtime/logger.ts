/**
 * Leveled logger over console. No formatting beyond a scope prefix.
 */

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export interface Logger {
  /** True when messages at level would be written. */
  isEnabled(level: Exclude<LogLevel, "silent">): boolean;
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: unknown): void;
}

/** Sink the logger writes to. Defaults to the global console. */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function createLogger(level: LogLevel, scope = "timeline", sink: LogSink = console): Logger {
  const threshold = rank(level);
  const prefix = `[${scope}]`;

  function write(at: Exclude<LogLevel, "silent">, message: string, details: unknown): void {
    if (rank(at) > threshold) return;
    if (details === undefined) sink[at](prefix, message);
    else sink[at](prefix, message, details);
  }

  return {
    isEnabled: (at) => rank(at) <= threshold,
    debug: (message, details) => write("debug", message, details),
    info: (message, details) => write("info", message, details),
    warn: (message, details) => write("warn", message, details),
    error: (message, details) => write("error", message, details),
  };
}
