/**
 * Azure Agent — Console Logger
 *
 * Leveled logger writing `timestamp | LEVEL | name | message` lines.
 */

import type { Logger, LogLevel } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

export type ConsoleSink = Pick<Console, "debug" | "info" | "warn" | "error">;

export type LoggerOptions = {
  level?: LogLevel;
  sink?: ConsoleSink;
  /** Clock override, used by tests. */
  now?: () => Date;
};

export function formatLogLine(timestamp: Date, level: LogLevel, name: string, msg: string): string {
  return `${timestamp.toISOString()} | ${level} | ${name} | ${msg}`;
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "INFO"];
  const sink = options.sink ?? console;
  const now = options.now ?? (() => new Date());

  const emit = (level: LogLevel, write: (line: string) => void, msg: string) => {
    if (LEVEL_ORDER[level] < threshold) return;
    write(formatLogLine(now(), level, name, msg));
  };

  return {
    debug: (msg) => emit("DEBUG", (line) => sink.debug(line), msg),
    info: (msg) => emit("INFO", (line) => sink.info(line), msg),
    warn: (msg) => emit("WARNING", (line) => sink.warn(line), msg),
    error: (msg) => emit("ERROR", (line) => sink.error(line), msg),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
