/**
 * Severity levels and the record shape every sink receives.
 * @module
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
  CRITICAL = 4,
}

export const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARNING]: "WARNING",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.CRITICAL]: "CRITICAL",
};

export type LogLevelName = "debug" | "info" | "warning" | "warn" | "error" | "critical";

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warning: LogLevel.WARNING,
  warn: LogLevel.WARNING,
  error: LogLevel.ERROR,
  critical: LogLevel.CRITICAL,
};

function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LEVELS_BY_NAME, value);
}

/** Parse a level name case-insensitively. Returns undefined for unknown names. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return isLogLevelName(normalized) ? LEVELS_BY_NAME[normalized] : undefined;
}

/** A fully formatted record, as handed to every sink. */
export interface LogRecord {
  /** Wall-clock emission time, used for the line timestamp only. */
  time: Date;
  level: LogLevel;
  loggerName: string;
  /** Prefix in effect when the record was emitted. */
  prefix: string;
  /** Body with the prefix applied: `[prefix] message`. */
  message: string;
  /** Value passed to `exception()`. */
  error?: unknown;
  /** Rendered stack text of `error`. */
  stack?: string;
}
