/**
 * Logger surface exposed to callers.
 * @module
 */

/** Severity calls, each rendering the logger's current prefix. */
export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  critical(msg: string): void;
  /** Logs at ERROR and attaches the stack text of `err`. */
  exception(msg: string, err?: unknown): void;
}

/** Logger with a mutable prefix and start/end beacon timing. */
export interface BeaconLogger extends Logger {
  readonly name: string;
  readonly prefix: string;
  updatePrefix(prefix: string): void;
  logStart(key: string, msg: string): void;
  logEnd(key: string, msg: string): void;
}
