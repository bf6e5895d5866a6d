/**
 * Logger that stamps every record with a mutable prefix and supports paired
 * start/end beacons for timing named operations.
 * @module
 */

import { CompositeSink } from "../adapters/composite-sink.js";
import { errorStack } from "../errors.js";
import type { BeaconLogger } from "../interfaces/logger.js";
import type { LogSink } from "../interfaces/sink.js";
import { LogLevel, type LogRecord } from "../types/log-record.js";
import { BeaconRegistry } from "./beacon-registry.js";
import { formatBody, formatEndBeacon, formatStartBeacon } from "./record-format.js";

export interface PrefixedLoggerOptions {
  name: string;
  prefix?: string;
  /** Records below this level are dropped. Default: INFO. */
  level?: LogLevel;
  sinks: readonly LogSink[];
  /** Monotonic clock in milliseconds, used for beacon timing. */
  now?: () => number;
  /** Wall clock, used for record timestamps. */
  currentTime?: () => Date;
}

export class PrefixedLogger implements BeaconLogger {
  readonly name: string;
  readonly level: LogLevel;
  private currentPrefix: string;
  private readonly sink: CompositeSink;
  private readonly beacons: BeaconRegistry;
  private readonly currentTime: () => Date;

  constructor(options: PrefixedLoggerOptions) {
    this.name = options.name;
    this.currentPrefix = options.prefix ?? "";
    this.level = options.level ?? LogLevel.INFO;
    this.sink = new CompositeSink(options.sinks);
    this.beacons = new BeaconRegistry({ now: options.now });
    this.currentTime = options.currentTime ?? (() => new Date());
  }

  get prefix(): string {
    return this.currentPrefix;
  }

  /** Replace the prefix for every record emitted from now on. */
  updatePrefix(prefix: string): void {
    this.currentPrefix = prefix;
  }

  isEnabledFor(level: LogLevel): boolean {
    return level >= this.level;
  }

  debug(msg: string): void {
    this.emit(LogLevel.DEBUG, msg);
  }

  info(msg: string): void {
    this.emit(LogLevel.INFO, msg);
  }

  warning(msg: string): void {
    this.emit(LogLevel.WARNING, msg);
  }

  warn(msg: string): void {
    this.emit(LogLevel.WARNING, msg);
  }

  error(msg: string): void {
    this.emit(LogLevel.ERROR, msg);
  }

  critical(msg: string): void {
    this.emit(LogLevel.CRITICAL, msg);
  }

  exception(msg: string, err?: unknown): void {
    this.emit(LogLevel.ERROR, msg, err);
  }

  /**
   * Record the start of `key` and emit a START beacon.
   * Starting a key that has not ended yet restarts its timer.
   */
  logStart(key: string, msg: string): void {
    this.beacons.start(key);
    this.info(formatStartBeacon(key, msg));
  }

  /**
   * Emit an END beacon with the time elapsed since the matching logStart().
   * Without a matching start the elapsed time renders as `N/A` after a warning.
   */
  logEnd(key: string, msg: string): void {
    const elapsed = this.beacons.end(key);
    if (elapsed !== undefined) {
      this.info(formatEndBeacon(key, elapsed, msg));
      return;
    }
    // The END record goes out even when a sink rejected the warning
    try {
      this.warning(`logEnd called for key '${key}' without a corresponding logStart.`);
    } finally {
      this.info(formatEndBeacon(key, undefined, msg));
    }
  }

  /** Keys started but not yet ended. */
  pendingBeacons(): string[] {
    return this.beacons.pending();
  }

  private emit(level: LogLevel, msg: string, err?: unknown): void {
    if (!this.isEnabledFor(level)) return;

    const record: LogRecord = {
      time: this.currentTime(),
      level,
      loggerName: this.name,
      prefix: this.currentPrefix,
      message: formatBody(this.currentPrefix, msg),
    };
    if (err !== undefined) {
      record.error = err;
      record.stack = errorStack(err);
    }

    this.sink.write(record);
  }
}
