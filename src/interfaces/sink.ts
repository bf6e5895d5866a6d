/**
 * Output destination for formatted log records.
 * Adapters (ConsoleSink, RotatingFileSink, GoogleCloudSink) implement this;
 * the logger programs to it.
 * @module
 */

import type { LogRecord } from "../types/log-record.js";

export interface LogSink {
  /** Stable identifier, used in error reports (e.g. `file:/var/log/app.log`). */
  readonly name: string;
  write(record: LogRecord): void;
  close?(): void;
}

export interface CloudSinkRequest {
  /** Name of the logger the sink is attached to. */
  loggerName: string;
  /** Label for the cloud log; falls back to `loggerName`. */
  cloudLoggerName?: string;
}

/**
 * Builds the cloud sink for one logger. Registered explicitly on the
 * LoggerRegistry by the composition root; loggers asking for cloud logging on
 * a registry without one fail at construction.
 */
export type CloudSinkFactory = (request: CloudSinkRequest) => LogSink;
