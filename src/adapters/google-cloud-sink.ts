import { type Entry, Logging } from "@google-cloud/logging";
import { errorMessage } from "../errors.js";
import type { CloudSinkFactory, LogSink } from "../interfaces/sink.js";
import { LogLevel, type LogRecord } from "../types/log-record.js";

type CloudEntryMetadata = NonNullable<ConstructorParameters<typeof Entry>[0]>;

/** The slice of a Cloud Logging `Log` the sink uses. */
export interface CloudLogHandle {
  entry(metadata: CloudEntryMetadata, data: string): Entry;
  write(entry: Entry): Promise<unknown>;
}

export type CloudWriteErrorHandler = (error: unknown, record: LogRecord) => void;

const SEVERITIES = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARNING]: "WARNING",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.CRITICAL]: "CRITICAL",
} as const satisfies Record<LogLevel, string>;

export interface GoogleCloudSinkOptions {
  log: CloudLogHandle;
  logName: string;
  /** Called when an asynchronous write is rejected. Defaults to a line on stderr. */
  onError?: CloudWriteErrorHandler;
}

/**
 * Sends records to Google Cloud Logging.
 *
 * Writes are fire-and-forget: write() returns before the API call settles, and
 * a rejected call is handed to `onError`.
 */
export class GoogleCloudSink implements LogSink {
  readonly name: string;
  private readonly log: CloudLogHandle;
  private readonly onError: CloudWriteErrorHandler;

  constructor(options: GoogleCloudSinkOptions) {
    this.name = `cloud:${options.logName}`;
    this.log = options.log;
    this.onError =
      options.onError ??
      ((error) =>
        process.stderr.write(`Cloud log write to ${options.logName} failed: ${errorMessage(error)}\n`));
  }

  write(record: LogRecord): void {
    const text = record.stack ? `${record.message}\n${record.stack}` : record.message;
    const entry = this.log.entry(
      {
        severity: SEVERITIES[record.level],
        timestamp: record.time,
        labels: { logger: record.loggerName, prefix: record.prefix },
      },
      text,
    );
    void this.log.write(entry).catch((error: unknown) => this.onError(error, record));
  }
}

export interface GoogleCloudSinkFactoryOptions {
  /** Client to reuse. Created on first use when omitted. */
  logging?: Logging;
  projectId?: string;
  onError?: CloudWriteErrorHandler;
}

/**
 * Cloud sink factory backed by `@google-cloud/logging`. Pass it to the
 * LoggerRegistry to make `enableCloudLogging` available.
 */
export function googleCloudSinkFactory(options: GoogleCloudSinkFactoryOptions = {}): CloudSinkFactory {
  let logging = options.logging;
  return ({ loggerName, cloudLoggerName }) => {
    logging ??= new Logging(options.projectId ? { projectId: options.projectId } : undefined);
    const logName = cloudLoggerName ?? loggerName;
    return new GoogleCloudSink({ log: logging.log(logName), logName, onError: options.onError });
  };
}
