import { resolve } from "node:path";
import { CompositeSink } from "../adapters/composite-sink.js";
import { ConsoleSink } from "../adapters/console-sink.js";
import { RotatingFileSink } from "../adapters/rotating-file-sink.js";
import { loadEnvConfig } from "../config/env.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import type { CloudSinkFactory, LogSink } from "../interfaces/sink.js";
import {
  DEFAULT_LOG_FILE_PATH,
  hasLoggerOptions,
  type LoggerOptions,
  type ResolvedLoggerOptions,
  resolveLoggerOptions,
} from "../types/config.js";
import { LogLevel } from "../types/log-record.js";
import { PrefixedLogger } from "./prefixed-logger.js";

export interface LoggerRegistryOptions {
  /** Minimum level for loggers that do not set their own. Default: INFO. */
  level?: LogLevel;
  /** File used when getLogger() gets no `logFilePath`; null disables it. Default: "logs.txt". */
  defaultLogFilePath?: string | null;
  /** Required for loggers created with `enableCloudLogging`. */
  cloudSinkFactory?: CloudSinkFactory;
  /** Shared console sink. Default: a ConsoleSink writing to stderr. */
  consoleSink?: LogSink;
  /** Monotonic clock in milliseconds, handed to every logger. */
  now?: () => number;
  /** Wall clock for record timestamps, handed to every logger. */
  currentTime?: () => Date;
}

/**
 * Owns every logger of an application, keyed by name.
 *
 * Loggers are created on the first getLogger() call for a name. Later calls
 * return the same instance and ignore their options (a warning is logged when
 * options are passed), so sink and prefix settings belong on the first call.
 * Create one registry in the composition root and shut it down on exit.
 */
export class LoggerRegistry {
  readonly level: LogLevel;
  private readonly defaultLogFilePath: string | null;
  private readonly cloudSinkFactory: CloudSinkFactory | undefined;
  private readonly consoleSink: LogSink;
  private readonly now: (() => number) | undefined;
  private readonly currentTime: (() => Date) | undefined;
  private readonly loggers = new Map<string, PrefixedLogger>();
  private readonly fileSinks = new Map<string, RotatingFileSink>();
  private readonly cloudSinks: LogSink[] = [];

  constructor(options: LoggerRegistryOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.defaultLogFilePath =
      options.defaultLogFilePath === undefined ? DEFAULT_LOG_FILE_PATH : options.defaultLogFilePath;
    this.cloudSinkFactory = options.cloudSinkFactory;
    this.consoleSink = options.consoleSink ?? new ConsoleSink();
    this.now = options.now;
    this.currentTime = options.currentTime;
  }

  /** Build a registry whose level and default file path come from the environment. */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    options: Omit<LoggerRegistryOptions, "level" | "defaultLogFilePath"> = {},
  ): LoggerRegistry {
    return new LoggerRegistry({ ...options, ...loadEnvConfig(env) });
  }

  get hasCloudSupport(): boolean {
    return this.cloudSinkFactory !== undefined;
  }

  /**
   * Return the logger registered under `name`, creating it on first use.
   *
   * @throws ConfigurationError when options are invalid, or cloud logging is
   *   requested and the registry has no cloud sink factory or it fails
   * @throws SinkError when the log file cannot be opened
   */
  getLogger(name: string, options: LoggerOptions = {}): PrefixedLogger {
    const existing = this.loggers.get(name);
    if (existing) {
      if (hasLoggerOptions(options)) {
        existing.warning(
          `getLogger('${name}') called again with options; keeping the existing configuration and ignoring them.`,
        );
      }
      return existing;
    }

    const resolved = resolveLoggerOptions(name, options, {
      logFilePath: this.defaultLogFilePath,
      level: this.level,
    });

    // Cloud before file, so a configuration error leaves no file behind
    const cloudSink = resolved.enableCloudLogging ? this.createCloudSink(name, resolved) : undefined;

    const sinks: LogSink[] = [this.consoleSink];
    if (resolved.logFilePath !== null) sinks.push(this.fileSinkFor(resolved.logFilePath, resolved));
    if (cloudSink) sinks.push(cloudSink);

    const logger = new PrefixedLogger({
      name,
      prefix: resolved.prefix,
      level: resolved.level,
      sinks,
      now: this.now,
      currentTime: this.currentTime,
    });
    this.loggers.set(name, logger);
    if (cloudSink) this.cloudSinks.push(cloudSink);
    return logger;
  }

  has(name: string): boolean {
    return this.loggers.has(name);
  }

  names(): string[] {
    return [...this.loggers.keys()];
  }

  /** Close every sink the registry opened and forget all loggers. */
  shutdown(): void {
    const sinks: LogSink[] = [this.consoleSink, ...this.fileSinks.values(), ...this.cloudSinks];
    this.loggers.clear();
    this.fileSinks.clear();
    this.cloudSinks.length = 0;
    new CompositeSink(sinks).close();
  }

  /** Loggers writing to the same path share one sink, so rotation sees every write. */
  private fileSinkFor(path: string, options: ResolvedLoggerOptions): RotatingFileSink {
    const key = resolve(path);
    let sink = this.fileSinks.get(key);
    if (!sink) {
      sink = new RotatingFileSink({
        path: key,
        maxBytes: options.logFileMaxBytes,
        backupCount: options.logFileBackupCount,
      });
      this.fileSinks.set(key, sink);
    }
    return sink;
  }

  private createCloudSink(name: string, options: ResolvedLoggerOptions): LogSink {
    if (!this.cloudSinkFactory) {
      throw new ConfigurationError(
        `Cloud logging requested for '${name}' but no cloud sink factory is registered`,
      );
    }
    try {
      return this.cloudSinkFactory({
        loggerName: name,
        cloudLoggerName: options.cloudLoggerName,
      });
    } catch (err) {
      throw new ConfigurationError(
        `Could not initialize cloud logging for '${name}': ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }
}
