import { loggerNameSchema, loggerOptionsSchema } from "../config/config-schema.js";
import { ConfigurationError } from "../errors.js";
import { LogLevel } from "./log-record.js";

export const DEFAULT_LOG_FILE_PATH = "logs.txt";
export const DEFAULT_LOG_FILE_MAX_BYTES = 100 * 1024 * 1024;
export const DEFAULT_LOG_FILE_BACKUP_COUNT = 5;

/** Options accepted by LoggerRegistry.getLogger(). Only honoured on the first call for a name. */
export interface LoggerOptions {
  /** Initial bracketed tag. Default: "" */
  prefix?: string;

  // File sink
  /** null disables the file sink; undefined selects the registry default. */
  logFilePath?: string | null;
  logFileMaxBytes?: number; // default: 100 MiB
  logFileBackupCount?: number; // default: 5

  // Cloud sink
  enableCloudLogging?: boolean; // default: false
  cloudLoggerName?: string; // default: the logger name

  /** Minimum level for this logger. Default: the registry level. */
  level?: LogLevel;
}

/** Fully resolved logger options with defaults applied. */
export type ResolvedLoggerOptions = Required<Omit<LoggerOptions, "cloudLoggerName" | "logFilePath">> &
  Pick<LoggerOptions, "cloudLoggerName"> & {
    logFilePath: string | null;
  };

/** Defaults a registry contributes to every logger it creates. */
export interface LoggerDefaults {
  logFilePath: string | null;
  level: LogLevel;
}

export const DEFAULT_LOGGER_DEFAULTS: LoggerDefaults = {
  logFilePath: DEFAULT_LOG_FILE_PATH,
  level: LogLevel.INFO,
};

export function resolveLoggerOptions(
  name: string,
  options: LoggerOptions,
  defaults: LoggerDefaults = DEFAULT_LOGGER_DEFAULTS,
): ResolvedLoggerOptions {
  const nameValidation = loggerNameSchema.safeParse(name);
  if (!nameValidation.success) {
    throw new ConfigurationError(`Invalid logger name: ${nameValidation.error.message}`);
  }
  const validation = loggerOptionsSchema.safeParse(options);
  if (!validation.success) {
    throw new ConfigurationError(`Invalid logger options for '${name}': ${validation.error.message}`);
  }

  return {
    prefix: options.prefix ?? "",
    logFilePath: options.logFilePath === undefined ? defaults.logFilePath : options.logFilePath,
    logFileMaxBytes: options.logFileMaxBytes ?? DEFAULT_LOG_FILE_MAX_BYTES,
    logFileBackupCount: options.logFileBackupCount ?? DEFAULT_LOG_FILE_BACKUP_COUNT,
    enableCloudLogging: options.enableCloudLogging ?? false,
    cloudLoggerName: options.cloudLoggerName,
    level: options.level ?? defaults.level,
  };
}

/** True when any option carries a value. */
export function hasLoggerOptions(options: LoggerOptions): boolean {
  return Object.values(options).some((value) => value !== undefined);
}
