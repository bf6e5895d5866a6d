/**
 * beaconlog public API barrel.
 *
 * Re-exports the registry, the prefixed logger, sinks, configuration helpers
 * and errors that make up the public surface of the package.
 * @module
 */

// Adapters
export { CompositeSink } from "./adapters/composite-sink.js";
export type { ConsoleSinkOptions } from "./adapters/console-sink.js";
export { ConsoleSink } from "./adapters/console-sink.js";
export type {
  CloudLogHandle,
  CloudWriteErrorHandler,
  GoogleCloudSinkFactoryOptions,
  GoogleCloudSinkOptions,
} from "./adapters/google-cloud-sink.js";
export { GoogleCloudSink, googleCloudSinkFactory } from "./adapters/google-cloud-sink.js";
export type { RotatingFileSinkOptions } from "./adapters/rotating-file-sink.js";
export { RotatingFileSink } from "./adapters/rotating-file-sink.js";
// Configuration
export type { EnvConfig } from "./config/env.js";
export { ENV_DISABLE_FILE, ENV_LOG_FILE_PATH, ENV_LOG_LEVEL, loadEnvConfig } from "./config/env.js";
// Core
export type { BeaconRegistryOptions } from "./core/beacon-registry.js";
export { BeaconRegistry } from "./core/beacon-registry.js";
export type { LoggerRegistryOptions } from "./core/logger-registry.js";
export { LoggerRegistry } from "./core/logger-registry.js";
export type { PrefixedLoggerOptions } from "./core/prefixed-logger.js";
export { PrefixedLogger } from "./core/prefixed-logger.js";
export {
  formatBody,
  formatEndBeacon,
  formatLine,
  formatStartBeacon,
} from "./core/record-format.js";
// Errors
export {
  BeaconLogError,
  ConfigurationError,
  errorMessage,
  SinkError,
} from "./errors.js";
// Interfaces
export type { BeaconLogger, Logger } from "./interfaces/logger.js";
export type { CloudSinkFactory, CloudSinkRequest, LogSink } from "./interfaces/sink.js";
// Types
export type {
  LoggerDefaults,
  LoggerOptions,
  ResolvedLoggerOptions,
} from "./types/config.js";
export {
  DEFAULT_LOG_FILE_BACKUP_COUNT,
  DEFAULT_LOG_FILE_MAX_BYTES,
  DEFAULT_LOG_FILE_PATH,
  resolveLoggerOptions,
} from "./types/config.js";
export type { LogLevelName, LogRecord } from "./types/log-record.js";
export { LEVEL_NAMES, LogLevel, parseLogLevel } from "./types/log-record.js";
