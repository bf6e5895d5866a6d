import { ConfigurationError } from "../errors.js";
import { type LogLevel, parseLogLevel } from "../types/log-record.js";

/** Environment variables read by loadEnvConfig(). */
export const ENV_LOG_FILE_PATH = "LOGGING_FILE_PATH";
export const ENV_LOG_LEVEL = "LOG_LEVEL";
export const ENV_DISABLE_FILE = "LOGGING_DISABLE_FILE";

export interface EnvConfig {
  level?: LogLevel;
  /** Default file sink path; null when file logging is disabled. */
  defaultLogFilePath?: string | null;
}

function isTruthyEnv(value: string | undefined): boolean {
  if (!value) return false;
  return ["1", "true", "yes"].includes(value.trim().toLowerCase());
}

/**
 * Registry defaults taken from the environment. Unset or empty variables are
 * left out so the registry's own defaults apply.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const config: EnvConfig = {};

  const rawLevel = env[ENV_LOG_LEVEL];
  if (rawLevel) {
    const level = parseLogLevel(rawLevel);
    if (level === undefined) {
      throw new ConfigurationError(`Invalid ${ENV_LOG_LEVEL}: ${rawLevel}`);
    }
    config.level = level;
  }

  if (isTruthyEnv(env[ENV_DISABLE_FILE])) {
    config.defaultLogFilePath = null;
  } else if (env[ENV_LOG_FILE_PATH]) {
    config.defaultLogFilePath = env[ENV_LOG_FILE_PATH];
  }

  return config;
}
