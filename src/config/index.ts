/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvPath,
} from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvPath,
} from "./env.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode; forces the log level to debug */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Directory holding saved templates */
  readonly home: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Append log entries to a file under logDir */
  readonly logToFile: boolean;
}

/**
 * Load configuration from an environment map.
 * Fails fast on malformed values; unset values take their defaults.
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development", env),
    debug: optionalEnvBool("DEBUG", false, env),
    logLevel: optionalEnv("LOG_LEVEL", "info", env),
    home: optionalEnvPath("SCAFFOLDR_HOME", "~/.scaffoldr/templates", env),
    logDir: optionalEnvPath("LOG_DIR", "~/.scaffoldr/logs", env),
    logToFile: optionalEnvBool("LOG_TO_FILE", false, env),
  };
}

/**
 * Validate a loaded configuration.
 * Call this at application startup to fail fast.
 */
export function validateConfig(config: AppConfig): void {
  if (!ENVIRONMENTS.some((env) => env === config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be ${ENVIRONMENTS.join(", ")}.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}

/**
 * Effective log level: DEBUG=true wins over LOG_LEVEL.
 */
export function effectiveLogLevel(config: AppConfig): LogLevel {
  if (config.debug) return "debug";
  return isLogLevel(config.logLevel) ? config.logLevel : "info";
}
