/**
 * Environment variable loading and validation.
 */

import "dotenv/config";
import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(
  key: string,
  defaultValue: string,
  env: Env = process.env
): string {
  const value = env[key];
  return value !== undefined && value !== "" ? value : defaultValue;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(
  key: string,
  defaultValue: boolean,
  env: Env = process.env
): boolean {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}

/**
 * Get an optional environment variable as a filesystem path.
 * A leading "~/" expands to the home directory; relative paths resolve
 * against the working directory.
 */
export function optionalEnvPath(
  key: string,
  defaultValue: string,
  env: Env = process.env
): string {
  const raw = optionalEnv(key, defaultValue, env);
  const expanded = raw === "~" || raw.startsWith("~/")
    ? join(homedir(), raw.slice(1))
    : raw;
  return isAbsolute(expanded) ? expanded : resolve(expanded);
}
