/**
 * Environment variable loading and validation.
 */

import "dotenv/config";

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EnvConfigError";
  }
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value !== undefined && value !== "" ? value : defaultValue;
}

/**
 * Get a presence flag: unset is false, set but empty is true, anything
 * else is parsed as a boolean.
 */
export function optionalEnvFlag(key: string): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return false;
  }
  return value === "" ? true : parseBool(key, value);
}

export function parseBool(key: string, value: string): boolean {
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new EnvConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}
