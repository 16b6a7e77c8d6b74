/**
 * Application configuration.
 * Validates and exposes typed configuration values read from the environment.
 */

import { EnvConfigError, optionalEnv, optionalEnvFlag } from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export { EnvConfigError } from "./env.js";

// Re-export project options module
export * from "./project/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Append log entries to this file when set */
  readonly logFile: string;
  /** Use a toolchain found on PATH instead of building one from source */
  readonly useSystemToolchain: boolean;
  /** Build executor invoked after the manifest is written */
  readonly ninjaBinary: string;
}

/**
 * Load application configuration.
 */
function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("KBUILD_LOG_LEVEL", "info"),
    logFile: optionalEnv("KBUILD_LOG_FILE", ""),
    useSystemToolchain: optionalEnvFlag("KBUILD_USE_SYSTEM_TOOLCHAIN"),
    ninjaBinary: optionalEnv("KBUILD_NINJA", "ninja"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate the loaded configuration.
 * Call this at build-script startup to fail fast.
 */
export function validateConfig(candidate: AppConfig = config): void {
  if (!["development", "production", "test"].includes(candidate.env)) {
    throw new EnvConfigError(
      `Invalid NODE_ENV: ${candidate.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(candidate.logLevel)) {
    throw new EnvConfigError(
      `Invalid KBUILD_LOG_LEVEL: ${candidate.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}

/**
 * The configured log level, falling back to "info" when invalid.
 */
export function configuredLogLevel(candidate: AppConfig = config): LogLevel {
  return isLogLevel(candidate.logLevel) ? candidate.logLevel : "info";
}
