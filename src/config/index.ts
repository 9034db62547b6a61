/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

export * from "./project/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Also append log lines to output/logs */
  readonly logToFile: boolean;
  /** Optional project config file */
  readonly configFile: string;
}

function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logToFile: optionalEnvBool("LOG_FILE", false),
    configFile: optionalEnv("RELEASE_GLUE_CONFIG", "release-glue.config.json"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate the environment-derived configuration.
 * Call this at CLI startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}

/**
 * Log level from configuration, narrowed. Call after validateConfig().
 */
export function configuredLogLevel(): LogLevel {
  return isLogLevel(config.logLevel) ? config.logLevel : "info";
}
