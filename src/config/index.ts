/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";
import { isLogLevel, LOG_LEVELS } from "../logging/logger.js";

export { ConfigError } from "./env.js";

// Re-export style configuration module
export * from "./styles/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level for formatter diagnostics */
  readonly logLevel: string;
  /** Also append diagnostics to a log file */
  readonly logToFile: boolean;
  /** Directory for the log file */
  readonly logDir: string;
  /** Color used for `[COLOR :name]` markers that cannot be resolved */
  readonly neutralColor: string;
}

/**
 * Load configuration from the environment.
 */
function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "warn"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    neutralColor: optionalEnv("LABEL_NEUTRAL_COLOR", "gray"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate the loaded configuration.
 * Call this at startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be one of: ${LOG_LEVELS.join(", ")}.`
    );
  }

  if (!/^\w+$/.test(config.neutralColor)) {
    throw new ConfigError(
      `Invalid LABEL_NEUTRAL_COLOR: ${config.neutralColor}. Must be a color name.`
    );
  }
}
