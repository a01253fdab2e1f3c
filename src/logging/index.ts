/**
 * Logging utilities.
 */

import { config } from "../config/index.js";
import { createLogger, isLogLevel, type Logger } from "./logger.js";

export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";

let defaultLogger: Logger | null = null;

/**
 * Diagnostic sink used by formatters that were not given a logger.
 * Created on first use from the application configuration.
 */
export function getDefaultLogger(): Logger {
  if (defaultLogger === null) {
    defaultLogger = createLogger({
      level: isLogLevel(config.logLevel) ? config.logLevel : "warn",
      file: config.logToFile,
      logDir: config.logDir,
    });
  }
  return defaultLogger;
}
