/**
 * label-format: safe string templating for media labels.
 */

export * from "./format/index.js";

export {
  config,
  validateConfig,
  ConfigError,
  loadStyleConfig,
  loadStyleConfigFromFile,
  validateStyleConfig,
  toFormatterOptions,
  StyleConfigError,
  DEFAULT_STYLE_CONFIG,
  type AppConfig,
  type StyleConfig,
  type ConfigValidationIssue,
} from "./config/index.js";

export { createLogger, type Logger, type LoggerOptions, type LogLevel } from "./logging/index.js";
