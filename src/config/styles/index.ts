/**
 * Style configuration module.
 *
 * Usage:
 *   import { loadStyleConfigFromFile, toFormatterOptions } from "./config/styles/index.js";
 *
 *   const styles = loadStyleConfigFromFile("styles.json");
 *   const formatter = new SafeFormatter(toFormatterOptions(styles));
 */

export type { StyleConfig, StyleConfigInput } from "./schema.js";

export { StyleConfigSchema, StyleDescriptorSchema, StylePathSchema } from "./schema.js";

export {
  loadStyleConfig,
  loadStyleConfigFromFile,
  validateStyleConfig,
  toFormatterOptions,
  formatZodIssues,
  StyleConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_STYLE_CONFIG } from "./defaults.js";
