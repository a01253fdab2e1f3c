/**
 * Default style configuration: no rules, no colors.
 * Unresolved `[COLOR :name]` markers fall back to the neutral color.
 */

import type { StyleConfig } from "./schema.js";

export const DEFAULT_STYLE_CONFIG: StyleConfig = {
  styles: {},
  colors: {},
  info: {},
  extra: {},
};
