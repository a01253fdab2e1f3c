/**
 * Formatting engine.
 *
 * Usage:
 *   import { safeFormat, sectionFormat, stylize } from "./format/index.js";
 *
 *   safeFormat("{title} ({year})", { title: "Serial" });
 *   // → "Serial ({year})"
 *
 *   sectionFormat("[{series} – ][S{season:02d}]", { series: "Serial" });
 *   // → "Serial – "
 */

// Entry points
export {
  safeFormat,
  contextFormat,
  stylize,
  findPattern,
  sectionFormat,
  vsectionFormat,
  composeSections,
  DEFAULT_CONTEXT_FUNCTIONS,
  type FormatContext,
  type FindPatternOptions,
  type SectionFormatOptions,
} from "./api.js";

// Formatter
export {
  SafeFormatter,
  isEmptyValue,
  type FormatterOptions,
  type ResolvedField,
  type StylizeOverrides,
} from "./formatter.js";

// Building blocks
export { tokenize, untokenize, type FieldToken, type TokenizeOptions } from "./tokenizer.js";
export { formatValue, parseFormatSpec, type ParsedFormatSpec } from "./format-spec.js";
export { escapeString, toDisplayString, reprValue } from "./escape.js";
export { lookupField, splitFieldName } from "./lookup.js";
export { resolveStyle, generalizeFieldPath, normalizeFieldPath, isFieldPath } from "./field-path.js";
export {
  applyStyle,
  compileStyle,
  parseStyleToken,
  replaceCustomColors,
  DEFAULT_NEUTRAL_COLOR,
  type StyleToken,
  type CompiledStyle,
} from "./stylize.js";
export { splitSections, type SectionNode } from "./section.js";

// Errors
export {
  FormatError,
  TemplateSyntaxError,
  MissingPositionalArgumentError,
  RecoverableFormatError,
  UnresolvedFieldError,
  LookupFailedError,
  EmptyValueError,
  FormatSpecError,
  ConversionError,
  InvalidExpressionError,
  StyleApplicationError,
  isRecoverable,
} from "./errors.js";

// Types
export type {
  StyleDescriptor,
  StyleRules,
  ColorSource,
  StylizeSettings,
  Evaluator,
  EvaluatorFunction,
  TemplateRenderer,
} from "./types.js";
