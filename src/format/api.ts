/**
 * Public formatting entry points.
 */

import { SafeFormatter, type StylizeOverrides } from "./formatter.js";
import type { Evaluator, EvaluatorFunction, StyleDescriptor } from "./types.js";

export { sectionFormat, vsectionFormat, composeSections, type SectionFormatOptions } from "./section.js";

/**
 * Safe format: unresolved fields stay as `{placeholders}`.
 *
 *   safeFormat("{a} and {b}", { a: 1 })  → "1 and {b}"
 */
export function safeFormat(
  template: string,
  named: Readonly<Record<string, unknown>> = {},
  ...positional: unknown[]
): string {
  return new SafeFormatter().vformat(template, positional, named);
}

// ---------------------------------------------------------------------------
// Context formatting
// ---------------------------------------------------------------------------

/**
 * Ambient names for contextFormat(). Scopes are ordered outer to inner;
 * an inner scope shadows an outer one.
 */
export interface FormatContext {
  scopes?: readonly Readonly<Record<string, unknown>>[];
  /** Number of innermost scopes to skip. */
  depth?: number;
  /** Functions for the evaluator, on top of the defaults. */
  functions?: Record<string, EvaluatorFunction>;
  evaluator?: Evaluator;
}

function ownKeys(value: unknown): string[] {
  if (value instanceof Map) {
    return [...value.keys()].map(String);
  }
  return value !== null && typeof value === "object" ? Object.keys(value) : [];
}

function ownEntries(value: unknown): Record<string, unknown> {
  if (value instanceof Map) {
    return Object.fromEntries([...value.entries()].map(([k, v]: [unknown, unknown]) => [String(k), v]));
  }
  return value !== null && typeof value === "object" ? Object.fromEntries(Object.entries(value)) : {};
}

/** Helpers every context format call can use. */
export const DEFAULT_CONTEXT_FUNCTIONS: Readonly<Record<string, EvaluatorFunction>> = {
  str: (value: unknown) => String(value),
  keys: ownKeys,
  vars: ownEntries,
};

/**
 * Format against a chain of scopes plus explicit arguments (which win).
 */
export function contextFormat(
  template: string,
  context: FormatContext,
  named: Readonly<Record<string, unknown>> = {},
  ...positional: unknown[]
): string {
  const scopes = context.scopes ?? [];
  const visible = scopes.slice(0, Math.max(0, scopes.length - (context.depth ?? 0)));
  const data = visible.reduce<Record<string, unknown>>((merged, scope) => ({ ...merged, ...scope }), {});
  Object.assign(data, named);

  const formatter = new SafeFormatter({
    evaluator: context.evaluator,
    functions: { ...DEFAULT_CONTEXT_FUNCTIONS, ...context.functions },
  });
  return formatter.vformat(template, positional, data);
}

// ---------------------------------------------------------------------------
// Styling
// ---------------------------------------------------------------------------

let styleFormatter: SafeFormatter | null = null;

/**
 * Decorate text with a style and resolve `[COLOR :name]` markers.
 *
 *   stylize("Title", ["B", "()"])  → "[B](Title)[/B]"
 */
export function stylize(text: string, style?: StyleDescriptor, options: StylizeOverrides = {}): string {
  if (styleFormatter === null) {
    styleFormatter = new SafeFormatter();
  }
  return styleFormatter.stylize(text, style, options);
}

// ---------------------------------------------------------------------------
// Pattern search
// ---------------------------------------------------------------------------

export interface FindPatternOptions {
  /** RegExp flags, used when the pattern is a string. */
  flags?: string;
  /** With several groups, return all of them (default) or only the first. */
  many?: boolean;
}

/**
 * Search text for a pattern.
 *
 * Without capture groups the whole match is returned; with one group, that
 * group; with several, all groups (or the first one when `many` is false).
 * A group that did not participate yields `defaultValue`, and so does no
 * match at all.
 */
export function findPattern(
  pattern: string | RegExp,
  text: string,
  defaultValue = "",
  options: FindPatternOptions = {}
): string | string[] {
  const re = typeof pattern === "string" ? new RegExp(pattern, options.flags) : pattern;
  // Search from the start regardless of a global regex's lastIndex.
  const match = new RegExp(re.source, re.flags.replace(/[gy]/g, "")).exec(text);
  if (match === null) {
    return defaultValue;
  }

  const groups = match.slice(1).map((group) => group ?? defaultValue);
  if (groups.length === 0) {
    return match[0];
  }
  if (groups.length === 1 || options.many === false) {
    return groups[0];
  }
  return groups;
}
