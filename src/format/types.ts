/**
 * Shared types for the formatting engine.
 */

// ---------------------------------------------------------------------------
// Styles
// ---------------------------------------------------------------------------

/**
 * A style as written in a rule table: one style token, or several applied
 * outer-to-inner (the last token wraps the text innermost).
 */
export type StyleDescriptor = string | readonly string[];

/**
 * Field path → style. Held by reference: edits made by the caller are
 * seen on the next format call.
 */
export type StyleRules = Record<string, StyleDescriptor>;

/** Where `[COLOR :name]` markers get their concrete color from. */
export type ColorSource =
  | { kind: "map"; colors: Readonly<Record<string, string>> }
  | { kind: "resolver"; resolve: (name: string) => string };

/**
 * Instance-level stylize defaults. `info` and `extra` are kept by
 * reference and merged with per-call values.
 */
export interface StylizeSettings {
  /** Style used when stylize() is called without one. */
  style?: StyleDescriptor;
  /** Values exposed to template style tokens as `info`. */
  info?: Record<string, unknown>;
  colors?: ColorSource;
  /** Extra named arguments for template style tokens. */
  extra?: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/** A helper callable from evaluated expressions; arguments arrive unvalidated. */
export type EvaluatorFunction = (...args: unknown[]) => unknown;

/**
 * Expression evaluator capability. Consulted only when direct lookup of
 * a non-numeric field fails; throws InvalidExpressionError when the
 * expression cannot be evaluated.
 */
export interface Evaluator {
  evaluate(
    expression: string,
    names: Readonly<Record<string, unknown>>,
    functions: Readonly<Record<string, EvaluatorFunction>>
  ): unknown;
}

/** Renders a nested template; used by template style tokens. */
export interface TemplateRenderer {
  vformat(
    template: string,
    positional: readonly unknown[],
    named: Readonly<Record<string, unknown>>
  ): string;
}
