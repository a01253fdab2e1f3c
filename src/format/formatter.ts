/**
 * Safe formatter.
 *
 * Renders `{field!conversion:spec}` templates, leaving what it cannot
 * resolve in place instead of throwing:
 *
 *   format("{a:!!def} {b}")        → "def {b}"
 *   format("{a + 2}", { a: 42 })    → "44"     (with an evaluator)
 *   format("{n:02d!!0}")            → "00"
 *
 * Field resolution order: direct lookup, then the evaluator (if one is
 * configured), then the literal placeholder `{expr}` marked unknown.
 * After a field is rendered its path is matched against the style rules
 * (see field-path.ts) and the winning style is applied.
 *
 * A formatter keeps no per-call state; everything a call needs travels
 * in a FormatCall value.
 */

import {
  ConversionError,
  EmptyValueError,
  InvalidExpressionError,
  LookupFailedError,
  MissingPositionalArgumentError,
  TemplateSyntaxError,
  UnresolvedFieldError,
} from "./errors.js";
import { asciiRepr, escapeString, reprValue, toDisplayString } from "./escape.js";
import { resolveStyle } from "./field-path.js";
import { formatValue, isFloatType, isIntegerType } from "./format-spec.js";
import { lookupField } from "./lookup.js";
import { applyStyle } from "./stylize.js";
import { tokenize } from "./tokenizer.js";
import type {
  ColorSource,
  Evaluator,
  EvaluatorFunction,
  StyleDescriptor,
  StyleRules,
  StylizeSettings,
  TemplateRenderer,
} from "./types.js";
import { getDefaultLogger, type Logger } from "../logging/index.js";
import { config } from "../config/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FormatterOptions {
  /**
   * When true (default), data problems never throw: unresolved fields stay
   * as placeholders and failing fields render as diagnostics.
   */
  safe?: boolean;
  /** Fallback for fields that direct lookup cannot resolve. */
  evaluator?: Evaluator;
  /** Default names for the evaluator; the call's named args win. */
  names?: Record<string, unknown>;
  /** Functions available to the evaluator. */
  functions?: Record<string, EvaluatorFunction>;
  /** Enable the `!e` (escape) conversion. Default true. */
  escape?: boolean;
  /** Throw EmptyValueError when a field resolves to an empty value. */
  raiseEmpty?: boolean;
  /** Escape newlines inside quoted runs of field expressions. */
  eolEscape?: boolean;
  stylize?: StylizeSettings;
  /** Style rules by field path (kept by reference). */
  styles?: StyleRules;
  logger?: Logger;
  /** Color for unresolvable `[COLOR :name]` markers. */
  neutralColor?: string;
}

/** A field after resolution. */
export interface ResolvedField {
  value: unknown;
  /** True when neither lookup nor evaluation produced a value. */
  unknown: boolean;
  /** Trimmed field expression, matched against the style rules. */
  path: string;
}

export interface StylizeOverrides {
  info?: Record<string, unknown>;
  colors?: ColorSource;
  extra?: Record<string, unknown>;
}

interface FormatCall {
  positional: readonly unknown[];
  named: Readonly<Record<string, unknown>>;
  /** Evaluator namespace: configured names merged with named args. */
  names: Readonly<Record<string, unknown>>;
  numbering: { mode: "auto" | "manual" | null; next: number };
}

/** Nested `{…}` fields inside a spec are rendered, two levels deep at most. */
const MAX_RECURSION = 2;

const DEFAULT_SEPARATOR = "!!";
const NESTED_SPEC_SEPARATOR = "::";

const INT_LITERAL_RE = /^\s*[+-]?\d+(?:_\d+)*\s*$/;
const FLOAT_LITERAL_RE =
  /^\s*[+-]?(?:(?:\d+(?:_\d+)*)?\.?\d+(?:_\d+)*(?:[eE][+-]?\d+)?|\d+(?:_\d+)*\.|inf(?:inity)?|nan)\s*$/i;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isEmptyValue(value: unknown): boolean {
  return value === "" || value === null || value === undefined || (Array.isArray(value) && value.length === 0);
}

function parseIntLiteral(text: string): bigint | null {
  return INT_LITERAL_RE.test(text) ? BigInt(text.trim().replaceAll("_", "")) : null;
}

function parseFloatLiteral(text: string): number | null {
  if (!FLOAT_LITERAL_RE.test(text)) return null;
  const cleaned = text.trim().replaceAll("_", "").toLowerCase();
  const unsigned = cleaned.replace(/^[+-]/, "");
  const negative = cleaned.startsWith("-");
  if (unsigned === "nan") return NaN;
  if (unsigned === "inf" || unsigned === "infinity") return negative ? -Infinity : Infinity;
  return Number(cleaned);
}

function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

// ---------------------------------------------------------------------------
// Formatter
// ---------------------------------------------------------------------------

export class SafeFormatter implements TemplateRenderer {
  readonly safe: boolean;
  readonly raiseEmpty: boolean;
  readonly escape: boolean;
  readonly eolEscape: boolean;
  readonly styles: StyleRules;
  readonly stylizeSettings: StylizeSettings;
  private readonly evaluator: Evaluator | undefined;
  private readonly names: Record<string, unknown> | undefined;
  private readonly functions: Record<string, EvaluatorFunction>;
  private readonly logger: Logger;
  private readonly neutralColor: string;
  private styleRenderer: SafeFormatter | null = null;

  constructor(options: FormatterOptions = {}) {
    this.safe = options.safe ?? true;
    this.raiseEmpty = options.raiseEmpty ?? false;
    this.escape = options.escape ?? true;
    this.eolEscape = options.eolEscape ?? false;
    this.styles = options.styles ?? {};
    this.stylizeSettings = options.stylize ?? {};
    this.evaluator = options.evaluator;
    this.names = options.names;
    this.functions = options.functions ?? {};
    this.logger = options.logger ?? getDefaultLogger();
    this.neutralColor = options.neutralColor ?? config.neutralColor;
  }

  /**
   * Format with named arguments first, then positional ones.
   */
  format(template: string, named: Readonly<Record<string, unknown>> = {}, ...positional: unknown[]): string {
    return this.vformat(template, positional, named);
  }

  /**
   * Format a template.
   *
   * In safe mode a failure of the call as a whole is logged and the text
   * rendered up to that point is returned. Template syntax errors and
   * missing positional arguments always propagate.
   */
  vformat(
    template: string,
    positional: readonly unknown[],
    named: Readonly<Record<string, unknown>>
  ): string {
    const call = this.createCall(positional, named);
    const out: string[] = [];

    try {
      this.render(template, call, out, MAX_RECURSION, true);
      return out.join("");
    } catch (err) {
      if (!this.safe || err instanceof TemplateSyntaxError || err instanceof MissingPositionalArgumentError) {
        throw err;
      }
      this.logger.error("Formatting failed", { template, error: describeError(err) });
      return out.join("");
    }
  }

  /**
   * Resolve one field expression against the given arguments.
   */
  resolveField(
    fieldExpr: string,
    positional: readonly unknown[] = [],
    named: Readonly<Record<string, unknown>> = {}
  ): ResolvedField {
    return this.resolve(fieldExpr, this.createCall(positional, named));
  }

  /**
   * Apply a conversion: `s` display, `r` repr, `a` ASCII repr, `e` escape.
   *
   * @throws ConversionError for any other conversion
   */
  convert(value: unknown, conversion: string | null): unknown {
    if (conversion === null) {
      return value;
    }
    switch (conversion) {
      case "s":
        return toDisplayString(value);
      case "r":
        return reprValue(value);
      case "a":
        return asciiRepr(value);
      case "e":
        if (this.escape) return escapeString(toDisplayString(value));
        break;
    }
    throw new ConversionError(conversion);
  }

  /**
   * Render a resolved field with a format spec, honoring the
   * `spec!!default` and `spec!!value::nestedSpec` fallbacks. No styling.
   */
  applyFormatSpec(field: ResolvedField, formatSpec: string): string {
    const { value, spec } = this.prepareSpec(field, formatSpec);
    return formatValue(value, spec);
  }

  /**
   * applyFormatSpec() followed by the style cascade.
   */
  formatField(field: ResolvedField, formatSpec: string): string {
    const { value, spec } = this.prepareSpec(field, formatSpec);

    try {
      const text = formatValue(value, spec);
      const style = resolveStyle(field.path, this.styles);
      return style === undefined ? text : this.stylize(text, style);
    } catch (err) {
      if (this.safe) {
        this.logger.debug("Field failed", { field: field.path, spec: formatSpec, error: describeError(err) });
        return `{${reprValue(value)}:${reprValue(formatSpec)}}`;
      }
      throw err;
    }
  }

  /**
   * Decorate text with a style, merging the instance stylize settings with
   * per-call overrides (the call wins).
   */
  stylize(text: string, style?: StyleDescriptor, overrides: StylizeOverrides = {}): string {
    const settings = this.stylizeSettings;

    let info = overrides.info;
    if (settings.info !== undefined) {
      info = info === undefined ? settings.info : { ...settings.info, ...info };
    }

    let extra = overrides.extra;
    if (settings.extra !== undefined) {
      extra = { ...settings.extra, ...extra };
    }

    return applyStyle(text, style ?? settings.style, {
      renderer: this.getStyleRenderer(),
      info,
      extra,
      colors: mergeColors(settings.colors, overrides.colors),
      logger: this.logger,
      neutralColor: this.neutralColor,
    });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private createCall(positional: readonly unknown[], named: Readonly<Record<string, unknown>>): FormatCall {
    return {
      positional,
      named,
      names: this.names === undefined ? named : { ...this.names, ...named },
      numbering: { mode: null, next: 0 },
    };
  }

  private render(template: string, call: FormatCall, out: string[], depth: number, styled: boolean): void {
    if (depth < 0) {
      throw new TemplateSyntaxError("Max string recursion exceeded");
    }

    for (const token of tokenize(template, { eolEscape: this.eolEscape })) {
      out.push(token.literalText);
      if (token.fieldExpr === null) continue;

      const field = this.resolve(this.numberField(token.fieldExpr, call), call);
      const converted: ResolvedField = field.unknown
        ? field
        : { ...field, value: this.convert(field.value, token.conversion) };

      let spec = token.formatSpec ?? "";
      if (spec.includes("{")) {
        const nested: string[] = [];
        this.render(spec, call, nested, depth - 1, false);
        spec = nested.join("");
      }

      out.push(styled ? this.formatField(converted, spec) : this.applyFormatSpec(converted, spec));
    }
  }

  /** Automatic (`{}`) and manual (`{0}`) numbering cannot be mixed. */
  private numberField(fieldExpr: string, call: FormatCall): string {
    const numbering = call.numbering;
    if (fieldExpr === "") {
      if (numbering.mode === "manual") {
        throw new TemplateSyntaxError("Cannot switch from manual field numbering to automatic field numbering");
      }
      numbering.mode = "auto";
      return String(numbering.next++);
    }
    if (/^\d+$/.test(fieldExpr)) {
      if (numbering.mode === "auto") {
        throw new TemplateSyntaxError("Cannot switch from automatic field numbering to manual field numbering");
      }
      numbering.mode = "manual";
    }
    return fieldExpr;
  }

  private resolve(fieldExpr: string, call: FormatCall): ResolvedField {
    const path = fieldExpr.trim();
    let value: unknown;

    try {
      value = lookupField(fieldExpr, call.positional, call.named);
    } catch (err) {
      if (!(err instanceof LookupFailedError)) throw err;
      if (/^\d+$/.test(fieldExpr)) {
        throw new MissingPositionalArgumentError(parseInt(fieldExpr, 10));
      }

      const evaluated = this.evaluate(fieldExpr, call);
      if (!evaluated.ok) {
        return { value: `{${fieldExpr}}`, unknown: true, path };
      }
      value = evaluated.value;
    }

    if (this.raiseEmpty && isEmptyValue(value)) {
      throw new EmptyValueError(path);
    }
    return { value, unknown: false, path };
  }

  private evaluate(fieldExpr: string, call: FormatCall): { ok: true; value: unknown } | { ok: false } {
    if (this.evaluator === undefined) {
      return { ok: false };
    }
    try {
      return { ok: true, value: this.evaluator.evaluate(fieldExpr, call.names, this.functions) };
    } catch (err) {
      if (err instanceof InvalidExpressionError) {
        return { ok: false };
      }
      throw err;
    }
  }

  private prepareSpec(field: ResolvedField, formatSpec: string): { value: unknown; spec: string } {
    const separator = formatSpec.indexOf(DEFAULT_SEPARATOR);
    const primary = separator < 0 ? formatSpec : formatSpec.slice(0, separator);

    if (!field.unknown) {
      return { value: field.value, spec: primary };
    }
    if (separator < 0) {
      if (!this.safe) throw new UnresolvedFieldError(field.path);
      return { value: field.value, spec: primary };
    }

    const fallback = formatSpec.slice(separator + DEFAULT_SEPARATOR.length);
    const nested = fallback.indexOf(NESTED_SPEC_SEPARATOR);
    if (nested >= 0) {
      return {
        value: fallback.slice(0, nested),
        spec: fallback.slice(nested + NESTED_SPEC_SEPARATOR.length),
      };
    }

    // An empty primary spec also takes the integer path.
    const type = primary.slice(-1);
    if (type === "" || isIntegerType(type)) {
      const parsed = parseIntLiteral(fallback);
      return parsed === null ? { value: fallback, spec: "s" } : { value: parsed, spec: primary };
    }
    if (isFloatType(type)) {
      const parsed = parseFloatLiteral(fallback);
      return parsed === null ? { value: fallback, spec: "s" } : { value: parsed, spec: primary };
    }
    return { value: fallback, spec: primary };
  }

  /** Template style tokens render without style rules, so a style cannot restyle itself. */
  private getStyleRenderer(): SafeFormatter {
    if (this.styleRenderer === null) {
      this.styleRenderer = new SafeFormatter({
        evaluator: this.evaluator,
        names: this.names,
        functions: this.functions,
        escape: this.escape,
        logger: this.logger,
        neutralColor: this.neutralColor,
      });
    }
    return this.styleRenderer;
  }
}

function mergeColors(base: ColorSource | undefined, override: ColorSource | undefined): ColorSource | undefined {
  if (base === undefined) return override;
  if (override === undefined) return base;
  if (base.kind === "resolver") {
    // A configured resolver is kept unless the call brings its own.
    return override.kind === "resolver" ? override : base;
  }
  if (override.kind === "map") {
    return { kind: "map", colors: { ...base.colors, ...override.colors } };
  }
  return override;
}
