/**
 * Stylizer: decorates rendered text according to a style descriptor and
 * resolves custom color markers.
 *
 * Style tokens, by shape:
 *
 *   "B", "COLOR red"   markup tag      → [B]text[/B], [COLOR red]text[/COLOR]
 *   "[]"               bracket pair    → [\u200btext\u200b] (zero-width spaces keep it
 *                                          from reading as a markup tag)
 *   "()", "|"          bracket pair    → (text), |text|
 *   "{text} ({info.year})"
 *                      nested template → rendered with the text and info
 *
 * A list of tokens wraps outer-to-inner: ["B", "()"] gives [B](text)[/B].
 */

import { StyleApplicationError } from "./errors.js";
import type { ColorSource, StyleDescriptor, TemplateRenderer } from "./types.js";
import type { Logger } from "../logging/index.js";

// ---------------------------------------------------------------------------
// Style tokens
// ---------------------------------------------------------------------------

export type StyleToken =
  | { kind: "none" }
  | { kind: "markup"; tag: string; name: string }
  | { kind: "zero-width-bracket" }
  | { kind: "bracket"; open: string; close: string }
  | { kind: "template"; template: string };

export type CompiledStyle =
  | { kind: "single"; token: StyleToken }
  | { kind: "sequence"; tokens: readonly StyleToken[] };

const ZERO_WIDTH_SPACE = "\u200b";

/** Custom color marker: `[COLOR :name]`. */
const CUSTOM_COLOR_RE = /\[COLOR +:(\w+)\]/g;

export const DEFAULT_NEUTRAL_COLOR = "gray";

export function parseStyleToken(raw: string): StyleToken {
  if (raw === "") {
    return { kind: "none" };
  }
  if (/^\p{L}/u.test(raw)) {
    return { kind: "markup", tag: raw, name: raw.split(/\s+/, 1)[0] };
  }
  if (raw === "[]") {
    return { kind: "zero-width-bracket" };
  }
  const chars = [...raw];
  if (chars.length <= 2) {
    return { kind: "bracket", open: chars[0], close: chars[chars.length - 1] };
  }
  return { kind: "template", template: raw };
}

export function compileStyle(style: StyleDescriptor): CompiledStyle {
  if (typeof style === "string") {
    return { kind: "single", token: parseStyleToken(style) };
  }
  return { kind: "sequence", tokens: style.map((raw) => parseStyleToken(raw)) };
}

// ---------------------------------------------------------------------------
// Application
// ---------------------------------------------------------------------------

export interface ApplyStyleOptions {
  /** Renders template tokens. */
  renderer: TemplateRenderer;
  info?: Record<string, unknown>;
  colors?: ColorSource;
  extra?: Record<string, unknown>;
  logger?: Logger;
  neutralColor?: string;
}

function wrap(text: string, token: StyleToken, options: ApplyStyleOptions): string {
  switch (token.kind) {
    case "none":
      return text;
    case "markup":
      return `[${token.tag}]${text}[/${token.name}]`;
    case "zero-width-bracket":
      return `[${ZERO_WIDTH_SPACE}${text}${ZERO_WIDTH_SPACE}]`;
    case "bracket":
      return `${token.open}${text}${token.close}`;
    case "template":
      return options.renderer.vformat(token.template, [text], {
        ...options.extra,
        text,
        info: options.info ?? {},
      });
  }
}

/**
 * Apply a style (innermost token first), then resolve custom colors.
 *
 * @throws StyleApplicationError if `text` is not a string
 */
export function applyStyle(
  text: string,
  style: StyleDescriptor | undefined,
  options: ApplyStyleOptions
): string {
  let result = text;

  if (style !== undefined) {
    const compiled = compileStyle(style);
    const tokens = compiled.kind === "single" ? [compiled.token] : compiled.tokens;
    for (let i = tokens.length - 1; i >= 0; i--) {
      result = wrap(result, tokens[i], options);
    }
  }

  return replaceCustomColors(result, options.colors, options);
}

/**
 * Replace `[COLOR :name]` markers with concrete `[COLOR value]` tags.
 */
export function replaceCustomColors(
  text: unknown,
  colors: ColorSource | undefined,
  options: { logger?: Logger; neutralColor?: string } = {}
): string {
  if (typeof text !== "string") {
    const error = new StyleApplicationError(text === null ? "null" : typeof text);
    options.logger?.error(error.message);
    throw error;
  }

  const neutral = options.neutralColor ?? DEFAULT_NEUTRAL_COLOR;

  return text.replace(CUSTOM_COLOR_RE, (_match, name: string) => {
    if (colors === undefined) {
      options.logger?.error(`No color source to resolve [COLOR :${name}]`, { neutral });
      return `[COLOR ${neutral}]`;
    }
    if (colors.kind === "resolver") {
      return `[COLOR ${colors.resolve(name)}]`;
    }
    return `[COLOR ${Object.prototype.hasOwnProperty.call(colors.colors, name) ? colors.colors[name] : neutral}]`;
  });
}
