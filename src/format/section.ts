/**
 * Section formatting.
 *
 * A template is literal text interleaved with `[...]` sections. A section
 * that references missing (or, by default, empty) data disappears, and
 * so does the text that directly follows it:
 *
 *   sectionFormat("[{series} – ][S{season:02d}][E{episode:02d}][: {title}]",
 *                 { series: "Serial", season: 2, episode: 3, title: "" })
 *     → "Serial – S02E03"
 *
 * Sections nest to any depth. A dropped inner section takes the text
 * after it with it; a failing text drops the section that holds it.
 * Use `%[`, `%]`, `%%` (or `\[`, `\]`, `\%`) for literal brackets and
 * percent signs. `{...}` placeholders are opaque to bracket matching.
 */

import { isRecoverable } from "./errors.js";
import { SafeFormatter } from "./formatter.js";
import type { Evaluator, EvaluatorFunction, StyleRules, StylizeSettings } from "./types.js";
import { getDefaultLogger, type Logger } from "../logging/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SectionNode =
  | { kind: "text"; text: string }
  | { kind: "section"; nodes: SectionNode[] };

export interface SectionFormatOptions {
  /** Keep sections whose values are empty strings. Missing values still drop them. */
  allowEmpty?: boolean;
  evaluator?: Evaluator;
  names?: Record<string, unknown>;
  functions?: Record<string, EvaluatorFunction>;
  styles?: StyleRules;
  stylize?: StylizeSettings;
  /** Color for `[COLOR :name]` tags with no configured name. */
  neutralColor?: string;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Scanning
// ---------------------------------------------------------------------------

const ESCAPABLE = "[]%\\";

const SECTION_ESCAPE_RE = /[%\\]([[\]%\\])/g;

function isEscape(source: string, index: number): boolean {
  const ch = source[index];
  const next = source[index + 1];
  return (ch === "%" || ch === "\\") && next !== undefined && ESCAPABLE.includes(next);
}

/**
 * Index just past the `{...}` placeholder opening at `index`. Doubled
 * braces and a `{` that never closes are single characters.
 */
function skipPlaceholder(source: string, index: number): number {
  if (source[index + 1] === "{") {
    return index + 2;
  }
  let depth = 0;
  for (let i = index; i < source.length; i++) {
    if (source[i] === "{") depth++;
    else if (source[i] === "}" && --depth === 0) return i + 1;
  }
  return index + 1;
}

/**
 * Index of the `]` matching the `[` at `open`, or -1.
 */
function findSectionEnd(source: string, open: number): number {
  let depth = 0;
  let i = open;

  while (i < source.length) {
    const ch = source[i];
    if (isEscape(source, i)) {
      i += 2;
      continue;
    }
    if (ch === "{") {
      i = skipPlaceholder(source, i);
      continue;
    }
    if (ch === "[") {
      depth++;
    } else if (ch === "]" && --depth === 0) {
      return i;
    }
    i++;
  }

  return -1;
}

/**
 * Split a template into alternating text and section nodes. The result
 * always starts and ends with a (possibly empty) text node; section
 * interiors are split recursively. A `[` without a matching `]` is text.
 */
export function splitSections(template: string): SectionNode[] {
  const nodes: SectionNode[] = [];
  let text = "";
  let i = 0;

  while (i < template.length) {
    const ch = template[i];

    if (isEscape(template, i)) {
      text += template.slice(i, i + 2);
      i += 2;
    } else if (ch === "{") {
      const end = skipPlaceholder(template, i);
      text += template.slice(i, end);
      i = end;
    } else if (ch === "[") {
      const end = findSectionEnd(template, i);
      if (end < 0) {
        text += ch;
        i++;
      } else {
        nodes.push({ kind: "text", text });
        nodes.push({ kind: "section", nodes: splitSections(template.slice(i + 1, end)) });
        text = "";
        i = end + 1;
      }
    } else {
      text += ch;
      i++;
    }
  }

  nodes.push({ kind: "text", text });
  return nodes;
}

export function unescapeSectionText(text: string): string {
  return text.replace(SECTION_ESCAPE_RE, "$1");
}

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

function composeNodes(
  nodes: readonly SectionNode[],
  positional: readonly unknown[],
  named: Readonly<Record<string, unknown>>,
  options: SectionFormatOptions,
  logger: Logger
): string | null {
  // Each level gets its own strict formatter.
  const formatter = new SafeFormatter({
    safe: false,
    raiseEmpty: !options.allowEmpty,
    evaluator: options.evaluator,
    names: options.names,
    functions: options.functions,
    styles: options.styles,
    stylize: options.stylize,
    neutralColor: options.neutralColor,
    logger,
  });

  try {
    const parts = nodes.map((node) =>
      node.kind === "text"
        ? formatter.vformat(unescapeSectionText(node.text), positional, named)
        : composeNodes(node.nodes, positional, named, options, logger)
    );

    // A part survives only if it and the part before it both rendered.
    let out = "";
    parts.forEach((part, index) => {
      const previous = index === 0 ? "" : parts[index - 1];
      if (part !== null && previous !== null) {
        out += part;
      }
    });
    return out;
  } catch (err) {
    if (!isRecoverable(err)) throw err;
    logger.debug("Section dropped", { error: err.message });
    return null;
  }
}

/**
 * Strict composition: returns null when the top level itself fails.
 * Errors other than missing/empty/invalid data propagate.
 */
export function composeSections(
  template: string,
  positional: readonly unknown[] = [],
  named: Readonly<Record<string, unknown>> = {},
  options: SectionFormatOptions = {}
): string | null {
  const logger = (options.logger ?? getDefaultLogger()).child({ template });
  return composeNodes(splitSections(template), positional, named, options, logger);
}

/**
 * Format in sections; an empty string when nothing could be rendered.
 */
export function vsectionFormat(
  template: string,
  positional: readonly unknown[],
  named: Readonly<Record<string, unknown>>,
  options: SectionFormatOptions = {}
): string {
  return composeSections(template, positional, named, options) ?? "";
}

/**
 * Format in sections with named arguments first, then positional ones.
 * Sections with missing or empty values vanish with the text after them.
 */
export function sectionFormat(
  template: string,
  named: Readonly<Record<string, unknown>> = {},
  ...positional: unknown[]
): string {
  return vsectionFormat(template, positional, named);
}
