/**
 * Field paths and the style cascade.
 *
 * A field path is `identifier ('.' identifier | '[' index ']')* ('.*' | '[*]')?`
 * where an index is a bare word or a quoted string. The cascade looks for
 * a style from the most specific path upward:
 *
 *   c.z[0]  →  c.z[*]  →  c.*  →  *
 */

import { QUOTE_SOURCE } from "./tokenizer.js";
import type { StyleDescriptor, StyleRules } from "./types.js";

const IDENT_RE = /[\p{L}_][\p{L}\p{N}_]*/uy;
const PART_RE = new RegExp(
  `\\.[\\p{L}_][\\p{L}\\p{N}_]*|\\[\\s*[\\p{L}\\p{N}_]+\\s*\\]|\\[\\s*(?:${QUOTE_SOURCE})\\s*\\]`,
  "suy"
);
const WILDCARD_RE = /\.\*|\[\*\]/y;

const QUOTED_RE =
  /"""((?:\\.|.)*?)"""|"((?:\\.|.)*?)"|'''((?:\\.|.)*?)'''|'((?:\\.|.)*?)'/gs;

export const WILDCARD = "*";

interface PathPart {
  start: number;
  kind: "attribute" | "index";
}

/**
 * Split a path into its trailing parts, or null when it is not a field path.
 */
function splitFieldPath(path: string): PathPart[] | null {
  IDENT_RE.lastIndex = 0;
  if (!IDENT_RE.exec(path)) return null;

  const parts: PathPart[] = [];
  let index = IDENT_RE.lastIndex;

  for (;;) {
    PART_RE.lastIndex = index;
    const match = PART_RE.exec(path);
    if (!match) break;
    parts.push({ start: index, kind: match[0].startsWith("[") ? "index" : "attribute" });
    index = PART_RE.lastIndex;
  }

  WILDCARD_RE.lastIndex = index;
  if (WILDCARD_RE.exec(path)) {
    index = WILDCARD_RE.lastIndex;
  }

  return index === path.length ? parts : null;
}

export function isFieldPath(path: string): boolean {
  return splitFieldPath(path) !== null;
}

/**
 * Strip the quotes from quoted indexes: `c["y"]` → `c[y]`.
 */
export function normalizeFieldPath(path: string): string {
  return path.replace(
    QUOTED_RE,
    (_match, q1?: string, q2?: string, q3?: string, q4?: string) => q1 ?? q2 ?? q3 ?? q4 ?? ""
  );
}

/**
 * One cascade step: replace the last index with `[*]` or the last
 * attribute with `.*`; a bare identifier generalizes to `*`.
 * Returns null for `*` and for strings outside the field-path grammar.
 */
export function generalizeFieldPath(path: string): string | null {
  if (path === WILDCARD) return null;

  const parts = splitFieldPath(path);
  if (parts === null) return null;

  if (parts.length === 0) return WILDCARD;

  const last = parts[parts.length - 1];
  const head = path.slice(0, last.start);
  return last.kind === "index" ? `${head}[*]` : `${head}.*`;
}

function lookupStyle(rules: StyleRules, path: string): StyleDescriptor | undefined {
  return Object.prototype.hasOwnProperty.call(rules, path) ? rules[path] : undefined;
}

/**
 * Find the style for a field path, walking the cascade.
 */
export function resolveStyle(fieldPath: string, rules: StyleRules): StyleDescriptor | undefined {
  let current: string | null = fieldPath.trim();
  let previous: string | null = null;

  while (current) {
    // The cascade must always advance.
    if (current === previous) break;
    previous = current;

    const style = lookupStyle(rules, current) ?? lookupStyle(rules, normalizeFieldPath(current));
    if (style !== undefined) return style;

    current = generalizeFieldPath(current);
  }

  return undefined;
}
