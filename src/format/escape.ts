/**
 * String escaping and value display helpers.
 */

/** Escape table used by the `!e` conversion. */
const ESCAPE_TABLE: Readonly<Record<string, string>> = {
  "\\": "\\\\",
  "'": "\\'",
  '"': '\\"',
  "\x07": "\\a",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\v": "\\v",
  "\0": "\\0",
};

/**
 * Escape a string, e.g. a tab becomes the two characters `\t`.
 */
export function escapeString(text: string): string {
  let out = "";
  for (const ch of text) {
    out += ESCAPE_TABLE[ch] ?? ch;
  }
  return out;
}

/**
 * Display form of a value, used when a field is rendered without a
 * format type or through the `!s` conversion.
 */
export function toDisplayString(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === null || value === undefined) return "";
  if (Array.isArray(value)) {
    return value.map((item) => toDisplayString(item)).join(", ");
  }
  if (value instanceof Map) {
    return JSON.stringify(Object.fromEntries(value));
  }
  if (typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Quoted, escaped form of a value (the `!r` conversion). Strings are
 * single-quoted; everything else uses its display form.
 */
export function reprValue(value: unknown): string {
  if (typeof value === "string") {
    return `'${escapeString(value).replaceAll('\\"', '"')}'`;
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => reprValue(item)).join(", ")}]`;
  }
  return toDisplayString(value);
}

/** repr with every non-ASCII character escaped (the `!a` conversion). */
export function asciiRepr(value: unknown): string {
  return reprValue(value).replace(/[^\x00-\x7f]/gu, (ch) => {
    const code = ch.codePointAt(0) ?? 0;
    if (code <= 0xff) return `\\x${code.toString(16).padStart(2, "0")}`;
    if (code <= 0xffff) return `\\u${code.toString(16).padStart(4, "0")}`;
    return `\\U${code.toString(16).padStart(8, "0")}`;
  });
}
