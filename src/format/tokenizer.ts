/**
 * Field tokenizer.
 *
 * Splits a template into `(literalText, fieldExpr, formatSpec, conversion)`
 * tokens, the same shape a standard placeholder parser produces, with two
 * extensions inside a field:
 *
 *   - nested braces:  {", ".join(f"({x})" for x in hosts)}
 *   - quoted strings: {"a:b}"}  (delimiters inside quotes are content)
 *
 * Doubled braces `{{` / `}}` outside of a field are literal braces.
 */

import { TemplateSyntaxError } from "./errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FieldToken {
  /** Literal text preceding the field. */
  literalText: string;
  /** Field expression; null for the trailing literal-only token. */
  fieldExpr: string | null;
  formatSpec: string | null;
  conversion: string | null;
}

export interface TokenizeOptions {
  /** Rewrite newlines inside quoted runs as `\n` escapes. */
  eolEscape?: boolean;
}

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

/** Quoted run: `"""…"""`, `"…"`, `'''…'''` or `'…'`, backslash escapes honored. */
export const QUOTE_SOURCE =
  `"""(?:\\\\.|.)*?"""|"(?:\\\\.|.)*?"|'''(?:\\\\.|.)*?'''|'(?:\\\\.|.)*?'`;

const QUOTE_RE = new RegExp(QUOTE_SOURCE, "sy");

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

type Slot = "literalText" | "fieldExpr" | "formatSpec" | "conversion";

function emptyToken(): FieldToken {
  return { literalText: "", fieldExpr: null, formatSpec: null, conversion: null };
}

function append(token: FieldToken, slot: Slot, text: string): void {
  token[slot] = (token[slot] ?? "") + text;
}

/**
 * Tokenize a template lazily.
 *
 * @throws TemplateSyntaxError on a lone `}` or an unterminated `{`
 */
export function* tokenize(
  template: string,
  options: TokenizeOptions = {}
): Generator<FieldToken, void, undefined> {
  let level = 0;
  let slot: Slot = "literalText";
  let token = emptyToken();

  for (let i = 0; i < template.length; i++) {
    const ch = template[i];

    if (level === 0 && (ch === "{" || ch === "}") && template[i + 1] === ch) {
      append(token, slot, ch);
      i++;
    } else if (ch === "{") {
      if (level === 0) {
        slot = "fieldExpr";
        token.fieldExpr = "";
        token.formatSpec = "";
      } else {
        append(token, slot, ch);
      }
      level++;
    } else if (ch === "}") {
      level--;
      if (level < 0) {
        throw new TemplateSyntaxError("Unbalanced closing delimiter '}'", i);
      }
      if (level === 0) {
        yield token;
        slot = "literalText";
        token = emptyToken();
      } else {
        append(token, slot, ch);
      }
    } else if (level === 1 && ch === "!" && slot === "fieldExpr") {
      slot = "conversion";
      token.conversion = "";
    } else if (level === 1 && ch === ":" && (slot === "fieldExpr" || slot === "conversion")) {
      slot = "formatSpec";
      token.formatSpec = "";
    } else {
      const quoted = level > 0 && (ch === '"' || ch === "'") ? matchQuote(template, i) : null;
      if (quoted !== null) {
        append(token, slot, options.eolEscape ? quoted.replaceAll("\n", "\\n") : quoted);
        i += quoted.length - 1;
      } else {
        append(token, slot, ch);
      }
    }
  }

  if (level !== 0) {
    throw new TemplateSyntaxError("Unterminated delimiter '{'", template.length);
  }
  if (token.literalText !== "" || token.fieldExpr !== null) {
    yield token;
  }
}

function matchQuote(source: string, index: number): string | null {
  QUOTE_RE.lastIndex = index;
  const match = QUOTE_RE.exec(source);
  return match ? match[0] : null;
}

/**
 * Inverse of tokenize(): rebuild template text from tokens.
 */
export function untokenize(tokens: Iterable<FieldToken>): string {
  let out = "";
  for (const token of tokens) {
    out += token.literalText.replaceAll("{", "{{").replaceAll("}", "}}");
    if (token.fieldExpr === null) continue;
    out += `{${token.fieldExpr}`;
    if (token.conversion !== null) out += `!${token.conversion}`;
    if (token.formatSpec) out += `:${token.formatSpec}`;
    out += "}";
  }
  return out;
}
