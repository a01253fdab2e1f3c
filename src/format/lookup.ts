/**
 * Direct structured lookup of a field against the call's arguments.
 *
 *   {0}            positional argument 0
 *   {series}       named argument
 *   {info.season}  attribute chain
 *   {cast[0]}      index (digits → numeric index)
 *   {c["y"]}       quoted key
 */

import { LookupFailedError } from "./errors.js";

export type FieldKey = string | number;

export interface FieldName {
  first: FieldKey;
  rest: FieldKey[];
}

const DIGITS_RE = /^\d+$/;

function toKey(raw: string): FieldKey {
  const trimmed = raw.trim();
  if (DIGITS_RE.test(trimmed)) {
    return parseInt(trimmed, 10);
  }
  const quoted = /^(["'])(.*)\1$/s.exec(trimmed);
  return quoted ? quoted[2] : trimmed;
}

/**
 * Split `first(.attr|[key])*`. Returns null when the expression is not a
 * plain chain (e.g. an arithmetic expression for the evaluator).
 */
export function splitFieldName(expr: string): FieldName | null {
  const headEnd = expr.search(/[.[]|$/);
  const head = expr.slice(0, headEnd).trim();
  const first: FieldKey = DIGITS_RE.test(head) ? parseInt(head, 10) : head;
  const rest: FieldKey[] = [];

  let i = headEnd;
  while (i < expr.length) {
    if (expr[i] === ".") {
      const end = expr.slice(i + 1).search(/[.[]|$/) + i + 1;
      const name = expr.slice(i + 1, end).trim();
      if (!/^[^\s\]]+$/.test(name)) return null;
      rest.push(name);
      i = end;
    } else if (expr[i] === "[") {
      const end = expr.indexOf("]", i);
      if (end < 0) return null;
      rest.push(toKey(expr.slice(i + 1, end)));
      i = end + 1;
      if (i < expr.length && expr[i] !== "." && expr[i] !== "[" && expr.slice(i).trim() !== "") {
        return null;
      }
      if (expr.slice(i).trim() === "") break;
    } else {
      return null;
    }
  }

  return { first, rest };
}

function getMember(target: unknown, key: FieldKey): unknown {
  if (target === null || target === undefined) {
    return undefined;
  }

  if (target instanceof Map) {
    return target.has(key) ? target.get(key) : target.get(String(key));
  }

  if (typeof key === "number" && (Array.isArray(target) || typeof target === "string")) {
    return key < target.length ? target[key] : undefined;
  }

  const boxed: object = Object(target);
  const prop = String(key);
  if (!(prop in boxed)) {
    return undefined;
  }
  if (prop in Object.prototype && !Object.prototype.hasOwnProperty.call(boxed, prop)) {
    return undefined;
  }
  const value: unknown = Reflect.get(boxed, prop);
  return value;
}

/**
 * Resolve a field chain against positional and named arguments.
 *
 * @throws LookupFailedError when any step is missing (undefined)
 */
export function lookupField(
  expr: string,
  positional: readonly unknown[],
  named: Readonly<Record<string, unknown>>
): unknown {
  const name = splitFieldName(expr);
  if (name === null) {
    throw new LookupFailedError(expr, expr);
  }

  let value: unknown;
  if (typeof name.first === "number") {
    value = name.first < positional.length ? positional[name.first] : undefined;
  } else {
    value = Object.prototype.hasOwnProperty.call(named, name.first) ? named[name.first] : undefined;
  }
  if (value === undefined) {
    throw new LookupFailedError(expr, name.first);
  }

  for (const key of name.rest) {
    value = getMember(value, key);
    if (value === undefined) {
      throw new LookupFailedError(expr, key);
    }
  }

  return value;
}
