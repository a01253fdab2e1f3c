/**
 * Format-spec mini-language.
 *
 *   [[fill]align][sign][z][#][0][width][grouping][.precision][type]
 *
 * Integer types: b c d n o x X (numbers without a fraction, bigints,
 * booleans). Float types: e E f F g G n %. String type: s. An empty spec
 * renders the value's display string.
 */

import { FormatSpecError } from "./errors.js";
import { toDisplayString } from "./escape.js";

export type Align = "<" | ">" | "=" | "^";

export interface ParsedFormatSpec {
  fill: string | null;
  align: Align | null;
  sign: "+" | "-" | " " | null;
  /** Coerce negative zero to positive zero (`z`). */
  coerceZero: boolean;
  /** Alternate form (`#`): base prefixes, kept decimal point. */
  alternate: boolean;
  zeroPad: boolean;
  width: number | null;
  grouping: "," | "_" | null;
  precision: number | null;
  type: string | null;
}

const SPEC_RE =
  /^(?:(.)?([<>=^]))?([-+ ])?(z)?(#)?(0)?(\d+)?([_,])?(?:\.(\d+))?([bcdeEfFgGnosxX%])?$/su;

const INT_TYPES = new Set(["b", "c", "d", "n", "o", "x", "X"]);
const FLOAT_TYPES = new Set(["e", "E", "f", "F", "g", "G", "n", "%"]);

/** Upper bound on width and precision; larger values would only build huge strings. */
export const MAX_SPEC_SIZE = 10_000;

/** Trailing spec characters that coerce a `!!` default to an integer. */
export function isIntegerType(type: string): boolean {
  return type.length === 1 && "bcdoxX".includes(type);
}

/** Trailing spec characters that coerce a `!!` default to a float. */
export function isFloatType(type: string): boolean {
  return type.length === 1 && "eEfFgG".includes(type);
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function parseFormatSpec(spec: string): ParsedFormatSpec {
  const match = SPEC_RE.exec(spec);
  if (!match) {
    throw new FormatSpecError(spec, "does not match [[fill]align][sign][z][#][0][width][grouping][.precision][type]");
  }
  const [, fill, align, sign, z, alt, zero, width, grouping, precision, type] = match;
  const widthValue = width !== undefined ? parseInt(width, 10) : null;
  const precisionValue = precision !== undefined ? parseInt(precision, 10) : null;
  if ((widthValue ?? 0) > MAX_SPEC_SIZE || (precisionValue ?? 0) > MAX_SPEC_SIZE) {
    throw new FormatSpecError(spec, `width and precision must not exceed ${MAX_SPEC_SIZE}`);
  }

  return {
    fill: fill ?? null,
    align: parseAlign(align),
    sign: sign === "+" || sign === "-" || sign === " " ? sign : null,
    coerceZero: z !== undefined,
    alternate: alt !== undefined,
    zeroPad: zero !== undefined,
    width: widthValue,
    grouping: grouping === "," || grouping === "_" ? grouping : null,
    precision: precisionValue,
    type: type ?? null,
  };
}

function parseAlign(align: string | undefined): Align | null {
  switch (align) {
    case "<":
    case ">":
    case "=":
    case "^":
      return align;
    default:
      return null;
  }
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/**
 * Render a value according to a format spec.
 *
 * @throws FormatSpecError for malformed specs or a type the value cannot take
 */
export function formatValue(value: unknown, spec: string): string {
  if (spec === "") {
    return toDisplayString(value);
  }

  const parsed = parseFormatSpec(spec);
  const type = parsed.type;

  if (typeof value === "bigint") {
    return formatNumeric(value, parsed, spec);
  }

  if (typeof value === "number") {
    if (Number.isInteger(value) && (type === null || INT_TYPES.has(type))) {
      return formatInteger(BigInt(value), parsed, spec);
    }
    return formatNumeric(value, parsed, spec);
  }

  if (typeof value === "boolean" && type !== null && type !== "s") {
    return formatNumeric(value ? 1n : 0n, parsed, spec);
  }

  if (type !== null && type !== "s") {
    throw new FormatSpecError(spec, `unknown format code '${type}' for a ${describeType(value)}`);
  }

  return formatString(toDisplayString(value), parsed, spec);
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function formatNumeric(value: number | bigint, parsed: ParsedFormatSpec, spec: string): string {
  const type = parsed.type;
  if (typeof value === "bigint") {
    if (type === null || INT_TYPES.has(type)) {
      return formatInteger(value, parsed, spec);
    }
    if (!FLOAT_TYPES.has(type)) {
      throw new FormatSpecError(spec, `unknown format code '${type}' for an integer`);
    }
    return formatFloat(Number(value), parsed, spec);
  }
  if (type !== null && !FLOAT_TYPES.has(type)) {
    throw new FormatSpecError(spec, `unknown format code '${type}' for a float`);
  }
  return formatFloat(value, parsed, spec);
}

function formatString(text: string, parsed: ParsedFormatSpec, spec: string): string {
  if (parsed.sign !== null) {
    throw new FormatSpecError(spec, "sign not allowed in string format specifier");
  }
  if (parsed.alternate) {
    throw new FormatSpecError(spec, "alternate form (#) not allowed in string format specifier");
  }
  if (parsed.align === "=") {
    throw new FormatSpecError(spec, "'=' alignment not allowed in string format specifier");
  }
  if (parsed.grouping !== null) {
    throw new FormatSpecError(spec, `cannot specify '${parsed.grouping}' with 's'`);
  }

  let body = text;
  if (parsed.precision !== null) {
    body = [...body].slice(0, parsed.precision).join("");
  }
  return pad("", body, parsed, "<");
}

function formatInteger(value: bigint, parsed: ParsedFormatSpec, spec: string): string {
  if (parsed.precision !== null) {
    throw new FormatSpecError(spec, "precision not allowed in integer format specifier");
  }

  const type = parsed.type ?? "d";
  const negative = value < 0n;
  const magnitude = negative ? -value : value;

  if (type === "c") {
    if (parsed.sign !== null) {
      throw new FormatSpecError(spec, "sign not allowed with integer format specifier 'c'");
    }
    if (negative || magnitude > 0x10ffffn) {
      throw new FormatSpecError(spec, "%c arg not in range(0x110000)");
    }
    return pad("", String.fromCodePoint(Number(magnitude)), parsed, "<");
  }

  let digits: string;
  let prefix = "";
  switch (type) {
    case "b":
      digits = magnitude.toString(2);
      prefix = "0b";
      break;
    case "o":
      digits = magnitude.toString(8);
      prefix = "0o";
      break;
    case "x":
      digits = magnitude.toString(16);
      prefix = "0x";
      break;
    case "X":
      digits = magnitude.toString(16).toUpperCase();
      prefix = "0X";
      break;
    default:
      digits = magnitude.toString(10);
  }

  if (parsed.grouping !== null) {
    const decimal = type === "d";
    if (type === "n" || (parsed.grouping === "," && !decimal)) {
      throw new FormatSpecError(spec, `cannot specify '${parsed.grouping}' with '${type}'`);
    }
    digits = groupDigits(digits, parsed.grouping, decimal ? 3 : 4);
  }

  return pad(signOf(negative, parsed) + (parsed.alternate ? prefix : ""), digits, parsed, ">");
}

function formatFloat(value: number, parsed: ParsedFormatSpec, spec: string): string {
  const type = parsed.type;
  const upper = type === "E" || type === "F" || type === "G";
  let negative = value < 0 || Object.is(value, -0);
  const magnitude = Math.abs(value);

  let body: string;
  if (Number.isNaN(value)) {
    negative = false;
    body = "nan";
  } else if (!Number.isFinite(value)) {
    body = "inf";
  } else {
    const precision = parsed.precision ?? 6;
    switch (type) {
      case "f":
      case "F":
        body = fixed(magnitude, precision, parsed.alternate);
        break;
      case "e":
      case "E":
        body = exponential(magnitude, precision, parsed.alternate);
        break;
      case "%":
        body = `${fixed(magnitude * 100, precision, parsed.alternate)}%`;
        break;
      case "g":
      case "G":
      case "n":
        body = general(magnitude, precision, parsed.alternate);
        break;
      default:
        body = parsed.precision === null
          ? String(magnitude)
          : general(magnitude, parsed.precision, parsed.alternate);
    }

    if (negative && parsed.coerceZero && /^[0.]+(e[+-]\d+)?%?$/.test(body)) {
      negative = false;
    }
  }

  if (upper) {
    body = body.toUpperCase();
  }

  if (parsed.grouping !== null) {
    if (type !== null && "eEgGn".includes(type)) {
      throw new FormatSpecError(spec, `cannot specify '${parsed.grouping}' with '${type}'`);
    }
    const dot = body.search(/[.%eE]|$/);
    body = groupDigits(body.slice(0, dot), parsed.grouping, 3) + body.slice(dot);
  }

  return pad(signOf(negative, parsed), body, parsed, ">");
}

// Digits are generated from the exact binary value of the double, so any
// precision works and large magnitudes stay positional. Ties round to even.

const FLOAT_VIEW = new DataView(new ArrayBuffer(8));

/** Split a finite, non-negative double into `mantissa * 2 ** exponent`. */
function decompose(magnitude: number): { mantissa: bigint; exponent: number } {
  FLOAT_VIEW.setFloat64(0, magnitude);
  const bits = FLOAT_VIEW.getBigUint64(0);
  const biased = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & ((1n << 52n) - 1n);
  return biased === 0
    ? { mantissa: fraction, exponent: -1074 }
    : { mantissa: fraction | (1n << 52n), exponent: biased - 1075 };
}

/** `round(magnitude * 10 ** scale)`, computed exactly. */
function scaledDigits(magnitude: number, scale: number): bigint {
  const { mantissa, exponent } = decompose(magnitude);
  let numerator = mantissa;
  let denominator = 1n;
  if (exponent >= 0) {
    numerator <<= BigInt(exponent);
  } else {
    denominator <<= BigInt(-exponent);
  }
  if (scale >= 0) {
    numerator *= 10n ** BigInt(scale);
  } else {
    denominator *= 10n ** BigInt(-scale);
  }

  const quotient = numerator / denominator;
  const twice = (numerator % denominator) * 2n;
  if (twice > denominator || (twice === denominator && quotient % 2n === 1n)) {
    return quotient + 1n;
  }
  return quotient;
}

/** Significant digits (`precision + 1` of them) and the decimal exponent. */
function scientificDigits(magnitude: number, precision: number): { digits: string; exponent: number } {
  if (magnitude === 0) {
    return { digits: "0".repeat(precision + 1), exponent: 0 };
  }
  const lower = 10n ** BigInt(precision);
  const upper = lower * 10n;
  let exponent = Math.floor(Math.log10(magnitude));
  let digits = scaledDigits(magnitude, precision - exponent);
  // log10 can be off by one next to a power of ten, and rounding can carry.
  while (digits >= upper) {
    exponent += 1;
    digits = scaledDigits(magnitude, precision - exponent);
  }
  while (digits < lower) {
    exponent -= 1;
    digits = scaledDigits(magnitude, precision - exponent);
  }
  return { digits: digits.toString(), exponent };
}

function fixed(magnitude: number, precision: number, alternate: boolean): string {
  const digits = scaledDigits(magnitude, precision).toString().padStart(precision + 1, "0");
  const point = digits.length - precision;
  if (precision === 0) {
    return alternate ? `${digits}.` : digits;
  }
  return `${digits.slice(0, point)}.${digits.slice(point)}`;
}

function exponential(magnitude: number, precision: number, alternate: boolean): string {
  const { digits, exponent } = scientificDigits(magnitude, precision);
  const fraction = digits.slice(1);
  const point = fraction !== "" || alternate ? "." : "";
  const sign = exponent < 0 ? "-" : "+";
  return `${digits[0]}${point}${fraction}e${sign}${String(Math.abs(exponent)).padStart(2, "0")}`;
}

function general(magnitude: number, precision: number, alternate: boolean): string {
  const p = precision === 0 ? 1 : precision;
  if (magnitude === 0) {
    return alternate ? `0.${"0".repeat(p - 1)}` : "0";
  }

  const { exponent } = scientificDigits(magnitude, p - 1);
  let text = exponent >= -4 && exponent < p
    ? fixed(magnitude, p - 1 - exponent, false)
    : exponential(magnitude, p - 1, false);

  if (!alternate) {
    text = text.replace(/(\.\d*?)0+(?=e|$)/, "$1").replace(/\.(?=e|$)/, "");
  }
  return text;
}

function groupDigits(digits: string, separator: string, size: number): string {
  let out = "";
  for (let end = digits.length; end > 0; end -= size) {
    const chunk = digits.slice(Math.max(0, end - size), end);
    out = out === "" ? chunk : `${chunk}${separator}${out}`;
  }
  return out;
}

function signOf(negative: boolean, parsed: ParsedFormatSpec): string {
  if (negative) return "-";
  if (parsed.sign === "+") return "+";
  if (parsed.sign === " ") return " ";
  return "";
}

/**
 * Pad `lead + body` to the spec's width. `lead` (sign and base prefix)
 * stays in front of the padding for `=` alignment.
 */
function pad(lead: string, body: string, parsed: ParsedFormatSpec, defaultAlign: Align): string {
  const text = lead + body;
  const length = [...text].length;
  if (parsed.width === null || length >= parsed.width) {
    return text;
  }

  const align = parsed.align ?? (parsed.zeroPad && defaultAlign === ">" ? "=" : defaultAlign);
  const fill = parsed.fill ?? (parsed.zeroPad ? "0" : " ");
  const missing = parsed.width - length;

  switch (align) {
    case "<":
      return text + fill.repeat(missing);
    case "^": {
      const left = Math.floor(missing / 2);
      return fill.repeat(left) + text + fill.repeat(missing - left);
    }
    case "=":
      return lead + fill.repeat(missing) + body;
    default:
      return fill.repeat(missing) + text;
  }
}
