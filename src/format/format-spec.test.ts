/**
 * Format-spec and value display tests.
 *
 * Run: node --import tsx src/format/format-spec.test.ts
 *
 * Tests cover:
 *   1. Spec parsing
 *   2. Integers, floats, strings
 *   3. Invalid specs
 *   4. Escaping and display strings
 */

import { strict as assert } from "node:assert";

import { FormatSpecError } from "./errors.js";
import { escapeString, reprValue, toDisplayString, asciiRepr } from "./escape.js";
import { formatValue, parseFormatSpec } from "./format-spec.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Parsing");

test("fill, align and width", () => {
  const parsed = parseFormatSpec("x<10");
  assert.equal(parsed.fill, "x");
  assert.equal(parsed.align, "<");
  assert.equal(parsed.width, 10);
  assert.equal(parsed.type, null);
});

test("every component", () => {
  assert.deepEqual(parseFormatSpec("*^+z#012,.3f"), {
    fill: "*",
    align: "^",
    sign: "+",
    coerceZero: true,
    alternate: true,
    zeroPad: true,
    width: 12,
    grouping: ",",
    precision: 3,
    type: "f",
  });
});

test("malformed spec", () => {
  assert.throws(() => parseFormatSpec("abc"), FormatSpecError);
});

// ═══════════════════════════════════════════════════════════════════════════
// INTEGERS
// ═══════════════════════════════════════════════════════════════════════════

section("Integers");

test("zero padding", () => {
  assert.equal(formatValue(7, "02d"), "07");
});

test("zero padding keeps the sign in front", () => {
  assert.equal(formatValue(-5, "04d"), "-005");
});

test("plus sign", () => {
  assert.equal(formatValue(5, "+d"), "+5");
});

test("hex with and without prefix", () => {
  assert.equal(formatValue(255, "x"), "ff");
  assert.equal(formatValue(255, "#X"), "0XFF");
});

test("binary", () => {
  assert.equal(formatValue(5, "b"), "101");
  assert.equal(formatValue(5, "#b"), "0b101");
  assert.equal(formatValue(5, "08b"), "00000101");
});

test("thousands grouping", () => {
  assert.equal(formatValue(1234567, ","), "1,234,567");
  assert.equal(formatValue(1234567, "_d"), "1_234_567");
});

test("bigint beyond the safe integer range", () => {
  assert.equal(formatValue(10n ** 20n, ","), "100,000,000,000,000,000,000");
});

test("character", () => {
  assert.equal(formatValue(65, "c"), "A");
});

test("boolean under a numeric type", () => {
  assert.equal(formatValue(true, "d"), "1");
});

test("right-aligned by default", () => {
  assert.equal(formatValue(42, "5"), "   42");
});

test("precision is rejected", () => {
  assert.throws(() => formatValue(3, ".2d"), FormatSpecError);
});

// ═══════════════════════════════════════════════════════════════════════════
// FLOATS
// ═══════════════════════════════════════════════════════════════════════════

section("Floats");

test("fixed point", () => {
  assert.equal(formatValue(3.14159, ".2f"), "3.14");
});

test("integer value under a float type", () => {
  assert.equal(formatValue(2, ".1f"), "2.0");
});

test("percentage", () => {
  assert.equal(formatValue(0.5, ".1%"), "50.0%");
});

test("exponent has at least two digits", () => {
  assert.equal(formatValue(1234.5, "e"), "1.234500e+03");
});

test("general format strips trailing zeros", () => {
  assert.equal(formatValue(0.0001, "g"), "0.0001");
});

test("no type keeps the shortest form", () => {
  assert.equal(formatValue(2.5, ">6"), "   2.5");
});

test("negative zero", () => {
  assert.equal(formatValue(-0, ".1f"), "-0.0");
  assert.equal(formatValue(-0, "z.1f"), "0.0");
});

test("infinity and nan", () => {
  assert.equal(formatValue(Infinity, "f"), "inf");
  assert.equal(formatValue(-Infinity, "F"), "-INF");
  assert.equal(formatValue(NaN, "f"), "nan");
});

test("large magnitudes stay positional", () => {
  assert.equal(formatValue(1e21, ".2f"), "1000000000000000000000.00");
  assert.equal(formatValue(1.5e22, "f"), "15000000000000000000000.000000");
  assert.equal(formatValue(1e100, "e"), "1.000000e+100");
});

test("precision above one hundred", () => {
  assert.equal(formatValue(1.5, ".101f"), `1.5${"0".repeat(100)}`);
  assert.equal(formatValue(1.5, ".102g"), "1.5");
});

test("exact ties round to even", () => {
  assert.equal(formatValue(0.125, ".2f"), "0.12");
  assert.equal(formatValue(0.375, ".2f"), "0.38");
});

test("rounding carries into the exponent", () => {
  assert.equal(formatValue(9.9999999, ".2e"), "1.00e+01");
});

test("n behaves like g for floats", () => {
  assert.equal(formatValue(2.5, "n"), "2.5");
  assert.equal(formatValue(0.00001234, "n"), "1.234e-05");
  assert.throws(() => formatValue(1.5, ",n"), FormatSpecError);
  assert.throws(() => formatValue(1500, ",n"), FormatSpecError);
});

test("oversized width or precision", () => {
  assert.throws(() => formatValue(1.5, ".10001f"), FormatSpecError);
  assert.throws(() => formatValue("x", "20000"), FormatSpecError);
});

test("fraction under an integer type", () => {
  assert.throws(() => formatValue(1.5, "d"), FormatSpecError);
});

// ═══════════════════════════════════════════════════════════════════════════
// STRINGS
// ═══════════════════════════════════════════════════════════════════════════

section("Strings");

test("empty spec renders the display string", () => {
  assert.equal(formatValue("ab", ""), "ab");
  assert.equal(formatValue(null, ""), "");
});

test("alignment", () => {
  assert.equal(formatValue("ab", ">5"), "   ab");
  assert.equal(formatValue("ab", "^6"), "  ab  ");
  assert.equal(formatValue("ab", "*<5"), "ab***");
});

test("zero flag pads on the right", () => {
  assert.equal(formatValue("ab", "05"), "ab000");
});

test("precision truncates", () => {
  assert.equal(formatValue("abcdef", ".3"), "abc");
});

test("width counts code points", () => {
  assert.equal(formatValue("é😀", ">3"), " é😀");
});

test("numeric type on a string", () => {
  assert.throws(
    () => formatValue("ab", "d"),
    (err: unknown) => {
      assert.ok(err instanceof FormatSpecError);
      assert.equal(err.spec, "d");
      return true;
    }
  );
});

test("sign on a string", () => {
  assert.throws(() => formatValue("x", "+"), FormatSpecError);
});

// ═══════════════════════════════════════════════════════════════════════════
// DISPLAY
// ═══════════════════════════════════════════════════════════════════════════

section("Escaping and display");

test("escape control characters", () => {
  assert.equal(escapeString("a\tb\n"), "a\\tb\\n");
});

test("escape quotes, backslash and NUL", () => {
  assert.equal(escapeString(`'"\\\0`), `\\'\\"\\\\\\0`);
});

test("repr of a string", () => {
  assert.equal(reprValue("it's"), "'it\\'s'");
  assert.equal(reprValue('say "hi"'), `'say "hi"'`);
});

test("repr of an array", () => {
  assert.equal(reprValue(["a", 1]), "['a', 1]");
});

test("ascii repr", () => {
  assert.equal(asciiRepr("é"), "'\\xe9'");
  assert.equal(asciiRepr("–"), "'\\u2013'");
});

test("display strings", () => {
  assert.equal(toDisplayString([1, "a"]), "1, a");
  assert.equal(toDisplayString({ a: 1 }), '{"a":1}');
  assert.equal(toDisplayString(undefined), "");
  assert.equal(toDisplayString(12.5), "12.5");
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
