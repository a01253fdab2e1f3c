/**
 * Field path and stylizer tests.
 *
 * Run: node --import tsx src/format/stylize.test.ts
 */

import { strict as assert } from "node:assert";

import { StyleApplicationError } from "./errors.js";
import {
  generalizeFieldPath,
  isFieldPath,
  normalizeFieldPath,
  resolveStyle,
} from "./field-path.js";
import { SafeFormatter } from "./formatter.js";
import {
  applyStyle,
  compileStyle,
  parseStyleToken,
  replaceCustomColors,
  type ApplyStyleOptions,
} from "./stylize.js";
import { createLogger } from "../logging/index.js";

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

const logger = createLogger({ console: false });

function options(extra: Partial<ApplyStyleOptions> = {}): ApplyStyleOptions {
  return {
    renderer: new SafeFormatter({ logger }),
    logger,
    neutralColor: "gray",
    ...extra,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// FIELD PATHS
// ═══════════════════════════════════════════════════════════════════════════

section("Field paths");

test("grammar", () => {
  assert.equal(isFieldPath("c.z[0]"), true);
  assert.equal(isFieldPath('c["a b"]'), true);
  assert.equal(isFieldPath("c.*"), true);
  assert.equal(isFieldPath("tytuł.rok"), true);
  assert.equal(isFieldPath("a + 1"), false);
  assert.equal(isFieldPath("1abc"), false);
});

test("generalization steps", () => {
  assert.equal(generalizeFieldPath("c.z[0]"), "c.z[*]");
  assert.equal(generalizeFieldPath("c.z[*]"), "c.*");
  assert.equal(generalizeFieldPath("c.*"), "*");
  assert.equal(generalizeFieldPath("c"), "*");
  assert.equal(generalizeFieldPath('c["y"]'), "c[*]");
});

test("generalization stops", () => {
  assert.equal(generalizeFieldPath("*"), null);
  assert.equal(generalizeFieldPath("a + 1"), null);
});

test("quoted indexes normalize", () => {
  assert.equal(normalizeFieldPath('c["y"]'), "c[y]");
  assert.equal(normalizeFieldPath("c['y']"), "c[y]");
});

section("Style cascade");

const rules = { "c.x": "X", "c.*": "Y", "c[*]": "Z" };

test("exact, attribute wildcard, index wildcard", () => {
  assert.equal(resolveStyle("c.x", rules), "X");
  assert.equal(resolveStyle("c.y", rules), "Y");
  assert.equal(resolveStyle("c[0]", rules), "Z");
});

test("no rule", () => {
  assert.equal(resolveStyle("d", rules), undefined);
  assert.equal(resolveStyle("a + 1", { "*": "S" }), undefined);
});

test("catch-all rule", () => {
  assert.equal(resolveStyle("a.b", { "*": "S" }), "S");
});

test("normalized path", () => {
  assert.equal(resolveStyle('c["x"]', { "c[x]": "Q" }), "Q");
});

test("inherited keys are not rules", () => {
  assert.equal(resolveStyle("toString", {}), undefined);
});

// ═══════════════════════════════════════════════════════════════════════════
// STYLE TOKENS
// ═══════════════════════════════════════════════════════════════════════════

section("Style tokens");

test("token shapes", () => {
  assert.deepEqual(parseStyleToken(""), { kind: "none" });
  assert.deepEqual(parseStyleToken("COLOR red"), { kind: "markup", tag: "COLOR red", name: "COLOR" });
  assert.deepEqual(parseStyleToken("[]"), { kind: "zero-width-bracket" });
  assert.deepEqual(parseStyleToken("()"), { kind: "bracket", open: "(", close: ")" });
  assert.deepEqual(parseStyleToken("|"), { kind: "bracket", open: "|", close: "|" });
  assert.deepEqual(parseStyleToken("<{text}>"), { kind: "template", template: "<{text}>" });
});

test("single and sequence", () => {
  assert.equal(compileStyle("B").kind, "single");
  assert.deepEqual(compileStyle(["B", ""]), {
    kind: "sequence",
    tokens: [{ kind: "markup", tag: "B", name: "B" }, { kind: "none" }],
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// APPLICATION
// ═══════════════════════════════════════════════════════════════════════════

section("Application");

test("markup tag", () => {
  assert.equal(applyStyle("T", "COLOR red", options()), "[COLOR red]T[/COLOR]");
});

test("sequence wraps outer to inner", () => {
  assert.equal(applyStyle("T", ["B", "()"], options()), "[B](T)[/B]");
});

test("zero-width brackets", () => {
  assert.equal(applyStyle("T", "[]", options()), "[\u200bT\u200b]");
});

test("template with info", () => {
  const text = applyStyle("T", "<{text}> {info.year}", options({ info: { year: 1999 } }));
  assert.equal(text, "<T> 1999");
});

test("template positional argument", () => {
  assert.equal(applyStyle("T", "{0}{0}!", options()), "TT!");
});

test("no style leaves the text", () => {
  assert.equal(applyStyle("T", undefined, options()), "T");
});

test("restyling with an empty sequence changes nothing", () => {
  const once = applyStyle("T", ["B", "()"], options());
  assert.equal(applyStyle(once, [], options()), once);
});

section("Custom colors");

test("color map", () => {
  const text = applyStyle("[COLOR :accent]x[/COLOR]", undefined, options({
    colors: { kind: "map", colors: { accent: "gold" } },
  }));
  assert.equal(text, "[COLOR gold]x[/COLOR]");
});

test("missing map entry uses the neutral color", () => {
  const text = replaceCustomColors("[COLOR :other]", { kind: "map", colors: {} }, { neutralColor: "silver" });
  assert.equal(text, "[COLOR silver]");
});

test("resolver", () => {
  const text = replaceCustomColors(
    "[COLOR  :accent]",
    { kind: "resolver", resolve: (name) => name.toUpperCase() }
  );
  assert.equal(text, "[COLOR ACCENT]");
});

test("no color source", () => {
  assert.equal(replaceCustomColors("[COLOR :a]x", undefined, { logger }), "[COLOR gray]x");
});

test("plain color tags are untouched", () => {
  assert.equal(replaceCustomColors("[COLOR red]x[/COLOR]", undefined), "[COLOR red]x[/COLOR]");
});

test("non-string text", () => {
  assert.throws(
    () => replaceCustomColors(42, undefined, { logger }),
    (err: unknown) => {
      assert.ok(err instanceof StyleApplicationError);
      assert.equal(err.message, "Incorrect label/title type number");
      return true;
    }
  );
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
