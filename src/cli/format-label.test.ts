/**
 * Tests for the label formatting CLI helpers.
 *
 * Run: node --import tsx src/cli/format-label.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { parseAssignments, readDataFile, renderLabel } from "./format-label.js";
import { loadStyleConfig } from "../config/index.js";

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

const TEST_DIR = join(tmpdir(), `format-label-test-${process.pid}`);
mkdirSync(TEST_DIR, { recursive: true });

const EPISODE = { series: "Serial", season: 2, episode: 3, title: "" };

// ═══════════════════════════════════════════════════════════════════════════
// ASSIGNMENTS
// ═══════════════════════════════════════════════════════════════════════════

section("Assignments");

test("values are parsed as JSON when possible", () => {
  assert.deepEqual(parseAssignments(["a=1", "b=x", "flag=true", 's="07"', "n=07"]), {
    a: 1,
    b: "x",
    flag: true,
    s: "07",
    n: "07",
  });
});

test("dotted keys nest", () => {
  assert.deepEqual(parseAssignments(["info.year=2024", "info.genre=drama"]), {
    info: { year: 2024, genre: "drama" },
  });
});

test("a value may contain '='", () => {
  assert.deepEqual(parseAssignments(["t=a=b"]), { t: "a=b" });
});

test("assignments override existing data", () => {
  const data: Record<string, unknown> = { a: 1, info: "flat" };
  parseAssignments(["a=2", "info.year=1"], data);
  assert.deepEqual(data, { a: 2, info: { year: 1 } });
});

test("prototype keys are rejected", () => {
  assert.throws(() => parseAssignments(["__proto__.polluted=1"]), /"__proto__" cannot be used as a key/);
  assert.throws(() => parseAssignments(["a.constructor.prototype.x=1"]), /"constructor" cannot be used as a key/);
  assert.equal(Object.prototype.hasOwnProperty.call(Object.prototype, "polluted"), false);
});

test("missing key or '='", () => {
  assert.throws(() => parseAssignments(["novalue"]), /expected key=value/);
  assert.throws(() => parseAssignments(["=v"]), /expected key=value/);
});

// ═══════════════════════════════════════════════════════════════════════════
// DATA FILES
// ═══════════════════════════════════════════════════════════════════════════

section("Data files");

test("object file", () => {
  const path = join(TEST_DIR, "episode.json");
  writeFileSync(path, JSON.stringify(EPISODE));
  assert.deepEqual(readDataFile(path), EPISODE);
});

test("non-object file", () => {
  const path = join(TEST_DIR, "list.json");
  writeFileSync(path, "[1, 2]");
  assert.throws(() => readDataFile(path), /must contain a JSON object/);
});

// ═══════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════

section("Rendering");

test("plain mode keeps missing fields visible", () => {
  assert.equal(
    renderLabel({ template: "{series} S{season:02d}E{episode:02d} {part}", data: EPISODE }),
    "Serial S02E03 {part}"
  );
});

test("section mode", () => {
  assert.equal(
    renderLabel({
      template: "[{series} – ][S{season:02d}][E{episode:02d}][: {title}]",
      data: EPISODE,
      sections: true,
    }),
    "Serial – S02E03"
  );
});

test("section mode with empty values allowed", () => {
  assert.equal(
    renderLabel({ template: "[S{season:02d}][: {title}]", data: EPISODE, sections: true, allowEmpty: true }),
    "S02: "
  );
});

test("styles", () => {
  const styles = loadStyleConfig({ styles: { series: "B" } });
  assert.equal(renderLabel({ template: "{series}", data: EPISODE, styles }), "[B]Serial[/B]");
  assert.equal(
    renderLabel({ template: "[{series}][ {part}]", data: EPISODE, styles, sections: true }),
    "[B]Serial[/B]"
  );
});

test("neutral color applies in both modes", () => {
  const styles = loadStyleConfig({ styles: { t: "[COLOR :accent]{text}[/COLOR]" }, neutralColor: "white" });
  const data = { t: "x" };
  assert.equal(renderLabel({ template: "{t}", data, styles }), "[COLOR white]x[/COLOR]");
  assert.equal(renderLabel({ template: "[{t}]", data, styles, sections: true }), "[COLOR white]x[/COLOR]");
});

// ═══════════════════════════════════════════════════════════════════════════
// Cleanup
// ═══════════════════════════════════════════════════════════════════════════

rmSync(TEST_DIR, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
