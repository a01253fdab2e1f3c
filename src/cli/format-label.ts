#!/usr/bin/env node
/**
 * CLI tool to render a label template against JSON data.
 *
 * Usage:
 *   format-label --template "{series} S{season:02d}E{episode:02d}" --data episode.json
 *   format-label --template "[{series} – ][S{season:02d}][E{episode:02d}]" --sections \
 *     --set series=Serial --set season=2
 *
 * Options:
 *   --template <text>     Template to render (required)
 *   --data <path>         JSON file with the named values
 *   --set <key=value>     Set a value (repeatable, dotted keys nest, JSON values parsed)
 *   --styles <path>       Style configuration JSON
 *   --sections            Section mode: drop [...] sections with missing values
 *   --allow-empty         In section mode, keep sections with empty values
 *   --json                Output as JSON
 *   -h, --help            Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (bad arguments, unreadable data, template syntax error)
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";

import {
  validateConfig,
  ConfigError,
  loadStyleConfigFromFile,
  toFormatterOptions,
  StyleConfigError,
  DEFAULT_STYLE_CONFIG,
  type StyleConfig,
} from "../config/index.js";
import { SafeFormatter, vsectionFormat } from "../format/index.js";

// ============================================================
// Types
// ============================================================

export interface RenderLabelOptions {
  template: string;
  data: Record<string, unknown>;
  sections?: boolean;
  allowEmpty?: boolean;
  styles?: StyleConfig;
}

const DataFileSchema = z.record(z.unknown());

/** Keys that would reach Object.prototype when assigned through. */
const RESERVED_KEYS = new Set(["__proto__", "constructor", "prototype"]);

// ============================================================
// Helpers
// ============================================================

function parseValue(raw: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Turn `key=value` pairs into named values. Dotted keys nest
 * (`info.year=2024` → `{ info: { year: 2024 } }`); values that parse as
 * JSON are taken as JSON, anything else as a plain string.
 */
export function parseAssignments(
  pairs: readonly string[],
  into: Record<string, unknown> = {}
): Record<string, unknown> {
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new Error(`Invalid assignment "${pair}": expected key=value`);
    }

    const keys = pair.slice(0, eq).split(".");
    const reserved = keys.find((key) => RESERVED_KEYS.has(key));
    if (reserved !== undefined) {
      throw new Error(`Invalid assignment "${pair}": "${reserved}" cannot be used as a key`);
    }
    const leaf = keys.pop() ?? "";
    let target = into;
    for (const key of keys) {
      const next = target[key];
      if (!isRecord(next)) {
        const created: Record<string, unknown> = {};
        target[key] = created;
        target = created;
      } else {
        target = next;
      }
    }
    target[leaf] = parseValue(pair.slice(eq + 1));
  }
  return into;
}

/**
 * Read a JSON object of named values.
 */
export function readDataFile(filePath: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  const result = DataFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Data file ${filePath} must contain a JSON object`);
  }
  return result.data;
}

/**
 * Render a label in plain or section mode.
 */
export function renderLabel(options: RenderLabelOptions): string {
  const formatterOptions = toFormatterOptions(options.styles ?? DEFAULT_STYLE_CONFIG);

  if (options.sections) {
    return vsectionFormat(options.template, [], options.data, {
      allowEmpty: options.allowEmpty,
      styles: formatterOptions.styles,
      stylize: formatterOptions.stylize,
      neutralColor: formatterOptions.neutralColor,
    });
  }
  return new SafeFormatter(formatterOptions).vformat(options.template, [], options.data);
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      template: { type: "string" },
      data: { type: "string" },
      set: { type: "string", multiple: true, default: [] },
      styles: { type: "string" },
      sections: { type: "boolean", default: false },
      "allow-empty": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: format-label --template <text> [options]

Options:
  --template <text>     Template to render (required)
  --data <path>         JSON file with the named values
  --set <key=value>     Set a value (repeatable, dotted keys nest, JSON values parsed)
  --styles <path>       Style configuration JSON
  --sections            Section mode: drop [...] sections with missing values
  --allow-empty         In section mode, keep sections with empty values
  --json                Output as JSON
  -h, --help            Show this help message

Exit codes:
  0 - Success
  1 - Error
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Main
// ============================================================

function main(): void {
  validateConfig();
  const args = parseCliArgs();

  if (args.template === undefined) {
    throw new Error("--template is required");
  }

  const data: Record<string, unknown> = args.data === undefined ? {} : readDataFile(resolve(args.data));
  parseAssignments(args.set, data);

  const styles = args.styles === undefined ? undefined : loadStyleConfigFromFile(resolve(args.styles));

  const label = renderLabel({
    template: args.template,
    data,
    sections: args.sections,
    allowEmpty: args["allow-empty"],
    styles,
  });

  if (args.json) {
    console.log(JSON.stringify({ template: args.template, label }, null, 2));
  } else {
    console.log(label);
  }
}

const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("format-label.ts") ||
   process.argv[1].endsWith("format-label.js") ||
   process.argv[1].endsWith("format-label"));

if (isDirectExecution) {
  try {
    main();
  } catch (err: unknown) {
    if (err instanceof StyleConfigError) {
      console.error(err.format());
    } else if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}
