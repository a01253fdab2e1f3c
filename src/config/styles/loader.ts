/**
 * Style configuration loader and validator.
 *
 * Loaded tables are handed to formatters by reference and are not frozen:
 * a rule added later is seen by the next format call.
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import type { FormatterOptions } from "../../format/formatter.js";
import { StyleConfigSchema, type StyleConfig } from "./schema.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "invalid_json" */
  code: string;
}

/**
 * Structured validation error for style configuration.
 */
export class StyleConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "StyleConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Style configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Convert Zod issues to our structured format.
 */
export function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function parseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new StyleConfigError("Invalid style configuration: not valid JSON", [
      { path: [], message, code: "invalid_json" },
    ]);
  }
}

/**
 * Validate and load a style configuration.
 *
 * @param input - Configuration object, or its JSON text
 * @throws StyleConfigError if validation fails
 */
export function loadStyleConfig(input: unknown): StyleConfig {
  const raw = typeof input === "string" ? parseJson(input) : input;
  const result = StyleConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new StyleConfigError(
      `Invalid style configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return result.data;
}

/**
 * Read and load a JSON style configuration file.
 */
export function loadStyleConfigFromFile(filePath: string): StyleConfig {
  return loadStyleConfig(readFileSync(filePath, "utf-8"));
}

/**
 * Validate a style configuration without throwing.
 */
export function validateStyleConfig(input: unknown): {
  success: boolean;
  config?: StyleConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = StyleConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Formatter options carrying a style configuration.
 */
export function toFormatterOptions(styleConfig: StyleConfig): FormatterOptions {
  return {
    styles: styleConfig.styles,
    stylize: {
      style: styleConfig.defaultStyle,
      info: styleConfig.info,
      extra: styleConfig.extra,
      colors: { kind: "map", colors: styleConfig.colors },
    },
    neutralColor: styleConfig.neutralColor,
  };
}
