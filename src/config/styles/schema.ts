/**
 * Style configuration schema.
 *
 * A style configuration document bundles everything a formatter needs to
 * decorate its output:
 *
 *   {
 *     "styles": { "title": "B", "cast[*]": ["I", "()"], "*": "" },
 *     "colors": { "accent": "gold" },
 *     "info": { "year": 2024 }
 *   }
 */

import { z } from "zod";
import { isFieldPath, WILDCARD } from "../../format/field-path.js";

/** One style token or a list applied outer-to-inner. */
export const StyleDescriptorSchema = z
  .union([z.string(), z.array(z.string())])
  .describe("Markup tag, bracket pair, nested template, or a list of those");

/** Key of a style rule: a field path, a wildcard path, or `*`. */
export const StylePathSchema = z
  .string()
  .trim()
  .refine((path) => path === WILDCARD || isFieldPath(path), {
    message: "Must be a field path such as title, cast[*], info.*, or *",
  });

const ColorNameSchema = z
  .string()
  .regex(/^\w+$/, "Color names may only contain letters, digits and underscores");

export const StyleConfigSchema = z
  .object({
    /** Style used by stylize() when no style is given */
    defaultStyle: StyleDescriptorSchema.optional(),

    /** Style rules by field path */
    styles: z.record(StylePathSchema, StyleDescriptorSchema).default({}),

    /** Custom colors for `[COLOR :name]` markers */
    colors: z.record(ColorNameSchema, z.string().min(1)).default({}),

    /** Values exposed to template styles as `info` */
    info: z.record(z.unknown()).default({}),

    /** Extra named arguments for template styles */
    extra: z.record(z.unknown()).default({}),

    /** Replacement for custom colors that are not configured */
    neutralColor: ColorNameSchema.optional(),
  })
  .strict();

export type StyleConfig = z.infer<typeof StyleConfigSchema>;

/** Style configuration as written, before defaults are applied. */
export type StyleConfigInput = z.input<typeof StyleConfigSchema>;
