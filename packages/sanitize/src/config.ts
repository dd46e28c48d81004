/**
 * Zod schemas for sanitizer options, plus the case-insensitive name set the
 * allow-lists are stored in.
 */

import { SanitizeConfigurationError } from "@sanitas/errors";
import { z } from "zod";
import { CSS_RULE_TYPES } from "./constants.js";

/**
 * A `Set<string>` that compares names without regard to ASCII case.
 * Entries are stored lowercased.
 */
export class NameSet extends Set<string> {
  constructor(values?: Iterable<string>) {
    super();
    if (values !== undefined) {
      for (const value of values) {
        this.add(value);
      }
    }
  }

  override add(value: string): this {
    return super.add(value.toLowerCase());
  }

  override has(value: string): boolean {
    return super.has(value.toLowerCase());
  }

  override delete(value: string): boolean {
    return super.delete(value.toLowerCase());
  }
}

const NameListSchema = z.array(z.string().min(1));

export const SanitizerOptionsSchema = z.object({
  allowedTags: NameListSchema.optional(),
  allowedAttributes: NameListSchema.optional(),
  uriAttributes: NameListSchema.optional(),
  allowedCssProperties: NameListSchema.optional(),
  allowedSchemes: NameListSchema.optional(),
  allowedClasses: NameListSchema.optional(),
  allowedAtRules: z.array(z.enum(CSS_RULE_TYPES)).optional(),
  allowDataAttributes: z.boolean().optional(),
  keepChildNodes: z.boolean().optional(),
  disallowCssPropertyValue: z.instanceof(RegExp).optional(),
  maxInputLength: z.number().int().positive().optional(),
});

export type SanitizerOptions = z.infer<typeof SanitizerOptionsSchema>;

/**
 * Validate the data part of the options.
 * @throws SanitizeConfigurationError listing every `path: message` issue
 */
export function parseSanitizerOptions(options: unknown): SanitizerOptions {
  const result = SanitizerOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new SanitizeConfigurationError(
      `Invalid sanitizer options: ${issues.join("; ")}`,
      issues,
    );
  }
  return result.data;
}
