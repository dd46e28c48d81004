import defaults from "./data/defaults.json" with { type: "json" };
import type { CssRuleType } from "./types.js";

export const CSS_RULE_TYPES = [
  "style",
  "charset",
  "import",
  "media",
  "font-face",
  "page",
  "keyframes",
  "keyframe",
  "margin",
  "namespace",
  "counter-style",
  "supports",
  "document",
  "font-feature-values",
  "viewport",
  "layer",
  "container",
  "unknown",
] as const satisfies readonly CssRuleType[];

export function isCssRuleType(value: string): value is CssRuleType {
  return CSS_RULE_TYPES.some((type) => type === value);
}

/** Tag names allowed when none are configured: the SVG vocabulary */
export const DEFAULT_ALLOWED_TAGS: readonly string[] = Object.freeze([...defaults.allowedTags]);

export const DEFAULT_ALLOWED_ATTRIBUTES: readonly string[] = Object.freeze([
  ...defaults.allowedAttributes,
]);

/** Attributes whose value is treated as a URL */
export const DEFAULT_URI_ATTRIBUTES: readonly string[] = Object.freeze([...defaults.uriAttributes]);

export const DEFAULT_ALLOWED_SCHEMES: readonly string[] = Object.freeze([
  ...defaults.allowedSchemes,
]);

export const DEFAULT_ALLOWED_CSS_PROPERTIES: readonly string[] = Object.freeze([
  ...defaults.allowedCssProperties,
]);

/** Empty: every class is allowed until the caller restricts them */
export const DEFAULT_ALLOWED_CLASSES: readonly string[] = Object.freeze([]);

export const DEFAULT_ALLOWED_AT_RULES: readonly CssRuleType[] = Object.freeze(
  defaults.allowedAtRules.filter(isCssRuleType),
);

/** Values matching this are never kept in a declaration */
export const DEFAULT_DISALLOWED_CSS_PROPERTY_VALUE = new RegExp(defaults.disallowCssPropertyValue);
