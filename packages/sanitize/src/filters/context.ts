import type { SanitizerHooks } from "../hooks.js";
import type { CssRuleType, SanitizeRemoval } from "../types.js";

/** Allow-lists and switches the filters read; implemented by MarkupSanitizer */
export interface SanitizerPolicy {
  readonly allowedTags: ReadonlySet<string>;
  readonly allowedAttributes: ReadonlySet<string>;
  readonly uriAttributes: ReadonlySet<string>;
  readonly allowedCssProperties: ReadonlySet<string>;
  readonly allowedSchemes: ReadonlySet<string>;
  readonly allowedClasses: ReadonlySet<string>;
  readonly allowedAtRules: ReadonlySet<CssRuleType>;
  readonly allowDataAttributes: boolean;
  readonly keepChildNodes: boolean;
  readonly disallowCssPropertyValue: RegExp;
}

/** State shared by the filters for one sanitize call */
export interface SanitizeContext {
  readonly policy: SanitizerPolicy;
  readonly hooks: SanitizerHooks;
  /** Base relative URLs resolve against; empty for no resolution */
  readonly baseUrl: string;
  /** Called once per decision that was actually applied */
  readonly record: (removal: SanitizeRemoval) => void;
}
