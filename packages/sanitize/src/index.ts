export const PACKAGE_NAME = "@sanitas/sanitize" as const;

// Configuration
export {
  NameSet,
  parseSanitizerOptions,
  type SanitizerOptions,
  SanitizerOptionsSchema,
} from "./config.js";
export {
  CSS_RULE_TYPES,
  DEFAULT_ALLOWED_AT_RULES,
  DEFAULT_ALLOWED_ATTRIBUTES,
  DEFAULT_ALLOWED_CLASSES,
  DEFAULT_ALLOWED_CSS_PROPERTIES,
  DEFAULT_ALLOWED_SCHEMES,
  DEFAULT_ALLOWED_TAGS,
  DEFAULT_DISALLOWED_CSS_PROPERTY_VALUE,
  DEFAULT_URI_ATTRIBUTES,
  isCssRuleType,
} from "./constants.js";

// CSS
export { decodeCss } from "./css/decoder.js";
export { StyleDeclaration, type StyleProperty } from "./css/declaration.js";
export {
  type CssFontFaceRule,
  type CssGroupingRule,
  type CssKeyframeRule,
  type CssKeyframesRule,
  type CssOpaqueRule,
  type CssPageRule,
  type CssRule,
  CssRuleList,
  type CssStyleRule,
} from "./css/rules.js";

// DOM
export {
  createHtmlParser,
  createXmlParser,
  htmlFormatter,
  type MarkupFormatter,
  type MarkupParser,
  type ParsedFragment,
  type SanitizeRoot,
  type XmlContentType,
  xmlFormatter,
} from "./dom.js";

// Hooks
export {
  createSanitizerHooks,
  type FilterUrlData,
  type PostProcessDomData,
  type PostProcessNodeData,
  type RemovingAtRuleData,
  type RemovingAttributeData,
  type RemovingCommentData,
  type RemovingCssClassData,
  type RemovingStyleData,
  type RemovingTagData,
  type SanitizerHooks,
  type SanitizerInterceptors,
  type SanitizerObservers,
} from "./hooks.js";

// Metrics
export { getRemovalCounter, getSanitizeDuration, type SanitizeMode } from "./metrics.js";

// Core
export { getSafeUrl, type SafeUrl } from "./filters/url.js";
export { MarkupSanitizer, type MarkupSanitizerOptions } from "./sanitizer.js";

// Types
export type {
  CssRuleType,
  RemovalSubject,
  RemoveReason,
  SanitizeRemoval,
  SanitizeReport,
} from "./types.js";
