export { isAllowedAttribute, removeAttribute } from "./attribute.js";
export type { SanitizeContext, SanitizerPolicy } from "./context.js";
export { removeComments } from "./comment.js";
export { sanitizeElement } from "./element.js";
export { postProcess } from "./post-process.js";
export { parseInlineStyle, sanitizeStyleDeclaration } from "./style.js";
export { sanitizeStyleRule, sanitizeStyleSheets } from "./stylesheet.js";
export { removeDisallowedTags, removeTag } from "./tag.js";
export { getSafeUrl, type SafeUrl, sanitizeUrl } from "./url.js";
