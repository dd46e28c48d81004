import { removeAttribute, removeDisallowedAttributes, sanitizeUriAttributes } from "./attribute.js";
import { sanitizeClassList } from "./class.js";
import type { SanitizeContext } from "./context.js";
import { sanitizeInlineStyle } from "./style.js";

/**
 * Attribute pipeline for one element that survived the tag filter:
 * allow-list, URI values, inline style, then a final scan of what is left.
 */
export function sanitizeElement(ctx: SanitizeContext, element: Element): void {
  removeDisallowedAttributes(ctx, element);
  sanitizeUriAttributes(ctx, element);

  const oldStyleEmpty = (element.getAttribute("style") ?? "") === "";
  sanitizeInlineStyle(ctx, element);

  for (const attribute of Array.from(element.attributes)) {
    if (attribute.value.includes("&{")) {
      removeAttribute(ctx, element, attribute, "not-allowed-value");
    } else if (attribute.name === "class" && ctx.policy.allowedClasses.size > 0) {
      sanitizeClassList(ctx, element, attribute);
    } else if (attribute.name === "style" && !oldStyleEmpty && attribute.value === "") {
      removeAttribute(ctx, element, attribute, "style-attribute-empty");
    }
  }
}
