import { isCanceled } from "../hooks.js";
import { tagNameOf } from "../dom.js";
import type { RemoveReason } from "../types.js";
import type { SanitizeContext, SanitizerPolicy } from "./context.js";
import { sanitizeUrl } from "./url.js";

export function isAllowedAttribute(policy: SanitizerPolicy, name: string): boolean {
  return (
    policy.allowedAttributes.has(name) ||
    (policy.allowDataAttributes && name.toLowerCase().startsWith("data-"))
  );
}

/** Fire `RemovingAttribute` and remove the attribute unless a handler blocked it */
export function removeAttribute(
  ctx: SanitizeContext,
  element: Element,
  attribute: Attr,
  reason: RemoveReason,
): void {
  const result = ctx.hooks.emit("RemovingAttribute", { tag: element, attribute, reason });
  if (isCanceled(result)) return;

  element.removeAttribute(attribute.name);
  ctx.record({ subject: "attribute", tag: tagNameOf(element), name: attribute.name, reason });
}

export function removeDisallowedAttributes(ctx: SanitizeContext, element: Element): void {
  for (const attribute of Array.from(element.attributes)) {
    if (!isAllowedAttribute(ctx.policy, attribute.name)) {
      removeAttribute(ctx, element, attribute, "not-allowed-attribute");
    }
  }
}

/** Remove URI attributes with a rejected value; write back the sanitized value otherwise */
export function sanitizeUriAttributes(ctx: SanitizeContext, element: Element): void {
  const uriAttributes = Array.from(element.attributes).filter((attribute) =>
    ctx.policy.uriAttributes.has(attribute.name),
  );

  for (const attribute of uriAttributes) {
    const url = sanitizeUrl(ctx, element, attribute.value);
    if (url === undefined) {
      removeAttribute(ctx, element, attribute, "not-allowed-url-value");
    } else {
      element.setAttribute(attribute.name, url);
    }
  }
}
