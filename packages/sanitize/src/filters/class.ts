import { tagNameOf } from "../dom.js";
import { isCanceled } from "../hooks.js";
import { removeAttribute } from "./attribute.js";
import type { SanitizeContext } from "./context.js";

/**
 * Drop class tokens outside `allowedClasses`; an emptied class list takes the
 * attribute with it. Only called while the restriction is active.
 */
export function sanitizeClassList(ctx: SanitizeContext, element: Element, attribute: Attr): void {
  const removedClasses = Array.from(element.classList).filter(
    (cssClass) => !ctx.policy.allowedClasses.has(cssClass),
  );

  for (const cssClass of removedClasses) {
    const result = ctx.hooks.emit("RemovingCssClass", {
      tag: element,
      cssClass,
      reason: "not-allowed-css-class",
    });
    if (isCanceled(result)) continue;

    element.classList.remove(cssClass);
    ctx.record({
      subject: "css-class",
      tag: tagNameOf(element),
      name: cssClass,
      reason: "not-allowed-css-class",
    });
  }

  if (element.classList.length === 0) {
    removeAttribute(ctx, element, attribute, "class-attribute-empty");
  }
}
