import { tagNameOf, type SanitizeRoot } from "../dom.js";
import { isCanceled } from "../hooks.js";
import type { RemoveReason } from "../types.js";
import type { SanitizeContext } from "./context.js";

/**
 * Fire `RemovingTag`; unless blocked, splice the element's children into its
 * place (`keepChildNodes`) or drop it with its subtree.
 */
export function removeTag(ctx: SanitizeContext, element: Element, reason: RemoveReason): void {
  const result = ctx.hooks.emit("RemovingTag", { tag: element, reason });
  if (isCanceled(result)) return;

  if (ctx.policy.keepChildNodes && element.hasChildNodes()) {
    element.replaceWith(...Array.from(element.childNodes));
  } else {
    element.remove();
  }
  const name = tagNameOf(element);
  ctx.record({ subject: "tag", tag: name, name, reason });
}

/**
 * Remove every element under `context` whose tag is not allowed. The list is
 * taken up front, so descendants of an element already removed are still
 * visited (and their hooks still fire).
 */
export function removeDisallowedTags(ctx: SanitizeContext, context: SanitizeRoot): void {
  const disallowed = Array.from(context.querySelectorAll("*")).filter(
    (element) => !ctx.policy.allowedTags.has(element.tagName),
  );

  for (const element of disallowed) {
    removeTag(ctx, element, "not-allowed-tag");
  }
}
