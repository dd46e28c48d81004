import { getAllNodes, isComment, type SanitizeRoot } from "../dom.js";
import { isCanceled } from "../hooks.js";
import type { SanitizeContext } from "./context.js";

export function removeComments(ctx: SanitizeContext, context: SanitizeRoot): void {
  for (const comment of getAllNodes(context).filter(isComment)) {
    const result = ctx.hooks.emit("RemovingComment", { comment });
    if (isCanceled(result)) continue;

    comment.remove();
    ctx.record({ subject: "comment", tag: undefined, name: comment.data, reason: undefined });
  }
}
