import { getAllNodes, isChildNode, type SanitizeRoot } from "../dom.js";
import type { SanitizeContext } from "./context.js";

/**
 * Run `PostProcessNode` over every node of the sanitized tree (after merging
 * adjacent text nodes), then notify `PostProcessDom` once. Both are skipped
 * when nothing is subscribed.
 */
export function postProcess(ctx: SanitizeContext, document: Document, context: SanitizeRoot): void {
  if (ctx.hooks.hasHandlers("PostProcessNode")) {
    document.normalize();

    for (const node of getAllNodes(context)) {
      const result = ctx.hooks.emit("PostProcessNode", { document, node, replacementNodes: [] });
      if (result.action !== "modify") continue;

      const { replacementNodes } = result.data;
      if (replacementNodes.length > 0 && isChildNode(node)) {
        node.replaceWith(...replacementNodes);
      }
    }
  }

  if (ctx.hooks.hasHandlers("PostProcessDom")) {
    ctx.hooks.notify("PostProcessDom", { document });
  }
}
