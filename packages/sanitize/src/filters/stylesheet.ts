import postcss, { CssSyntaxError, type Root } from "postcss";
import { CssRuleList, type CssRule } from "../css/rules.js";
import { isCanceled } from "../hooks.js";
import type { SanitizeContext } from "./context.js";
import { sanitizeStyleDeclaration } from "./style.js";

function parseStyleSheet(css: string): Root | undefined {
  try {
    return postcss.parse(css);
  } catch (error) {
    if (error instanceof CssSyntaxError) return undefined;
    throw error;
  }
}

/** Text of a sanitized sheet: comments dropped, `<` escaped so it cannot end the element */
function serializeStyleSheet(root: Root): string {
  root.walkComments((comment) => {
    comment.remove();
  });
  root.walkDecls((decl) => {
    delete decl.raws.value;
  });
  return root.toString().replace(/</g, "\\3c");
}

/**
 * Fire `RemovingAtRule`; true when the rule may be deleted.
 */
function removeAtRule(ctx: SanitizeContext, styleTag: Element, rule: CssRule): boolean {
  const result = ctx.hooks.emit("RemovingAtRule", { tag: styleTag, rule });
  if (isCanceled(result)) return false;

  ctx.record({
    subject: "at-rule",
    tag: styleTag.tagName.toLowerCase(),
    name: rule.node.toString(),
    reason: undefined,
  });
  return true;
}

function sanitizeRuleList(ctx: SanitizeContext, styleTag: Element, rules: CssRuleList): void {
  for (let i = 0; i < rules.length; ) {
    const rule = rules.item(i);
    if (rule === undefined) break;

    if (!sanitizeStyleRule(ctx, styleTag, rule) && removeAtRule(ctx, styleTag, rule)) {
      rules.deleteRule(i);
    } else {
      i++;
    }
  }
}

/**
 * Sanitize one rule and everything below it.
 *
 * @returns false when the rule type is not allowed and the rule should go;
 *   containers are kept even when emptied
 */
export function sanitizeStyleRule(ctx: SanitizeContext, styleTag: Element, rule: CssRule): boolean {
  if (!ctx.policy.allowedAtRules.has(rule.type)) return false;

  switch (rule.kind) {
    case "style":
    case "page":
      sanitizeStyleDeclaration(ctx, styleTag, rule.style);
      sanitizeRuleList(ctx, styleTag, rule.children);
      return true;
    case "keyframe":
    case "font-face":
      sanitizeStyleDeclaration(ctx, styleTag, rule.style);
      return true;
    case "grouping":
      sanitizeRuleList(ctx, styleTag, rule.children);
      return true;
    case "keyframes":
      for (const child of rule.rules.toArray()) {
        if (sanitizeStyleRule(ctx, styleTag, child) || !removeAtRule(ctx, styleTag, child)) continue;
        if (child.kind === "keyframe") {
          rule.rules.deleteByKeyText(child.keyText);
        } else {
          rule.rules.remove(child);
        }
      }
      return true;
    case "opaque":
      return true;
  }
}

/**
 * Sanitize every `<style>` element of the document, wherever it sits, and
 * regenerate its text from the filtered rule tree. The `type` attribute is not
 * consulted, since the attribute filter may remove it afterwards. A sheet that
 * does not parse is emptied.
 */
export function sanitizeStyleSheets(ctx: SanitizeContext, document: Document): void {
  for (const styleTag of Array.from(document.querySelectorAll("style"))) {
    const root = parseStyleSheet(styleTag.textContent ?? "");
    if (root === undefined) {
      styleTag.textContent = "";
      continue;
    }

    sanitizeRuleList(ctx, styleTag, new CssRuleList(root));
    styleTag.textContent = serializeStyleSheet(root);
  }
}
