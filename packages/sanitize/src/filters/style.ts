import postcss, { CssSyntaxError, type Declaration, type Root } from "postcss";
import { StyleDeclaration, toStyleProperty } from "../css/declaration.js";
import { CSS_EXPRESSION, CSS_URL, decodeCss } from "../css/decoder.js";
import { tagNameOf } from "../dom.js";
import { isCanceled } from "../hooks.js";
import type { RemoveReason } from "../types.js";
import { removeAttribute } from "./attribute.js";
import type { SanitizeContext } from "./context.js";
import { sanitizeUrl } from "./url.js";

interface StagedRemoval {
  readonly decl: Declaration;
  readonly reason: RemoveReason;
}

interface StagedUpdate {
  readonly decl: Declaration;
  readonly name: string;
  readonly value: string;
}

/**
 * Rebuild `value` with every `url(...)` target sanitized.
 * Returns undefined as soon as one target is rejected.
 */
function rewriteUrls(ctx: SanitizeContext, element: Element, value: string): string | undefined {
  const targets: string[] = [];
  for (const match of value.matchAll(CSS_URL)) {
    const target = sanitizeUrl(ctx, element, match[2] ?? "");
    if (target === undefined) return undefined;
    targets.push(target);
  }

  let index = 0;
  return value.replace(CSS_URL, (_match, open: string, _target: string, close: string) => {
    const target = targets[index] ?? "";
    index++;
    return `url(${open}${target}${close}`;
  });
}

/**
 * Filter a declaration block in place.
 *
 * Names and values are decoded before any check. Each declaration is judged on
 * its own, duplicates included. Updates are applied before removals; each
 * removal goes through `RemovingStyle`.
 */
export function sanitizeStyleDeclaration(
  ctx: SanitizeContext,
  element: Element,
  styles: StyleDeclaration,
): void {
  const removeStyles: StagedRemoval[] = [];
  const setStyles: StagedUpdate[] = [];

  for (const decl of styles.declarations()) {
    const key = decodeCss(decl.prop);
    const value = decodeCss(decl.value);

    if (!ctx.policy.allowedCssProperties.has(key)) {
      removeStyles.push({ decl, reason: "not-allowed-style" });
      continue;
    }

    if (CSS_EXPRESSION.test(value) || value.search(ctx.policy.disallowCssPropertyValue) !== -1) {
      removeStyles.push({ decl, reason: "not-allowed-value" });
      continue;
    }

    if (value.search(CSS_URL) === -1) continue;

    const rewritten = rewriteUrls(ctx, element, value);
    if (rewritten === undefined) {
      removeStyles.push({ decl, reason: "not-allowed-url-value" });
      continue;
    }
    if (rewritten !== value) {
      setStyles.push({ decl, name: key, value: rewritten });
      // Only this branch moves an escaped property name to its decoded form
      if (key !== decl.prop) {
        removeStyles.push({ decl, reason: "not-allowed-url-value" });
      }
    }
  }

  for (const { decl, name, value } of setStyles) {
    if (name === decl.prop) {
      decl.value = value;
    } else {
      decl.cloneAfter({ prop: name, value });
    }
  }

  for (const { decl, reason } of removeStyles) {
    const style = toStyleProperty(decl);
    const result = ctx.hooks.emit("RemovingStyle", { tag: element, style, reason });
    if (isCanceled(result)) continue;

    decl.remove();
    ctx.record({ subject: "style", tag: tagNameOf(element), name: style.name, reason });
  }
}

/**
 * Parse a `style` attribute value as a declaration list.
 * Returns undefined for anything else: syntax errors, or text that closes the
 * block and opens rules of its own.
 */
export function parseInlineStyle(value: string): StyleDeclaration | undefined {
  let root: Root;
  try {
    root = postcss.parse(`a{${value}}`);
  } catch (error) {
    if (error instanceof CssSyntaxError) return undefined;
    throw error;
  }

  const [rule, ...rest] = root.nodes;
  if (rule === undefined || rest.length > 0 || rule.type !== "rule") return undefined;
  if ((rule.nodes ?? []).some((node) => node.type !== "decl" && node.type !== "comment")) return undefined;

  return new StyleDeclaration(rule);
}

/**
 * Sanitize the `style` attribute of `element` and write it back in canonical
 * form. An unparseable value is removed as `not-allowed-style`.
 */
export function sanitizeInlineStyle(ctx: SanitizeContext, element: Element): void {
  const attribute = element.getAttributeNode("style");
  if (attribute === null) return;

  const styles = parseInlineStyle(attribute.value);
  if (styles === undefined) {
    removeAttribute(ctx, element, attribute, "not-allowed-style");
    return;
  }

  sanitizeStyleDeclaration(ctx, element, styles);
  element.setAttribute("style", styles.toCss());
}
