/**
 * Typed view of a postcss tree as the closed set of rule kinds the
 * stylesheet sanitizer walks.
 */

import type { AtRule, Container, Rule } from "postcss";
import type { CssRuleType } from "../types.js";
import { StyleDeclaration } from "./declaration.js";

interface RuleBase {
  readonly type: CssRuleType;
  readonly node: Rule | AtRule;
}

/** Selector rule; `children` holds nested rules */
export interface CssStyleRule extends RuleBase {
  readonly kind: "style";
  readonly type: "style";
  readonly node: Rule;
  readonly selectorText: string;
  readonly style: StyleDeclaration;
  readonly children: CssRuleList;
}

/** `@media`, `@supports`, `@document`, block `@layer`, `@container`, `@font-feature-values` */
export interface CssGroupingRule extends RuleBase {
  readonly kind: "grouping";
  readonly node: AtRule;
  readonly conditionText: string;
  readonly children: CssRuleList;
}

/** `@page` and the margin boxes nested in it */
export interface CssPageRule extends RuleBase {
  readonly kind: "page";
  readonly type: "page" | "margin";
  readonly node: AtRule;
  readonly style: StyleDeclaration;
  readonly children: CssRuleList;
}

export interface CssKeyframesRule extends RuleBase {
  readonly kind: "keyframes";
  readonly type: "keyframes";
  readonly node: AtRule;
  readonly name: string;
  readonly rules: CssRuleList;
}

/** One frame (`from`, `50%`, …) of a `@keyframes` block */
export interface CssKeyframeRule extends RuleBase {
  readonly kind: "keyframe";
  readonly type: "keyframe";
  readonly node: Rule;
  readonly keyText: string;
  readonly style: StyleDeclaration;
}

/** Descriptor blocks: `@font-face`, `@counter-style`, `@viewport` */
export interface CssFontFaceRule extends RuleBase {
  readonly kind: "font-face";
  readonly node: AtRule;
  readonly style: StyleDeclaration;
}

/** Statements and blocks the sanitizer keeps or drops whole */
export interface CssOpaqueRule extends RuleBase {
  readonly kind: "opaque";
  readonly node: AtRule;
}

export type CssRule =
  | CssStyleRule
  | CssGroupingRule
  | CssPageRule
  | CssKeyframesRule
  | CssKeyframeRule
  | CssFontFaceRule
  | CssOpaqueRule;

const MARGIN_RULES = new Set([
  "top-left-corner",
  "top-left",
  "top-center",
  "top-right",
  "top-right-corner",
  "bottom-left-corner",
  "bottom-left",
  "bottom-center",
  "bottom-right",
  "bottom-right-corner",
  "left-top",
  "left-middle",
  "left-bottom",
  "right-top",
  "right-middle",
  "right-bottom",
]);

/** `-webkit-keyframes` → `keyframes` */
function unprefixed(name: string): string {
  return name.toLowerCase().replace(/^-[a-z]+-/, "");
}

function toAtRule(node: AtRule): CssRule {
  const name = unprefixed(node.name);
  const hasBlock = node.nodes !== undefined;

  switch (name) {
    case "media":
    case "supports":
    case "document":
    case "container":
      return {
        kind: "grouping",
        type: name,
        node,
        conditionText: node.params,
        children: new CssRuleList(node),
      };
    case "font-feature-values":
      return {
        kind: "grouping",
        type: "font-feature-values",
        node,
        conditionText: node.params,
        children: new CssRuleList(node),
      };
    case "layer":
      if (!hasBlock) return { kind: "opaque", type: "layer", node };
      return {
        kind: "grouping",
        type: "layer",
        node,
        conditionText: node.params,
        children: new CssRuleList(node),
      };
    case "keyframes":
      return {
        kind: "keyframes",
        type: "keyframes",
        node,
        name: node.params,
        rules: new CssRuleList(node, true),
      };
    case "page":
      return {
        kind: "page",
        type: "page",
        node,
        style: new StyleDeclaration(node),
        children: new CssRuleList(node),
      };
    case "font-face":
    case "counter-style":
    case "viewport":
      return { kind: "font-face", type: name, node, style: new StyleDeclaration(node) };
    case "charset":
    case "import":
    case "namespace":
      return { kind: "opaque", type: name, node };
    default:
      if (MARGIN_RULES.has(name)) {
        return {
          kind: "page",
          type: "margin",
          node,
          style: new StyleDeclaration(node),
          children: new CssRuleList(node),
        };
      }
      return { kind: "opaque", type: "unknown", node };
  }
}

function toCssRule(node: Rule | AtRule, inKeyframes: boolean): CssRule {
  if (node.type === "atrule") {
    return toAtRule(node);
  }
  if (inKeyframes) {
    return {
      kind: "keyframe",
      type: "keyframe",
      node,
      keyText: node.selector,
      style: new StyleDeclaration(node),
    };
  }
  return {
    kind: "style",
    type: "style",
    node,
    selectorText: node.selector,
    style: new StyleDeclaration(node),
    children: new CssRuleList(node),
  };
}

/**
 * Live, indexable list of the rules (not declarations or comments) directly
 * inside a postcss container. Items are fresh views on every access.
 */
export class CssRuleList {
  constructor(
    private readonly container: Container,
    private readonly inKeyframes = false,
  ) {}

  get length(): number {
    return this.nodes().length;
  }

  item(index: number): CssRule | undefined {
    const node = this.nodes()[index];
    return node === undefined ? undefined : toCssRule(node, this.inKeyframes);
  }

  /** Snapshot of the current rules */
  toArray(): CssRule[] {
    return this.nodes().map((node) => toCssRule(node, this.inKeyframes));
  }

  deleteRule(index: number): void {
    this.nodes()[index]?.remove();
  }

  /** Remove the first keyframe whose key text matches; false if none did */
  deleteByKeyText(keyText: string): boolean {
    const wanted = keyText.trim().toLowerCase();
    const match = this.nodes().find(
      (node) => node.type === "rule" && node.selector.trim().toLowerCase() === wanted,
    );
    if (match === undefined) return false;
    match.remove();
    return true;
  }

  /** Remove a rule previously obtained from this list */
  remove(rule: CssRule): void {
    if (rule.node.parent === this.container) {
      rule.node.remove();
    }
  }

  private nodes(): (Rule | AtRule)[] {
    const result: (Rule | AtRule)[] = [];
    for (const node of this.container.nodes ?? []) {
      if (node.type === "rule" || node.type === "atrule") result.push(node);
    }
    return result;
  }
}
