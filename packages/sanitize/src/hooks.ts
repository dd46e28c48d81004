import { HookRegistry, type HookRegistryConfig, type HookResult } from "@sanitas/hooks";
import type { CssRule } from "./css/rules.js";
import type { StyleProperty } from "./css/declaration.js";
import type { RemoveReason } from "./types.js";

// ---------------------------------------------------------------------------
// Interceptor Event Data (block cancels the removal, modify rewrites)
// ---------------------------------------------------------------------------

export interface RemovingTagData {
  readonly tag: Element;
  readonly reason: RemoveReason;
}

export interface RemovingAttributeData {
  readonly tag: Element;
  readonly attribute: Attr;
  readonly reason: RemoveReason;
}

export interface RemovingStyleData {
  readonly tag: Element;
  readonly style: StyleProperty;
  readonly reason: RemoveReason;
}

export interface RemovingAtRuleData {
  /** The `<style>` element owning the stylesheet */
  readonly tag: Element;
  readonly rule: CssRule;
}

export interface RemovingCommentData {
  readonly comment: Comment;
}

export interface RemovingCssClassData {
  readonly tag: Element;
  readonly cssClass: string;
  readonly reason: RemoveReason;
}

export interface FilterUrlData {
  readonly tag: Element;
  readonly originalUrl: string;
  /** Candidate value; `undefined` means the URL will be rejected */
  readonly sanitizedUrl: string | undefined;
}

export interface PostProcessNodeData {
  readonly document: Document;
  readonly node: Node;
  /** When non-empty on a `modify` result, these nodes replace `node` */
  readonly replacementNodes: readonly Node[];
}

// ---------------------------------------------------------------------------
// Observer Event Data
// ---------------------------------------------------------------------------

export interface PostProcessDomData {
  readonly document: Document;
}

// ---------------------------------------------------------------------------
// Event Maps
// ---------------------------------------------------------------------------

export interface SanitizerInterceptors {
  readonly RemovingTag: RemovingTagData;
  readonly RemovingAttribute: RemovingAttributeData;
  readonly RemovingStyle: RemovingStyleData;
  readonly RemovingAtRule: RemovingAtRuleData;
  readonly RemovingComment: RemovingCommentData;
  readonly RemovingCssClass: RemovingCssClassData;
  readonly FilterUrl: FilterUrlData;
  readonly PostProcessNode: PostProcessNodeData;
}

export interface SanitizerObservers {
  readonly PostProcessDom: PostProcessDomData;
}

export type SanitizerHooks = HookRegistry<SanitizerInterceptors, SanitizerObservers>;

export function createSanitizerHooks(config?: HookRegistryConfig): SanitizerHooks {
  return new HookRegistry<SanitizerInterceptors, SanitizerObservers>(config);
}

/** A removal goes ahead unless some handler blocked it */
export function isCanceled<T>(result: HookResult<T>): boolean {
  return result.action === "block";
}
