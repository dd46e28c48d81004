import { HookRegistry } from "../registry.js";
import type { HookRegistryConfig } from "../types.js";

export interface ScrubData {
  readonly tag: string;
  readonly attribute: string;
}

export interface RewriteData {
  readonly url: string;
}

export interface TestInterceptors {
  readonly Scrub: ScrubData;
  readonly Rewrite: RewriteData;
}

export interface AuditData {
  readonly count: number;
}

export interface TestObservers {
  readonly Audit: AuditData;
}

export function makeRegistry(config?: HookRegistryConfig): HookRegistry<TestInterceptors, TestObservers> {
  return new HookRegistry<TestInterceptors, TestObservers>(config);
}

export function makeScrubData(overrides?: Partial<ScrubData>): ScrubData {
  return {
    tag: "div",
    attribute: "onclick",
    ...overrides,
  };
}
