export const PACKAGE_NAME = "@sanitas/hooks" as const;

// Constants
export { CONTINUE_RESULT, DEFAULT_MAX_DEPTH, HOOK_PRIORITY } from "./constants.js";
// Registry
export { HookRegistry } from "./registry.js";
// Types
export type {
  EventMap,
  EventName,
  HandlerEntry,
  HookOptions,
  HookRegistryConfig,
  HookResult,
  InterceptorEntry,
  InterceptorHandler,
  ObserverEntry,
  ObserverHandler,
} from "./types.js";
