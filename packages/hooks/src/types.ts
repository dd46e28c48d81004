// ---------------------------------------------------------------------------
// Event maps
// ---------------------------------------------------------------------------

/**
 * Event map shape: event name → payload type. Interfaces and type literals
 * both qualify.
 */
export type EventMap = object;

/** String event names declared by an event map */
export type EventName<M extends EventMap> = Extract<keyof M, string>;

// ---------------------------------------------------------------------------
// Hook Result (interceptor return type)
// ---------------------------------------------------------------------------

/** Result returned by interceptor hook handlers */
export type HookResult<T> =
  | { readonly action: "continue" }
  | { readonly action: "block"; readonly reason: string }
  | { readonly action: "modify"; readonly data: T };

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Options for hook registration */
export interface HookOptions<T = unknown> {
  readonly priority?: number;
  /** Handler only runs when the predicate accepts the (waterfalled) payload */
  readonly match?: (data: T) => boolean;
  /** Remove the handler after its first run */
  readonly once?: boolean;
}

// ---------------------------------------------------------------------------
// Handler Types
// ---------------------------------------------------------------------------

/** Handler for interceptor events: can block or modify the data pipeline */
export type InterceptorHandler<T> = (data: T) => HookResult<T>;

/** Handler for observer events: observe only, cannot block or modify */
export type ObserverHandler<T> = (data: T) => void;

// ---------------------------------------------------------------------------
// Registry Configuration
// ---------------------------------------------------------------------------

/** Configuration for HookRegistry */
export interface HookRegistryConfig {
  /** Maximum re-entrancy depth for emit() calls (default: 10) */
  readonly maxDepth?: number;
  /** Callback invoked when an observer handler throws (instead of console.warn) */
  readonly onObserverError?: (event: string, error: Error) => void;
}

// ---------------------------------------------------------------------------
// Internal Types (used by HookRegistry implementation)
// ---------------------------------------------------------------------------

/** Internal handler entry with metadata */
export interface HandlerEntry<H, T> {
  readonly handler: H;
  readonly priority: number;
  readonly once: boolean;
  readonly match: ((data: T) => boolean) | undefined;
}

export type InterceptorEntry<T> = HandlerEntry<InterceptorHandler<T>, T>;
export type ObserverEntry<T> = HandlerEntry<ObserverHandler<T>, T>;
