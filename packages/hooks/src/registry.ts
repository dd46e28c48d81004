import {
  HookConfigurationError,
  HookExecutionError,
  HookReentrancyError,
} from "@sanitas/errors";
import { CONTINUE_RESULT, DEFAULT_MAX_DEPTH, HOOK_PRIORITY } from "./constants.js";
import type {
  EventMap,
  EventName,
  HookOptions,
  HookRegistryConfig,
  HookResult,
  InterceptorEntry,
  InterceptorHandler,
  ObserverEntry,
  ObserverHandler,
} from "./types.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

type InterceptorTable<I extends EventMap> = { [E in keyof I]?: readonly InterceptorEntry<I[E]>[] };
type ObserverTable<O extends EventMap> = { [E in keyof O]?: readonly ObserverEntry<O[E]>[] };

/**
 * Binary search for insertion index into a sorted array.
 * Maintains stable insertion order for equal priorities (insert after existing same-priority entries).
 */
function findInsertIndex(entries: readonly { readonly priority: number }[], priority: number): number {
  let low = 0;
  let high = entries.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const midEntry = entries[mid];
    if (midEntry !== undefined && midEntry.priority <= priority) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

function insertSorted<T extends { readonly priority: number }>(
  existing: readonly T[],
  entry: T,
): readonly T[] {
  const insertIdx = findInsertIndex(existing, entry.priority);
  return [...existing.slice(0, insertIdx), entry, ...existing.slice(insertIdx)];
}

function without<T>(existing: readonly T[], entry: T): readonly T[] | undefined {
  const idx = existing.indexOf(entry);
  if (idx === -1) return existing;
  const updated = [...existing.slice(0, idx), ...existing.slice(idx + 1)];
  return updated.length === 0 ? undefined : updated;
}

function resolvePriority(options: HookOptions<never> | undefined): number {
  const priority = options?.priority ?? HOOK_PRIORITY.NORMAL;
  if (!Number.isFinite(priority)) {
    throw new HookConfigurationError(`priority must be a finite number, got ${priority}`);
  }
  return priority;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// ---------------------------------------------------------------------------
// HookRegistry
// ---------------------------------------------------------------------------

/**
 * Synchronous, priority-ordered hook registry.
 *
 * `I` maps interceptor events to their payloads: handlers run as a waterfall
 * and may `block` or `modify`. `O` maps observer events: handlers are notified
 * in order and their failures never abort the chain.
 *
 * Handler arrays are replaced, never mutated, so registering or disposing from
 * inside a handler does not disturb an emit that is already iterating.
 */
export class HookRegistry<I extends EventMap, O extends EventMap = Record<never, never>> {
  private interceptors: InterceptorTable<I> = {};
  private observers: ObserverTable<O> = {};
  private readonly counts = new Map<string, number>();
  private readonly maxDepth: number;
  private readonly onObserverError: ((event: string, error: Error) => void) | undefined;
  private depth = 0;

  constructor(config?: HookRegistryConfig) {
    const maxDepth = config?.maxDepth ?? DEFAULT_MAX_DEPTH;

    if (!Number.isFinite(maxDepth) || maxDepth < 1) {
      throw new HookConfigurationError(`maxDepth must be a positive integer, got ${maxDepth}`, [
        "maxDepth must be >= 1",
      ]);
    }

    this.maxDepth = maxDepth;
    this.onObserverError = config?.onObserverError;
  }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  /**
   * Register a handler for an interceptor event.
   * Returns a disposer function that removes the handler.
   */
  intercept<E extends EventName<I>>(
    event: E,
    handler: InterceptorHandler<I[E]>,
    options?: HookOptions<I[E]>,
  ): () => void {
    const entry: InterceptorEntry<I[E]> = {
      handler,
      priority: resolvePriority(options),
      once: options?.once ?? false,
      match: options?.match,
    };

    this.interceptors[event] = insertSorted(this.interceptors[event] ?? [], entry);
    this.adjustCount(event, 1);

    return this.disposer(() => this.removeInterceptor(event, entry));
  }

  /**
   * Register a handler for an observer event.
   * Returns a disposer function that removes the handler.
   */
  observe<E extends EventName<O>>(
    event: E,
    handler: ObserverHandler<O[E]>,
    options?: HookOptions<O[E]>,
  ): () => void {
    const entry: ObserverEntry<O[E]> = {
      handler,
      priority: resolvePriority(options),
      once: options?.once ?? false,
      match: options?.match,
    };

    this.observers[event] = insertSorted(this.observers[event] ?? [], entry);
    this.adjustCount(event, 1);

    return this.disposer(() => this.removeObserver(event, entry));
  }

  // -------------------------------------------------------------------------
  // Emit
  // -------------------------------------------------------------------------

  /**
   * Emit an interceptor event. Returns HookResult with waterfall semantics:
   * the first `block` wins, `modify` replaces the payload seen by later handlers.
   */
  emit<E extends EventName<I>>(event: E, data: I[E]): HookResult<I[E]> {
    // Fast path: no handlers
    const entries = this.interceptors[event];
    if (entries === undefined || entries.length === 0) {
      return CONTINUE_RESULT;
    }

    this.enter(event);
    try {
      let currentData = data;
      let modified = false;

      for (const entry of entries) {
        let result: HookResult<I[E]>;
        try {
          if (entry.match !== undefined && !entry.match(currentData)) continue;
          if (entry.once) this.removeInterceptor(event, entry);
          result = entry.handler(currentData);
        } catch (err) {
          if (err instanceof HookReentrancyError) {
            throw err;
          }
          const error = toError(err);
          throw new HookExecutionError(event, error.message, error);
        }

        if (result.action === "block") {
          return result;
        }
        if (result.action === "modify") {
          currentData = result.data;
          modified = true;
        }
        // "continue": data unchanged, move to next handler
      }

      return modified ? { action: "modify", data: currentData } : CONTINUE_RESULT;
    } finally {
      this.depth--;
    }
  }

  /**
   * Notify observers of an event. Observer failures go to `onObserverError`
   * (or a console warning) and the remaining observers still run.
   */
  notify<E extends EventName<O>>(event: E, data: O[E]): void {
    const entries = this.observers[event];
    if (entries === undefined || entries.length === 0) {
      return;
    }

    this.enter(event);
    try {
      for (const entry of entries) {
        try {
          if (entry.match !== undefined && !entry.match(data)) continue;
          if (entry.once) this.removeObserver(event, entry);
          entry.handler(data);
        } catch (err) {
          // Re-entrancy errors should propagate
          if (err instanceof HookReentrancyError) {
            throw err;
          }
          this.reportObserverError(event, toError(err));
        }
      }
    } finally {
      this.depth--;
    }
  }

  // -------------------------------------------------------------------------
  // Utilities
  // -------------------------------------------------------------------------

  /** Whether any handler (interceptor or observer) is registered for an event */
  hasHandlers(event: EventName<I> | EventName<O>): boolean {
    return this.handlerCount(event) > 0;
  }

  /** Get the number of handlers registered for an event */
  handlerCount(event: EventName<I> | EventName<O>): number {
    return this.counts.get(event) ?? 0;
  }

  /** Remove all handlers for a specific event, or all events if no arg */
  clear(event?: EventName<I> | EventName<O>): void {
    if (event !== undefined) {
      Reflect.deleteProperty(this.interceptors, event);
      Reflect.deleteProperty(this.observers, event);
      this.counts.delete(event);
    } else {
      this.interceptors = {};
      this.observers = {};
      this.counts.clear();
    }
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private enter(event: string): void {
    const next = this.depth + 1;
    if (next > this.maxDepth) {
      throw new HookReentrancyError(event, next, this.maxDepth);
    }
    this.depth = next;
  }

  private disposer(remove: () => void): () => void {
    let disposed = false;
    return () => {
      if (disposed) return;
      disposed = true;
      remove();
    };
  }

  private removeInterceptor<E extends EventName<I>>(event: E, entry: InterceptorEntry<I[E]>): void {
    const existing = this.interceptors[event];
    if (existing === undefined || !existing.includes(entry)) return;

    const updated = without(existing, entry);
    if (updated === undefined) {
      delete this.interceptors[event];
    } else {
      this.interceptors[event] = updated;
    }
    this.adjustCount(event, -1);
  }

  private removeObserver<E extends EventName<O>>(event: E, entry: ObserverEntry<O[E]>): void {
    const existing = this.observers[event];
    if (existing === undefined || !existing.includes(entry)) return;

    const updated = without(existing, entry);
    if (updated === undefined) {
      delete this.observers[event];
    } else {
      this.observers[event] = updated;
    }
    this.adjustCount(event, -1);
  }

  private adjustCount(event: string, delta: number): void {
    const next = (this.counts.get(event) ?? 0) + delta;
    if (next <= 0) {
      this.counts.delete(event);
    } else {
      this.counts.set(event, next);
    }
  }

  private reportObserverError(event: string, error: Error): void {
    if (this.onObserverError) {
      this.onObserverError(event, error);
      return;
    }
    console.warn(`[sanitas/hooks] Observer for '${event}' threw: ${error.message}`);
  }
}
