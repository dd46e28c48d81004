/**
 * OTel metrics for sanitize calls.
 *
 * Lazily initialized: instruments are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";
import type { SanitizeRemoval } from "./types.js";

const METER_NAME = "sanitas.sanitize";

/**
 * Entry point a sanitize call went through.
 */
export type SanitizeMode = "fragment" | "document" | "dom";

let _removals: Counter | undefined;
let _duration: Histogram | undefined;

/**
 * Get the counter for applied removals.
 * Lazily creates the counter on first access.
 */
export function getRemovalCounter(): Counter {
  if (_removals === undefined) {
    _removals = metrics.getMeter(METER_NAME).createCounter("sanitas.sanitize.removals", {
      description: "Removals applied by the sanitizer, by subject and reason",
    });
  }
  return _removals;
}

/**
 * Get the histogram for sanitize call duration in milliseconds.
 * Lazily creates the histogram on first access.
 */
export function getSanitizeDuration(): Histogram {
  if (_duration === undefined) {
    _duration = metrics.getMeter(METER_NAME).createHistogram("sanitas.sanitize.duration_ms", {
      description: "Sanitize call duration in milliseconds",
      unit: "ms",
    });
  }
  return _duration;
}

export function recordRemoval(removal: SanitizeRemoval): void {
  getRemovalCounter().add(1, {
    subject: removal.subject,
    reason: removal.reason ?? "none",
  });
}

export function recordDuration(mode: SanitizeMode, durationMs: number): void {
  getSanitizeDuration().record(durationMs, { mode });
}
