import { ExternalError } from "./bases/external-error.js";
import { ValidationError } from "./bases/validation-error.js";

// ============================================================================
// SANITIZE ERRORS
// ============================================================================

/**
 * Thrown when sanitizer options fail schema validation
 */
export class SanitizeConfigurationError extends ValidationError<"SANITIZE_CONFIGURATION_INVALID"> {
  /** Flattened `path: message` strings, one per schema issue */
  readonly configIssues: readonly string[];

  constructor(
    message: string,
    issues: readonly string[] = [],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super({
      code: "SANITIZE_CONFIGURATION_INVALID",
      message,
      metadata,
      traceId,
      issues: issues.map((i) => ({ field: "config", message: i, code: "CONFIG_ISSUE" })),
    });
    this.configIssues = issues;
  }
}

/**
 * Thrown when markup is longer than the caller's configured limit
 */
export class SanitizeContentBlockedError extends ValidationError<"SANITIZE_CONTENT_BLOCKED"> {
  constructor(
    public readonly reason: string,
    public readonly contentLength: number,
    public readonly maxLength: number,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super({
      code: "SANITIZE_CONTENT_BLOCKED",
      message: `Content blocked: ${reason} (length: ${contentLength}, max: ${maxLength})`,
      metadata,
      traceId,
    });
  }
}

// ============================================================================
// HOOK ERRORS
// ============================================================================

export class HookConfigurationError extends ValidationError<"HOOK_CONFIGURATION_INVALID"> {
  readonly configIssues: readonly string[];

  constructor(
    message: string,
    issues: readonly string[] = [],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super({
      code: "HOOK_CONFIGURATION_INVALID",
      message: `Invalid hook configuration: ${message}`,
      metadata,
      traceId,
      issues: issues.map((i) => ({ field: "config", message: i, code: "CONFIG_ISSUE" })),
    });
    this.configIssues = issues;
  }
}

/**
 * Thrown when an interceptor handler throws. The original exception is kept as `cause`.
 */
export class HookExecutionError extends ExternalError<"HOOK_EXECUTION_FAILED"> {
  constructor(
    public readonly hookEvent: string,
    message: string,
    cause?: Error,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super({
      code: "HOOK_EXECUTION_FAILED",
      message: `Hook '${hookEvent}' execution failed: ${message}`,
      metadata,
      traceId,
      cause,
    });
  }
}

export class HookReentrancyError extends ExternalError<"HOOK_REENTRANCY_EXCEEDED"> {
  constructor(
    public readonly hookEvent: string,
    public readonly depth: number,
    public readonly maxDepth: number,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super({
      code: "HOOK_REENTRANCY_EXCEEDED",
      message: `Hook '${hookEvent}' re-entrancy depth ${depth} exceeds maximum ${maxDepth}`,
      metadata,
      traceId,
    });
  }
}
