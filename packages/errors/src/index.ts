/**
 * @sanitas/errors
 *
 * Shared error taxonomy for the sanitas packages.
 *
 * Errors are built on three behavioral base types:
 * ValidationError, ExternalError, InternalError
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

export const PACKAGE_NAME = "@sanitas/errors" as const;

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isSanitasError, SanitasError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export { wrapError } from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ExternalError, InternalError, ValidationError } from "./bases/index.js";

export type { SanitasErrorOptions, ValidationIssue } from "./types.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export {
  HookConfigurationError,
  HookExecutionError,
  HookReentrancyError,
  SanitizeConfigurationError,
  SanitizeContentBlockedError,
} from "./classes.js";
