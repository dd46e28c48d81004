/**
 * Error Catalog - Single Source of Truth
 *
 * Each error code maps to an HTTP status code, a gRPC canonical code and the
 * base error type it is raised as.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, sanitize, hooks
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "ExternalError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // SANITIZE ERRORS: Markup sanitization
  // ============================================================================
  SANITIZE_CONFIGURATION_INVALID: {
    domain: "sanitize",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid sanitizer configuration",
    description: "The sanitizer options failed schema validation",
  },
  SANITIZE_CONTENT_BLOCKED: {
    domain: "sanitize",
    httpStatus: 422,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Content blocked",
    description: "The markup exceeds the configured maximum input length",
  },

  // ============================================================================
  // HOOK ERRORS: Decision hook registry
  // ============================================================================
  HOOK_CONFIGURATION_INVALID: {
    domain: "hooks",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid hook configuration",
    description: "A hook registry or handler option is out of range",
  },
  HOOK_EXECUTION_FAILED: {
    domain: "hooks",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Hook execution failed",
    description: "An interceptor handler threw while deciding on a sanitizer event",
  },
  HOOK_REENTRANCY_EXCEEDED: {
    domain: "hooks",
    httpStatus: 500,
    grpcCode: "RESOURCE_EXHAUSTED" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Hook re-entrancy exceeded",
    description: "Nested emits from inside handlers went past the configured depth",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
