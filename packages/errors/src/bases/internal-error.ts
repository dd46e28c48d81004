import { SanitasError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "../catalog.js";

/**
 * Errors caused by bugs. Also the wrapper {@link wrapError} falls back to
 * for foreign exceptions.
 */
export class InternalError extends SanitasError {
  readonly _tag = "InternalError" as const;
  override readonly code = "INTERNAL_ERROR" as const;
  override readonly httpStatus: HttpStatusCode = ERROR_CATALOG.INTERNAL_ERROR.httpStatus;
  override readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.INTERNAL_ERROR.grpcCode;
  override readonly domain: ErrorDomain = ERROR_CATALOG.INTERNAL_ERROR.domain;
  override readonly isExpected = ERROR_CATALOG.INTERNAL_ERROR.isExpected;
}
