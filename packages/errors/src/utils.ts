import { A2aError } from "./a2a.js";
import { ParleyError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode } from "./catalog.js";

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return Object.hasOwn(ERROR_CATALOG, code);
}

/**
 * Get all error codes in the catalog
 */
export function getAllErrorCodes(): ErrorCode[] {
  return Object.keys(ERROR_CATALOG).filter(isValidErrorCode);
}

/**
 * Wrap an unknown error into a ParleyError.
 * ParleyErrors pass through; anything else becomes an InternalError.
 */
export function wrapError(error: unknown, traceId?: string): ParleyError {
  if (error instanceof ParleyError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { originalName: error.name }, traceId, error);
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError(message, undefined, traceId);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Whether a caller-side retry of the failed call could succeed.
 * Non-A2A errors are treated as not retryable.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof A2aError && error.retryable;
}
