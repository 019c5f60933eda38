/**
 * Type guards for code-level discrimination.
 */

import { A2aError } from "./a2a.js";
import type { ParleyError } from "./base.js";
import type { ErrorCode } from "./catalog.js";

/** Check if an error belongs to the A2A client family */
export function isA2aError(error: unknown): error is A2aError {
  return error instanceof A2aError;
}

/**
 * Check if a ParleyError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: ParleyError,
  code: C,
): error is ParleyError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (4xx-class).
 * Returns false for non-ParleyError values.
 */
export function isExpectedError(error: unknown): boolean {
  if (
    error !== null &&
    typeof error === "object" &&
    "isExpected" in error &&
    typeof error.isExpected === "boolean"
  ) {
    return error.isExpected;
  }
  return false;
}
