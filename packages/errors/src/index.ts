/**
 * @parley/errors
 *
 * Shared error taxonomy for the Parley A2A client packages.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * or `instanceof` for family matching.
 */

export const PACKAGE_NAME = "@parley/errors";

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isParleyError, ParleyError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorMessage,
  isRetryable,
  isValidErrorCode,
  wrapError,
} from "./utils.js";

export { hasCode, isA2aError, isExpectedError } from "./guards.js";

// ============================================================================
// BASE ERRORS
// ============================================================================

export { ConfigValidationError, InternalError } from "./bases/index.js";

// ============================================================================
// A2A ERRORS
// ============================================================================

export {
  A2aError,
  type A2aStage,
  DiscoveryError,
  HttpStatusError,
  InvalidAgentUrlError,
  MalformedCardError,
  ProtocolError,
  RemoteRpcError,
  TaskTerminalError,
  UnreachableError,
} from "./a2a.js";
