/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the Parley packages is declared here with
 * its HTTP status, behavioral base type, and whether it represents an
 * expected (caller-caused) condition.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: a2a, config, internal
 */

/**
 * Behavioral base types the catalog codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "ConflictError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    baseType: "InternalError",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // CONFIG ERRORS - Invalid construction-time configuration
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid configuration",
    description: "The client configuration failed validation",
  },

  // ============================================================================
  // A2A ERRORS - Agent-to-Agent protocol client
  // ============================================================================
  A2A_INVALID_URL: {
    domain: "a2a",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid agent URL",
    description: "The agent URL is empty or does not use http/https",
  },
  A2A_UNREACHABLE: {
    domain: "a2a",
    httpStatus: 503,
    baseType: "ExternalError",
    isExpected: false,
    title: "Agent unreachable",
    description: "The remote agent could not be reached or did not answer in time",
  },
  A2A_HTTP_STATUS: {
    domain: "a2a",
    httpStatus: 502,
    baseType: "ExternalError",
    isExpected: false,
    title: "Agent returned an error status",
    description: "The remote agent answered with a non-2xx HTTP status",
  },
  A2A_MALFORMED_CARD: {
    domain: "a2a",
    httpStatus: 502,
    baseType: "ExternalError",
    isExpected: false,
    title: "Malformed agent card",
    description: "The agent card is not valid JSON or lacks required fields",
  },
  A2A_PROTOCOL_ERROR: {
    domain: "a2a",
    httpStatus: 502,
    baseType: "ExternalError",
    isExpected: false,
    title: "Protocol error",
    description: "The remote agent's response does not match the A2A schema",
  },
  A2A_RPC_ERROR: {
    domain: "a2a",
    httpStatus: 502,
    baseType: "ExternalError",
    isExpected: false,
    title: "Remote JSON-RPC error",
    description: "The remote agent answered with a JSON-RPC error object",
  },
  A2A_DISCOVERY_FAILED: {
    domain: "a2a",
    httpStatus: 502,
    baseType: "ExternalError",
    isExpected: false,
    title: "Agent discovery failed",
    description: "The agent card could not be discovered before sending",
  },
  A2A_TASK_TERMINAL: {
    domain: "a2a",
    httpStatus: 409,
    baseType: "ConflictError",
    isExpected: true,
    title: "Task already terminal",
    description: "The task has reached a terminal state and accepts no further updates",
  },
} as const;

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Catalog entry for any code
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

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
