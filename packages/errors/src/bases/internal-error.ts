import { ParleyError } from "../base.js";

/**
 * Bugs, misuse of a closed client, and anything not otherwise classified.
 */
export class InternalError extends ParleyError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    cause?: Error,
  ) {
    super(message, metadata, traceId, cause ? { cause } : undefined);
  }
}
