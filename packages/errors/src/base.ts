import {
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
} from "./catalog.js";

/**
 * Wire-safe representation of a ParleyError.
 */
export interface ErrorJSON {
  readonly _tag: string;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly metadata?: Readonly<Record<string, string>> | undefined;
  readonly traceId?: string | undefined;
  readonly timestamp: string;
  readonly cause?: string | undefined;
}

/**
 * Root of every error thrown by Parley packages.
 *
 * Subclasses declare `_tag` (behavioral base type) and `code` (catalog key);
 * HTTP status, domain and expectedness are read from the catalog.
 */
export abstract class ParleyError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  readonly metadata: Readonly<Record<string, string>> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
  }

  get catalogEntry(): ErrorCatalogEntry {
    return ERROR_CATALOG[this.code];
  }

  get httpStatus(): HttpStatusCode {
    return this.catalogEntry.httpStatus;
  }

  get domain(): ErrorDomain {
    return this.catalogEntry.domain;
  }

  get isExpected(): boolean {
    return this.catalogEntry.isExpected;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      domain: this.domain,
      isExpected: this.isExpected,
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.traceId ? { traceId: this.traceId } : {}),
      timestamp: this.timestamp.toISOString(),
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }
}

/**
 * Check if a value is a ParleyError
 */
export function isParleyError(error: unknown): error is ParleyError {
  return error instanceof ParleyError;
}

/**
 * Check if a value is any Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
