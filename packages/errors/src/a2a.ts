/**
 * A2A errors: Agent-to-Agent protocol client
 *
 * Abstract base: A2aError
 * Concrete:
 *   - InvalidAgentUrlError  (A2A_INVALID_URL)
 *   - UnreachableError      (A2A_UNREACHABLE)
 *   - HttpStatusError       (A2A_HTTP_STATUS)
 *   - MalformedCardError    (A2A_MALFORMED_CARD)
 *   - ProtocolError         (A2A_PROTOCOL_ERROR)
 *   - RemoteRpcError        (A2A_RPC_ERROR)
 *   - DiscoveryError        (A2A_DISCOVERY_FAILED)
 *   - TaskTerminalError     (A2A_TASK_TERMINAL)
 */

import { ParleyError } from "./base.js";

/** The client operation during which a network or parsing failure happened. */
export type A2aStage = "discovery" | "send" | "poll" | "cancel";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class A2aError extends ParleyError {
  /** Whether repeating the same call could plausibly succeed. */
  abstract readonly retryable: boolean;
}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

export class InvalidAgentUrlError extends A2aError {
  readonly _tag = "ValidationError" as const;
  readonly code = "A2A_INVALID_URL" as const;
  readonly retryable = false;
  readonly agentUrl: string;

  constructor(agentUrl: string) {
    super(`Invalid A2A agent URL "${agentUrl}": expected an http:// or https:// URL`);
    this.agentUrl = agentUrl;
  }
}

export class UnreachableError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_UNREACHABLE" as const;
  readonly retryable = true;
  readonly agentUrl: string;
  readonly stage: A2aStage;

  constructor(agentUrl: string, stage: A2aStage, reason: string, cause?: Error) {
    super(
      `A2A ${stage} request to "${agentUrl}" failed: ${reason}`,
      undefined,
      undefined,
      cause ? { cause } : undefined,
    );
    this.agentUrl = agentUrl;
    this.stage = stage;
  }
}

export class HttpStatusError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_HTTP_STATUS" as const;
  readonly agentUrl: string;
  readonly stage: A2aStage;
  readonly status: number;
  readonly responseBody: string;

  constructor(agentUrl: string, stage: A2aStage, status: number, responseBody = "") {
    super(
      `A2A ${stage} request to "${agentUrl}" returned HTTP ${status}${responseBody ? `: ${responseBody}` : ""}`,
    );
    this.agentUrl = agentUrl;
    this.stage = stage;
    this.status = status;
    this.responseBody = responseBody;
  }

  /** Only rate limiting and server-side failures are worth repeating. */
  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

export class MalformedCardError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_MALFORMED_CARD" as const;
  readonly retryable = false;
  readonly agentUrl: string;
  readonly stage = "discovery" as const;

  constructor(agentUrl: string, reason: string, cause?: Error) {
    super(
      `Malformed agent card from "${agentUrl}": ${reason}`,
      undefined,
      undefined,
      cause ? { cause } : undefined,
    );
    this.agentUrl = agentUrl;
  }
}

export class ProtocolError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_PROTOCOL_ERROR" as const;
  readonly retryable = false;
  readonly agentUrl: string;
  readonly stage: A2aStage;

  constructor(agentUrl: string, stage: A2aStage, reason: string, cause?: Error) {
    super(
      `A2A ${stage} response from "${agentUrl}" is malformed: ${reason}`,
      undefined,
      undefined,
      cause ? { cause } : undefined,
    );
    this.agentUrl = agentUrl;
    this.stage = stage;
  }
}

export class RemoteRpcError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_RPC_ERROR" as const;
  readonly retryable = false;
  readonly agentUrl: string;
  readonly stage: A2aStage;
  readonly rpcCode: number;
  readonly rpcMessage: string;

  constructor(agentUrl: string, stage: A2aStage, rpcCode: number, rpcMessage: string) {
    super(`A2A ${stage} request to "${agentUrl}" failed with JSON-RPC error ${rpcCode}: ${rpcMessage}`);
    this.agentUrl = agentUrl;
    this.stage = stage;
    this.rpcCode = rpcCode;
    this.rpcMessage = rpcMessage;
  }
}

/**
 * Discovery failure encountered on the way to a send. The original failure
 * is kept as `cause`; retryability follows it.
 */
export class DiscoveryError extends A2aError {
  readonly _tag = "ExternalError" as const;
  readonly code = "A2A_DISCOVERY_FAILED" as const;
  readonly agentUrl: string;
  readonly stage = "discovery" as const;
  readonly retryable: boolean;

  constructor(agentUrl: string, cause: Error) {
    super(`A2A discovery failed for "${agentUrl}": ${cause.message}`, undefined, undefined, {
      cause,
    });
    this.agentUrl = agentUrl;
    this.retryable = cause instanceof A2aError ? cause.retryable : false;
  }
}

export class TaskTerminalError extends A2aError {
  readonly _tag = "ConflictError" as const;
  readonly code = "A2A_TASK_TERMINAL" as const;
  readonly retryable = false;
  readonly taskId: string;
  readonly state: string;
  readonly attemptedState: string | undefined;

  constructor(taskId: string, state: string, attemptedState?: string) {
    super(
      `A2A task ${taskId} is already ${state}; refusing update${attemptedState ? ` to ${attemptedState}` : ""}`,
    );
    this.taskId = taskId;
    this.state = state;
    this.attemptedState = attemptedState;
  }
}
