/**
 * Core types for the A2A protocol client.
 *
 * These are Parley-normalized shapes: raw wire JSON is validated by the
 * schemas in validation.ts and converted into these before it reaches
 * callers.
 */

// ---------------------------------------------------------------------------
// Agent Card (discovery result: normalized)
// ---------------------------------------------------------------------------

/**
 * Immutable snapshot of a discovered agent. Replaced wholesale on
 * re-discovery, never mutated.
 */
export interface AgentCard {
  readonly name: string;
  readonly description: string | undefined;
  /** JSON-RPC service endpoint; the agent URL when the card omits it */
  readonly url: string;
  readonly version: string | undefined;
  readonly protocolVersion: string | undefined;
  readonly provider: string | undefined;
  readonly skills: readonly AgentSkill[];
  readonly capabilities: AgentCapabilities;
  readonly defaultInputModes: readonly string[];
  readonly defaultOutputModes: readonly string[];
  readonly securitySchemes: Readonly<Record<string, SecuritySchemeInfo>>;
  /** Names of the security schemes the agent requires */
  readonly security: readonly string[];
}

export interface AgentSkill {
  readonly id: string;
  readonly name: string;
  readonly description: string | undefined;
  readonly tags: readonly string[];
  readonly inputModes: readonly string[] | undefined;
  readonly outputModes: readonly string[] | undefined;
}

export interface AgentCapabilities {
  readonly streaming: boolean;
  readonly pushNotifications: boolean;
  readonly stateTransitionHistory: boolean;
}

export interface SecuritySchemeInfo {
  readonly type: string;
  readonly scheme: string | undefined;
  readonly in: string | undefined;
  readonly name: string | undefined;
}

/** One row of the registry listing. */
export interface RegistryEntry {
  readonly url: string;
  readonly card: AgentCard;
}

// ---------------------------------------------------------------------------
// Headers
// ---------------------------------------------------------------------------

/** Frozen header name → value mapping for one agent URL. */
export type HeaderSet = Readonly<Record<string, string>>;

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export type A2aMessagePart =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "data"; readonly data: Readonly<Record<string, unknown>> }
  | {
      readonly kind: "file";
      readonly uri: string | undefined;
      readonly bytes: string | undefined;
      readonly mimeType: string | undefined;
      readonly name: string | undefined;
    };

export interface A2aMessage {
  readonly role: "user" | "agent";
  readonly parts: readonly A2aMessagePart[];
  readonly messageId: string | undefined;
}

export interface A2aArtifact {
  readonly artifactId: string;
  readonly name: string | undefined;
  readonly description: string | undefined;
  readonly parts: readonly A2aMessagePart[];
}

/**
 * A message destined for one agent. A plain string passed to the client is
 * shorthand for a single text part.
 */
export interface OutboundMessage {
  readonly parts: readonly A2aMessagePart[];
  readonly contextId?: string | undefined;
  readonly taskId?: string | undefined;
  readonly messageId?: string | undefined;
  readonly metadata?: Readonly<Record<string, unknown>> | undefined;
}

// ---------------------------------------------------------------------------
// Task lifecycle
// ---------------------------------------------------------------------------

/**
 * Task states as defined by the A2A protocol.
 */
export type TaskState =
  | "submitted"
  | "working"
  | "input-required"
  | "auth-required"
  | "completed"
  | "failed"
  | "canceled"
  | "rejected";

export const TASK_STATES: readonly TaskState[] = [
  "submitted",
  "working",
  "input-required",
  "auth-required",
  "completed",
  "failed",
  "canceled",
  "rejected",
];

/** Terminal states: no further mutation accepted */
export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>([
  "completed",
  "failed",
  "canceled",
  "rejected",
]);

/** A status change reported by a poll response or a push notification. */
export interface TaskUpdate {
  readonly state: TaskState;
  readonly message?: A2aMessage | undefined;
  readonly artifacts?: readonly A2aArtifact[] | undefined;
}

export interface TaskTransition {
  readonly state: TaskState;
  readonly at: string;
}

/** Plain-data view of a TaskHandle, suitable for tool output and logs. */
export interface TaskSnapshot {
  readonly taskId: string;
  readonly agentUrl: string;
  readonly contextId: string | undefined;
  readonly messageId: string;
  readonly state: TaskState;
  readonly terminal: boolean;
  readonly correlationToken: string | undefined;
  readonly messages: readonly A2aMessage[];
  readonly artifacts: readonly A2aArtifact[];
  readonly history: readonly TaskTransition[];
}

// ---------------------------------------------------------------------------
// Push notifications
// ---------------------------------------------------------------------------

/**
 * Webhook subscription attached to one outbound task.
 */
export interface PushNotificationConfig {
  readonly webhookUrl: string;
  readonly webhookToken: string;
  readonly correlationToken: string;
}

/** Outcome of handing one inbound webhook payload to the client. */
export type UpdateResult =
  | {
      readonly kind: "updated";
      readonly correlationToken: string;
      readonly taskId: string;
      readonly previousState: TaskState;
      readonly state: TaskState;
    }
  | { readonly kind: "unknown-correlation"; readonly correlationToken: string }
  | {
      /** Arrived while the send was in flight; applied once the handle exists */
      readonly kind: "buffered";
      readonly correlationToken: string;
      readonly state: TaskState;
    }
  | { readonly kind: "auth-failed" }
  | { readonly kind: "invalid-payload"; readonly reason: string }
  | {
      readonly kind: "terminal-state";
      readonly correlationToken: string;
      readonly taskId: string;
      readonly state: TaskState;
      readonly attemptedState: TaskState;
    }
  | {
      readonly kind: "invalid-transition";
      readonly correlationToken: string;
      readonly taskId: string;
      readonly state: TaskState;
      readonly attemptedState: TaskState;
    };

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Configuration for the A2AClient.
 */
export interface A2aClientConfig {
  /** Agents discovered once, lazily, before the first listing */
  readonly knownAgentUrls?: readonly string[] | undefined;
  /** Per-call HTTP timeout in milliseconds (default: 300_000) */
  readonly timeoutMs?: number | undefined;
  /** Webhook the remote agents should notify; requires webhookToken */
  readonly webhookUrl?: string | undefined;
  /** Bearer token the webhook expects; requires webhookUrl */
  readonly webhookToken?: string | undefined;
  /** Headers per agent URL, matched exactly after normalization */
  readonly headers?: Readonly<Record<string, Readonly<Record<string, string>>>> | undefined;
  /** Agent Card path below the agent URL (default: /.well-known/agent.json) */
  readonly agentCardPath?: string | undefined;
}

// ---------------------------------------------------------------------------
// Tool exposure
// ---------------------------------------------------------------------------

/** JSON-schema style tool definition for a host orchestration framework. */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, unknown>>;
}

export interface ToolRequest {
  readonly toolName: string;
  readonly input?: unknown;
}

export interface ToolResponse {
  readonly output: unknown;
  readonly metadata?: Readonly<Record<string, unknown>> | undefined;
}

export type ToolHandler = (req: ToolRequest) => Promise<ToolResponse>;

/** Interceptor around a host framework's tool calls. */
export interface ToolMiddleware {
  readonly name: string;
  wrapToolCall(req: ToolRequest, next: ToolHandler): Promise<ToolResponse>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Default per-call timeout; agent tasks may run for minutes */
export const DEFAULT_TIMEOUT_MS = 300_000;

/** Default tool name prefix */
export const DEFAULT_TOOL_PREFIX = "a2a";

/** Well-known Agent Card path */
export const AGENT_CARD_PATH = "/.well-known/agent.json";

/** JSON-RPC method names */
export const RPC_METHODS = {
  send: "message/send",
  get: "tasks/get",
  cancel: "tasks/cancel",
} as const;
