/**
 * @parley/a2a: A2A protocol client engine
 *
 * Discover remote A2A agents, send them messages, and receive task updates
 * by polling or webhook push.
 *
 * Public API surface.
 */

// Client
export {
  A2AClient,
  type A2aClientDeps,
  createA2aClient,
  type DiscoverAgentOptions,
  type SendMessageOptions,
  type SendResult,
  type SendStage,
} from "./a2a-client.js";
// Components
export { type AgentCardFetcher, HttpAgentCardFetcher } from "./agent-card-fetcher.js";
export { AgentRegistry, type AgentRegistryConfig, type DiscoverOptions } from "./agent-registry.js";
export { CredentialResolver, EMPTY_HEADERS } from "./credentials.js";
export { type SendOptions, TaskDispatcher, type TaskDispatcherConfig } from "./dispatcher.js";
export {
  FetchHttpClient,
  type HttpClient,
  type HttpRequest,
  type HttpResponse,
  requestForAgent,
} from "./http.js";
export {
  createPushConfig,
  NotificationSubscriptionManager,
  verifyBearer,
  type WebhookConfig,
} from "./notifications.js";
export {
  isAllowedTransition,
  isTerminalState,
  TaskHandle,
  type TaskHandleInit,
  type TransitionOutcome,
} from "./task-handle.js";
// Configuration
export { ENV_KEYS, loadA2aConfigFromEnv } from "./config.js";
// Tool layer
export { A2AToolMiddleware, createA2aToolMiddleware } from "./middleware.js";
export { type A2aToolNames, a2aToolNames, buildA2aTools } from "./tools.js";
// Types
export type {
  A2aArtifact,
  A2aClientConfig,
  A2aMessage,
  A2aMessagePart,
  AgentCapabilities,
  AgentCard,
  AgentSkill,
  HeaderSet,
  OutboundMessage,
  PushNotificationConfig,
  RegistryEntry,
  SecuritySchemeInfo,
  TaskSnapshot,
  TaskState,
  TaskTransition,
  TaskUpdate,
  ToolDefinition,
  ToolHandler,
  ToolMiddleware,
  ToolRequest,
  ToolResponse,
  UpdateResult,
} from "./types.js";
export {
  AGENT_CARD_PATH,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TOOL_PREFIX,
  RPC_METHODS,
  TASK_STATES,
  TERMINAL_STATES,
} from "./types.js";
// Validation
export {
  A2aClientConfigSchema,
  HeaderMapSchema,
  normalizeAgentUrl,
  parseClientConfig,
  parseTaskState,
  validateMessage,
} from "./validation.js";
