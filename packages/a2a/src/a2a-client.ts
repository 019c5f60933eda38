/**
 * A2AClient: facade over discovery, dispatch and push notifications.
 *
 * Owns one CredentialResolver, AgentRegistry, TaskDispatcher and
 * NotificationSubscriptionManager; all of them are created with the client
 * and torn down by close().
 */

import {
  type A2aStage,
  DiscoveryError,
  getErrorMessage,
  InternalError,
  InvalidAgentUrlError,
  wrapError,
} from "@parley/errors";
import { addSpanEvent, withSpan } from "@parley/telemetry";
import { type AgentCardFetcher, HttpAgentCardFetcher } from "./agent-card-fetcher.js";
import { AgentRegistry } from "./agent-registry.js";
import { CredentialResolver } from "./credentials.js";
import { TaskDispatcher } from "./dispatcher.js";
import { FetchHttpClient, type HttpClient } from "./http.js";
import { NotificationSubscriptionManager, type WebhookConfig } from "./notifications.js";
import type { TaskHandle } from "./task-handle.js";
import type {
  A2aClientConfig,
  AgentCard,
  OutboundMessage,
  RegistryEntry,
  UpdateResult,
} from "./types.js";
import { DEFAULT_TIMEOUT_MS } from "./types.js";
import { normalizeAgentUrl, parseClientConfig } from "./validation.js";
import { toOutboundMessage } from "./wire.js";

const LOG_PREFIX = "[A2AClient]";

function toError(error: unknown): Error {
  return error instanceof Error ? error : wrapError(error);
}

/** Collaborators that tests or hosts may replace */
export interface A2aClientDeps {
  readonly http?: HttpClient | undefined;
  readonly fetcher?: AgentCardFetcher | undefined;
}

export interface DiscoverAgentOptions {
  /** Re-fetch and replace a cached card */
  readonly refresh?: boolean | undefined;
  readonly signal?: AbortSignal | undefined;
}

export interface SendMessageOptions {
  readonly messageId?: string | undefined;
  readonly contextId?: string | undefined;
  readonly signal?: AbortSignal | undefined;
}

/** Stage at which a discover-then-send attempt failed */
export type SendStage = Extract<A2aStage, "discovery" | "send">;

export type SendResult =
  | { readonly ok: true; readonly card: AgentCard; readonly handle: TaskHandle }
  | { readonly ok: false; readonly stage: SendStage; readonly error: Error };

export class A2AClient {
  private readonly credentials: CredentialResolver;
  private readonly registry: AgentRegistry;
  private readonly dispatcher: TaskDispatcher;
  private readonly notifications: NotificationSubscriptionManager;
  private readonly webhook: WebhookConfig | undefined;
  private readonly knownAgentUrls: readonly string[];
  private knownAgentsDiscovery: Promise<void> | undefined;
  private closed = false;

  constructor(config: A2aClientConfig = {}, deps: A2aClientDeps = {}) {
    const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const http = deps.http ?? new FetchHttpClient();

    this.credentials = new CredentialResolver(config.headers);
    this.registry = new AgentRegistry({
      fetcher: deps.fetcher ?? new HttpAgentCardFetcher(http, config.agentCardPath),
      credentials: this.credentials,
      timeoutMs,
    });
    this.webhook =
      config.webhookUrl !== undefined && config.webhookToken !== undefined
        ? { webhookUrl: config.webhookUrl, webhookToken: config.webhookToken }
        : undefined;
    this.notifications = new NotificationSubscriptionManager(this.webhook?.webhookToken);
    this.dispatcher = new TaskDispatcher({
      registry: this.registry,
      credentials: this.credentials,
      http,
      timeoutMs,
      subscriptions: this.notifications,
    });
    this.knownAgentUrls = config.knownAgentUrls ?? [];
  }

  // -------------------------------------------------------------------------
  // Discovery
  // -------------------------------------------------------------------------

  /**
   * Fetch (or return the cached) Agent Card for `agentUrl`.
   */
  async discoverAgent(agentUrl: string, options: DiscoverAgentOptions = {}): Promise<AgentCard> {
    this.assertOpen();
    const url = this.requireUrl(agentUrl);
    return withSpan(
      "parley.a2a.discover",
      {
        "a2a.agent_url": url,
        "a2a.cached": this.registry.has(url),
        "a2a.refresh": options.refresh === true,
      },
      () => this.registry.discoverOrFetch(url, options),
    );
  }

  /**
   * Every discovered agent, in discovery order. Configured known agents are
   * discovered before the first listing.
   */
  async listDiscoveredAgents(): Promise<readonly RegistryEntry[]> {
    this.assertOpen();
    await this.discoverKnownAgents();
    return this.registry.list();
  }

  /**
   * Discover the configured known agents. Runs once per client; later calls
   * share the first run. Failures are logged and skipped.
   */
  discoverKnownAgents(): Promise<void> {
    this.assertOpen();
    this.knownAgentsDiscovery ??= this.runKnownAgentDiscovery();
    return this.knownAgentsDiscovery;
  }

  // -------------------------------------------------------------------------
  // Sending
  // -------------------------------------------------------------------------

  /**
   * Discover-then-send as a two-stage result. Never rejects.
   */
  async trySendMessage(
    agentUrl: string,
    message: string | OutboundMessage,
    options: SendMessageOptions = {},
  ): Promise<SendResult> {
    if (this.closed) {
      return { ok: false, stage: "discovery", error: new InternalError("A2A client is closed") };
    }
    const url = normalizeAgentUrl(agentUrl);
    if (url === "") {
      return { ok: false, stage: "discovery", error: new InvalidAgentUrlError(agentUrl) };
    }

    return withSpan(
      "parley.a2a.send",
      { "a2a.agent_url": url, "a2a.push": this.webhook !== undefined },
      async (): Promise<SendResult> => {
        let card: AgentCard;
        try {
          card = await this.registry.discoverOrFetch(url, { signal: options.signal });
        } catch (error) {
          addSpanEvent("a2a.send.failed", { "a2a.stage": "discovery" });
          return { ok: false, stage: "discovery", error: toError(error) };
        }

        const outbound = toOutboundMessage(message);
        let handle: TaskHandle;
        try {
          handle = await this.dispatcher.dispatch(
            url,
            card,
            {
              ...outbound,
              messageId: options.messageId ?? outbound.messageId,
              contextId: options.contextId ?? outbound.contextId,
            },
            { webhook: this.webhook, signal: options.signal },
          );
        } catch (error) {
          addSpanEvent("a2a.send.failed", { "a2a.stage": "send" });
          return { ok: false, stage: "send", error: toError(error) };
        }

        addSpanEvent("a2a.task.created", {
          "a2a.task_id": handle.taskId,
          "a2a.task_state": handle.state,
        });
        return { ok: true, card, handle };
      },
    );
  }

  /**
   * Send `message` to `agentUrl`, discovering it first when unseen.
   *
   * @throws DiscoveryError when the agent card cannot be obtained
   * @throws the send-stage error (UnreachableError, HttpStatusError,
   *   ProtocolError, RemoteRpcError) when dispatch fails
   */
  async sendMessage(
    agentUrl: string,
    message: string | OutboundMessage,
    options: SendMessageOptions = {},
  ): Promise<TaskHandle> {
    this.assertOpen();
    const result = await this.trySendMessage(agentUrl, message, options);
    if (result.ok) return result.handle;
    if (result.stage === "discovery" && !options.signal?.aborted) {
      throw new DiscoveryError(agentUrl, result.error);
    }
    throw result.error;
  }

  // -------------------------------------------------------------------------
  // Task lifecycle
  // -------------------------------------------------------------------------

  /** One tasks/get round trip; updates and returns `handle` */
  async refreshTask(handle: TaskHandle, signal?: AbortSignal): Promise<TaskHandle> {
    this.assertOpen();
    return withSpan(
      "parley.a2a.poll",
      { "a2a.agent_url": handle.agentUrl, "a2a.task_id": handle.taskId },
      () => this.dispatcher.poll(handle, signal),
    );
  }

  /** One tasks/cancel round trip; updates and returns `handle` */
  async cancelTask(handle: TaskHandle, signal?: AbortSignal): Promise<TaskHandle> {
    this.assertOpen();
    return withSpan(
      "parley.a2a.cancel",
      { "a2a.agent_url": handle.agentUrl, "a2a.task_id": handle.taskId },
      () => this.dispatcher.cancel(handle, signal),
    );
  }

  /**
   * Hand one webhook delivery to the client. `payload` is the raw request
   * body (string) or its parsed JSON; `authHeader` the raw Authorization
   * header. Never throws, also after close(): the table is empty by then,
   * so an authenticated delivery reports "unknown-correlation".
   */
  onNotification(payload: unknown, authHeader: string | null | undefined): UpdateResult {
    const result = this.notifications.onNotification(payload, authHeader);
    addSpanEvent("a2a.notification", { "a2a.result": result.kind });
    return result;
  }

  /** Handle registered under `correlationToken`, if any */
  getPendingTask(correlationToken: string): TaskHandle | undefined {
    return this.notifications.get(correlationToken);
  }

  /** Forget a push registration (e.g. once the caller is done with a task) */
  releaseTask(handle: TaskHandle): boolean {
    return handle.correlationToken !== undefined
      ? this.notifications.unregister(handle.correlationToken)
      : false;
  }

  get pendingCount(): number {
    return this.notifications.pendingCount;
  }

  get pushEnabled(): boolean {
    return this.webhook !== undefined;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /** Drop every cached card and pending registration. Idempotent. */
  close(): void {
    this.closed = true;
    this.registry.clear();
    this.notifications.clear();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private assertOpen(): void {
    if (this.closed) {
      throw new InternalError("A2A client is closed");
    }
  }

  private requireUrl(agentUrl: string): string {
    const url = normalizeAgentUrl(agentUrl);
    if (url === "") {
      throw new InvalidAgentUrlError(agentUrl);
    }
    return url;
  }

  private async runKnownAgentDiscovery(): Promise<void> {
    const results = await Promise.allSettled(
      this.knownAgentUrls.map((url) => this.registry.discoverOrFetch(url)),
    );
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        console.warn(
          `${LOG_PREFIX} Failed to discover known agent ${this.knownAgentUrls[index] ?? "?"}: ${getErrorMessage(result.reason)}`,
        );
      }
    });
  }
}

/**
 * Factory: validates the configuration, then creates the client.
 *
 * @throws ConfigValidationError listing every invalid field
 */
export function createA2aClient(config?: unknown, deps?: A2aClientDeps): A2AClient {
  return new A2AClient(parseClientConfig(config), deps);
}
