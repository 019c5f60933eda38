/**
 * TaskDispatcher: JSON-RPC calls against a discovered agent.
 *
 * send     → message/send (non-blocking), returns a TaskHandle
 * poll     → tasks/get, applies the reported status to the handle
 * cancel   → tasks/cancel, applies the result to the handle
 *
 * No call waits for task completion, loops or retries.
 */

import { randomUUID } from "node:crypto";
import {
  type A2aStage,
  DiscoveryError,
  HttpStatusError,
  ProtocolError,
  RemoteRpcError,
  TaskTerminalError,
} from "@parley/errors";
import type { AgentRegistry } from "./agent-registry.js";
import type { CredentialResolver } from "./credentials.js";
import { type HttpClient, requestForAgent } from "./http.js";
import {
  createPushConfig,
  type NotificationSubscriptionManager,
  type WebhookConfig,
} from "./notifications.js";
import { TaskHandle } from "./task-handle.js";
import type { AgentCard, OutboundMessage, PushNotificationConfig, TaskUpdate } from "./types.js";
import { DEFAULT_TIMEOUT_MS, RPC_METHODS } from "./types.js";
import {
  formatIssues,
  JsonRpcResponseSchema,
  normalizeAgentUrl,
  parseTaskState,
  RawMessageSchema,
  type RawTask,
  RawTaskSchema,
} from "./validation.js";
import { toArtifacts, toMessage, toWireMessage, toWirePushConfig } from "./wire.js";

/** Longest response body excerpt kept on an HttpStatusError */
const MAX_ERROR_BODY = 500;

export interface TaskDispatcherConfig {
  readonly registry: AgentRegistry;
  readonly credentials: CredentialResolver;
  readonly http: HttpClient;
  readonly timeoutMs?: number | undefined;
  /** Receives the pending registration of every push-enabled send */
  readonly subscriptions?: NotificationSubscriptionManager | undefined;
}

export interface SendOptions {
  /** Ask the agent for push notifications; a fresh correlation token is minted per call */
  readonly webhook?: WebhookConfig | undefined;
  readonly signal?: AbortSignal | undefined;
}

export class TaskDispatcher {
  private readonly registry: AgentRegistry;
  private readonly credentials: CredentialResolver;
  private readonly http: HttpClient;
  private readonly timeoutMs: number;
  private readonly subscriptions: NotificationSubscriptionManager | undefined;

  constructor(config: TaskDispatcherConfig) {
    this.registry = config.registry;
    this.credentials = config.credentials;
    this.http = config.http;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.subscriptions = config.subscriptions;
  }

  /**
   * Discover the agent if needed, then dispatch.
   *
   * @throws DiscoveryError when the agent card cannot be obtained
   */
  async send(
    agentUrl: string,
    message: OutboundMessage,
    options: SendOptions = {},
  ): Promise<TaskHandle> {
    let card: AgentCard;
    try {
      card = await this.registry.discoverOrFetch(agentUrl, { signal: options.signal });
    } catch (error) {
      if (options.signal?.aborted || !(error instanceof Error)) throw error;
      throw new DiscoveryError(agentUrl, error);
    }
    return this.dispatch(agentUrl, card, message, options);
  }

  /**
   * Send `message` to an agent whose card is already known.
   *
   * With a webhook, the correlation token is reserved before the request
   * goes out, so a notification racing the response is kept and replayed.
   * The reservation is dropped again when the send fails or the agent
   * answers with a plain message.
   */
  async dispatch(
    agentUrl: string,
    card: AgentCard,
    message: OutboundMessage,
    options: SendOptions = {},
  ): Promise<TaskHandle> {
    const pushConfig = options.webhook ? createPushConfig(options.webhook) : undefined;
    const token = pushConfig?.correlationToken;
    if (token !== undefined) {
      this.subscriptions?.reserve(token);
    }

    let handle: TaskHandle;
    try {
      handle = await this.post(agentUrl, card, message, pushConfig, options.signal);
    } catch (error) {
      if (token !== undefined) this.subscriptions?.unregister(token);
      throw error;
    }

    if (token !== undefined) {
      if (handle.correlationToken === token) {
        this.subscriptions?.registerPending(token, handle);
      } else {
        this.subscriptions?.unregister(token);
      }
    }
    return handle;
  }

  private async post(
    agentUrl: string,
    card: AgentCard,
    message: OutboundMessage,
    pushConfig: PushNotificationConfig | undefined,
    signal: AbortSignal | undefined,
  ): Promise<TaskHandle> {
    const url = normalizeAgentUrl(agentUrl);
    const messageId = message.messageId ?? randomUUID();

    const result = await this.call(
      url,
      card.url,
      "send",
      RPC_METHODS.send,
      {
        message: toWireMessage(message, messageId),
        configuration: {
          blocking: false,
          acceptedOutputModes: [...card.defaultOutputModes],
          ...(pushConfig ? { pushNotificationConfig: toWirePushConfig(pushConfig) } : {}),
        },
      },
      signal,
    );

    const task = RawTaskSchema.safeParse(result);
    if (task.success) {
      const update = this.toUpdate(url, "send", task.data);
      return new TaskHandle({
        taskId: task.data.id,
        agentUrl: url,
        messageId,
        state: update.state,
        contextId: task.data.contextId ?? message.contextId,
        correlationToken: pushConfig?.correlationToken,
        messages: update.message ? [update.message] : [],
        artifacts: update.artifacts,
      });
    }

    // Agents may answer a message directly instead of opening a task
    const reply = RawMessageSchema.safeParse(result);
    if (reply.success) {
      return new TaskHandle({
        taskId: reply.data.taskId ?? reply.data.messageId ?? messageId,
        agentUrl: url,
        messageId,
        state: "completed",
        contextId: reply.data.contextId ?? message.contextId,
        messages: [toMessage(reply.data)],
      });
    }

    throw new ProtocolError(
      url,
      "send",
      `result is neither a task nor a message (${formatIssues(task.error).join("; ")})`,
    );
  }

  /**
   * One tasks/get round trip.
   *
   * @throws TaskTerminalError if the handle is already terminal
   */
  async poll(handle: TaskHandle, signal?: AbortSignal): Promise<TaskHandle> {
    return this.refresh(handle, "poll", RPC_METHODS.get, signal);
  }

  /**
   * One tasks/cancel round trip.
   *
   * @throws TaskTerminalError if the handle is already terminal
   */
  async cancel(handle: TaskHandle, signal?: AbortSignal): Promise<TaskHandle> {
    return this.refresh(handle, "cancel", RPC_METHODS.cancel, signal);
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private async refresh(
    handle: TaskHandle,
    stage: A2aStage,
    method: string,
    signal: AbortSignal | undefined,
  ): Promise<TaskHandle> {
    if (handle.isTerminal) {
      throw new TaskTerminalError(handle.taskId, handle.state);
    }

    const endpoint = this.registry.get(handle.agentUrl)?.url ?? handle.agentUrl;
    const result = await this.call(
      handle.agentUrl,
      endpoint,
      stage,
      method,
      { id: handle.taskId },
      signal,
    );

    const task = RawTaskSchema.safeParse(result);
    if (!task.success) {
      throw new ProtocolError(handle.agentUrl, stage, formatIssues(task.error).join("; "));
    }
    const update = this.toUpdate(handle.agentUrl, stage, task.data);

    const outcome = handle.applyUpdate(update);
    if (!outcome.ok) {
      if (outcome.reason === "terminal-state") {
        throw new TaskTerminalError(handle.taskId, outcome.state, update.state);
      }
      throw new ProtocolError(
        handle.agentUrl,
        stage,
        `task ${handle.taskId} cannot move from ${outcome.state} to ${update.state}`,
      );
    }
    return handle;
  }

  private toUpdate(agentUrl: string, stage: A2aStage, task: RawTask): TaskUpdate {
    const state = parseTaskState(task.status.state);
    if (state === undefined) {
      throw new ProtocolError(agentUrl, stage, `unknown task state "${task.status.state}"`);
    }
    return {
      state,
      message: task.status.message ? toMessage(task.status.message) : undefined,
      artifacts: toArtifacts(task.artifacts),
    };
  }

  /**
   * POST a JSON-RPC request and return its `result` member.
   */
  private async call(
    agentUrl: string,
    endpoint: string,
    stage: A2aStage,
    method: string,
    params: Record<string, unknown>,
    signal: AbortSignal | undefined,
  ): Promise<unknown> {
    const response = await requestForAgent(
      this.http,
      {
        method: "POST",
        url: endpoint,
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
          ...this.credentials.headersFor(agentUrl),
        },
        body: JSON.stringify({ jsonrpc: "2.0", id: randomUUID(), method, params }),
        timeoutMs: this.timeoutMs,
        signal,
      },
      agentUrl,
      stage,
    );

    if (response.status < 200 || response.status >= 300) {
      throw new HttpStatusError(
        agentUrl,
        stage,
        response.status,
        response.body.slice(0, MAX_ERROR_BODY),
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch (error) {
      throw new ProtocolError(
        agentUrl,
        stage,
        "response body is not valid JSON",
        error instanceof Error ? error : undefined,
      );
    }

    const rpc = JsonRpcResponseSchema.safeParse(json);
    if (!rpc.success) {
      throw new ProtocolError(agentUrl, stage, formatIssues(rpc.error).join("; "));
    }
    if (rpc.data.error !== undefined) {
      throw new RemoteRpcError(agentUrl, stage, rpc.data.error.code, rpc.data.error.message);
    }
    if (rpc.data.result === undefined) {
      throw new ProtocolError(agentUrl, stage, "response has neither result nor error");
    }
    return rpc.data.result;
  }
}
