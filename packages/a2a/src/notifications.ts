/**
 * NotificationSubscriptionManager: correlates inbound webhook
 * notifications with the tasks that requested them.
 *
 * Registrations are keyed by the correlation token the client generated for
 * the task. A token is reserved before the send request goes out; updates
 * that arrive before the task handle exists are buffered on the reservation
 * and replayed, in arrival order, when the handle is registered.
 *
 * A registration survives its task reaching a terminal state, so a late
 * duplicate is reported as "terminal-state" rather than
 * "unknown-correlation".
 */

import { createHash, randomUUID, timingSafeEqual } from "node:crypto";
import type { TaskHandle } from "./task-handle.js";
import type { PushNotificationConfig, TaskState, TaskUpdate, UpdateResult } from "./types.js";
import { formatIssues, NotificationPayloadSchema, parseTaskState } from "./validation.js";
import { toArtifacts, toMessage } from "./wire.js";

const LOG_PREFIX = "[NotificationManager]";

export interface WebhookConfig {
  readonly webhookUrl: string;
  readonly webhookToken: string;
}

/** Fresh push config for one outbound task */
export function createPushConfig(webhook: WebhookConfig): PushNotificationConfig {
  return {
    webhookUrl: webhook.webhookUrl,
    webhookToken: webhook.webhookToken,
    correlationToken: randomUUID(),
  };
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/**
 * Compare a presented `Authorization` header against the expected bearer
 * token in constant time. Everything after the scheme, trimmed, is the
 * presented token.
 */
export function verifyBearer(authHeader: string | null | undefined, expected: string): boolean {
  if (typeof authHeader !== "string") return false;
  const match = /^Bearer\s+(.+)$/is.exec(authHeader.trim());
  const presented = match?.[1];
  if (presented === undefined) return false;
  return timingSafeEqual(digest(presented), digest(expected));
}

interface Subscription {
  handle: TaskHandle | undefined;
  readonly early: TaskUpdate[];
}

export class NotificationSubscriptionManager {
  private readonly pending: Map<string, Subscription> = new Map();
  private readonly webhookToken: string | undefined;

  constructor(webhookToken?: string) {
    this.webhookToken = webhookToken;
  }

  /**
   * Hold `correlationToken` for a send that is still in flight. Deliveries
   * for it are buffered until registerPending() binds the handle.
   */
  reserve(correlationToken: string): void {
    if (!this.pending.has(correlationToken)) {
      this.pending.set(correlationToken, { handle: undefined, early: [] });
    }
  }

  /**
   * Bind `handle` to `correlationToken` and replay any buffered updates.
   */
  registerPending(correlationToken: string, handle: TaskHandle): void {
    const early = this.pending.get(correlationToken)?.early ?? [];
    this.pending.set(correlationToken, { handle, early: [] });
    for (const update of early) {
      const outcome = handle.applyUpdate(update);
      if (!outcome.ok) {
        this.refused(handle, outcome.state, update.state, outcome.reason);
      }
    }
  }

  unregister(correlationToken: string): boolean {
    return this.pending.delete(correlationToken);
  }

  get(correlationToken: string): TaskHandle | undefined {
    return this.pending.get(correlationToken)?.handle;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  clear(): void {
    this.pending.clear();
  }

  /**
   * Authenticate, validate and apply one webhook delivery.
   *
   * Never throws: every outcome, including auth failure and an unknown
   * correlation token, is an UpdateResult.
   */
  onNotification(payload: unknown, authHeader: string | null | undefined): UpdateResult {
    if (this.webhookToken === undefined) {
      console.warn(`${LOG_PREFIX} Notification rejected: no webhook token is configured`);
      return { kind: "auth-failed" };
    }
    if (!verifyBearer(authHeader, this.webhookToken)) {
      console.warn(`${LOG_PREFIX} Notification rejected: bearer token mismatch`);
      return { kind: "auth-failed" };
    }

    let body: unknown = payload;
    if (typeof payload === "string") {
      try {
        body = JSON.parse(payload);
      } catch {
        return this.invalid("payload is not valid JSON");
      }
    }

    const parsed = NotificationPayloadSchema.safeParse(body);
    if (!parsed.success) {
      return this.invalid(formatIssues(parsed.error).join("; "));
    }

    const { correlationToken, status, artifacts } = parsed.data;
    const rawState = typeof status === "string" ? status : status.state;
    const state = parseTaskState(rawState);
    if (state === undefined) {
      return this.invalid(`unknown task state "${rawState}"`);
    }

    const subscription = this.pending.get(correlationToken);
    if (subscription === undefined) {
      return { kind: "unknown-correlation", correlationToken };
    }

    const update: TaskUpdate = {
      state,
      message: typeof status !== "string" && status.message ? toMessage(status.message) : undefined,
      artifacts: toArtifacts(artifacts),
    };
    const handle = subscription.handle;
    if (handle === undefined) {
      subscription.early.push(update);
      return { kind: "buffered", correlationToken, state };
    }

    const outcome = handle.applyUpdate(update);
    if (outcome.ok) {
      return {
        kind: "updated",
        correlationToken,
        taskId: handle.taskId,
        previousState: outcome.previousState,
        state: handle.state,
      };
    }

    this.refused(handle, outcome.state, state, outcome.reason);
    return {
      kind: outcome.reason,
      correlationToken,
      taskId: handle.taskId,
      state: outcome.state,
      attemptedState: state,
    };
  }

  private refused(handle: TaskHandle, from: TaskState, to: TaskState, reason: string): void {
    console.warn(`${LOG_PREFIX} Refused ${from} -> ${to} for task ${handle.taskId}: ${reason}`);
  }

  private invalid(reason: string): UpdateResult {
    console.warn(`${LOG_PREFIX} Invalid notification payload: ${reason}`);
    return { kind: "invalid-payload", reason };
  }
}
