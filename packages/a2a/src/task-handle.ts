/**
 * TaskHandle: client-side view of one task submitted to a remote agent.
 *
 * Mutated only through applyUpdate(), by a poll response or a correlated
 * push notification. Terminal states are final.
 */

import type {
  A2aArtifact,
  A2aMessage,
  TaskSnapshot,
  TaskState,
  TaskTransition,
  TaskUpdate,
} from "./types.js";
import { TERMINAL_STATES } from "./types.js";

export interface TaskHandleInit {
  readonly taskId: string;
  readonly agentUrl: string;
  readonly messageId: string;
  readonly state: TaskState;
  readonly contextId?: string | undefined;
  readonly correlationToken?: string | undefined;
  readonly messages?: readonly A2aMessage[] | undefined;
  readonly artifacts?: readonly A2aArtifact[] | undefined;
}

export type TransitionOutcome =
  | { readonly ok: true; readonly previousState: TaskState }
  | {
      readonly ok: false;
      readonly reason: "terminal-state" | "invalid-transition";
      readonly state: TaskState;
    };

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Non-terminal states may move to any state except back to "submitted",
 * and may repeat themselves.
 */
export function isAllowedTransition(from: TaskState, to: TaskState): boolean {
  if (isTerminalState(from)) return false;
  if (from === to) return true;
  return to !== "submitted";
}

export class TaskHandle {
  readonly taskId: string;
  readonly agentUrl: string;
  readonly messageId: string;
  readonly contextId: string | undefined;
  readonly correlationToken: string | undefined;
  private currentState: TaskState;
  private readonly messageLog: A2aMessage[];
  private readonly artifactsById: Map<string, A2aArtifact> = new Map();
  private readonly transitions: TaskTransition[];

  constructor(init: TaskHandleInit, now: Date = new Date()) {
    this.taskId = init.taskId;
    this.agentUrl = init.agentUrl;
    this.messageId = init.messageId;
    this.contextId = init.contextId;
    this.correlationToken = init.correlationToken;
    this.currentState = init.state;
    this.messageLog = [...(init.messages ?? [])];
    for (const artifact of init.artifacts ?? []) {
      this.artifactsById.set(artifact.artifactId, artifact);
    }
    this.transitions = [{ state: init.state, at: now.toISOString() }];
  }

  get state(): TaskState {
    return this.currentState;
  }

  get isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }

  get messages(): readonly A2aMessage[] {
    return [...this.messageLog];
  }

  get artifacts(): readonly A2aArtifact[] {
    return [...this.artifactsById.values()];
  }

  get history(): readonly TaskTransition[] {
    return [...this.transitions];
  }

  /** Text of every text part in the agent's messages and artifacts */
  get text(): string {
    const parts = [...this.messageLog.filter((m) => m.role === "agent"), ...this.artifacts].flatMap(
      (item) => item.parts,
    );
    return parts
      .map((p) => (p.kind === "text" ? p.text : ""))
      .filter((t) => t.length > 0)
      .join("\n");
  }

  /**
   * Apply a status update. Refused updates leave the handle untouched.
   */
  applyUpdate(update: TaskUpdate, now: Date = new Date()): TransitionOutcome {
    const previousState = this.currentState;
    if (isTerminalState(previousState)) {
      return { ok: false, reason: "terminal-state", state: previousState };
    }
    if (!isAllowedTransition(previousState, update.state)) {
      return { ok: false, reason: "invalid-transition", state: previousState };
    }

    if (update.message !== undefined) {
      this.messageLog.push(update.message);
    }
    for (const artifact of update.artifacts ?? []) {
      this.artifactsById.set(artifact.artifactId, artifact);
    }
    if (update.state !== previousState) {
      this.currentState = update.state;
      this.transitions.push({ state: update.state, at: now.toISOString() });
    }
    return { ok: true, previousState };
  }

  toJSON(): TaskSnapshot {
    return {
      taskId: this.taskId,
      agentUrl: this.agentUrl,
      contextId: this.contextId,
      messageId: this.messageId,
      state: this.currentState,
      terminal: this.isTerminal,
      correlationToken: this.correlationToken,
      messages: this.messages,
      artifacts: this.artifacts,
      history: this.history,
    };
  }
}
