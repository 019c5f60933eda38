/**
 * Conversions between raw A2A JSON and the normalized client types.
 *
 * Inputs here have already passed the zod schemas in validation.ts; these
 * functions reshape and freeze, and mint ids for artifacts that carry none.
 */

import { randomUUID } from "node:crypto";
import type {
  A2aArtifact,
  A2aMessage,
  A2aMessagePart,
  AgentCard,
  AgentSkill,
  OutboundMessage,
  PushNotificationConfig,
  SecuritySchemeInfo,
} from "./types.js";
import type { RawAgentCard, RawArtifact, RawMessage, RawPart } from "./validation.js";

// ---------------------------------------------------------------------------
// Inbound
// ---------------------------------------------------------------------------

/** Normalize one raw part; parts with no recognizable payload are dropped */
export function toPart(raw: RawPart): A2aMessagePart | undefined {
  if (raw.text !== undefined && raw.text !== null) {
    return { kind: "text", text: raw.text };
  }
  if (raw.data !== undefined && raw.data !== null) {
    return { kind: "data", data: raw.data };
  }
  if (raw.file?.uri || raw.file?.bytes) {
    return {
      kind: "file",
      uri: raw.file.uri ?? undefined,
      bytes: raw.file.bytes ?? undefined,
      mimeType: raw.file.mimeType ?? undefined,
      name: raw.file.name ?? undefined,
    };
  }
  return undefined;
}

export function toParts(rawParts: readonly RawPart[]): readonly A2aMessagePart[] {
  return Object.freeze(
    rawParts.map(toPart).filter((p): p is A2aMessagePart => p !== undefined),
  );
}

export function toMessage(raw: RawMessage): A2aMessage {
  return Object.freeze({
    role: raw.role,
    parts: toParts(raw.parts),
    messageId: raw.messageId ?? undefined,
  });
}

export function toArtifacts(
  rawArtifacts: readonly RawArtifact[] | null | undefined,
): readonly A2aArtifact[] {
  if (!rawArtifacts) return [];
  return Object.freeze(
    rawArtifacts.map((a) =>
      Object.freeze({
        // An id-less artifact never replaces an earlier one
        artifactId: a.artifactId ?? randomUUID(),
        name: a.name ?? undefined,
        description: a.description ?? undefined,
        parts: toParts(a.parts),
      }),
    ),
  );
}

/**
 * Build the frozen AgentCard snapshot. `agentUrl` is the registry key and
 * stands in for the service endpoint when the card has none.
 */
export function toAgentCard(agentUrl: string, raw: RawAgentCard): AgentCard {
  const skills: AgentSkill[] = raw.skills.map((s) =>
    Object.freeze({
      id: s.id,
      name: s.name,
      description: s.description ?? undefined,
      tags: Object.freeze([...(s.tags ?? [])]),
      inputModes: s.inputModes ? Object.freeze([...s.inputModes]) : undefined,
      outputModes: s.outputModes ? Object.freeze([...s.outputModes]) : undefined,
    }),
  );

  const securitySchemes: Record<string, SecuritySchemeInfo> = {};
  for (const [name, scheme] of Object.entries(raw.securitySchemes ?? {})) {
    securitySchemes[name] = Object.freeze({
      type: scheme.type,
      scheme: scheme.scheme ?? undefined,
      in: scheme.in ?? undefined,
      name: scheme.name ?? undefined,
    });
  }

  const security = new Set<string>();
  for (const requirement of raw.security ?? []) {
    for (const name of Object.keys(requirement)) {
      security.add(name);
    }
  }

  return Object.freeze({
    name: raw.name,
    description: raw.description ?? undefined,
    url: raw.url ?? agentUrl,
    version: raw.version ?? undefined,
    protocolVersion: raw.protocolVersion ?? undefined,
    provider: raw.provider?.organization ?? undefined,
    skills: Object.freeze(skills),
    capabilities: Object.freeze({
      streaming: raw.capabilities?.streaming === true,
      pushNotifications: raw.capabilities?.pushNotifications === true,
      stateTransitionHistory: raw.capabilities?.stateTransitionHistory === true,
    }),
    defaultInputModes: Object.freeze([...(raw.defaultInputModes ?? ["text"])]),
    defaultOutputModes: Object.freeze([...(raw.defaultOutputModes ?? ["text"])]),
    securitySchemes: Object.freeze(securitySchemes),
    security: Object.freeze([...security]),
  });
}

// ---------------------------------------------------------------------------
// Outbound
// ---------------------------------------------------------------------------

/** Turn the `string | OutboundMessage` accepted by the client into a message */
export function toOutboundMessage(message: string | OutboundMessage): OutboundMessage {
  return typeof message === "string" ? { parts: [{ kind: "text", text: message }] } : message;
}

function toWirePart(part: A2aMessagePart): Record<string, unknown> {
  switch (part.kind) {
    case "text":
      return { kind: "text", text: part.text };
    case "data":
      return { kind: "data", data: part.data };
    case "file":
      return {
        kind: "file",
        file: {
          ...(part.uri !== undefined ? { uri: part.uri } : {}),
          ...(part.bytes !== undefined ? { bytes: part.bytes } : {}),
          ...(part.mimeType !== undefined ? { mimeType: part.mimeType } : {}),
          ...(part.name !== undefined ? { name: part.name } : {}),
        },
      };
  }
}

/** The `params.message` object of a message/send request */
export function toWireMessage(message: OutboundMessage, messageId: string): Record<string, unknown> {
  return {
    kind: "message",
    role: "user",
    messageId,
    parts: message.parts.map(toWirePart),
    ...(message.contextId !== undefined ? { contextId: message.contextId } : {}),
    ...(message.taskId !== undefined ? { taskId: message.taskId } : {}),
    ...(message.metadata !== undefined ? { metadata: message.metadata } : {}),
  };
}

/** The `configuration.pushNotificationConfig` block of a message/send request */
export function toWirePushConfig(config: PushNotificationConfig): Record<string, unknown> {
  return {
    id: config.correlationToken,
    url: config.webhookUrl,
    token: config.correlationToken,
    authentication: {
      schemes: ["Bearer"],
      credentials: config.webhookToken,
    },
  };
}
