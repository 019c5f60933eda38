/**
 * Zod schemas for A2A configuration, wire payloads and input validation.
 */

import { ConfigValidationError } from "@parley/errors";
import { type ZodError, z } from "zod";
import type { A2aClientConfig, TaskState } from "./types.js";
import { TASK_STATES } from "./types.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export const HeaderMapSchema = z.record(z.string().min(1), z.record(z.string().min(1), z.string()));

export const A2aClientConfigSchema = z
  .object({
    knownAgentUrls: z.array(z.string().url()).optional(),
    timeoutMs: z.number().int().min(1_000).max(3_600_000).optional(),
    webhookUrl: z.string().url().optional(),
    webhookToken: z
      .string()
      .regex(/^\S+$/, "must be a single token without whitespace")
      .optional(),
    headers: HeaderMapSchema.optional(),
    agentCardPath: z.string().startsWith("/").optional(),
  })
  .refine((config) => (config.webhookUrl === undefined) === (config.webhookToken === undefined), {
    message: "webhookUrl and webhookToken must be configured together",
    path: ["webhookToken"],
  });

/** Render zod issues as `path: message` lines */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}

/**
 * Validate a client configuration, throwing ConfigValidationError with every
 * violation listed.
 */
export function parseClientConfig(config: unknown): A2aClientConfig {
  const result = A2aClientConfigSchema.safeParse(config ?? {});
  if (!result.success) {
    throw new ConfigValidationError("A2A client", formatIssues(result.error));
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Agent Card (raw, as served by the agent)
// ---------------------------------------------------------------------------

const RawSkillSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().nullish(),
  tags: z.array(z.string()).nullish(),
  inputModes: z.array(z.string()).nullish(),
  outputModes: z.array(z.string()).nullish(),
});

const RawSecuritySchemeSchema = z.object({
  type: z.string(),
  scheme: z.string().nullish(),
  in: z.string().nullish(),
  name: z.string().nullish(),
});

export const RawAgentCardSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullish(),
  url: z.string().url().nullish(),
  version: z.string().nullish(),
  protocolVersion: z.string().nullish(),
  provider: z.object({ organization: z.string().nullish() }).nullish(),
  skills: z.array(RawSkillSchema),
  capabilities: z
    .object({
      streaming: z.boolean().nullish(),
      pushNotifications: z.boolean().nullish(),
      stateTransitionHistory: z.boolean().nullish(),
    })
    .nullish(),
  defaultInputModes: z.array(z.string()).nullish(),
  defaultOutputModes: z.array(z.string()).nullish(),
  securitySchemes: z.record(z.string(), RawSecuritySchemeSchema).nullish(),
  security: z.array(z.record(z.string(), z.array(z.string()))).nullish(),
});

export type RawAgentCard = z.infer<typeof RawAgentCardSchema>;

// ---------------------------------------------------------------------------
// Messages, artifacts, tasks (raw JSON-RPC results)
// ---------------------------------------------------------------------------

export const RawPartSchema = z.object({
  kind: z.string().nullish(),
  text: z.string().nullish(),
  data: z.record(z.string(), z.unknown()).nullish(),
  file: z
    .object({
      uri: z.string().nullish(),
      bytes: z.string().nullish(),
      mimeType: z.string().nullish(),
      name: z.string().nullish(),
    })
    .nullish(),
});

export type RawPart = z.infer<typeof RawPartSchema>;

export const RawMessageSchema = z.object({
  kind: z.literal("message").nullish(),
  role: z.enum(["user", "agent"]),
  parts: z.array(RawPartSchema),
  messageId: z.string().nullish(),
  contextId: z.string().nullish(),
  taskId: z.string().nullish(),
});

export type RawMessage = z.infer<typeof RawMessageSchema>;

export const RawArtifactSchema = z.object({
  artifactId: z.string().nullish(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  parts: z.array(RawPartSchema),
});

export type RawArtifact = z.infer<typeof RawArtifactSchema>;

export const RawTaskStatusSchema = z.object({
  state: z.string().min(1),
  message: RawMessageSchema.nullish(),
  timestamp: z.string().nullish(),
});

export const RawTaskSchema = z.object({
  kind: z.literal("task").nullish(),
  id: z.string().min(1),
  contextId: z.string().nullish(),
  status: RawTaskStatusSchema,
  artifacts: z.array(RawArtifactSchema).nullish(),
});

export type RawTask = z.infer<typeof RawTaskSchema>;

export const JsonRpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number().int(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

// ---------------------------------------------------------------------------
// Webhook notification payload
// ---------------------------------------------------------------------------

export const NotificationPayloadSchema = z.object({
  correlationToken: z.string().min(1),
  status: z.union([
    z.string().min(1),
    z.object({ state: z.string().min(1), message: RawMessageSchema.nullish() }),
  ]),
  artifacts: z.array(RawArtifactSchema).nullish(),
});

export type NotificationPayload = z.infer<typeof NotificationPayloadSchema>;

// ---------------------------------------------------------------------------
// Scalar helpers
// ---------------------------------------------------------------------------

const DEFAULT_PORTS: Readonly<Record<string, string>> = { http: "80", https: "443" };

/**
 * Validate and normalize an agent URL into its registry key.
 *
 * Trims whitespace, requires an http(s) scheme, drops an explicit
 * scheme-default port and strips trailing slashes. Nothing else changes:
 * host case, path case and query are kept verbatim. Returns "" when the
 * input is not a usable URL.
 */
export function normalizeAgentUrl(url: unknown): string {
  if (typeof url !== "string" || url.trim().length === 0) {
    return "";
  }
  const match = /^(https?):\/\/([^/?#]+)(.*)$/.exec(url.trim());
  if (match === null) {
    return "";
  }
  const [, scheme = "", rawAuthority = "", rest = ""] = match;
  const defaultPort = DEFAULT_PORTS[scheme];
  const authority =
    defaultPort !== undefined && rawAuthority.endsWith(`:${defaultPort}`)
      ? rawAuthority.slice(0, -(defaultPort.length + 1))
      : rawAuthority;
  if (authority.length === 0) {
    return "";
  }
  let path = rest;
  while (path.endsWith("/")) {
    path = path.slice(0, -1);
  }
  return `${scheme}://${authority}${path}`;
}

/**
 * Map a wire task state onto TaskState. Accepts the JSON-RPC spelling
 * ("input-required"), the enum spelling ("INPUT_REQUIRED",
 * "TASK_STATE_INPUT_REQUIRED") and "cancelled". Returns undefined for
 * anything else, including "unknown".
 */
export function parseTaskState(raw: string): TaskState | undefined {
  const normalized = raw
    .trim()
    .toLowerCase()
    .replace(/^task_state_/, "")
    .replaceAll("_", "-")
    .replace(/^cancelled$/, "canceled");
  return TASK_STATES.find((state) => state === normalized);
}

/**
 * Validate that a message string is non-empty after trimming.
 */
export function validateMessage(message: unknown): string {
  if (typeof message !== "string" || message.trim().length === 0) {
    return "";
  }
  return message.trim();
}
