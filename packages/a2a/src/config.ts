/**
 * Environment-backed A2A client configuration.
 *
 *   PARLEY_A2A_KNOWN_AGENTS    comma-separated agent URLs
 *   PARLEY_A2A_TIMEOUT_MS      per-call timeout in milliseconds
 *   PARLEY_A2A_WEBHOOK_URL     push notification webhook
 *   PARLEY_A2A_WEBHOOK_TOKEN   bearer token the webhook expects
 *
 * Per-agent headers carry secrets and are passed in code, not read here.
 */

import type { A2aClientConfig } from "./types.js";
import { parseClientConfig } from "./validation.js";

export const ENV_KEYS = {
  knownAgents: "PARLEY_A2A_KNOWN_AGENTS",
  timeoutMs: "PARLEY_A2A_TIMEOUT_MS",
  webhookUrl: "PARLEY_A2A_WEBHOOK_URL",
  webhookToken: "PARLEY_A2A_WEBHOOK_TOKEN",
} as const;

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build and validate an A2aClientConfig from environment variables.
 * Unset or blank variables are omitted.
 *
 * @throws ConfigValidationError when a variable holds an invalid value
 */
export function loadA2aConfigFromEnv(env: NodeJS.ProcessEnv = process.env): A2aClientConfig {
  const knownAgents = readEnv(env, ENV_KEYS.knownAgents);
  const timeout = readEnv(env, ENV_KEYS.timeoutMs);
  const webhookUrl = readEnv(env, ENV_KEYS.webhookUrl);
  const webhookToken = readEnv(env, ENV_KEYS.webhookToken);

  return parseClientConfig({
    ...(knownAgents
      ? {
          knownAgentUrls: knownAgents
            .split(",")
            .map((u) => u.trim())
            .filter((u) => u.length > 0),
        }
      : {}),
    ...(timeout ? { timeoutMs: Number(timeout) } : {}),
    ...(webhookUrl ? { webhookUrl } : {}),
    ...(webhookToken ? { webhookToken } : {}),
  });
}
