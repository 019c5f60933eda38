/**
 * A2AToolMiddleware: routes the three A2A tool calls to an A2AClient.
 *
 * Failures are reported in-band as `{ status: "error", error }` so the
 * calling model can read them; other tool names pass through to `next`.
 */

import { getErrorMessage, isParleyError } from "@parley/errors";
import { z } from "zod";
import { type A2AClient, type A2aClientDeps, createA2aClient } from "./a2a-client.js";
import { type A2aToolNames, a2aToolNames } from "./tools.js";
import type { ToolHandler, ToolMiddleware, ToolRequest, ToolResponse } from "./types.js";
import { DEFAULT_TOOL_PREFIX } from "./types.js";
import { validateMessage } from "./validation.js";

const DiscoverInputSchema = z.object({ url: z.string() });

const SendInputSchema = z.object({
  message_text: z.string(),
  target_agent_url: z.string(),
  message_id: z.string().min(1).optional(),
});

function errorOutput(error: unknown, extra: Record<string, unknown>): Record<string, unknown> {
  return {
    status: "error",
    error: getErrorMessage(error),
    ...(isParleyError(error) ? { code: error.code } : {}),
    ...extra,
  };
}

export class A2AToolMiddleware implements ToolMiddleware {
  readonly name = "a2a";
  private readonly client: A2AClient;
  private readonly tools: A2aToolNames;

  constructor(client: A2AClient, toolPrefix: string = DEFAULT_TOOL_PREFIX) {
    this.client = client;
    this.tools = a2aToolNames(toolPrefix);
  }

  async wrapToolCall(req: ToolRequest, next: ToolHandler): Promise<ToolResponse> {
    switch (req.toolName) {
      case this.tools.discover:
        return this.handleDiscover(req);
      case this.tools.list:
        return this.handleList();
      case this.tools.send:
        return this.handleSendMessage(req);
      default:
        return next(req);
    }
  }

  private async handleDiscover(req: ToolRequest): Promise<ToolResponse> {
    const metadata = { provider: "a2a", operation: "discover_agent" };
    const input = DiscoverInputSchema.safeParse(req.input);
    if (!input.success) {
      return { output: errorOutput("url is required", {}), metadata };
    }
    const { url } = input.data;

    try {
      const card = await this.client.discoverAgent(url);
      return { output: { status: "success", url, agent_card: card }, metadata };
    } catch (error) {
      return { output: errorOutput(error, { url }), metadata };
    }
  }

  private async handleList(): Promise<ToolResponse> {
    const metadata = { provider: "a2a", operation: "list_discovered_agents" };
    try {
      const entries = await this.client.listDiscoveredAgents();
      return {
        output: {
          status: "success",
          agents: entries.map(({ url, card }) => ({
            url,
            name: card.name,
            description: card.description,
            skills: card.skills.map((s) => s.name),
          })),
          total_count: entries.length,
        },
        metadata,
      };
    } catch (error) {
      return { output: errorOutput(error, {}), metadata };
    }
  }

  private async handleSendMessage(req: ToolRequest): Promise<ToolResponse> {
    const metadata = { provider: "a2a", operation: "send_message" };
    const input = SendInputSchema.safeParse(req.input);
    if (!input.success) {
      return {
        output: errorOutput("message_text and target_agent_url are required", {}),
        metadata,
      };
    }
    const { target_agent_url: targetUrl, message_id: messageId } = input.data;
    const text = validateMessage(input.data.message_text);
    if (text === "") {
      return {
        output: errorOutput("message_text must not be empty", {
          target_agent_url: targetUrl,
        }),
        metadata,
      };
    }

    const result = await this.client.trySendMessage(targetUrl, text, { messageId });
    if (!result.ok) {
      return {
        output: errorOutput(result.error, {
          stage: result.stage,
          target_agent_url: targetUrl,
          ...(messageId !== undefined ? { message_id: messageId } : {}),
        }),
        metadata: { ...metadata, stage: result.stage },
      };
    }

    const { handle } = result;
    return {
      output: {
        status: "success",
        message_id: handle.messageId,
        target_agent_url: targetUrl,
        task: handle.toJSON(),
      },
      metadata: { ...metadata, taskId: handle.taskId, state: handle.state },
    };
  }
}

/**
 * Factory: creates a validated client and wraps it in the middleware.
 *
 * @throws ConfigValidationError when the client configuration is invalid
 */
export function createA2aToolMiddleware(
  config?: unknown,
  options: { readonly toolPrefix?: string | undefined; readonly deps?: A2aClientDeps } = {},
): A2AToolMiddleware {
  return new A2AToolMiddleware(
    createA2aClient(config, options.deps),
    options.toolPrefix ?? DEFAULT_TOOL_PREFIX,
  );
}
