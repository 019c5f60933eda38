/**
 * A2A tool definitions for a host orchestration framework.
 *
 * Three tools, one per client operation:
 *   - a2a_discover_agent          → fetch and cache an Agent Card
 *   - a2a_list_discovered_agents  → list cached agents
 *   - a2a_send_message            → send a message, return the task handle
 */

import type { ToolDefinition } from "./types.js";
import { DEFAULT_TOOL_PREFIX } from "./types.js";

export interface A2aToolNames {
  readonly discover: string;
  readonly list: string;
  readonly send: string;
}

export function a2aToolNames(prefix = DEFAULT_TOOL_PREFIX): A2aToolNames {
  return {
    discover: `${prefix}_discover_agent`,
    list: `${prefix}_list_discovered_agents`,
    send: `${prefix}_send_message`,
  };
}

/**
 * Build the three A2A tool definitions with an optional name prefix.
 */
export function buildA2aTools(prefix = DEFAULT_TOOL_PREFIX): readonly ToolDefinition[] {
  const names = a2aToolNames(prefix);
  return [
    {
      name: names.discover,
      description:
        "Discover a remote A2A agent by URL. Returns the agent card: name, description, " +
        "skills and capabilities. The agent is remembered for later listing.",
      parameters: {
        type: "object",
        properties: {
          url: {
            type: "string",
            description: "The base URL of the remote A2A agent (e.g. https://agent.example.com)",
          },
        },
        required: ["url"],
      },
    },
    {
      name: names.list,
      description:
        "List every A2A agent discovered so far, including the configured known agents, " +
        "with their names and descriptions.",
      parameters: {
        type: "object",
        properties: {},
      },
    },
    {
      name: names.send,
      description:
        "Send a text message to a remote A2A agent. Returns the task the agent created; " +
        "the task completes asynchronously.",
      parameters: {
        type: "object",
        properties: {
          message_text: {
            type: "string",
            description: "The message to send to the remote agent",
          },
          target_agent_url: {
            type: "string",
            description: "The base URL of the remote A2A agent",
          },
          message_id: {
            type: "string",
            description: "Optional message ID; a random one is generated when omitted",
          },
        },
        required: ["message_text", "target_agent_url"],
      },
    },
  ];
}
