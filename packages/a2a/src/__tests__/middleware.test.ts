import { describe, expect, it, vi } from "vitest";
import { A2AClient } from "../a2a-client.js";
import { A2AToolMiddleware, createA2aToolMiddleware } from "../middleware.js";
import type { ToolHandler } from "../types.js";
import type { Route } from "./helpers.js";
import { agentRoute, createRawTask, rpcSuccess, StubHttpClient } from "./helpers.js";

function createMiddleware(route: Route, prefix?: string) {
  const http = new StubHttpClient(route);
  const client = new A2AClient({}, { http });
  return { http, client, middleware: new A2AToolMiddleware(client, prefix) };
}

function createNext() {
  return vi.fn<ToolHandler>().mockResolvedValue({ output: "passed through" });
}

describe("A2AToolMiddleware", () => {
  it("passes unrelated tool calls to next", async () => {
    const { middleware } = createMiddleware(agentRoute());
    const next = createNext();

    const response = await middleware.wrapToolCall({ toolName: "web_search", input: {} }, next);

    expect(response.output).toBe("passed through");
    expect(next).toHaveBeenCalledWith({ toolName: "web_search", input: {} });
  });

  describe("discover_agent", () => {
    it("returns the agent card", async () => {
      const { middleware } = createMiddleware(agentRoute());

      const response = await middleware.wrapToolCall(
        { toolName: "a2a_discover_agent", input: { url: "https://a.test" } },
        createNext(),
      );

      expect(response.output).toMatchObject({
        status: "success",
        url: "https://a.test",
        agent_card: { name: "Test Agent", url: "https://a.test" },
      });
      expect(response.metadata).toEqual({ provider: "a2a", operation: "discover_agent" });
    });

    it("reports failures in-band", async () => {
      const { middleware } = createMiddleware(() => ({ status: 404, body: "" }));

      const response = await middleware.wrapToolCall(
        { toolName: "a2a_discover_agent", input: { url: "https://a.test" } },
        createNext(),
      );

      expect(response.output).toEqual({
        status: "error",
        error: 'A2A discovery request to "https://a.test" returned HTTP 404',
        code: "A2A_HTTP_STATUS",
        url: "https://a.test",
      });
    });

    it("reports a missing url", async () => {
      const { middleware } = createMiddleware(agentRoute());

      const response = await middleware.wrapToolCall(
        { toolName: "a2a_discover_agent", input: {} },
        createNext(),
      );

      expect(response.output).toEqual({ status: "error", error: "url is required" });
    });
  });

  describe("list_discovered_agents", () => {
    it("lists discovered agents with a total count", async () => {
      const { middleware, client } = createMiddleware(agentRoute());
      await client.discoverAgent("https://a.test");

      const response = await middleware.wrapToolCall(
        { toolName: "a2a_list_discovered_agents" },
        createNext(),
      );

      expect(response.output).toEqual({
        status: "success",
        agents: [
          {
            url: "https://a.test",
            name: "Test Agent",
            description: "A test A2A agent",
            skills: ["Search"],
          },
        ],
        total_count: 1,
      });
    });

    it("reports a closed client in-band", async () => {
      const { middleware, client } = createMiddleware(agentRoute());
      client.close();

      const response = await middleware.wrapToolCall(
        { toolName: "a2a_list_discovered_agents" },
        createNext(),
      );

      expect(response.output).toEqual({
        status: "error",
        error: "A2A client is closed",
        code: "INTERNAL_ERROR",
      });
    });
  });

  describe("send_message", () => {
    it("sends and returns the task snapshot", async () => {
      const { middleware } = createMiddleware(agentRoute({ send: rpcSuccess(createRawTask()) }));

      const response = await middleware.wrapToolCall(
        {
          toolName: "a2a_send_message",
          input: {
            message_text: "  hello  ",
            target_agent_url: "https://a.test",
            message_id: "test-123",
          },
        },
        createNext(),
      );

      expect(response.output).toMatchObject({
        status: "success",
        message_id: "test-123",
        target_agent_url: "https://a.test",
        task: { taskId: "task-123", state: "submitted", terminal: false },
      });
      expect(response.metadata).toEqual({
        provider: "a2a",
        operation: "send_message",
        taskId: "task-123",
        state: "submitted",
      });
    });

    it("reports the failed stage", async () => {
      const { middleware } = createMiddleware(() => {
        throw new TypeError("fetch failed");
      });

      const response = await middleware.wrapToolCall(
        {
          toolName: "a2a_send_message",
          input: { message_text: "hello", target_agent_url: "https://a.test" },
        },
        createNext(),
      );

      expect(response.output).toEqual({
        status: "error",
        error: 'A2A discovery request to "https://a.test" failed: fetch failed',
        code: "A2A_UNREACHABLE",
        stage: "discovery",
        target_agent_url: "https://a.test",
      });
    });

    it("rejects a blank message without sending", async () => {
      const { middleware, http } = createMiddleware(agentRoute());

      const response = await middleware.wrapToolCall(
        {
          toolName: "a2a_send_message",
          input: { message_text: "   ", target_agent_url: "https://a.test" },
        },
        createNext(),
      );

      expect(response.output).toEqual({
        status: "error",
        error: "message_text must not be empty",
        target_agent_url: "https://a.test",
      });
      expect(http.requests).toHaveLength(0);
    });

    it("reports missing arguments", async () => {
      const { middleware } = createMiddleware(agentRoute());

      const response = await middleware.wrapToolCall(
        { toolName: "a2a_send_message", input: { message_text: "hi" } },
        createNext(),
      );

      expect(response.output).toEqual({
        status: "error",
        error: "message_text and target_agent_url are required",
      });
    });
  });

  it("honours a custom tool prefix", async () => {
    const { middleware } = createMiddleware(agentRoute(), "remote");
    const next = createNext();

    await middleware.wrapToolCall({ toolName: "a2a_discover_agent", input: {} }, next);
    const response = await middleware.wrapToolCall(
      { toolName: "remote_discover_agent", input: { url: "https://a.test" } },
      next,
    );

    expect(next).toHaveBeenCalledTimes(1);
    expect(response.output).toMatchObject({ status: "success" });
  });
});

describe("createA2aToolMiddleware", () => {
  it("validates the client configuration", () => {
    expect(() => createA2aToolMiddleware({ timeoutMs: "soon" })).toThrow(
      "Invalid A2A client configuration",
    );
  });

  it("creates a middleware named a2a", () => {
    expect(createA2aToolMiddleware({}).name).toBe("a2a");
  });
});
