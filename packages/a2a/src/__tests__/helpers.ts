/**
 * Test helpers for @parley/a2a
 */

import { z } from "zod";
import type { HttpClient, HttpRequest, HttpResponse } from "../http.js";
import type { AgentCard } from "../types.js";
import { RawAgentCardSchema } from "../validation.js";
import { toAgentCard } from "../wire.js";

// ---------------------------------------------------------------------------
// Raw Agent Card JSON (as served by an agent)
// ---------------------------------------------------------------------------

export function createRawAgentCard(overrides?: Record<string, unknown>): Record<string, unknown> {
  return {
    name: "Test Agent",
    description: "A test A2A agent",
    version: "1.0.0",
    skills: [
      {
        id: "search",
        name: "Search",
        description: "Search the web",
        tags: ["search", "web"],
      },
    ],
    capabilities: { streaming: false, pushNotifications: true },
    provider: { organization: "Test Corp" },
    ...overrides,
  };
}

/** Normalized card, as the fetcher would produce it */
export function createAgentCard(
  agentUrl = "https://a.test",
  overrides?: Record<string, unknown>,
): AgentCard {
  return toAgentCard(agentUrl, RawAgentCardSchema.parse(createRawAgentCard(overrides)));
}

// ---------------------------------------------------------------------------
// Raw JSON-RPC results
// ---------------------------------------------------------------------------

export function createRawTask(
  state = "submitted",
  taskId = "task-123",
  extra?: Record<string, unknown>,
): Record<string, unknown> {
  return {
    kind: "task",
    id: taskId,
    contextId: "ctx-1",
    status: { state },
    artifacts: [],
    ...extra,
  };
}

export function rpcSuccess(result: unknown, id = "req-1"): unknown {
  return { jsonrpc: "2.0", id, result };
}

export function rpcError(code: number, message: string, id = "req-1"): unknown {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return { status, body: JSON.stringify(body) };
}

// ---------------------------------------------------------------------------
// Stub HTTP client
// ---------------------------------------------------------------------------

export type Route = (req: HttpRequest) => HttpResponse | Promise<HttpResponse>;

/** In-process HttpClient that records every request */
export class StubHttpClient implements HttpClient {
  readonly requests: HttpRequest[] = [];
  private readonly route: Route;

  constructor(route: Route) {
    this.route = route;
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    this.requests.push(req);
    return this.route(req);
  }

  /** Requests whose JSON-RPC method matches */
  rpcRequests(method: string): HttpRequest[] {
    return this.requests.filter((r) => r.method === "POST" && parseRpcBody(r).method === method);
  }
}

const RpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.string(),
  method: z.string(),
  params: z.record(z.string(), z.unknown()),
});

export type RpcRequest = z.infer<typeof RpcRequestSchema>;

export function parseRpcBody(req: HttpRequest): RpcRequest {
  return RpcRequestSchema.parse(JSON.parse(req.body ?? ""));
}

const PushParamsSchema = z.object({
  configuration: z.object({ pushNotificationConfig: z.object({ id: z.string() }) }),
});

/** Correlation token carried by a message/send request */
export function pushTokenOf(req: HttpRequest): string {
  return PushParamsSchema.parse(parseRpcBody(req).params).configuration.pushNotificationConfig.id;
}

export interface AgentStubOptions {
  readonly card?: Record<string, unknown> | undefined;
  readonly cardStatus?: number | undefined;
  readonly send?: unknown;
  readonly get?: unknown;
  readonly cancel?: unknown;
}

/**
 * Route that serves an Agent Card on GET and canned JSON-RPC bodies on POST,
 * keyed by method.
 */
export function agentRoute(options: AgentStubOptions = {}): Route {
  return (req) => {
    if (req.method === "GET") {
      return jsonResponse(options.card ?? createRawAgentCard(), options.cardStatus ?? 200);
    }
    const { method } = parseRpcBody(req);
    const body =
      method === "message/send"
        ? options.send
        : method === "tasks/get"
          ? options.get
          : options.cancel;
    return jsonResponse(body ?? rpcError(-32601, "Method not found"));
  };
}
