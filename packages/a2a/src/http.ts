/**
 * Minimal HTTP abstraction used by the fetcher and the dispatcher.
 *
 * FetchHttpClient runs over the global fetch with a per-call timeout.
 * Tests inject their own HttpClient.
 */

import { type A2aStage, getErrorMessage, UnreachableError } from "@parley/errors";
import type { HeaderSet } from "./types.js";

export interface HttpRequest {
  readonly method: "GET" | "POST";
  readonly url: string;
  readonly headers: HeaderSet;
  readonly body?: string | undefined;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal | undefined;
}

export interface HttpResponse {
  readonly status: number;
  readonly body: string;
}

/**
 * Resolves with any HTTP status; rejects only on network failure, timeout
 * or an external abort.
 */
export interface HttpClient {
  request(req: HttpRequest): Promise<HttpResponse>;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export class FetchHttpClient implements HttpClient {
  async request(req: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), req.timeoutMs);

    const onExternalAbort = () => controller.abort();
    if (req.signal?.aborted) {
      controller.abort();
    } else {
      req.signal?.addEventListener("abort", onExternalAbort, { once: true });
    }

    try {
      const response = await fetch(req.url, {
        method: req.method,
        headers: { ...req.headers },
        ...(req.body !== undefined ? { body: req.body } : {}),
        signal: controller.signal,
      });
      return { status: response.status, body: await response.text() };
    } catch (error) {
      if (isAbortError(error) && !req.signal?.aborted) {
        throw new Error(`Request timed out after ${req.timeoutMs}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      req.signal?.removeEventListener("abort", onExternalAbort);
    }
  }
}

/**
 * Issue a request on behalf of one agent operation. Transport failures
 * become UnreachableError; an abort requested by the caller propagates
 * unchanged.
 */
export async function requestForAgent(
  http: HttpClient,
  req: HttpRequest,
  agentUrl: string,
  stage: A2aStage,
): Promise<HttpResponse> {
  try {
    return await http.request(req);
  } catch (error) {
    if (req.signal?.aborted) throw error;
    throw new UnreachableError(
      agentUrl,
      stage,
      getErrorMessage(error),
      error instanceof Error ? error : undefined,
    );
  }
}
