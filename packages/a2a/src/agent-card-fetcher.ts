/**
 * AgentCardFetcher: GET {agentUrl}{agentCardPath} and parse the card.
 */

import { HttpStatusError, MalformedCardError } from "@parley/errors";
import { FetchHttpClient, type HttpClient, requestForAgent } from "./http.js";
import type { AgentCard, HeaderSet } from "./types.js";
import { AGENT_CARD_PATH } from "./types.js";
import { formatIssues, RawAgentCardSchema } from "./validation.js";
import { toAgentCard } from "./wire.js";

/** Longest response body excerpt kept on an HttpStatusError */
const MAX_ERROR_BODY = 500;

export interface AgentCardFetcher {
  fetch(
    agentUrl: string,
    headers: HeaderSet,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<AgentCard>;
}

export class HttpAgentCardFetcher implements AgentCardFetcher {
  private readonly http: HttpClient;
  private readonly cardPath: string;

  constructor(http: HttpClient = new FetchHttpClient(), cardPath: string = AGENT_CARD_PATH) {
    this.http = http;
    this.cardPath = cardPath;
  }

  /**
   * @throws UnreachableError on connection failure or timeout
   * @throws HttpStatusError on a non-2xx response
   * @throws MalformedCardError when the body is not JSON or lacks required fields
   */
  async fetch(
    agentUrl: string,
    headers: HeaderSet,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<AgentCard> {
    const response = await requestForAgent(
      this.http,
      {
        method: "GET",
        url: `${agentUrl}${this.cardPath}`,
        headers: { Accept: "application/json", ...headers },
        timeoutMs,
        signal,
      },
      agentUrl,
      "discovery",
    );

    if (response.status < 200 || response.status >= 300) {
      throw new HttpStatusError(
        agentUrl,
        "discovery",
        response.status,
        response.body.slice(0, MAX_ERROR_BODY),
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch (error) {
      throw new MalformedCardError(
        agentUrl,
        "response body is not valid JSON",
        error instanceof Error ? error : undefined,
      );
    }

    const parsed = RawAgentCardSchema.safeParse(json);
    if (!parsed.success) {
      throw new MalformedCardError(agentUrl, formatIssues(parsed.error).join("; "));
    }
    return toAgentCard(agentUrl, parsed.data);
  }
}
