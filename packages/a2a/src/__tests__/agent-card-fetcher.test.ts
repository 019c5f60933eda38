import { HttpStatusError, MalformedCardError, UnreachableError } from "@parley/errors";
import { describe, expect, it } from "vitest";
import { HttpAgentCardFetcher } from "../agent-card-fetcher.js";
import { createRawAgentCard, jsonResponse, StubHttpClient } from "./helpers.js";

describe("HttpAgentCardFetcher", () => {
  it("GETs the well-known path with the given headers", async () => {
    const http = new StubHttpClient(() => jsonResponse(createRawAgentCard()));
    const fetcher = new HttpAgentCardFetcher(http);

    const card = await fetcher.fetch("https://a.test", { "X-API-Key": "k1" }, 5_000);

    expect(card.name).toBe("Test Agent");
    expect(card.url).toBe("https://a.test");
    expect(http.requests).toHaveLength(1);
    expect(http.requests[0]).toMatchObject({
      method: "GET",
      url: "https://a.test/.well-known/agent.json",
      headers: { Accept: "application/json", "X-API-Key": "k1" },
      timeoutMs: 5_000,
    });
  });

  it("honours a custom card path", async () => {
    const http = new StubHttpClient(() => jsonResponse(createRawAgentCard()));
    const fetcher = new HttpAgentCardFetcher(http, "/.well-known/agent-card.json");

    await fetcher.fetch("https://a.test/agents/x", {}, 5_000);

    expect(http.requests[0]?.url).toBe("https://a.test/agents/x/.well-known/agent-card.json");
  });

  it("throws HttpStatusError on a non-2xx response", async () => {
    const http = new StubHttpClient(() => ({ status: 404, body: "Not Found" }));
    const fetcher = new HttpAgentCardFetcher(http);

    const error = await fetcher.fetch("https://a.test", {}, 5_000).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({ status: 404, stage: "discovery", responseBody: "Not Found" });
  });

  it("throws MalformedCardError when the body is not JSON", async () => {
    const http = new StubHttpClient(() => ({ status: 200, body: "<html>" }));
    const fetcher = new HttpAgentCardFetcher(http);

    await expect(fetcher.fetch("https://a.test", {}, 5_000)).rejects.toThrow(
      'Malformed agent card from "https://a.test": response body is not valid JSON',
    );
  });

  it("throws MalformedCardError when required fields are missing", async () => {
    const http = new StubHttpClient(() => jsonResponse({ description: "no name" }));
    const fetcher = new HttpAgentCardFetcher(http);

    const error = await fetcher.fetch("https://a.test", {}, 5_000).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MalformedCardError);
    expect(error instanceof MalformedCardError && error.message).toContain("name:");
    expect(error instanceof MalformedCardError && error.message).toContain("skills:");
  });

  it("throws UnreachableError on connection failure", async () => {
    const http = new StubHttpClient(() => {
      throw new TypeError("fetch failed");
    });
    const fetcher = new HttpAgentCardFetcher(http);

    await expect(fetcher.fetch("https://a.test", {}, 5_000)).rejects.toThrow(UnreachableError);
  });
});
