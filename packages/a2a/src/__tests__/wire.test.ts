import { describe, expect, it } from "vitest";
import { RawAgentCardSchema } from "../validation.js";
import {
  toAgentCard,
  toArtifacts,
  toOutboundMessage,
  toPart,
  toWireMessage,
  toWirePushConfig,
} from "../wire.js";
import { createRawAgentCard } from "./helpers.js";

describe("toAgentCard", () => {
  it("normalizes a full card", () => {
    const raw = RawAgentCardSchema.parse(
      createRawAgentCard({
        url: "https://a.test/rpc",
        protocolVersion: "0.3.0",
        securitySchemes: { apiKey: { type: "apiKey", in: "header", name: "X-API-Key" } },
        security: [{ apiKey: [] }],
      }),
    );

    const card = toAgentCard("https://a.test", raw);

    expect(card.name).toBe("Test Agent");
    expect(card.url).toBe("https://a.test/rpc");
    expect(card.protocolVersion).toBe("0.3.0");
    expect(card.provider).toBe("Test Corp");
    expect(card.skills[0]).toEqual({
      id: "search",
      name: "Search",
      description: "Search the web",
      tags: ["search", "web"],
      inputModes: undefined,
      outputModes: undefined,
    });
    expect(card.capabilities).toEqual({
      streaming: false,
      pushNotifications: true,
      stateTransitionHistory: false,
    });
    expect(card.securitySchemes.apiKey).toEqual({
      type: "apiKey",
      scheme: undefined,
      in: "header",
      name: "X-API-Key",
    });
    expect(card.security).toEqual(["apiKey"]);
  });

  it("fills defaults for a minimal card", () => {
    const card = toAgentCard("https://a.test", RawAgentCardSchema.parse({ name: "Echo", skills: [] }));

    expect(card.url).toBe("https://a.test");
    expect(card.description).toBeUndefined();
    expect(card.defaultInputModes).toEqual(["text"]);
    expect(card.defaultOutputModes).toEqual(["text"]);
    expect(card.capabilities.pushNotifications).toBe(false);
    expect(card.security).toEqual([]);
  });

  it("freezes the card and its arrays", () => {
    const card = toAgentCard("https://a.test", RawAgentCardSchema.parse(createRawAgentCard()));

    expect(Object.isFrozen(card)).toBe(true);
    expect(Object.isFrozen(card.skills)).toBe(true);
    expect(Object.isFrozen(card.skills[0])).toBe(true);
    expect(Object.isFrozen(card.capabilities)).toBe(true);
  });
});

describe("toPart", () => {
  it("recognizes text, data and file parts", () => {
    expect(toPart({ kind: "text", text: "hi" })).toEqual({ kind: "text", text: "hi" });
    expect(toPart({ data: { n: 1 } })).toEqual({ kind: "data", data: { n: 1 } });
    expect(toPart({ file: { uri: "https://f.test/a.pdf", mimeType: "application/pdf" } })).toEqual(
      {
        kind: "file",
        uri: "https://f.test/a.pdf",
        bytes: undefined,
        mimeType: "application/pdf",
        name: undefined,
      },
    );
  });

  it("drops parts without a payload", () => {
    expect(toPart({ kind: "text" })).toBeUndefined();
    expect(toPart({ file: {} })).toBeUndefined();
  });
});

describe("toArtifacts", () => {
  it("mints a unique id for each artifact without one", () => {
    const first = toArtifacts([
      { parts: [{ text: "a" }] },
      { artifactId: "named", parts: [{ text: "b" }] },
    ]);
    const second = toArtifacts([{ parts: [{ text: "c" }] }]);

    expect(first[0]?.artifactId).toMatch(/^[0-9a-f-]{36}$/);
    expect(first[1]?.artifactId).toBe("named");
    expect(second[0]?.artifactId).not.toBe(first[0]?.artifactId);
  });

  it("returns an empty list for null", () => {
    expect(toArtifacts(null)).toEqual([]);
  });
});

describe("outbound conversion", () => {
  it("treats a string as a single text part", () => {
    expect(toOutboundMessage("hello")).toEqual({ parts: [{ kind: "text", text: "hello" }] });
  });

  it("builds the message/send message object", () => {
    const wire = toWireMessage(
      {
        parts: [
          { kind: "text", text: "hello" },
          {
            kind: "file",
            uri: "https://f.test/a.pdf",
            bytes: undefined,
            mimeType: "application/pdf",
            name: undefined,
          },
        ],
        contextId: "ctx-1",
      },
      "msg-1",
    );

    expect(wire).toEqual({
      kind: "message",
      role: "user",
      messageId: "msg-1",
      parts: [
        { kind: "text", text: "hello" },
        { kind: "file", file: { uri: "https://f.test/a.pdf", mimeType: "application/pdf" } },
      ],
      contextId: "ctx-1",
    });
  });

  it("builds the push notification block", () => {
    expect(
      toWirePushConfig({
        webhookUrl: "https://hooks.test/a2a",
        webhookToken: "test-secret",
        correlationToken: "corr-1",
      }),
    ).toEqual({
      id: "corr-1",
      url: "https://hooks.test/a2a",
      token: "corr-1",
      authentication: { schemes: ["Bearer"], credentials: "test-secret" },
    });
  });
});
