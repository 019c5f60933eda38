import { SpanStatusCode, trace } from "@opentelemetry/api";
import { InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { addSpanEvent, isTelemetryEnabled, withSpan } from "../span-helpers.js";

describe("withSpan", () => {
  let exporter: InMemorySpanExporter;
  let provider: NodeTracerProvider;

  beforeEach(() => {
    exporter = new InMemorySpanExporter();
    provider = new NodeTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    trace.disable();
    provider.register();
  });

  afterEach(async () => {
    trace.disable();
    exporter.reset();
    await provider.shutdown();
  });

  it("creates a named span with attributes", async () => {
    await withSpan(
      "parley.a2a.discover",
      { "a2a.agent_url": "https://a.test", "a2a.cached": false },
      async () => {},
    );

    const spans = exporter.getFinishedSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]?.name).toBe("parley.a2a.discover");
    expect(spans[0]?.attributes["a2a.agent_url"]).toBe("https://a.test");
    expect(spans[0]?.attributes["a2a.cached"]).toBe(false);
  });

  it("skips undefined attributes", async () => {
    await withSpan("parley.a2a.send", { "a2a.context_id": undefined, count: 2 }, async () => {});

    const spans = exporter.getFinishedSpans();
    expect(Object.keys(spans[0]?.attributes ?? {})).toEqual(["count"]);
  });

  it("sets OK status and returns the function's value", async () => {
    const result = await withSpan("test.ok", {}, async () => 42);

    expect(result).toBe(42);
    expect(exporter.getFinishedSpans()[0]?.status.code).toBe(SpanStatusCode.OK);
  });

  it("records the exception and sets ERROR status on failure", async () => {
    await expect(
      withSpan("test.error", {}, async () => {
        throw new Error("agent unreachable");
      }),
    ).rejects.toThrow("agent unreachable");

    const spans = exporter.getFinishedSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]?.status.code).toBe(SpanStatusCode.ERROR);
    expect(spans[0]?.status.message).toBe("agent unreachable");
    expect(spans[0]?.events[0]?.name).toBe("exception");
  });

  it("handles non-Error throws", async () => {
    await expect(
      withSpan("test.string-error", {}, async () => {
        throw "string error";
      }),
    ).rejects.toBe("string error");

    expect(exporter.getFinishedSpans()[0]?.status.message).toBe("string error");
  });

  it("nests spans (parent-child)", async () => {
    await withSpan("parent", {}, async () => {
      await withSpan("child", {}, async () => {});
    });

    const spans = exporter.getFinishedSpans();
    const child = spans.find((s) => s.name === "child");
    const parent = spans.find((s) => s.name === "parent");
    expect(child?.parentSpanId).toBe(parent?.spanContext().spanId);
  });

  it("addSpanEvent annotates the active span", async () => {
    await withSpan("parley.a2a.notification", {}, async () => {
      addSpanEvent("notification.ignored", { reason: "unknown-correlation", skipped: undefined });
    });

    const events = exporter.getFinishedSpans()[0]?.events ?? [];
    expect(events).toHaveLength(1);
    expect(events[0]?.name).toBe("notification.ignored");
    expect(events[0]?.attributes).toEqual({ reason: "unknown-correlation" });
  });
});

describe("withSpan (no provider)", () => {
  it("executes the function when no provider is registered", async () => {
    trace.disable();

    const result = await withSpan("test.noop", { key: "value" }, async () => "works");
    expect(result).toBe("works");
  });

  it("addSpanEvent is a no-op outside any span", () => {
    trace.disable();
    expect(() => addSpanEvent("orphan")).not.toThrow();
  });
});

describe("isTelemetryEnabled", () => {
  it("accepts only explicit true values", () => {
    expect(isTelemetryEnabled({ OTEL_ENABLED: "true" })).toBe(true);
    expect(isTelemetryEnabled({ OTEL_ENABLED: "1" })).toBe(true);
    expect(isTelemetryEnabled({ OTEL_ENABLED: "yes" })).toBe(false);
    expect(isTelemetryEnabled({})).toBe(false);
  });
});
