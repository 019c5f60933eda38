/**
 * Span helper utilities: span creation with error handling.
 *
 * Wraps OpenTelemetry's tracer.startActiveSpan with automatic:
 * - Attribute setting (undefined values are skipped)
 * - Error recording + status propagation
 * - Span ending (even on error)
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";
import type { SpanAttributes } from "./types.js";

export const TRACER_NAME = "parley";

/**
 * Execute an async function within a named OTel span.
 *
 * When no tracer provider is registered the function still runs, inside a
 * no-op span.
 *
 * @param name - Span name (e.g., "parley.a2a.discover")
 * @param attributes - Key-value pairs to set on the span
 * @param fn - Async function to execute within the span
 * @throws Re-throws any error from fn after recording it on the span
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: () => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      for (const [key, value] of Object.entries(attributes)) {
        if (value !== undefined) {
          span.setAttribute(key, value);
        }
      }
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Attach an event to the currently active span, if any.
 * Used for outcomes that are not failures (e.g. an ignored notification).
 */
export function addSpanEvent(name: string, attributes: SpanAttributes = {}): void {
  const span = trace.getActiveSpan();
  if (span === undefined) return;
  const defined: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) {
      defined[key] = value;
    }
  }
  span.addEvent(name, defined);
}

/**
 * Check if telemetry is enabled via the OTEL_ENABLED env var.
 *
 * Returns true only when OTEL_ENABLED is explicitly set to "true" or "1".
 */
export function isTelemetryEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.OTEL_ENABLED;
  return value === "true" || value === "1";
}
