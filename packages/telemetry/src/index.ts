/**
 * @parley/telemetry: OpenTelemetry tracing helpers for the Parley packages.
 *
 * Public API:
 * - withSpan(): run async work inside a named span
 * - addSpanEvent(): annotate the active span
 * - isTelemetryEnabled(): check OTEL_ENABLED env var
 *
 * Registering a tracer provider and exporter is left to the host process.
 */

export { context, SpanStatusCode, trace } from "@opentelemetry/api";
export { addSpanEvent, isTelemetryEnabled, TRACER_NAME, withSpan } from "./span-helpers.js";
export type { SpanAttributes, SpanAttributeValue } from "./types.js";
