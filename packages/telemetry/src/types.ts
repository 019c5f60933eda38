/**
 * Standard span attribute types accepted by OpenTelemetry.
 */
export type SpanAttributeValue = string | number | boolean;

/**
 * Record of span attributes. `undefined` entries are dropped before they
 * reach the span, so optional fields can be passed straight through.
 */
export type SpanAttributes = Record<string, SpanAttributeValue | undefined>;
