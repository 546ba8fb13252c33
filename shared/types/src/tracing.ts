/**
 * Trace and span vocabulary shared by every hop.
 *
 * Identifiers follow W3C Trace Context: a 32-hex-char trace id and a
 * 16-hex-char span id, lowercase, never all zeros.
 */

/**
 * Identity of one span within a trace.
 * Immutable; a new hop always derives a fresh context instead of editing one.
 */
export interface TraceContext {
  readonly traceId: string;
  readonly spanId: string;
  /** Span id of the caller; absent on a root span */
  readonly parentSpanId?: string;
  readonly sampled: boolean;
}

/**
 * Flat string map that carries trace context across a process boundary
 * (HTTP headers or message headers).
 */
export type PropagationEnvelope = Record<string, string>;

export type SpanKind = 'SERVER' | 'CLIENT' | 'PRODUCER' | 'CONSUMER' | 'INTERNAL';

export const SPAN_KINDS: readonly SpanKind[] = ['SERVER', 'CLIENT', 'PRODUCER', 'CONSUMER', 'INTERNAL'];

export type AttributeValue = string | number | boolean;

export type SpanAttributes = Record<string, AttributeValue>;

export type SpanStatus =
  | { code: 'OK' }
  | { code: 'ERROR'; description: string };

/**
 * A closed span as handed to an exporter.
 */
export interface FinishedSpan {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  sampled: boolean;
  name: string;
  kind: SpanKind;
  serviceName: string;
  attributes: Readonly<SpanAttributes>;
  status: SpanStatus;
  /** Epoch milliseconds */
  startTimeMs: number;
  /** Epoch milliseconds, set exactly once on close */
  endTimeMs: number;
}
