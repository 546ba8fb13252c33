/**
 * Tracing Module
 *
 * W3C `traceparent` context propagation across HTTP and broker hops, span
 * recording with an execution-scoped current span, and span export.
 */

export {
  TRACEPARENT_HEADER,
  isValidTraceId,
  isValidSpanId,
  generateTraceId,
  generateSpanId,
  alwaysSample,
  createProbabilitySampler,
  newRootContext,
  createChildContext,
  formatTraceparent,
  parseTraceparent,
  toEnvelope,
  continueFrom,
} from './trace-context';
export type { Sampler, ParsedTraceparent } from './trace-context';

export { Span } from './span';
export { SpanRecorder } from './span-recorder';
export type { SpanRecorderOptions } from './span-recorder';
export { runWithActiveSpan, getActiveSpan, getActiveTraceFields } from './active-span';

export {
  InMemorySpanExporter,
  OtlpHttpSpanExporter,
  toOtlpSpan,
} from './span-exporter';
export type {
  SpanExporter,
  OtlpSpanExporterConfig,
  OtlpSpanExporterDeps,
  OtlpSpan,
  OtlpKeyValue,
  OtlpAnyValue,
} from './span-exporter';

export { HttpHopPropagator } from './http-propagator';
export type { IncomingHeaders } from './http-propagator';
export { MessageHopPropagator, TRACE_ID_HEADER, SPAN_ID_HEADER } from './message-propagator';
