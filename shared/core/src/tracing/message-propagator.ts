/**
 * Message hop propagation.
 *
 * The producer writes its PRODUCER span context into the message headers:
 * `traceparent` plus plain `traceId` and `spanId` entries for consumers that
 * only read those. The body is never touched.
 *
 * Every consumer extracts from its own copy of the message, so the consumers
 * of a fanout publish become siblings: same trace id, same parent (the
 * producer span), distinct span ids.
 */

import type { MessageProperties, TraceContext } from '@tracechain/types';
import {
  alwaysSample,
  continueFrom,
  formatTraceparent,
  generateSpanId,
  isValidSpanId,
  isValidTraceId,
  newRootContext,
  parseTraceparent,
  TRACEPARENT_HEADER,
} from './trace-context';
import type { Sampler } from './trace-context';

export const TRACE_ID_HEADER = 'traceId';
export const SPAN_ID_HEADER = 'spanId';

export class MessageHopPropagator {
  /**
   * @param sampleRoot - Sampling decision for messages that arrive without usable trace headers
   */
  constructor(private readonly sampleRoot: Sampler = alwaysSample) {}

  /**
   * Return new properties whose headers carry `context`.
   * Existing headers are kept; trace headers are overwritten.
   */
  injectIntoMessage(context: TraceContext, properties: MessageProperties = { headers: {} }): MessageProperties {
    return {
      ...properties,
      headers: {
        ...properties.headers,
        [TRACEPARENT_HEADER]: formatTraceparent(context),
        [TRACE_ID_HEADER]: context.traceId,
        [SPAN_ID_HEADER]: context.spanId,
      },
    };
  }

  /**
   * Context for the CONSUMER span that handles a received message.
   *
   * Prefers `traceparent`; falls back to the `traceId`/`spanId` pair
   * (assumed sampled). Anything else starts a new trace. Never throws.
   */
  extractFromMessage(properties: Partial<MessageProperties> | undefined): TraceContext {
    const headers = properties?.headers;
    if (!headers) {
      return newRootContext(this.sampleRoot());
    }

    if (parseTraceparent(headers[TRACEPARENT_HEADER])) {
      return continueFrom(headers, this.sampleRoot);
    }

    const traceId = headers[TRACE_ID_HEADER];
    const spanId = headers[SPAN_ID_HEADER];
    if (isValidTraceId(traceId) && isValidSpanId(spanId)) {
      return {
        traceId,
        spanId: generateSpanId(),
        parentSpanId: spanId,
        sampled: true,
      };
    }

    return newRootContext(this.sampleRoot());
  }
}
