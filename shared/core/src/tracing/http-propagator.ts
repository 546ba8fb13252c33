/**
 * HTTP hop propagation.
 *
 * Outbound: the caller's CLIENT span context goes into a `traceparent`
 * request header. Inbound: the header is read back (name matched
 * case-insensitively) and continued into a fresh span context.
 */

import type { PropagationEnvelope, TraceContext } from '@tracechain/types';
import {
  alwaysSample,
  continueFrom,
  toEnvelope,
  TRACEPARENT_HEADER,
} from './trace-context';
import type { Sampler } from './trace-context';

/**
 * Request headers as Node and express expose them.
 */
export type IncomingHeaders = Readonly<Record<string, string | string[] | undefined>>;

export class HttpHopPropagator {
  /**
   * @param sampleRoot - Sampling decision for requests that arrive without a usable traceparent
   */
  constructor(private readonly sampleRoot: Sampler = alwaysSample) {}

  /**
   * Headers to add to an outbound request made on behalf of `context`.
   */
  inject(context: TraceContext): PropagationEnvelope {
    return toEnvelope(context);
  }

  /**
   * Context for the span that handles an inbound request.
   * A missing or unparsable header starts a new trace. Never throws.
   */
  extract(headers: IncomingHeaders): TraceContext {
    const traceparent = findHeader(headers, TRACEPARENT_HEADER);
    return continueFrom(
      traceparent === undefined ? undefined : { [TRACEPARENT_HEADER]: traceparent },
      this.sampleRoot
    );
  }
}

function findHeader(headers: IncomingHeaders, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== name) continue;
    return Array.isArray(value) ? value[0] : value;
  }
  return undefined;
}
