/**
 * Trace Context Generation and Propagation.
 *
 * Creates trace contexts and converts them to and from the propagation
 * envelope that crosses process boundaries. The envelope's canonical entry
 * is a W3C `traceparent` value: `00-<traceId>-<spanId>-<flags>`.
 *
 * Design decisions:
 * - No OTEL SDK dependency; ids come from crypto.randomBytes
 * - Every function is pure: contexts are immutable and returned fresh
 * - Reading an envelope never throws; anything unusable yields a new root
 */

import { randomBytes } from 'crypto';
import type { PropagationEnvelope, TraceContext } from '@tracechain/types';

// =============================================================================
// Constants
// =============================================================================

/** Envelope key (and HTTP header name) carrying the W3C traceparent */
export const TRACEPARENT_HEADER = 'traceparent';

const TRACEPARENT_VERSION = '00';
const TRACEPARENT_PATTERN = /^([0-9a-f]{2})-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/;
const TRACE_ID_PATTERN = /^[0-9a-f]{32}$/;
const SPAN_ID_PATTERN = /^[0-9a-f]{16}$/;
const ALL_ZEROS = /^0+$/;
const SAMPLED_FLAG = 0x01;

// =============================================================================
// ID Generation and Validation
// =============================================================================

export function isValidTraceId(value: unknown): value is string {
  return typeof value === 'string' && TRACE_ID_PATTERN.test(value) && !ALL_ZEROS.test(value);
}

export function isValidSpanId(value: unknown): value is string {
  return typeof value === 'string' && SPAN_ID_PATTERN.test(value) && !ALL_ZEROS.test(value);
}

/**
 * Generate a W3C trace ID (32 hex characters / 16 bytes), never all zeros.
 */
export function generateTraceId(): string {
  let id = randomBytes(16).toString('hex');
  while (!isValidTraceId(id)) {
    id = randomBytes(16).toString('hex');
  }
  return id;
}

/**
 * Generate a W3C span ID (16 hex characters / 8 bytes), never all zeros.
 */
export function generateSpanId(): string {
  let id = randomBytes(8).toString('hex');
  while (!isValidSpanId(id)) {
    id = randomBytes(8).toString('hex');
  }
  return id;
}

// =============================================================================
// Sampling
// =============================================================================

/**
 * Decides whether a newly started root trace is sampled.
 * Continued traces always keep the upstream decision.
 */
export type Sampler = () => boolean;

export const alwaysSample: Sampler = () => true;

/**
 * Sample new root traces with the given probability.
 *
 * @param probability - 0 never samples, 1 always samples
 * @param random - Source of uniform numbers in [0, 1)
 */
export function createProbabilitySampler(
  probability: number,
  random: () => number = Math.random
): Sampler {
  if (!Number.isFinite(probability)) {
    throw new TypeError(`createProbabilitySampler: probability must be a finite number, got ${probability}`);
  }
  if (probability <= 0) return () => false;
  if (probability >= 1) return alwaysSample;
  return () => random() < probability;
}

// =============================================================================
// Context Lifecycle
// =============================================================================

/**
 * Start a brand-new trace: fresh trace id, fresh span id, no parent.
 *
 * @example
 * ```typescript
 * const ctx = newRootContext(true);
 * logger.info('Request started', { traceId: ctx.traceId });
 * ```
 */
export function newRootContext(sampled: boolean = true): TraceContext {
  return {
    traceId: generateTraceId(),
    spanId: generateSpanId(),
    sampled,
  };
}

/**
 * Derive the context of a child span in the same process.
 * Keeps the trace id and sampling decision; the parent's span id becomes
 * the child's parentSpanId.
 */
export function createChildContext(parent: TraceContext): TraceContext {
  return {
    traceId: parent.traceId,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
    sampled: parent.sampled,
  };
}

// =============================================================================
// traceparent Encoding
// =============================================================================

export interface ParsedTraceparent {
  traceId: string;
  spanId: string;
  sampled: boolean;
}

export function formatTraceparent(context: TraceContext): string {
  const flags = context.sampled ? '01' : '00';
  return `${TRACEPARENT_VERSION}-${context.traceId}-${context.spanId}-${flags}`;
}

/**
 * Parse a traceparent value.
 *
 * Returns null for anything that is not a well-formed version-00 value
 * with non-zero ids, including non-string input.
 */
export function parseTraceparent(value: unknown): ParsedTraceparent | null {
  if (typeof value !== 'string') {
    return null;
  }

  const match = TRACEPARENT_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, version, traceId, spanId, flags] = match;
  if (version !== TRACEPARENT_VERSION || !isValidTraceId(traceId) || !isValidSpanId(spanId)) {
    return null;
  }

  return {
    traceId,
    spanId,
    sampled: (parseInt(flags, 16) & SAMPLED_FLAG) === SAMPLED_FLAG,
  };
}

// =============================================================================
// Envelope Conversion
// =============================================================================

/**
 * Serialize a context into a propagation envelope.
 * The envelope carries the context's own span id; the receiver makes it
 * the parent of its span.
 */
export function toEnvelope(context: TraceContext): PropagationEnvelope {
  return { [TRACEPARENT_HEADER]: formatTraceparent(context) };
}

/**
 * Continue a trace from an incoming envelope.
 *
 * A valid envelope yields the same trace id, a fresh span id, the
 * envelope's span id as parent and the upstream sampling decision.
 * A missing or malformed envelope yields a new root context sampled by
 * `sampleRoot`. Never throws.
 *
 * @example
 * ```typescript
 * const ctx = continueFrom({ traceparent: '00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01' });
 * // ctx.traceId === '4bf92f3577b34da6a3ce929d0e0e4736'
 * // ctx.parentSpanId === '00f067aa0ba902b7'
 * ```
 */
export function continueFrom(envelope: unknown, sampleRoot: Sampler = alwaysSample): TraceContext {
  const parsed = isRecord(envelope) ? parseTraceparent(envelope[TRACEPARENT_HEADER]) : null;

  if (!parsed) {
    return newRootContext(sampleRoot());
  }

  return {
    traceId: parsed.traceId,
    spanId: generateSpanId(),
    parentSpanId: parsed.spanId,
    sampled: parsed.sampled,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
