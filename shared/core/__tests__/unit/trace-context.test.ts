/**
 * Trace Context Tests
 *
 * @see shared/core/src/tracing/trace-context.ts
 */

import { describe, it, expect } from '@jest/globals';
import {
  TRACEPARENT_HEADER,
  continueFrom,
  createChildContext,
  createProbabilitySampler,
  formatTraceparent,
  generateSpanId,
  generateTraceId,
  isValidSpanId,
  isValidTraceId,
  newRootContext,
  parseTraceparent,
  toEnvelope,
} from '../../src/tracing/trace-context';

const TRACE_ID = '4bf92f3577b34da6a3ce929d0e0e4736';
const SPAN_ID = '00f067aa0ba902b7';

describe('trace-context', () => {
  // ===========================================================================
  // ID generation
  // ===========================================================================

  describe('id generation', () => {
    it('should generate 32 lowercase hex trace ids', () => {
      const id = generateTraceId();
      expect(id).toMatch(/^[0-9a-f]{32}$/);
      expect(isValidTraceId(id)).toBe(true);
    });

    it('should generate 16 lowercase hex span ids', () => {
      const id = generateSpanId();
      expect(id).toMatch(/^[0-9a-f]{16}$/);
      expect(isValidSpanId(id)).toBe(true);
    });

    it('should generate distinct ids', () => {
      const ids = new Set(Array.from({ length: 200 }, () => generateSpanId()));
      expect(ids.size).toBe(200);
    });

    it('should reject all-zero and malformed ids', () => {
      expect(isValidTraceId('0'.repeat(32))).toBe(false);
      expect(isValidSpanId('0'.repeat(16))).toBe(false);
      expect(isValidTraceId(TRACE_ID.toUpperCase())).toBe(false);
      expect(isValidSpanId(SPAN_ID.slice(1))).toBe(false);
      expect(isValidTraceId(undefined)).toBe(false);
    });
  });

  // ===========================================================================
  // Context lifecycle
  // ===========================================================================

  describe('newRootContext', () => {
    it('should start a trace without parent', () => {
      const context = newRootContext();

      expect(isValidTraceId(context.traceId)).toBe(true);
      expect(isValidSpanId(context.spanId)).toBe(true);
      expect(context.parentSpanId).toBeUndefined();
      expect(context.sampled).toBe(true);
    });

    it('should carry the sampling decision', () => {
      expect(newRootContext(false).sampled).toBe(false);
    });
  });

  describe('createChildContext', () => {
    it('should keep the trace and point at the parent span', () => {
      const parent = newRootContext(false);
      const child = createChildContext(parent);

      expect(child.traceId).toBe(parent.traceId);
      expect(child.parentSpanId).toBe(parent.spanId);
      expect(child.spanId).not.toBe(parent.spanId);
      expect(child.sampled).toBe(false);
    });
  });

  // ===========================================================================
  // traceparent
  // ===========================================================================

  describe('traceparent', () => {
    it('should format version 00 with the sampled flag', () => {
      expect(formatTraceparent({ traceId: TRACE_ID, spanId: SPAN_ID, sampled: true }))
        .toBe(`00-${TRACE_ID}-${SPAN_ID}-01`);
      expect(formatTraceparent({ traceId: TRACE_ID, spanId: SPAN_ID, sampled: false }))
        .toBe(`00-${TRACE_ID}-${SPAN_ID}-00`);
    });

    it('should parse a well-formed value', () => {
      expect(parseTraceparent(`00-${TRACE_ID}-${SPAN_ID}-01`)).toEqual({
        traceId: TRACE_ID,
        spanId: SPAN_ID,
        sampled: true,
      });
      expect(parseTraceparent(`00-${TRACE_ID}-${SPAN_ID}-02`)?.sampled).toBe(false);
    });

    it('should reject malformed values', () => {
      const invalid: unknown[] = [
        undefined,
        42,
        '',
        'garbage',
        `01-${TRACE_ID}-${SPAN_ID}-01`,
        `00-${'0'.repeat(32)}-${SPAN_ID}-01`,
        `00-${TRACE_ID}-${'0'.repeat(16)}-01`,
        `00-${TRACE_ID.toUpperCase()}-${SPAN_ID}-01`,
        `00-${TRACE_ID}-${SPAN_ID}`,
      ];

      for (const value of invalid) {
        expect(parseTraceparent(value)).toBeNull();
      }
    });
  });

  // ===========================================================================
  // Envelope conversion
  // ===========================================================================

  describe('toEnvelope / continueFrom', () => {
    it('should serialize the context span id', () => {
      const context = { traceId: TRACE_ID, spanId: SPAN_ID, sampled: true };
      expect(toEnvelope(context)).toEqual({ [TRACEPARENT_HEADER]: `00-${TRACE_ID}-${SPAN_ID}-01` });
    });

    it('should continue the trace with the sender as parent', () => {
      const sender = newRootContext();
      const received = continueFrom(toEnvelope(sender));

      expect(received.traceId).toBe(sender.traceId);
      expect(received.parentSpanId).toBe(sender.spanId);
      expect(received.spanId).not.toBe(sender.spanId);
      expect(received.sampled).toBe(true);
    });

    it('should keep an unsampled upstream decision', () => {
      const received = continueFrom({ traceparent: `00-${TRACE_ID}-${SPAN_ID}-00` }, () => true);
      expect(received.sampled).toBe(false);
      expect(received.traceId).toBe(TRACE_ID);
    });

    it('should start a new root for unusable envelopes', () => {
      const inputs: unknown[] = [undefined, null, 'text', [], {}, { traceparent: 'corrupt' }];

      for (const input of inputs) {
        const context = continueFrom(input);
        expect(context.parentSpanId).toBeUndefined();
        expect(context.traceId).not.toBe(TRACE_ID);
        expect(isValidTraceId(context.traceId)).toBe(true);
      }
    });

    it('should sample new roots with the given sampler', () => {
      expect(continueFrom(undefined, () => false).sampled).toBe(false);
    });
  });

  // ===========================================================================
  // Sampling
  // ===========================================================================

  describe('createProbabilitySampler', () => {
    it('should never sample at 0 and always at 1', () => {
      expect(createProbabilitySampler(0)()).toBe(false);
      expect(createProbabilitySampler(1)()).toBe(true);
    });

    it('should compare the random draw with the probability', () => {
      const draws = [0.1, 0.6];
      const sampler = createProbabilitySampler(0.5, () => draws.shift() ?? 0);

      expect(sampler()).toBe(true);
      expect(sampler()).toBe(false);
    });

    it('should reject non-finite probabilities', () => {
      expect(() => createProbabilitySampler(Number.NaN)).toThrow(TypeError);
    });
  });
});
