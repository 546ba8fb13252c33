/**
 * A single timed operation within a trace.
 *
 * Spans are created and closed through {@link SpanRecorder}; this class only
 * holds state and enforces the OPEN -> CLOSED lifecycle. Once ended, every
 * mutator is a no-op.
 */

import type {
  AttributeValue,
  FinishedSpan,
  SpanAttributes,
  SpanKind,
  SpanStatus,
  TraceContext,
} from '@tracechain/types';

export class Span {
  private readonly attributes: SpanAttributes = {};
  private status: SpanStatus = { code: 'OK' };
  private endTimeMs: number | null = null;

  constructor(
    readonly context: TraceContext,
    readonly name: string,
    readonly kind: SpanKind,
    readonly serviceName: string,
    readonly startTimeMs: number,
    attributes: SpanAttributes = {}
  ) {
    for (const [key, value] of Object.entries(attributes)) {
      this.setAttribute(key, value);
    }
  }

  get isEnded(): boolean {
    return this.endTimeMs !== null;
  }

  /**
   * @returns false when the span is closed or the attribute is unusable
   */
  setAttribute(key: string, value: AttributeValue): boolean {
    if (this.isEnded || key.length === 0 || !isAttributeValue(value)) {
      return false;
    }
    this.attributes[key] = value;
    return true;
  }

  /**
   * Mark the span failed. The span stays open.
   */
  setError(description: string): boolean {
    if (this.isEnded) {
      return false;
    }
    this.status = { code: 'ERROR', description };
    return true;
  }

  getAttributes(): Readonly<SpanAttributes> {
    return { ...this.attributes };
  }

  getStatus(): SpanStatus {
    return this.status;
  }

  /**
   * Close the span.
   *
   * @returns the completed span on the first call, null on every later call
   */
  end(endTimeMs: number): FinishedSpan | null {
    if (this.isEnded) {
      return null;
    }
    this.endTimeMs = Math.max(endTimeMs, this.startTimeMs);

    return {
      traceId: this.context.traceId,
      spanId: this.context.spanId,
      parentSpanId: this.context.parentSpanId,
      sampled: this.context.sampled,
      name: this.name,
      kind: this.kind,
      serviceName: this.serviceName,
      attributes: this.getAttributes(),
      status: this.status,
      startTimeMs: this.startTimeMs,
      endTimeMs: this.endTimeMs,
    };
  }
}

function isAttributeValue(value: unknown): value is AttributeValue {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return typeof value === 'string' || typeof value === 'boolean';
}
