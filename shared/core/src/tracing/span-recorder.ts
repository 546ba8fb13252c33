/**
 * SpanRecorder
 *
 * Opens, annotates and closes spans for one service, and hands closed,
 * sampled spans to the configured exporter.
 *
 * Tagging a closed span and closing twice are no-ops. Exporter failures are
 * logged, never thrown.
 *
 * @example
 * ```typescript
 * const recorder = new SpanRecorder({ serviceName: 'service-a', exporter });
 * const span = recorder.start(ctx, 'GET /api/chain', 'SERVER');
 * await recorder.withSpan(span, async () => {
 *   recorder.tag(span, 'request.data', data);
 *   // ...
 * });
 * recorder.close(span);
 * ```
 */

import type { AttributeValue, SpanAttributes, SpanKind, TraceContext } from '@tracechain/types';
import { getErrorMessage } from '../error-handling';
import type { ILogger } from '../logging/types';
import { NullLogger } from '../logging/testing-logger';
import { getActiveSpan, runWithActiveSpan } from './active-span';
import { Span } from './span';
import type { SpanExporter } from './span-exporter';
import { createChildContext } from './trace-context';

export interface SpanRecorderOptions {
  /** Service that owns every span started by this recorder */
  serviceName: string;
  exporter: SpanExporter;
  logger?: ILogger;
  /** Epoch-millisecond clock */
  clock?: () => number;
}

export class SpanRecorder {
  private readonly serviceName: string;
  private readonly exporter: SpanExporter;
  private readonly logger: ILogger;
  private readonly clock: () => number;

  constructor(options: SpanRecorderOptions) {
    this.serviceName = options.serviceName;
    this.exporter = options.exporter;
    this.logger = options.logger ?? new NullLogger();
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Open a span whose identity is `context` and record its start time.
   */
  start(context: TraceContext, name: string, kind: SpanKind, attributes: SpanAttributes = {}): Span {
    return new Span(context, name, kind, this.serviceName, this.clock(), attributes);
  }

  /**
   * Open a span that is a child of `parent` in the same trace.
   */
  startChild(parent: Span, name: string, kind: SpanKind, attributes: SpanAttributes = {}): Span {
    return this.start(createChildContext(parent.context), name, kind, attributes);
  }

  /**
   * Attach an attribute. No-op on a closed span; never throws.
   */
  tag(span: Span, key: string, value: AttributeValue): void {
    if (!span.setAttribute(key, value) && !span.isEnded) {
      this.logger.debug('Span attribute rejected', { span: span.name, key });
    }
  }

  tagAll(span: Span, attributes: SpanAttributes): void {
    for (const [key, value] of Object.entries(attributes)) {
      this.tag(span, key, value);
    }
  }

  /**
   * Mark the span ERROR with the error's message. The span stays open.
   */
  recordError(span: Span, error: unknown): void {
    if (span.setError(getErrorMessage(error))) {
      span.setAttribute('error.type', error instanceof Error ? error.name : typeof error);
    }
  }

  /**
   * Close the span and export it when sampled. Closing twice is a no-op.
   */
  close(span: Span): void {
    const finished = span.end(this.clock());
    if (!finished || !finished.sampled) {
      return;
    }

    try {
      this.exporter.export(finished);
    } catch (error) {
      this.logger.warn('Span export failed', {
        span: finished.name,
        traceId: finished.traceId,
        error: getErrorMessage(error),
      });
    }
  }

  /**
   * Run `fn` with `span` as the current span of this execution scope.
   */
  withSpan<T>(span: Span, fn: () => T): T {
    return runWithActiveSpan(span, fn);
  }

  /**
   * The span current in this execution scope, if any.
   */
  currentSpan(): Span | undefined {
    return getActiveSpan();
  }
}
