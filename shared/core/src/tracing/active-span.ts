/**
 * Execution-scoped "current span".
 *
 * Backed by AsyncLocalStorage so that concurrent requests and messages each
 * see their own span, including across awaits. There is no process-global
 * current span.
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { Span } from './span';

const activeSpanStorage = new AsyncLocalStorage<Span>();

/**
 * Run `fn` with `span` as the current span. The previous span is restored
 * when `fn` (or the promise it returns) settles.
 */
export function runWithActiveSpan<T>(span: Span, fn: () => T): T {
  return activeSpanStorage.run(span, fn);
}

export function getActiveSpan(): Span | undefined {
  return activeSpanStorage.getStore();
}

/**
 * Trace fields for log correlation: `{ traceId, spanId }` of the current
 * span, or an empty object outside any span.
 */
export function getActiveTraceFields(): { traceId?: string; spanId?: string } {
  const span = activeSpanStorage.getStore();
  if (!span) {
    return {};
  }
  return { traceId: span.context.traceId, spanId: span.context.spanId };
}
