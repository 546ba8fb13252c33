/**
 * Span Exporters.
 *
 * - OtlpHttpSpanExporter: batches finished spans and ships them to an
 *   OpenTelemetry collector using the OTLP/HTTP JSON protocol over native
 *   `fetch`. Without an endpoint it runs as a noop.
 * - InMemorySpanExporter: keeps finished spans in memory for tests and
 *   local inspection.
 *
 * Export is fire-and-forget from the caller's point of view: `export()` only
 * queues, and a failed POST drops the batch without affecting request
 * handling.
 *
 * OTLP/HTTP JSON protocol reference:
 * https://opentelemetry.io/docs/specs/otlp/#otlphttp
 */

import type { AttributeValue, FinishedSpan, SpanKind } from '@tracechain/types';

// =============================================================================
// Exporter Contract
// =============================================================================

export interface SpanExporter {
  /** Queue a closed span for export. Must not throw. */
  export(span: FinishedSpan): void;
  /** Push any queued spans now. */
  flush(): Promise<void>;
  /** Flush and release timers. */
  shutdown(): Promise<void>;
}

// =============================================================================
// In-Memory Exporter
// =============================================================================

export class InMemorySpanExporter implements SpanExporter {
  private readonly spans: FinishedSpan[] = [];
  private stopped = false;

  export(span: FinishedSpan): void {
    if (this.stopped) return;
    this.spans.push(span);
  }

  getFinishedSpans(): ReadonlyArray<FinishedSpan> {
    return [...this.spans];
  }

  findByName(name: string): FinishedSpan[] {
    return this.spans.filter(span => span.name === name);
  }

  findByTraceId(traceId: string): FinishedSpan[] {
    return this.spans.filter(span => span.traceId === traceId);
  }

  reset(): void {
    this.spans.length = 0;
  }

  async flush(): Promise<void> {
    // nothing buffered
  }

  async shutdown(): Promise<void> {
    this.stopped = true;
  }
}

// =============================================================================
// OTLP Types (simplified for export)
// =============================================================================

export type OtlpAnyValue =
  | { stringValue: string }
  | { boolValue: boolean }
  | { intValue: string }
  | { doubleValue: number };

export interface OtlpKeyValue {
  key: string;
  value: OtlpAnyValue;
}

export interface OtlpSpan {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  kind: number;
  startTimeUnixNano: string;
  endTimeUnixNano: string;
  attributes: OtlpKeyValue[];
  status: { code: number; message?: string };
}

interface OtlpTraceExportRequest {
  resourceSpans: Array<{
    resource: { attributes: OtlpKeyValue[] };
    scopeSpans: Array<{
      scope: { name: string; version: string };
      spans: OtlpSpan[];
    }>;
  }>;
}

/** @see https://opentelemetry.io/docs/specs/otel/trace/api/#spankind */
const OTLP_SPAN_KIND: Record<SpanKind, number> = {
  INTERNAL: 1,
  SERVER: 2,
  CLIENT: 3,
  PRODUCER: 4,
  CONSUMER: 5,
};

const OTLP_STATUS_OK = 1;
const OTLP_STATUS_ERROR = 2;

// =============================================================================
// OTLP/HTTP Exporter
// =============================================================================

export interface OtlpSpanExporterConfig {
  /** OTEL collector base URL (e.g., "http://localhost:4318") */
  endpoint: string;

  /** Value of the `service.name` resource attribute */
  serviceName: string;

  /** Maximum number of spans to batch before flushing */
  batchSize?: number;

  /** Maximum time (ms) to wait before flushing a partial batch */
  flushIntervalMs?: number;

  /** Request timeout in ms */
  requestTimeoutMs?: number;

  /** Spans held while the collector is unreachable; older spans are dropped beyond this */
  maxQueueSize?: number;

  /** Additional resource attributes (service.version, created.by, ...) */
  resourceAttributes?: Record<string, string>;
}

export interface OtlpSpanExporterDeps {
  fetchImpl?: typeof fetch;
}

export class OtlpHttpSpanExporter implements SpanExporter {
  private readonly config: OtlpSpanExporterConfig | undefined;
  private readonly fetchImpl: typeof fetch;
  private readonly batch: OtlpSpan[] = [];
  private readonly maxBatchSize: number;
  private readonly maxQueueSize: number;
  private readonly requestTimeoutMs: number;
  private readonly resourceAttributes: OtlpKeyValue[];
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private _exportCount = 0;
  private _dropCount = 0;

  constructor(config?: OtlpSpanExporterConfig, deps: OtlpSpanExporterDeps = {}) {
    this.config = config;
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.maxBatchSize = config?.batchSize ?? 100;
    this.maxQueueSize = config?.maxQueueSize ?? 2048;
    this.requestTimeoutMs = config?.requestTimeoutMs ?? 5000;

    const resource: Record<string, string> = {
      ...config?.resourceAttributes,
      'service.name': config?.serviceName ?? 'unknown',
    };
    this.resourceAttributes = Object.entries(resource).map(([key, value]) => ({
      key,
      value: { stringValue: value },
    }));

    if (this.config) {
      this.flushTimer = setInterval(() => {
        this.scheduleFlush();
      }, config?.flushIntervalMs ?? 5000);
      this.flushTimer.unref();
    }
  }

  export(span: FinishedSpan): void {
    if (!this.config) {
      return;
    }

    this.batch.push(toOtlpSpan(span));

    if (this.batch.length > this.maxQueueSize) {
      const overflow = this.batch.length - this.maxQueueSize;
      this.batch.splice(0, overflow);
      this._dropCount += overflow;
    }

    if (this.batch.length >= this.maxBatchSize) {
      this.scheduleFlush();
    }
  }

  /**
   * Flush the current batch to the collector.
   */
  async flush(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
    if (this.batch.length === 0 || !this.config) {
      return;
    }

    const spans = this.batch.splice(0, this.batch.length);
    this.inFlight = this.post(this.config.endpoint, spans);
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  async shutdown(): Promise<void> {
    if (this.flushTimer !== null) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  /** Number of spans accepted by the collector */
  get exportCount(): number {
    return this._exportCount;
  }

  /** Number of spans dropped due to errors or overflow */
  get dropCount(): number {
    return this._dropCount;
  }

  /** Number of spans waiting in the batch buffer */
  get pendingCount(): number {
    return this.batch.length;
  }

  /** Whether the exporter is in noop mode (no endpoint configured) */
  get isNoop(): boolean {
    return !this.config;
  }

  private scheduleFlush(): void {
    // post() records its own failures
    this.flush().catch(() => undefined);
  }

  private async post(endpoint: string, spans: OtlpSpan[]): Promise<void> {
    const payload: OtlpTraceExportRequest = {
      resourceSpans: [
        {
          resource: { attributes: this.resourceAttributes },
          scopeSpans: [
            {
              scope: { name: '@tracechain/core', version: '1.0.0' },
              spans,
            },
          ],
        },
      ],
    };

    const fetchImpl = this.fetchImpl;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);

    try {
      const response = await fetchImpl(`${endpoint}/v1/traces`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (response.ok) {
        this._exportCount += spans.length;
      } else {
        this._dropCount += spans.length;
      }
    } catch {
      // Network errors, timeouts: drop the batch
      this._dropCount += spans.length;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// =============================================================================
// Record Conversion
// =============================================================================

function toUnixNano(epochMs: number): string {
  return String(BigInt(Math.round(epochMs)) * 1_000_000n);
}

function toAnyValue(value: AttributeValue): OtlpAnyValue {
  if (typeof value === 'string') return { stringValue: value };
  if (typeof value === 'boolean') return { boolValue: value };
  return Number.isInteger(value) ? { intValue: String(value) } : { doubleValue: value };
}

/**
 * Convert a finished span to its OTLP JSON representation.
 */
export function toOtlpSpan(span: FinishedSpan): OtlpSpan {
  const otlp: OtlpSpan = {
    traceId: span.traceId,
    spanId: span.spanId,
    name: span.name,
    kind: OTLP_SPAN_KIND[span.kind],
    startTimeUnixNano: toUnixNano(span.startTimeMs),
    endTimeUnixNano: toUnixNano(span.endTimeMs),
    attributes: Object.entries(span.attributes).map(([key, value]) => ({ key, value: toAnyValue(value) })),
    status: span.status.code === 'ERROR'
      ? { code: OTLP_STATUS_ERROR, message: span.status.description }
      : { code: OTLP_STATUS_OK },
  };

  if (span.parentSpanId) {
    otlp.parentSpanId = span.parentSpanId;
  }

  return otlp;
}
