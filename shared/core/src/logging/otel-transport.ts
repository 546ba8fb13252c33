/**
 * OpenTelemetry Log Transport for Pino.
 *
 * Ships structured log lines to an OTEL collector using the OTLP/HTTP JSON
 * protocol over native `fetch`. Log lines written inside a span carry
 * `traceId`/`spanId` (added by the logger mixin); those are lifted onto the
 * OTLP record so the backend can join logs to traces.
 *
 * Without an endpoint the stream is a noop. Export failures drop the batch.
 *
 * OTLP/HTTP JSON protocol reference:
 * https://opentelemetry.io/docs/specs/otlp/#otlphttp
 */

import { Writable } from 'stream';

// =============================================================================
// Types
// =============================================================================

export interface OtelTransportConfig {
  /** OTEL collector endpoint (e.g., "http://localhost:4318") */
  endpoint: string;

  /** Value of the `service.name` resource attribute */
  serviceName: string;

  /** Maximum number of log records to batch before flushing */
  batchSize?: number;

  /** Maximum time (ms) to wait before flushing a partial batch */
  flushIntervalMs?: number;

  /** Request timeout in ms */
  requestTimeoutMs?: number;

  /** Additional resource attributes (service.version, created.by, ...) */
  resourceAttributes?: Record<string, string>;

  fetchImpl?: typeof fetch;
}

/**
 * @see https://opentelemetry.io/docs/specs/otel/logs/data-model/#severity-fields
 */
const PINO_TO_OTEL_SEVERITY: Record<string, { severityNumber: number; severityText: string }> = {
  trace: { severityNumber: 1, severityText: 'TRACE' },
  debug: { severityNumber: 5, severityText: 'DEBUG' },
  info: { severityNumber: 9, severityText: 'INFO' },
  warn: { severityNumber: 13, severityText: 'WARN' },
  error: { severityNumber: 17, severityText: 'ERROR' },
  fatal: { severityNumber: 21, severityText: 'FATAL' },
};

const DEFAULT_SEVERITY = { severityNumber: 0, severityText: 'UNSPECIFIED' };

const SKIP_FIELDS = new Set(['level', 'time', 'msg', 'pid', 'hostname', 'name', 'v']);

interface OtlpStringAttribute {
  key: string;
  value: { stringValue: string };
}

export interface OtlpLogRecord {
  timeUnixNano: string;
  severityNumber: number;
  severityText: string;
  body: { stringValue: string };
  attributes: OtlpStringAttribute[];
  traceId?: string;
  spanId?: string;
}

interface OtlpExportRequest {
  resourceLogs: Array<{
    resource: { attributes: OtlpStringAttribute[] };
    scopeLogs: Array<{
      scope: { name: string; version: string };
      logRecords: OtlpLogRecord[];
    }>;
  }>;
}

// =============================================================================
// Factory
// =============================================================================

export function createOtelTransport(config?: OtelTransportConfig): OtelTransportStream {
  return new OtelTransportStream(config);
}

/**
 * Transport configuration from the environment.
 *
 * @returns undefined when OTEL_EXPORTER_ENDPOINT is unset
 */
export function resolveOtelConfig(env: NodeJS.ProcessEnv = process.env): OtelTransportConfig | undefined {
  const endpoint = env.OTEL_EXPORTER_ENDPOINT?.trim();
  if (!endpoint) {
    return undefined;
  }

  const batchSize = parseInt(env.OTEL_BATCH_SIZE ?? '', 10);
  const flushIntervalMs = parseInt(env.OTEL_FLUSH_INTERVAL_MS ?? '', 10);

  return {
    endpoint: endpoint.replace(/\/+$/, ''),
    serviceName: env.OTEL_SERVICE_NAME ?? env.SERVICE_NAME ?? 'chain-service',
    batchSize: Number.isFinite(batchSize) ? batchSize : undefined,
    flushIntervalMs: Number.isFinite(flushIntervalMs) ? flushIntervalMs : undefined,
    resourceAttributes: {
      'service.version': env.SERVICE_VERSION ?? '1.0.0',
      'created.by': env.OTEL_RESOURCE_CREATED_BY ?? 'Unknown',
      'built.with': env.OTEL_RESOURCE_BUILT_WITH ?? 'Unknown',
    },
  };
}

// =============================================================================
// Transport
// =============================================================================

/**
 * Writable stream that Pino writes JSON lines into. Lines are converted to
 * OTLP log records, batched, and POSTed to `${endpoint}/v1/logs`.
 */
export class OtelTransportStream extends Writable {
  private readonly config: OtelTransportConfig | undefined;
  private readonly fetchImpl: typeof fetch;
  private readonly batch: OtlpLogRecord[] = [];
  private readonly maxBatchSize: number;
  private readonly requestTimeoutMs: number;
  private readonly resourceAttributes: OtlpStringAttribute[];
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private _exportCount = 0;
  private _dropCount = 0;

  constructor(config?: OtelTransportConfig) {
    super({ objectMode: false });
    this.config = config;
    this.fetchImpl = config?.fetchImpl ?? fetch;
    this.maxBatchSize = config?.batchSize ?? 50;
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

  _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    if (!this.config) {
      callback();
      return;
    }

    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
    for (const line of text.split('\n')) {
      const record = parseLogLine(line);
      if (record) {
        this.batch.push(toOtlpLogRecord(record));
      }
    }

    if (this.batch.length >= this.maxBatchSize) {
      this.scheduleFlush();
    }

    callback();
  }

  _final(callback: (error?: Error | null) => void): void {
    this.shutdown().then(() => callback(), callback);
  }

  async flush(): Promise<void> {
    if (this.batch.length === 0 || !this.config) {
      return;
    }

    const records = this.batch.splice(0, this.batch.length);
    const payload: OtlpExportRequest = {
      resourceLogs: [
        {
          resource: { attributes: this.resourceAttributes },
          scopeLogs: [
            {
              scope: { name: '@tracechain/core', version: '1.0.0' },
              logRecords: records,
            },
          ],
        },
      ],
    };

    const fetchImpl = this.fetchImpl;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);

    try {
      const response = await fetchImpl(`${this.config.endpoint}/v1/logs`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (response.ok) {
        this._exportCount += records.length;
      } else {
        this._dropCount += records.length;
      }
    } catch {
      // Network errors, timeouts: drop the batch
      this._dropCount += records.length;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async shutdown(): Promise<void> {
    if (this.flushTimer !== null) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  /** Number of records accepted by the collector */
  get exportCount(): number {
    return this._exportCount;
  }

  /** Number of records dropped due to errors */
  get dropCount(): number {
    return this._dropCount;
  }

  get pendingCount(): number {
    return this.batch.length;
  }

  get isNoop(): boolean {
    return !this.config;
  }

  private scheduleFlush(): void {
    // flush() records its own failures
    this.flush().catch(() => undefined);
  }
}

// =============================================================================
// Record Conversion
// =============================================================================

function parseLogLine(line: string): Record<string, unknown> | null {
  if (line.trim().length === 0) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return null;
    }
    return { ...parsed };
  } catch {
    // pretty-printed or partial line
    return null;
  }
}

/**
 * Convert a Pino JSON log object to an OTLP log record.
 */
export function toOtlpLogRecord(pinoLog: Record<string, unknown>): OtlpLogRecord {
  const level = typeof pinoLog.level === 'string' ? pinoLog.level : String(pinoLog.level ?? 'info');
  const severity = PINO_TO_OTEL_SEVERITY[level] ?? DEFAULT_SEVERITY;
  const timeMs = typeof pinoLog.time === 'number' ? pinoLog.time : Date.now();

  const attributes: OtlpStringAttribute[] = [];
  for (const [key, value] of Object.entries(pinoLog)) {
    if (SKIP_FIELDS.has(key)) continue;

    const stringValue = typeof value === 'string'
      ? value
      : typeof value === 'object' && value !== null
        ? JSON.stringify(value)
        : String(value ?? '');
    attributes.push({ key, value: { stringValue } });
  }

  const record: OtlpLogRecord = {
    timeUnixNano: String(BigInt(Math.round(timeMs)) * 1_000_000n),
    severityNumber: severity.severityNumber,
    severityText: severity.severityText,
    body: { stringValue: typeof pinoLog.msg === 'string' ? pinoLog.msg : '' },
    attributes,
  };

  const { traceId, spanId } = pinoLog;
  if (typeof traceId === 'string' && /^[0-9a-f]{32}$/.test(traceId)) {
    record.traceId = traceId;
  }
  if (typeof spanId === 'string' && /^[0-9a-f]{16}$/.test(spanId)) {
    record.spanId = spanId;
  }

  return record;
}
