/**
 * Pino Logger Implementation
 *
 * - Singleton caching per logger name
 * - JSON output for production, pretty printing for development
 * - `traceId`/`spanId` of the current span added to every line via mixin
 * - Optional fan-out of JSON lines to the OTEL log transport
 */

import pino, { DestinationStream, Logger as PinoLoggerType, LoggerOptions } from 'pino';
import { getActiveTraceFields } from '../tracing/active-span';
import { OtelTransportStream, resolveOtelConfig } from './otel-transport';
import type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

// =============================================================================
// Singleton Cache
// =============================================================================

const loggerCache = new Map<string, ILogger>();

/**
 * Reset all cached loggers.
 * Used for testing and service shutdown.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
}

// =============================================================================
// OTEL Transport Singleton
// =============================================================================

let otelTransport: OtelTransportStream | undefined;
let otelResolved = false;

/**
 * The process-wide OTEL log transport, created on first use when
 * OTEL_EXPORTER_ENDPOINT is set.
 */
export function getOtelTransport(): OtelTransportStream | undefined {
  if (!otelResolved) {
    otelResolved = true;
    const config = resolveOtelConfig();
    otelTransport = config ? new OtelTransportStream(config) : undefined;
  }
  return otelTransport;
}

/**
 * Flush and stop the OTEL log transport. Safe to call when none exists.
 */
export async function shutdownOtelTransport(): Promise<void> {
  const transport = otelTransport;
  otelTransport = undefined;
  otelResolved = false;
  if (transport) {
    await transport.shutdown();
  }
}

// =============================================================================
// Options
// =============================================================================

const LOG_LEVELS: ReadonlyArray<LogLevel | 'silent'> = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: unknown): value is LogLevel | 'silent' {
  return LOG_LEVELS.some(level => level === value);
}

function resolveLevel(configured?: LogLevel | 'silent'): LogLevel | 'silent' {
  if (configured) {
    return configured;
  }
  const fromEnv = process.env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

const serializers: LoggerOptions['serializers'] = {
  err: pino.stdSerializers.err,
  error: pino.stdSerializers.err,
};

// =============================================================================
// Pino Logger Wrapper
// =============================================================================

/**
 * Adapts Pino to the ILogger interface.
 */
class PinoLoggerWrapper implements ILogger {
  constructor(private readonly pino: PinoLoggerType) {}

  fatal(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.fatal(meta, msg);
    } else {
      this.pino.fatal(msg);
    }
  }

  error(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.error(meta, msg);
    } else {
      this.pino.error(msg);
    }
  }

  warn(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.warn(meta, msg);
    } else {
      this.pino.warn(msg);
    }
  }

  info(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.info(meta, msg);
    } else {
      this.pino.info(msg);
    }
  }

  debug(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.debug(meta, msg);
    } else {
      this.pino.debug(msg);
    }
  }

  trace(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.trace(meta, msg);
    } else {
      this.pino.trace(msg);
    }
  }

  child(bindings: LogMeta): ILogger {
    return new PinoLoggerWrapper(this.pino.child(bindings));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create (or return the cached) Pino logger for `name`.
 *
 * @example
 * ```typescript
 * const logger = createPinoLogger('service-a');
 * const debugLogger = createPinoLogger({ name: 'service-b', level: 'debug' });
 * ```
 */
export function createPinoLogger(config: string | LoggerConfig): ILogger {
  const { name, level, pretty, bindings }: LoggerConfig = typeof config === 'string'
    ? { name: config }
    : config;

  const cached = loggerCache.get(name);
  if (cached) {
    return bindings ? cached.child(bindings) : cached;
  }

  const logLevel = resolveLevel(level);

  // LOG_FORMAT=json forces JSON output even in development
  const usePretty = pretty ?? (process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV === 'development');

  const options: LoggerOptions = {
    name,
    level: logLevel,
    serializers,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    base: {
      service: name,
      pid: process.pid,
    },
    mixin: () => getActiveTraceFields(),
    redact: {
      paths: [
        'password', '*.password',
        'authorization', '*.authorization',
        'token', '*.token',
        'secret', '*.secret',
        'apiKey', '*.apiKey',
      ],
      censor: '[REDACTED]',
    },
  };

  let pinoInstance: PinoLoggerType;
  const otel = getOtelTransport();

  if (usePretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,service',
      },
    };
    pinoInstance = pino(options);
  } else if (otel && logLevel !== 'silent') {
    const streams: Array<{ level: LogLevel; stream: DestinationStream }> = [
      { level: logLevel, stream: process.stdout },
      { level: logLevel, stream: otel },
    ];
    pinoInstance = pino(options, pino.multistream(streams));
  } else {
    pinoInstance = pino(options);
  }

  const logger = new PinoLoggerWrapper(pinoInstance);
  loggerCache.set(name, logger);

  // Children are not cached
  return bindings ? logger.child(bindings) : logger;
}
