/**
 * Logging Module
 *
 * Production code uses createPinoLogger(); tests inject
 * RecordingLogger or NullLogger.
 */

export type {
  ILogger,
  LoggerConfig,
  LogLevel,
  LogMeta,
} from './types';

export {
  createPinoLogger,
  resetLoggerCache,
  getOtelTransport,
  shutdownOtelTransport,
} from './pino-logger';

export {
  createOtelTransport,
  resolveOtelConfig,
  toOtlpLogRecord,
  OtelTransportStream,
} from './otel-transport';
export type { OtelTransportConfig, OtlpLogRecord } from './otel-transport';

export {
  RecordingLogger,
  NullLogger,
} from './testing-logger';
export type { LogEntry } from './testing-logger';
