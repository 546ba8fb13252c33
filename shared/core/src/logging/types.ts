/**
 * Logger Type Definitions
 *
 * Defines the ILogger interface that decouples the codebase from the
 * logging library. Services take an ILogger in their constructor; production
 * passes a Pino-backed logger, tests pass a RecordingLogger or NullLogger.
 */

/**
 * Log level union type for type-safe level checking.
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Metadata object that can be attached to log entries.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Core logger interface.
 *
 * All logging implementations (Pino, RecordingLogger, NullLogger) must
 * implement this interface.
 *
 * @example
 * ```typescript
 * class ChainOrchestrator {
 *   constructor(private logger: ILogger) {}
 * }
 *
 * // Production
 * new ChainOrchestrator(createLogger('service-a'));
 *
 * // Test
 * new ChainOrchestrator(new RecordingLogger());
 * ```
 */
export interface ILogger {
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger with additional context.
   * The context is merged into every log entry from the child.
   *
   * @example
   * ```typescript
   * const queueLogger = logger.child({ queue: 'tel.chain.queue' });
   * queueLogger.info('Message received'); // { queue: 'tel.chain.queue', msg: 'Message received' }
   * ```
   */
  child(bindings: LogMeta): ILogger;

  /**
   * Check if a given log level is enabled.
   * Useful for avoiding expensive computations for disabled levels.
   */
  isLevelEnabled?(level: LogLevel): boolean;
}

/**
 * Configuration for logger creation.
 */
export interface LoggerConfig {
  /**
   * Service/module name for log identification.
   */
  name: string;

  /**
   * Minimum log level to output. 'silent' disables output.
   * @default process.env.LOG_LEVEL ?? 'info'
   */
  level?: LogLevel | 'silent';

  /**
   * Enable pretty printing (development mode).
   * @default process.env.NODE_ENV === 'development'
   */
  pretty?: boolean;

  /**
   * Additional context to include in every log entry.
   */
  bindings?: LogMeta;
}
