/**
 * Shared Error Handling Utilities
 *
 * Error types and codes used by every service in the chain. Hop failures
 * (HTTP forwarding, broker publish) are modelled as typed errors so handlers
 * can turn them into the chain's error messages.
 */

// =============================================================================
// Error Codes
// =============================================================================

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  INVALID_ARGUMENT = 1001,
  INVALID_STATE = 1005,

  // Connection errors (2000-2999)
  CONNECTION_FAILED = 2000,
  CONNECTION_TIMEOUT = 2001,
  CONNECTION_CLOSED = 2002,

  // Redis errors (3000-3999)
  REDIS_STREAM_ERROR = 3003,

  // Hop errors (4000-4999)
  FORWARD_FAILED = 4000,
  PUBLISH_FAILED = 4001,

  // Service lifecycle errors (7000-7999)
  SERVICE_ALREADY_RUNNING = 7001,
}

export enum ErrorSeverity {
  /** Informational - expected errors that don't require action */
  INFO = 'info',
  /** Warning - unexpected but recoverable errors */
  WARNING = 'warning',
  /** Error - failures that may impact functionality */
  ERROR = 'error',
  /** Critical - severe failures requiring immediate attention */
  CRITICAL = 'critical'
}

// =============================================================================
// Custom Error Classes
// =============================================================================

export interface TraceChainErrorOptions {
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Base error class. Carries structured information for logging.
 */
export class TraceChainError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    options: TraceChainErrorOptions = {}
  ) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'TraceChainError';
    this.code = code;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause === undefined ? undefined : getErrorMessage(this.cause),
      stack: this.stack
    };
  }
}

/**
 * The next service in an HTTP chain could not be called or answered badly.
 * `message` is the human-readable reason used in the chain response.
 */
export class ForwardingError extends TraceChainError {
  readonly target: string;
  readonly statusCode?: number;

  constructor(
    message: string,
    target: string,
    options: { statusCode?: number; code?: ErrorCode; cause?: Error } = {}
  ) {
    super(message, options.code ?? ErrorCode.FORWARD_FAILED, {
      severity: ErrorSeverity.WARNING,
      cause: options.cause,
      context: { target, statusCode: options.statusCode }
    });
    this.name = 'ForwardingError';
    this.target = target;
    this.statusCode = options.statusCode;
  }
}

/**
 * A message could not be handed to the broker.
 */
export class PublishError extends TraceChainError {
  readonly destination: string;

  constructor(message: string, destination: string, options: { cause?: Error } = {}) {
    super(message, ErrorCode.PUBLISH_FAILED, {
      severity: ErrorSeverity.WARNING,
      cause: options.cause,
      context: { destination }
    });
    this.name = 'PublishError';
    this.destination = destination;
  }
}

/**
 * Service lifecycle error for start/stop issues.
 */
export class LifecycleError extends TraceChainError {
  readonly serviceName: string;
  readonly currentState?: string;

  constructor(
    message: string,
    serviceName: string,
    options: {
      code?: ErrorCode;
      currentState?: string;
      cause?: Error;
    } = {}
  ) {
    super(message, options.code ?? ErrorCode.INVALID_STATE, {
      severity: ErrorSeverity.ERROR,
      cause: options.cause,
      context: { serviceName, currentState: options.currentState }
    });
    this.name = 'LifecycleError';
    this.serviceName = serviceName;
    this.currentState = options.currentState;
  }
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Message of any thrown value. Errors without a message fall back to their name.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
