/**
 * @tracechain/core
 *
 * Building blocks shared by every chain service: tracing, logging, error
 * handling, async helpers, the Redis Streams broker, the next-hop HTTP
 * client and service bootstrap.
 */

// =============================================================================
// Error Handling
// =============================================================================

export {
  ErrorCode,
  ErrorSeverity,
  TraceChainError,
  ForwardingError,
  PublishError,
  LifecycleError,
  getErrorMessage,
} from './error-handling';
export type { TraceChainErrorOptions } from './error-handling';

// =============================================================================
// Async
// =============================================================================

export * from './async';

// =============================================================================
// Logging
// =============================================================================

export * from './logging';

// =============================================================================
// Tracing
// =============================================================================

export * from './tracing';

// =============================================================================
// Redis & Messaging
// =============================================================================

export * from './redis';
export * from './messaging';

// =============================================================================
// HTTP
// =============================================================================

export { NextHopClient, buildUrl } from './http/next-hop-client';
export type { NextHopClientOptions, NextHopRequest } from './http/next-hop-client';

// =============================================================================
// Service Lifecycle
// =============================================================================

export * from './service-lifecycle';
