/**
 * Service Bootstrap Utilities
 *
 * Shutdown handling, signal registration and entry-point wrapping shared by
 * the chain services.
 */

import type { Server } from 'http';
import type { ILogger } from '../logging/types';
import { getErrorMessage } from '../error-handling';

// =============================================================================
// Types
// =============================================================================

export interface ServiceShutdownConfig {
  logger: ILogger;

  /** Stop consumers, close servers, flush exporters, disconnect the broker */
  onShutdown: () => Promise<void>;

  serviceName: string;

  /** Max time (ms) to wait for graceful shutdown before force-exiting (default: 10000) */
  shutdownTimeoutMs?: number;

  /** Process exit hook (default: process.exit) */
  exit?: (code: number) => void;
}

/**
 * Removes every process handler registered by setupServiceShutdown.
 */
export type ServiceShutdownCleanup = () => void;

export interface RunServiceMainConfig {
  main: () => Promise<void>;
  serviceName: string;
  logger: ILogger;
  exit?: (code: number) => void;
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

/**
 * Register SIGTERM/SIGINT and uncaught-exception handlers that run
 * `onShutdown` once, then exit. A shutdown that outlasts
 * `shutdownTimeoutMs` is forced with exit code 1.
 */
export function setupServiceShutdown(config: ServiceShutdownConfig): ServiceShutdownCleanup {
  const { logger, onShutdown, serviceName, shutdownTimeoutMs = 10000 } = config;
  const exit = config.exit ?? ((code: number) => process.exit(code));

  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.debug(`Already shutting down ${serviceName}, ignoring ${signal}`);
      return;
    }
    isShuttingDown = true;

    logger.info(`Received ${signal}, shutting down ${serviceName} gracefully`);

    const forceExitTimer = setTimeout(() => {
      logger.error(`${serviceName} shutdown timed out after ${shutdownTimeoutMs}ms, forcing exit`);
      exit(1);
    }, shutdownTimeoutMs);
    forceExitTimer.unref();

    try {
      await onShutdown();
      clearTimeout(forceExitTimer);
      exit(0);
    } catch (error) {
      clearTimeout(forceExitTimer);
      logger.error(`Error during ${serviceName} shutdown`, {
        error: getErrorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      exit(1);
    }
  };

  const sigtermHandler = () => {
    void shutdown('SIGTERM');
  };
  const sigintHandler = () => {
    void shutdown('SIGINT');
  };
  const uncaughtHandler = (error: Error) => {
    logger.error(`Uncaught exception in ${serviceName}`, {
      error: error.message,
      stack: error.stack,
    });
    void shutdown('uncaughtException');
  };
  const rejectionHandler = (reason: unknown) => {
    logger.error(`Unhandled rejection in ${serviceName}`, { reason: getErrorMessage(reason) });
  };

  process.on('SIGTERM', sigtermHandler);
  process.on('SIGINT', sigintHandler);
  process.on('uncaughtException', uncaughtHandler);
  process.on('unhandledRejection', rejectionHandler);

  return () => {
    process.off('SIGTERM', sigtermHandler);
    process.off('SIGINT', sigintHandler);
    process.off('uncaughtException', uncaughtHandler);
    process.off('unhandledRejection', rejectionHandler);
  };
}

// =============================================================================
// Service Runner
// =============================================================================

/**
 * Run a service's main() and exit with code 1 if it rejects.
 * Skipped under Jest (JEST_WORKER_ID set).
 */
export function runServiceMain(config: RunServiceMainConfig): void {
  const { main, serviceName, logger } = config;
  const exit = config.exit ?? ((code: number) => process.exit(code));

  if (process.env.JEST_WORKER_ID) {
    return;
  }

  main().catch((error: unknown) => {
    logger.fatal(`Unhandled error in ${serviceName}`, {
      error: getErrorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    exit(1);
  });
}

/**
 * Close an HTTP server, giving up after `timeoutMs` so shutdown cannot hang
 * on keep-alive connections.
 */
export async function closeHttpServer(server: Server | null, timeoutMs = 5000): Promise<void> {
  if (!server) {
    return;
  }

  await new Promise<void>((resolve) => {
    let resolved = false;
    const safeResolve = () => {
      if (!resolved) {
        resolved = true;
        resolve();
      }
    };

    const timer = setTimeout(() => {
      server.closeAllConnections();
      safeResolve();
    }, timeoutMs);

    server.close(() => {
      clearTimeout(timer);
      safeResolve();
    });
    server.closeIdleConnections();
  });
}
