/**
 * Express middleware for the chain service: async route adapter, request
 * metrics and the error handler that turns local failures into HTTP 500.
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import type { ErrorResponse } from '@tracechain/types';
import { getErrorMessage } from '@tracechain/core';
import type { ILogger } from '@tracechain/core';
import type { MetricsRegistry } from '@tracechain/metrics';
import { TracedRequestError } from '../../chain-orchestrator';

/**
 * Express 4 does not forward rejected promises to error middleware.
 */
export function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export const UNMATCHED_ROUTE = 'unmatched';

function hasMatchedRoute(req: Request): boolean {
  const route: unknown = req.route;
  return typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string';
}

/**
 * Count every response and time it, labelled by path and status.
 * Requests no route matched share one label.
 */
export function requestMetrics(metrics: MetricsRegistry): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = process.hrtime.bigint();
    const path = req.path;

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      metrics.recordHttpRequest({
        method: req.method,
        route: hasMatchedRoute(req) ? path : UNMATCHED_ROUTE,
        status: res.statusCode,
        durationMs,
      });
    });

    next();
  };
}

export interface ErrorHandlerOptions {
  serviceName: string;
  logger: ILogger;
  clock?: () => Date;
}

/**
 * Unhandled local exceptions become `500 { service, error, traceId, timestamp }`.
 * The trace id is known when the failure happened inside a traced request.
 */
export function errorHandler(options: ErrorHandlerOptions): ErrorRequestHandler {
  const clock = options.clock ?? (() => new Date());

  return (error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const traceId = error instanceof TracedRequestError ? error.traceId : null;
    options.logger.error('Unhandled request error', {
      path: req.path,
      error: getErrorMessage(error),
      traceId,
    });

    const body: ErrorResponse = {
      service: options.serviceName,
      error: getErrorMessage(error),
      traceId,
      timestamp: clock().toISOString(),
    };
    res.status(500).json(body);
  };
}
