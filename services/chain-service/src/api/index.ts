/**
 * API Module
 *
 * Builds the express application of a chain hop.
 */

import express from 'express';
import type { ChainApiContext } from './types';
import { errorHandler, requestMetrics } from './middleware';
import { createActuatorRoutes, createChainRoutes } from './routes';

export * from './types';
export { UNMATCHED_ROUTE, asyncRoute, errorHandler, requestMetrics } from './middleware';
export { createActuatorRoutes, createChainRoutes, queryString } from './routes';

export function createChainApp(context: ChainApiContext): express.Application {
  const app = express();
  app.disable('x-powered-by');

  app.use(requestMetrics(context.metrics));
  app.use('/api', createChainRoutes(context));
  app.use('/actuator', createActuatorRoutes(context));
  app.use(errorHandler({
    serviceName: context.orchestrator.serviceName,
    logger: context.logger,
    clock: context.clock,
  }));

  return app;
}
