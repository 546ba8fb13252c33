/**
 * Actuator Routes
 *
 * Health and Prometheus endpoints. Untraced.
 */

import { Router, Request, Response } from 'express';
import type { ChainApiContext } from '../types';

export function createActuatorRoutes(context: ChainApiContext): Router {
  const router = Router();

  /**
   * GET /actuator/health
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'UP', service: context.orchestrator.serviceName });
  });

  /**
   * GET /actuator/prometheus
   */
  router.get('/prometheus', (_req: Request, res: Response) => {
    res.type('text/plain; version=0.0.4').send(context.metrics.render());
  });

  return router;
}
