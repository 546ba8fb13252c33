/**
 * Chain Routes
 *
 * GET /api/chain, /api/process, /api/fanout, /api/greet, /api/error
 */

import { Router, Request, Response } from 'express';
import type { ChainApiContext } from '../types';
import { asyncRoute } from '../middleware';

/**
 * First value of a query parameter, or `fallback` when it is missing or not
 * a plain string.
 */
export function queryString(req: Request, key: string, fallback: string): string {
  const raw: unknown = req.query[key];
  if (typeof raw === 'string') return raw;
  if (Array.isArray(raw) && typeof raw[0] === 'string') return raw[0];
  return fallback;
}

export function createChainRoutes(context: ChainApiContext): Router {
  const router = Router();
  const { orchestrator } = context;

  const chainHandler = (route: string) =>
    asyncRoute(async (req: Request, res: Response) => {
      const response = await orchestrator.handleChain({
        data: queryString(req, 'data', 'data'),
        headers: req.headers,
        route,
      });
      res.json(response);
    });

  router.get('/chain', chainHandler('/api/chain'));
  router.get('/process', chainHandler('/api/process'));

  router.get('/fanout', asyncRoute(async (req: Request, res: Response) => {
    const response = await orchestrator.handleFanout({
      data: queryString(req, 'data', 'data'),
      headers: req.headers,
    });
    res.json(response);
  }));

  router.get('/greet', asyncRoute(async (req: Request, res: Response) => {
    const response = await orchestrator.greet({
      name: queryString(req, 'name', 'World'),
      headers: req.headers,
    });
    res.json(response);
  }));

  router.get('/error', asyncRoute(async (req: Request) => {
    await orchestrator.simulateError(req.headers);
  }));

  return router;
}
