/**
 * API Types for the chain service.
 */

import type { ILogger } from '@tracechain/core';
import type { MetricsRegistry } from '@tracechain/metrics';
import type { ChainOrchestrator } from '../chain-orchestrator';

/**
 * What the routes need from the running service.
 */
export interface ChainApiContext {
  orchestrator: ChainOrchestrator;
  metrics: MetricsRegistry;
  logger: ILogger;
  clock?: () => Date;
}
