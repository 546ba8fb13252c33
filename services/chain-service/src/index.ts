/**
 * Chain Service Entry Point & Public API
 *
 * One binary for every hop; the role comes from the environment
 * (SERVICE_NAME, NEXT_HOP, CONSUME_QUEUES, ...).
 *
 * @see @tracechain/config loadServiceConfig for the full variable list
 */

export { ChainService } from './chain-service';
export type { ChainServiceDeps } from './chain-service';
export { ChainOrchestrator, TracedRequestError, SIMULATED_ERROR_MESSAGE } from './chain-orchestrator';
export type { ChainOrchestratorDeps, ChainRequest, FanoutRequest, GreetRequest } from './chain-orchestrator';
export { createChainApp } from './api';

import { loadServiceConfig } from '@tracechain/config';
import {
  createPinoLogger,
  runServiceMain,
  setupServiceShutdown,
  shutdownOtelTransport,
} from '@tracechain/core';
import { ChainService } from './chain-service';

const logger = createPinoLogger('chain-service');

async function main(): Promise<void> {
  const config = loadServiceConfig();
  const serviceLogger = createPinoLogger({ name: config.serviceName, level: config.logLevel });

  serviceLogger.info(`Starting ${config.serviceName} on port ${config.port}`, {
    nextHop: config.nextHop,
    consumeQueues: config.consumeQueues,
    samplingProbability: config.samplingProbability,
  });

  const service = new ChainService(config, { logger: serviceLogger });

  setupServiceShutdown({
    logger: serviceLogger,
    serviceName: config.serviceName,
    onShutdown: async () => {
      await service.stop();
      await shutdownOtelTransport();
    },
  });

  await service.start();
}

runServiceMain({ main, serviceName: 'chain-service', logger });
