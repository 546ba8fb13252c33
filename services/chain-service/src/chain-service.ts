/**
 * Chain Service
 *
 * Composition root of one hop: builds the tracing, broker and HTTP pieces
 * from a ServiceConfig, starts the consumers and the HTTP server, and tears
 * everything down again in reverse order.
 *
 * Collaborators can be injected for tests (span exporter, broker
 * connections, fetch, logger, randomness).
 */

import type { Server } from 'http';
import type { AddressInfo } from 'net';
import type express from 'express';
import { resolveTopology } from '@tracechain/config';
import type { ServiceConfig } from '@tracechain/config';
import {
  ErrorCode,
  HttpHopPropagator,
  LifecycleError,
  MessageHopPropagator,
  NextHopClient,
  OtlpHttpSpanExporter,
  RedisStreamsBroker,
  SpanRecorder,
  closeHttpServer,
  createIoRedisConnectionFactory,
  createPinoLogger,
  createProbabilitySampler,
  getErrorMessage,
  gracefulShutdown,
} from '@tracechain/core';
import type {
  ILogger,
  MessageBroker,
  SpanExporter,
  StreamConnectionFactory,
  Subscription,
} from '@tracechain/core';
import { MetricsRegistry } from '@tracechain/metrics';
import { createChainApp } from './api';
import { ChainOrchestrator } from './chain-orchestrator';

export interface ChainServiceDeps {
  logger?: ILogger;
  spanExporter?: SpanExporter;
  /** Broker connections; defaults to ioredis when REDIS_URL is configured */
  connectionFactory?: StreamConnectionFactory;
  fetchImpl?: typeof fetch;
  random?: () => number;
  /** XREADGROUP block time of the consumers (default: 1000) */
  consumerBlockMs?: number;
  /** Per-resource bound during stop() (default: 5000) */
  shutdownStepTimeoutMs?: number;
}

type ServiceState = 'stopped' | 'starting' | 'running' | 'stopping';

export class ChainService {
  private readonly config: ServiceConfig;
  private readonly logger: ILogger;
  private readonly spanExporter: SpanExporter;
  /** Injected exporters are flushed on stop, owned ones shut down */
  private readonly ownsExporter: boolean;
  private readonly broker: MessageBroker | undefined;
  private readonly shutdownStepTimeoutMs: number;
  private readonly subscriptions: Subscription[] = [];
  private server: Server | null = null;
  private state: ServiceState = 'stopped';

  readonly metrics: MetricsRegistry;
  readonly recorder: SpanRecorder;
  readonly orchestrator: ChainOrchestrator;
  readonly app: express.Application;

  constructor(config: ServiceConfig, deps: ChainServiceDeps = {}) {
    this.config = config;
    this.logger = deps.logger ?? createPinoLogger({ name: config.serviceName, level: config.logLevel });
    this.shutdownStepTimeoutMs = deps.shutdownStepTimeoutMs ?? 5000;

    this.ownsExporter = deps.spanExporter === undefined;
    this.spanExporter = deps.spanExporter ?? new OtlpHttpSpanExporter(
      config.telemetry.endpoint
        ? {
          endpoint: config.telemetry.endpoint,
          serviceName: config.serviceName,
          resourceAttributes: config.telemetry.resourceAttributes,
        }
        : undefined,
      { fetchImpl: deps.fetchImpl }
    );

    const connectionFactory = deps.connectionFactory ?? (
      config.redis
        ? createIoRedisConnectionFactory(config.redis.url, config.redis.password, this.logger)
        : undefined
    );
    this.broker = connectionFactory
      ? new RedisStreamsBroker(connectionFactory, {
        consumerName: `${config.serviceName}-${process.pid}`,
        blockMs: deps.consumerBlockMs,
        defaultPublishTimeoutMs: config.timeouts.publishMs,
        logger: this.logger.child({ component: 'broker' }),
      })
      : undefined;

    const sampleRoot = createProbabilitySampler(config.samplingProbability, deps.random);

    this.metrics = new MetricsRegistry(config.serviceName);
    this.recorder = new SpanRecorder({
      serviceName: config.serviceName,
      exporter: this.spanExporter,
      logger: this.logger,
    });

    this.orchestrator = new ChainOrchestrator({
      serviceName: config.serviceName,
      nextHop: config.nextHop,
      fanoutExchange: config.fanoutExchange,
      recorder: this.recorder,
      httpPropagator: new HttpHopPropagator(sampleRoot),
      messagePropagator: new MessageHopPropagator(sampleRoot),
      nextHopClient: new NextHopClient({ timeoutMs: config.timeouts.httpMs, fetchImpl: deps.fetchImpl }),
      broker: this.broker,
      metrics: this.metrics,
      logger: this.logger,
      publishTimeoutMs: config.timeouts.publishMs,
      delays: config.delays,
      random: deps.random,
    });

    this.app = createChainApp({
      orchestrator: this.orchestrator,
      metrics: this.metrics,
      logger: this.logger,
    });
  }

  get isRunning(): boolean {
    return this.state === 'running';
  }

  /**
   * Declare the broker topology, start the queue consumers, then listen.
   *
   * @param port - overrides the configured port; 0 picks a free one
   * @returns the port the HTTP server is bound to
   */
  async start(port: number = this.config.port): Promise<number> {
    if (this.state !== 'stopped') {
      throw new LifecycleError(`Cannot start ${this.config.serviceName}: service is ${this.state}`, this.config.serviceName, {
        code: ErrorCode.SERVICE_ALREADY_RUNNING,
        currentState: this.state,
      });
    }
    this.state = 'starting';

    try {
      if (this.broker) {
        await this.broker.declareTopology(resolveTopology(this.config));
        for (const queue of this.config.consumeQueues) {
          const subscription = await this.broker.subscribe(queue, delivery =>
            this.orchestrator.handleMessage(queue, delivery)
          );
          this.subscriptions.push(subscription);
        }
      }

      this.server = await this.listen(port);
    } catch (error) {
      this.logger.error(`Failed to start ${this.config.serviceName}`, { error: getErrorMessage(error) });
      await this.releaseResources();
      this.state = 'stopped';
      throw error;
    }

    const boundPort = this.boundPort();
    this.state = 'running';
    this.logger.info(`${this.config.serviceName} started`, {
      port: boundPort,
      nextHop: this.config.nextHop.kind,
      consumeQueues: this.config.consumeQueues,
    });
    return boundPort;
  }

  /**
   * Stop consumers, close the HTTP server, flush spans, disconnect the broker.
   */
  async stop(): Promise<void> {
    if (this.state !== 'running') {
      return;
    }
    this.state = 'stopping';
    this.logger.info(`Stopping ${this.config.serviceName}`);

    await this.releaseResources();

    this.state = 'stopped';
    this.logger.info(`${this.config.serviceName} stopped`);
  }

  private async releaseResources(): Promise<void> {
    const subscriptions = this.subscriptions.splice(0);
    const server = this.server;
    this.server = null;

    await gracefulShutdown([
      {
        name: 'consumers',
        cleanup: async () => {
          await Promise.all(subscriptions.map(subscription => subscription.unsubscribe()));
        },
      },
      { name: 'http server', cleanup: () => closeHttpServer(server) },
      {
        name: 'span exporter',
        cleanup: () => (this.ownsExporter ? this.spanExporter.shutdown() : this.spanExporter.flush()),
      },
      { name: 'broker', cleanup: async () => { await this.broker?.close(); } },
    ], this.shutdownStepTimeoutMs, this.logger);
  }

  private listen(port: number): Promise<Server> {
    return new Promise<Server>((resolve, reject) => {
      const server = this.app.listen(port);
      server.once('listening', () => {
        server.off('error', reject);
        resolve(server);
      });
      server.once('error', reject);
    });
  }

  private boundPort(): number {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      return this.config.port;
    }
    const info: AddressInfo = address;
    return info.port;
  }
}
