/**
 * Chain Orchestrator
 *
 * One hop of the chain. Every inbound request or message goes through
 *
 *   RECEIVED → SPAN_OPEN → BUSINESS_LOGIC → FORWARDING?
 *     → (HTTP_FORWARD | MESSAGE_PUBLISH | TERMINAL) → RESPONSE_RETURNED → SPAN_CLOSE
 *
 * The forwarding target comes from configuration (NEXT_HOP). Downstream
 * failures never fail the hop: they are recorded on the spans and reported
 * in the response's `error` field.
 */

import {
  BrokerTopology,
  FANOUT_CONSUMER_NAMES,
} from '@tracechain/types';
import type {
  ChainResponse,
  Delivery,
  Destination,
  GreetResponse,
  MessageBody,
  SpanAttributes,
} from '@tracechain/types';
import type { NextHop } from '@tracechain/config';
import {
  ErrorCode,
  PublishError,
  TraceChainError,
  getErrorMessage,
  randomDelay,
  sleep,
} from '@tracechain/core';
import type {
  HttpHopPropagator,
  ILogger,
  IncomingHeaders,
  MessageBroker,
  MessageHopPropagator,
  NextHopClient,
  Span,
  SpanRecorder,
} from '@tracechain/core';
import type { MetricsRegistry } from '@tracechain/metrics';

// =============================================================================
// Types
// =============================================================================

export interface ChainOrchestratorDeps {
  serviceName: string;
  nextHop: NextHop;
  fanoutExchange: string;
  recorder: SpanRecorder;
  httpPropagator: HttpHopPropagator;
  messagePropagator: MessageHopPropagator;
  nextHopClient: NextHopClient;
  /** Required for broker next hops and /api/fanout */
  broker?: MessageBroker;
  metrics: MetricsRegistry;
  logger: ILogger;
  publishTimeoutMs: number;
  delays: {
    processingMaxMs: number;
    greetMaxMs: number;
    consumerMs: number;
  };
  random?: () => number;
  clock?: () => Date;
}

export interface ChainRequest {
  data: string;
  headers: IncomingHeaders;
  route: string;
}

export interface FanoutRequest {
  data: string;
  headers: IncomingHeaders;
}

export interface GreetRequest {
  name: string;
  headers: IncomingHeaders;
}

type ForwardOutcome = Pick<ChainResponse, 'next' | 'message' | 'error' | 'consumers'>;

type PublishResult = { ok: true; messageId: string } | { ok: false; reason: string };

/**
 * A local failure inside a traced request. Carries the trace id so the
 * error response can still point at the broken span.
 */
export class TracedRequestError extends TraceChainError {
  constructor(message: string, readonly traceId: string, cause?: Error) {
    super(message, ErrorCode.UNKNOWN_ERROR, { cause, context: { traceId } });
    this.name = 'TracedRequestError';
  }
}

export const SIMULATED_ERROR_MESSAGE = 'This is a simulated error for trace-log correlation demo';

// =============================================================================
// ChainOrchestrator
// =============================================================================

export class ChainOrchestrator {
  private readonly deps: ChainOrchestratorDeps;
  private readonly logger: ILogger;
  private readonly random: () => number;
  private readonly clock: () => Date;

  constructor(deps: ChainOrchestratorDeps) {
    this.deps = deps;
    this.logger = deps.logger;
    this.random = deps.random ?? Math.random;
    this.clock = deps.clock ?? (() => new Date());
  }

  get serviceName(): string {
    return this.deps.serviceName;
  }

  // ===========================================================================
  // HTTP entry points
  // ===========================================================================

  /**
   * GET /api/chain (and /api/process): process locally, then forward to the
   * configured next hop.
   */
  handleChain(request: ChainRequest): Promise<ChainResponse> {
    const { data, route } = request;

    return this.inServerSpan(route, request.headers, async span => {
      this.logger.info(`[${this.serviceName}] Received chain request`, { data });

      this.tagSafely(span, {
        'request.data': data,
        'request.size': data.length,
        'service.description': `Microservice chain handler - ${this.serviceName}`,
        'business.operation': 'chain-processing',
        'component.type': 'REST Controller',
      });

      await randomDelay(this.deps.delays.processingMaxMs, this.random);

      const outcome = await this.forward(span, data);

      this.logger.info(`[${this.serviceName}] Returning response`);
      return { ...this.baseResponse(span, data), ...outcome };
    });
  }

  /**
   * GET /api/fanout: broadcast one message to every queue bound to the
   * fanout exchange.
   */
  handleFanout(request: FanoutRequest): Promise<ChainResponse> {
    const { data } = request;
    const exchange = this.deps.fanoutExchange;

    return this.inServerSpan('/api/fanout', request.headers, async span => {
      this.logger.info(`[${this.serviceName}] Broadcasting to fanout exchange`, { exchange, data });

      this.tagSafely(span, {
        'request.data': data,
        'business.operation': 'fanout-broadcast',
        'component.type': 'REST Controller',
      });

      const outcome = await this.publishFanout(span, exchange, {
        data,
        source_service: this.serviceName,
        timestamp: this.clock().toISOString(),
      });

      return { ...this.baseResponse(span, data), ...outcome };
    });
  }

  /**
   * GET /api/greet
   */
  greet(request: GreetRequest): Promise<GreetResponse> {
    return this.inServerSpan('/api/greet', request.headers, async span => {
      this.logger.info('Received greet request', { name: request.name });
      this.tagSafely(span, { 'greet.name': request.name });

      await randomDelay(this.deps.delays.greetMaxMs, this.random);

      return {
        message: 'hello',
        name: request.name,
        timestamp: this.clock().toISOString(),
      };
    });
  }

  /**
   * GET /api/error: fails on purpose so the 500 path and the ERROR span can
   * be observed.
   */
  simulateError(headers: IncomingHeaders): Promise<never> {
    return this.inServerSpan('/api/error', headers, async () => {
      this.logger.warn('Error endpoint called - simulating error condition');
      throw new Error(SIMULATED_ERROR_MESSAGE);
    });
  }

  // ===========================================================================
  // Broker entry point
  // ===========================================================================

  /**
   * Consume one message from `queue` inside a CONSUMER span that continues
   * the producer's trace. A handler failure is recorded on the span and
   * rethrown so the message stays unacknowledged.
   */
  async handleMessage(queue: string, delivery: Delivery): Promise<void> {
    const context = this.deps.messagePropagator.extractFromMessage(delivery.properties);
    const recorder = this.deps.recorder;
    const span = recorder.start(context, `${queue} receive`, 'CONSUMER');
    const consumerName: string | undefined = FANOUT_CONSUMER_NAMES[queue];
    const log = this.logger.child({ queue, ...(consumerName ? { consumer: consumerName } : {}) });

    await recorder.withSpan(span, async () => {
      try {
        log.info(`[${this.serviceName}] Received message`, { messageId: delivery.id });

        const attributes: SpanAttributes = {
          'messaging.system': 'redis',
          'messaging.destination.name': queue,
          'messaging.operation.type': consumerName ? 'receive' : 'process',
          'messaging.message.id': delivery.id,
          'business.operation': consumerName ? 'fanout-message-processing' : 'message-processing',
          'component.type': 'Redis Streams Consumer',
        };
        if (consumerName) {
          attributes['consumer.name'] = consumerName;
          attributes['messaging.pattern'] = 'fan-out';
          attributes['messaging.consumer.type'] = 'parallel';
        }
        const messageData = describeField(delivery.body.data);
        if (messageData !== undefined) {
          attributes['message.data'] = messageData;
        }
        const source = describeField(delivery.body.source_service ?? delivery.body.service);
        if (source !== undefined) {
          attributes['message.source'] = source;
        }
        this.tagSafely(span, attributes);

        await sleep(this.deps.delays.consumerMs);

        this.deps.metrics.recordMessageConsumed(queue, 'success');
        log.info(`[${this.serviceName}] Message processing complete`);
      } catch (error) {
        recorder.recordError(span, error);
        this.deps.metrics.recordMessageConsumed(queue, 'failure');
        log.error(`[${this.serviceName}] Error processing message`, { error: getErrorMessage(error) });
        throw error;
      } finally {
        recorder.close(span);
      }
    });
  }

  // ===========================================================================
  // Forwarding
  // ===========================================================================

  private async forward(serverSpan: Span, data: string): Promise<ForwardOutcome> {
    const nextHop = this.deps.nextHop;

    switch (nextHop.kind) {
      case 'terminal':
        this.logger.info(`[${this.serviceName}] End of chain reached`);
        this.deps.metrics.recordForward('terminal', 'success');
        return { message: 'End of chain' };

      case 'http':
        return this.forwardHttp(serverSpan, nextHop.baseUrl, data);

      case 'queue':
        return this.publishChain(serverSpan, nextHop.queue, data);

      case 'exchange':
        return this.publishFanout(serverSpan, nextHop.exchange, {
          data,
          source_service: this.serviceName,
          timestamp: this.clock().toISOString(),
        });
    }
  }

  private async forwardHttp(serverSpan: Span, baseUrl: string, data: string): Promise<ForwardOutcome> {
    const recorder = this.deps.recorder;
    const clientSpan = recorder.startChild(serverSpan, 'http get /api/chain', 'CLIENT', {
      'http.request.method': 'GET',
      'server.address': baseUrl,
      'url.path': '/api/chain',
    });

    return recorder.withSpan(clientSpan, async () => {
      try {
        this.logger.info(`[${this.serviceName}] Calling next service`, { nextService: baseUrl });

        const next = await this.deps.nextHopClient.getJson({
          baseUrl,
          path: '/api/chain',
          query: { data },
          headers: this.deps.httpPropagator.inject(clientSpan.context),
        });

        recorder.tag(clientSpan, 'http.response.status_code', 200);
        this.deps.metrics.recordForward('http', 'success');
        this.logger.info(`[${this.serviceName}] Successfully received response from next service`);
        return { next };
      } catch (error) {
        recorder.recordError(clientSpan, error);
        recorder.recordError(serverSpan, error);
        this.deps.metrics.recordForward('http', 'failure');
        this.logger.error(`[${this.serviceName}] Error calling next service`, {
          nextService: baseUrl,
          error: getErrorMessage(error),
        });
        return { error: `Failed to call next service: ${getErrorMessage(error)}` };
      } finally {
        recorder.close(clientSpan);
      }
    });
  }

  private async publishChain(serverSpan: Span, queue: string, data: string): Promise<ForwardOutcome> {
    const result = await this.publish(serverSpan, { type: 'queue', name: queue }, {
      service: this.serviceName,
      data,
      timestamp: this.clock().toISOString(),
    });

    if (!result.ok) {
      return { error: `Failed to publish to queue ${queue}: ${result.reason}` };
    }
    return {
      message: `Message sent to queue: ${queue}`,
      next: `${queue} consumer (via broker)`,
    };
  }

  private async publishFanout(serverSpan: Span, exchange: string, body: MessageBody): Promise<ForwardOutcome> {
    const result = await this.publish(serverSpan, { type: 'exchange', name: exchange }, body);

    if (!result.ok) {
      return { error: `Failed to publish to exchange ${exchange}: ${result.reason}` };
    }
    return {
      message: `Message broadcast to fanout exchange: ${exchange}`,
      consumers: BrokerTopology.FANOUT_QUEUES.map(queue => FANOUT_CONSUMER_NAMES[queue]),
    };
  }

  /**
   * Publish inside a PRODUCER span whose context travels in the message
   * headers. Failures mark both the producer and the server span ERROR.
   */
  private async publish(serverSpan: Span, destination: Destination, body: MessageBody): Promise<PublishResult> {
    const recorder = this.deps.recorder;
    const transport = destination.type;
    const producerSpan = recorder.startChild(serverSpan, `${destination.name} publish`, 'PRODUCER', {
      'messaging.system': 'redis',
      'messaging.destination.name': destination.name,
      'messaging.destination.kind': destination.type,
      'messaging.operation.type': 'send',
      'component.type': 'Redis Streams Producer',
    });

    return recorder.withSpan(producerSpan, async () => {
      try {
        const broker = this.deps.broker;
        if (!broker) {
          throw new PublishError('Message broker is not configured', destination.name);
        }

        this.logger.info(`[${this.serviceName}] Publishing message`, {
          destination: destination.name,
          type: destination.type,
        });

        const properties = this.deps.messagePropagator.injectIntoMessage(producerSpan.context);
        const messageId = await broker.publish(destination, { body, properties }, this.deps.publishTimeoutMs);

        recorder.tag(producerSpan, 'messaging.message.id', messageId);
        this.deps.metrics.recordForward(transport, 'success');
        return { ok: true, messageId };
      } catch (error) {
        recorder.recordError(producerSpan, error);
        recorder.recordError(serverSpan, error);
        this.deps.metrics.recordForward(transport, 'failure');
        this.logger.error(`[${this.serviceName}] Error publishing message`, {
          destination: destination.name,
          error: getErrorMessage(error),
        });
        return { ok: false, reason: getErrorMessage(error) };
      } finally {
        recorder.close(producerSpan);
      }
    });
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Run `handler` inside a SERVER span continuing the caller's trace.
   * A local failure is recorded on the span and rethrown as a
   * TracedRequestError.
   */
  private inServerSpan<T>(route: string, headers: IncomingHeaders, handler: (span: Span) => Promise<T>): Promise<T> {
    const recorder = this.deps.recorder;
    const context = this.deps.httpPropagator.extract(headers);
    const span = recorder.start(context, `http get ${route}`, 'SERVER', {
      'http.request.method': 'GET',
      'http.route': route,
    });

    return recorder.withSpan(span, async () => {
      try {
        const result = await handler(span);
        recorder.tag(span, 'http.response.status_code', 200);
        return result;
      } catch (error) {
        recorder.recordError(span, error);
        recorder.tag(span, 'http.response.status_code', 500);
        this.logger.error(`[${this.serviceName}] Request failed`, {
          route,
          error: getErrorMessage(error),
        });
        throw new TracedRequestError(
          getErrorMessage(error),
          span.context.traceId,
          error instanceof Error ? error : undefined
        );
      } finally {
        recorder.close(span);
      }
    });
  }

  /**
   * Tagging must never fail the request it describes.
   */
  private tagSafely(span: Span, attributes: SpanAttributes): void {
    try {
      this.deps.recorder.tagAll(span, attributes);
    } catch (error) {
      this.logger.warn('Failed to tag span', { span: span.name, error: getErrorMessage(error) });
    }
  }

  private baseResponse(span: Span, data: string): ChainResponse {
    return {
      service: this.serviceName,
      data,
      timestamp: this.clock().toISOString(),
      traceId: span.context.traceId,
    };
  }
}

/**
 * Span attribute value for a message body field, or undefined when absent.
 */
function describeField(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}
