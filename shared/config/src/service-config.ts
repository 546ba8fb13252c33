/**
 * Service Configuration
 *
 * One chain service binary plays every role (gateway, service-a ... service-e).
 * The role is chosen entirely by environment variables, parsed here into a
 * typed {@link ServiceConfig}.
 *
 * Environment Variables:
 * - SERVICE_NAME: identity used in responses and telemetry (default: 'tel')
 * - PORT: HTTP listen port (default: 8080)
 * - NEXT_HOP: '', 'http(s)://host:port', 'queue:<name>' or 'exchange:<name>'
 * - CONSUME_QUEUES: comma-separated queues consumed by this service
 * - REDIS_URL / REDIS_PASSWORD: broker connection
 * - SAMPLING_PROBABILITY: chance that a new root trace is sampled (0-1)
 * - HTTP_TIMEOUT_MS / PUBLISH_TIMEOUT_MS: bounds on outbound calls
 * - PROCESSING_DELAY_MAX_MS / GREET_DELAY_MAX_MS / CONSUMER_DELAY_MS: simulated work
 * - OTEL_EXPORTER_ENDPOINT: OTLP/HTTP collector base URL
 */

import { BrokerTopology } from '@tracechain/types';
import type { TopologyDeclaration } from '@tracechain/types';
import { ConfigurationError } from './errors';
import { DestinationNameSchema, HttpUrlSchema, ServiceEnvSchema, validateOrThrow } from './schemas';
import type { ServiceEnv } from './schemas';

// =============================================================================
// Types
// =============================================================================

/**
 * Where a chain hop sends the request after its own processing.
 * Exactly one variant applies, so a hop can never both call HTTP and publish.
 */
export type NextHop =
  | { kind: 'terminal' }
  | { kind: 'http'; baseUrl: string }
  | { kind: 'queue'; queue: string }
  | { kind: 'exchange'; exchange: string };

export interface RedisConfig {
  url: string;
  password?: string;
}

export interface ServiceConfig {
  serviceName: string;
  serviceVersion: string;
  port: number;
  nextHop: NextHop;
  consumeQueues: string[];
  fanoutExchange: string;
  /** Absent when the service never touches the broker */
  redis?: RedisConfig;
  samplingProbability: number;
  timeouts: {
    httpMs: number;
    publishMs: number;
  };
  delays: {
    processingMaxMs: number;
    greetMaxMs: number;
    consumerMs: number;
  };
  telemetry: {
    /** OTLP/HTTP base URL; undefined disables span export */
    endpoint?: string;
    resourceAttributes: Record<string, string>;
  };
  logLevel: ServiceEnv['LOG_LEVEL'];
}

// =============================================================================
// Parsing
// =============================================================================

const QUEUE_PREFIX = 'queue:';
const EXCHANGE_PREFIX = 'exchange:';

/**
 * Parse the NEXT_HOP variable.
 *
 * @throws ConfigurationError for anything that is not one of the four forms
 *
 * @example
 * ```typescript
 * parseNextHop('');                        // { kind: 'terminal' }
 * parseNextHop('http://service-b:8082');   // { kind: 'http', baseUrl: 'http://service-b:8082' }
 * parseNextHop('queue:tel.chain.queue');   // { kind: 'queue', queue: 'tel.chain.queue' }
 * ```
 */
export function parseNextHop(raw: string): NextHop {
  const value = raw.trim();
  if (value === '') {
    return { kind: 'terminal' };
  }

  if (value.startsWith(QUEUE_PREFIX)) {
    const queue = validateOrThrow(DestinationNameSchema, value.slice(QUEUE_PREFIX.length), 'NEXT_HOP queue');
    return { kind: 'queue', queue };
  }

  if (value.startsWith(EXCHANGE_PREFIX)) {
    const exchange = validateOrThrow(
      DestinationNameSchema,
      value.slice(EXCHANGE_PREFIX.length),
      'NEXT_HOP exchange'
    );
    return { kind: 'exchange', exchange };
  }

  if (/^https?:\/\//.test(value)) {
    const url = validateOrThrow(HttpUrlSchema, value, 'NEXT_HOP url');
    return { kind: 'http', baseUrl: url.replace(/\/+$/, '') };
  }

  throw new ConfigurationError(
    `Invalid NEXT_HOP "${value}": expected an http(s) URL, "queue:<name>", "exchange:<name>" or empty`,
    [{ path: 'NEXT_HOP', message: 'Unrecognized next-hop form' }]
  );
}

function parseQueueList(raw: string): string[] {
  const names = raw
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0);

  return [...new Set(names)].map(name => validateOrThrow(DestinationNameSchema, name, 'CONSUME_QUEUES'));
}

/**
 * Load and validate the service configuration from environment variables.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws ConfigurationError on any invalid value
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = validateOrThrow(ServiceEnvSchema, env, 'service environment');

  const nextHop = parseNextHop(parsed.NEXT_HOP);
  const consumeQueues = parseQueueList(parsed.CONSUME_QUEUES);

  // Consumers only bind their queues to FANOUT_EXCHANGE
  if (nextHop.kind === 'exchange' && nextHop.exchange !== parsed.FANOUT_EXCHANGE) {
    throw new ConfigurationError(
      `NEXT_HOP exchange "${nextHop.exchange}" must be the fanout exchange "${parsed.FANOUT_EXCHANGE}"`,
      [{ path: 'NEXT_HOP', message: 'Exchange has no bound queues' }]
    );
  }

  const needsBroker = nextHop.kind === 'queue' || nextHop.kind === 'exchange' || consumeQueues.length > 0;
  if (needsBroker && !parsed.REDIS_URL) {
    throw new ConfigurationError(
      'REDIS_URL is required when NEXT_HOP targets the broker or CONSUME_QUEUES is set',
      [{ path: 'REDIS_URL', message: 'Required' }]
    );
  }

  return {
    serviceName: parsed.SERVICE_NAME,
    serviceVersion: parsed.SERVICE_VERSION,
    port: parsed.PORT,
    nextHop,
    consumeQueues,
    fanoutExchange: parsed.FANOUT_EXCHANGE,
    redis: parsed.REDIS_URL
      ? { url: parsed.REDIS_URL, password: parsed.REDIS_PASSWORD }
      : undefined,
    samplingProbability: parsed.SAMPLING_PROBABILITY,
    timeouts: {
      httpMs: parsed.HTTP_TIMEOUT_MS,
      publishMs: parsed.PUBLISH_TIMEOUT_MS,
    },
    delays: {
      processingMaxMs: parsed.PROCESSING_DELAY_MAX_MS,
      greetMaxMs: parsed.GREET_DELAY_MAX_MS,
      consumerMs: parsed.CONSUMER_DELAY_MS,
    },
    telemetry: {
      endpoint: parsed.OTEL_EXPORTER_ENDPOINT?.replace(/\/+$/, ''),
      resourceAttributes: {
        'service.name': parsed.SERVICE_NAME,
        'service.version': parsed.SERVICE_VERSION,
        'created.by': parsed.OTEL_RESOURCE_CREATED_BY,
        'built.with': parsed.OTEL_RESOURCE_BUILT_WITH,
      },
    },
    logLevel: parsed.LOG_LEVEL,
  };
}

// =============================================================================
// Topology
// =============================================================================

/**
 * Broker topology a service declares on startup: the chain queue, the
 * fanout exchange with its three bound queues, plus any queue this service
 * publishes to or consumes that is not part of the standard set.
 *
 * An exchange next hop is always the fanout exchange (see loadServiceConfig),
 * so no other exchange is declared.
 */
export function resolveTopology(config: Pick<ServiceConfig, 'nextHop' | 'consumeQueues' | 'fanoutExchange'>): TopologyDeclaration {
  const queues = new Set<string>([BrokerTopology.CHAIN_QUEUE, ...BrokerTopology.FANOUT_QUEUES]);
  const exchanges: Record<string, readonly string[]> = {
    [config.fanoutExchange]: BrokerTopology.FANOUT_QUEUES,
  };

  if (config.nextHop.kind === 'queue') {
    queues.add(config.nextHop.queue);
  }
  for (const queue of config.consumeQueues) {
    queues.add(queue);
  }

  return { queues: [...queues], exchanges };
}
