/**
 * @tracechain/config
 *
 * Environment-driven service configuration, validated with zod.
 */

export { ConfigurationError } from './errors';

export {
  loadServiceConfig,
  parseNextHop,
  resolveTopology,
} from './service-config';
export type { NextHop, RedisConfig, ServiceConfig } from './service-config';

export {
  DestinationNameSchema,
  DurationMsSchema,
  HttpUrlSchema,
  PortSchema,
  ProbabilitySchema,
  RedisUrlSchema,
  ServiceEnvSchema,
  validateOrThrow,
} from './schemas';
export type { ServiceEnv } from './schemas';
