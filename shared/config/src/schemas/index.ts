/**
 * Zod Schema Validation for Service Configuration
 *
 * Environment variables arrive as strings (or not at all). These schemas
 * coerce and range-check them once at startup; after that the resulting
 * config object is trusted.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Treat blank env values the same as unset ones so defaults apply.
 */
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

/**
 * Non-negative integer read from an env string.
 */
export const DurationMsSchema = z.coerce
  .number()
  .int('Duration must be an integer number of milliseconds')
  .min(0, 'Duration cannot be negative');

/**
 * TCP port (1-65535).
 */
export const PortSchema = z.coerce
  .number()
  .int()
  .min(1, 'Port must be between 1 and 65535')
  .max(65535, 'Port must be between 1 and 65535');

/**
 * Probability as decimal (0-1).
 */
export const ProbabilitySchema = z.coerce
  .number()
  .min(0, 'Probability cannot be negative')
  .max(1, 'Probability cannot exceed 1');

/**
 * Redis connection URL.
 */
export const RedisUrlSchema = z
  .string()
  .regex(/^rediss?:\/\//, 'Redis URL must start with redis:// or rediss://');

/**
 * HTTP(S) base URL.
 */
export const HttpUrlSchema = z
  .string()
  .url('Invalid URL format')
  .regex(/^https?:\/\//, 'URL must start with http:// or https://');

/**
 * Queue, exchange or stream name.
 */
export const DestinationNameSchema = z
  .string()
  .min(1, 'Destination name cannot be empty')
  .max(256, 'Destination name is too long')
  .regex(/^[a-zA-Z0-9\-_:.]+$/, 'Destination name contains unsafe characters');

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

// =============================================================================
// Environment Schema
// =============================================================================

/**
 * Raw service environment. Field names match the variable names.
 */
export const ServiceEnvSchema = z.object({
  SERVICE_NAME: z.preprocess(blankToUndefined, z.string().trim().min(1).default('tel')),
  SERVICE_VERSION: z.preprocess(blankToUndefined, z.string().trim().default('1.0.0')),
  PORT: z.preprocess(blankToUndefined, PortSchema.default(8080)),
  NEXT_HOP: z.preprocess(blankToUndefined, z.string().trim().default('')),
  CONSUME_QUEUES: z.preprocess(blankToUndefined, z.string().default('')),
  FANOUT_EXCHANGE: z.preprocess(
    blankToUndefined,
    DestinationNameSchema.default('tel.fanout.exchange')
  ),
  REDIS_URL: z.preprocess(blankToUndefined, RedisUrlSchema.optional()),
  REDIS_PASSWORD: z.preprocess(blankToUndefined, z.string().trim().optional()),
  SAMPLING_PROBABILITY: z.preprocess(blankToUndefined, ProbabilitySchema.default(1)),
  HTTP_TIMEOUT_MS: z.preprocess(blankToUndefined, DurationMsSchema.min(1).default(5000)),
  PUBLISH_TIMEOUT_MS: z.preprocess(blankToUndefined, DurationMsSchema.min(1).default(5000)),
  PROCESSING_DELAY_MAX_MS: z.preprocess(blankToUndefined, DurationMsSchema.default(0)),
  GREET_DELAY_MAX_MS: z.preprocess(blankToUndefined, DurationMsSchema.default(100)),
  CONSUMER_DELAY_MS: z.preprocess(blankToUndefined, DurationMsSchema.default(50)),
  OTEL_EXPORTER_ENDPOINT: z.preprocess(blankToUndefined, HttpUrlSchema.optional()),
  OTEL_RESOURCE_CREATED_BY: z.preprocess(blankToUndefined, z.string().default('Unknown')),
  OTEL_RESOURCE_BUILT_WITH: z.preprocess(blankToUndefined, z.string().default('Unknown')),
  LOG_LEVEL: z.preprocess(blankToUndefined, LogLevelSchema.default('info')),
});

export type ServiceEnv = z.infer<typeof ServiceEnvSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Validate data and throw on failure.
 * Use at startup, not per request.
 *
 * @throws ConfigurationError listing every failed field
 */
export function validateOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string
): T {
  const result = schema.safeParse(data);

  if (result.success) {
    return result.data;
  }

  const issues = result.error.errors.map((e: z.ZodIssue) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
  const errorDetails = issues
    .map(issue => `  - ${issue.path}: ${issue.message}`)
    .join('\n');

  throw new ConfigurationError(
    `Config validation failed for ${context}:\n${errorDetails}`,
    issues
  );
}
