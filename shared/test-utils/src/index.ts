/**
 * Test Utilities for trace-chain
 *
 * ```typescript
 * import { RedisStreamsMock, startTestServer, httpGet, waitFor } from '@tracechain/test-utils';
 * ```
 */

// Mocks
export * from './mocks';

// Helpers
export * from './helpers';
