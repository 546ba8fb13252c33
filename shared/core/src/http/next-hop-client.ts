/**
 * Next-hop HTTP client.
 *
 * GETs `<baseUrl>/api/chain?data=...` on the next service with the
 * propagation headers attached. Uses native fetch with an AbortController
 * bound to the configured timeout.
 *
 * Every failure surfaces as a ForwardingError whose message is the short
 * reason shown to the caller (`ECONNREFUSED`, `HTTP 503`, a timeout message).
 */

import { TimeoutError } from '@tracechain/types';
import { ForwardingError, getErrorMessage, ErrorCode } from '../error-handling';

export interface NextHopClientOptions {
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export interface NextHopRequest {
  baseUrl: string;
  path: string;
  query?: Record<string, string>;
  headers?: Record<string, string>;
}

export class NextHopClient {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: NextHopClientOptions) {
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * @returns the parsed JSON object body of a 2xx response
   * @throws ForwardingError on network failure, timeout, non-2xx status or a non-object body
   */
  async getJson(request: NextHopRequest): Promise<Record<string, unknown>> {
    const url = buildUrl(request);
    const fetchImpl = this.fetchImpl;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetchImpl(url, {
          method: 'GET',
          headers: { Accept: 'application/json', ...request.headers },
          signal: controller.signal,
        });
      } catch (error) {
        if (controller.signal.aborted) {
          const timeout = new TimeoutError(`GET ${url}`, this.timeoutMs);
          throw new ForwardingError(timeout.message, url, {
            code: ErrorCode.CONNECTION_TIMEOUT,
            cause: timeout,
          });
        }
        throw new ForwardingError(describeNetworkError(error), url, {
          code: ErrorCode.CONNECTION_FAILED,
          cause: error instanceof Error ? error : undefined,
        });
      }

      if (!response.ok) {
        throw new ForwardingError(`HTTP ${response.status}`, url, { statusCode: response.status });
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new ForwardingError('Invalid JSON response', url, {
          statusCode: response.status,
          cause: error instanceof Error ? error : undefined,
        });
      }

      if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        throw new ForwardingError('Response body is not a JSON object', url, { statusCode: response.status });
      }
      return { ...body };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function buildUrl(request: NextHopRequest): string {
  const base = request.baseUrl.replace(/\/+$/, '');
  const path = request.path.startsWith('/') ? request.path : `/${request.path}`;
  const query = new URLSearchParams(request.query ?? {}).toString();
  return query ? `${base}${path}?${query}` : `${base}${path}`;
}

/**
 * fetch wraps socket errors as `TypeError: fetch failed` with the system
 * error in `cause`; prefer the cause's code.
 */
function describeNetworkError(error: unknown): string {
  if (error instanceof Error && typeof error.cause === 'object' && error.cause !== null) {
    const cause = error.cause;
    if ('code' in cause && typeof cause.code === 'string') {
      return cause.code;
    }
    if (cause instanceof Error && cause.message) {
      return cause.message;
    }
  }
  return getErrorMessage(error);
}
