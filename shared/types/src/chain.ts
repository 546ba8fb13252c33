/**
 * Response shapes returned by a chain hop.
 */

/**
 * What the next hop produced: the downstream JSON body for HTTP hops,
 * or a description of the broker destination for message hops.
 */
export type ChainNext = Record<string, unknown> | string;

export interface ChainResponse {
  service: string;
  data: string;
  /** ISO-8601 time at which this hop built the response */
  timestamp: string;
  traceId: string;
  next?: ChainNext;
  message?: string;
  /** Set when forwarding failed; the response is still a 200 */
  error?: string;
  /** Consumers reached by a fanout publish */
  consumers?: string[];
}

export interface GreetResponse {
  message: string;
  name: string;
  timestamp: string;
}

export interface ErrorResponse {
  service: string;
  error: string;
  traceId: string | null;
  timestamp: string;
}
