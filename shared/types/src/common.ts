/**
 * Common types used across all packages.
 */

/**
 * Timeout error for async operations that exceed their time limit.
 *
 * @example
 * ```typescript
 * throw new TimeoutError('publish to tel.chain.queue', 5000);
 * ```
 */
export class TimeoutError extends Error {
  constructor(
    /** What operation timed out */
    public readonly operation: string,
    /** The timeout duration in milliseconds */
    public readonly timeoutMs: number,
    /** Optional service name for context */
    public readonly service?: string
  ) {
    super(`Timeout: ${operation} exceeded ${timeoutMs}ms${service ? ` in ${service}` : ''}`);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
