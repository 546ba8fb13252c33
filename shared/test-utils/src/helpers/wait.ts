/**
 * Polling helpers for asynchronous assertions (real timers only).
 */

export interface WaitForOptions {
  /** default: 3000 */
  timeoutMs?: number;
  /** default: 10 */
  intervalMs?: number;
  /** Appended to the timeout error */
  description?: string;
}

/**
 * Resolve once `condition` returns true; reject after `timeoutMs`.
 *
 * @example
 * ```typescript
 * await waitFor(() => exporter.getFinishedSpans().length === 3);
 * ```
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  options: WaitForOptions = {}
): Promise<void> {
  const { timeoutMs = 3000, intervalMs = 10, description } = options;
  const deadline = Date.now() + timeoutMs;

  while (!(await condition())) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms${description ? `: ${description}` : ''}`);
    }
    await new Promise(resolve => setTimeout(resolve, intervalMs));
  }
}
