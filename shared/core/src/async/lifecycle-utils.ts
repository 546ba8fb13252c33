/**
 * Lifecycle Utilities
 *
 * ```typescript
 * this.pollTimer = clearTimeoutSafe(this.pollTimer);
 * ```
 */

/**
 * Clear a timeout and return null for assignment.
 * Safe to call with null (no-op).
 */
export function clearTimeoutSafe(timeout: NodeJS.Timeout | null): null {
  if (timeout) {
    clearTimeout(timeout);
  }
  return null;
}
