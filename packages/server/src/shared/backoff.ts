/** Exponential backoff configuration. */
export interface BackoffConfig {
  /** Delay before the first retry, in milliseconds. */
  initialBackoffMs: number;
  /** Upper bound for any single delay, in milliseconds. */
  maxBackoffMs: number;
}

/**
 * Delay for the 1-indexed attempt `n`: `min(initial * 2^(n-1), max)`.
 */
export function computeBackoffDelay(attempt: number, config: BackoffConfig): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(config.initialBackoffMs * 2 ** exponent, config.maxBackoffMs);
}
