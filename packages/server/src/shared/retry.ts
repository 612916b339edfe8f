import { computeBackoffDelay } from "./backoff.js";
import { isTemporaryError } from "./errors.js";

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly initialBackoffMs: number;
  readonly maxBackoffMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialBackoffMs: 2_000,
  maxBackoffMs: 30_000,
};

export interface RetryAttemptInfo {
  /** The attempt that just failed (1-indexed). */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  /** Called before each backoff sleep. */
  onRetry?: (info: RetryAttemptInfo) => void;
  /** Decides whether a failure may be retried. Defaults to `isTemporaryError`. */
  isRetryable?: (error: unknown) => boolean;
  sleep?: Sleep;
  signal?: AbortSignal;
}

export const defaultSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error("Operation aborted");
}

/**
 * Runs `operation` up to `policy.maxAttempts` times, strictly one invocation at
 * a time. Temporary failures sleep for the computed backoff and try again;
 * permanent failures and the failure of the last attempt are rethrown as-is.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  const isRetryable = options.isRetryable ?? isTemporaryError;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw abortReason(options.signal);
    }
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryable(error)) {
        throw error;
      }
      const delayMs = computeBackoffDelay(attempt, policy);
      options.onRetry?.({ attempt, maxAttempts, delayMs, error });
      await sleep(delayMs, options.signal);
    }
  }
}
