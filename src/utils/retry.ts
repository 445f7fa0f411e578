import { sleep as defaultSleep } from "./concurrency";

export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number;
  backoffStartMs: number;
  backoffMaxMs: number;
}

export const DEFAULT_BACKOFF_MAX_MS = 10_000;

/** Delay before retry number `retry` (0-based): doubles, then caps. */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  return Math.min(policy.backoffStartMs * 2 ** retry, policy.backoffMaxMs);
}

export interface RetryOptions<T> {
  policy: RetryPolicy;
  shouldRetry: (result: T) => boolean;
  sleep?: (ms: number) => Promise<void>;
  signal?: AbortSignal;
  onRetry?: (result: T, attempt: number, delayMs: number) => void;
}

/**
 * Runs `attempt` until it yields a result that should not be retried or the
 * attempt cap is reached; the last result is returned either way.
 */
export async function withRetry<T>(
  attempt: (attemptNumber: number) => Promise<T>,
  options: RetryOptions<T>,
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.policy.maxAttempts);

  let result = await attempt(1);
  for (let n = 2; n <= maxAttempts; n++) {
    if (!options.shouldRetry(result) || options.signal?.aborted) break;

    const delayMs = backoffDelay(options.policy, n - 2);
    options.onRetry?.(result, n - 1, delayMs);
    await sleep(delayMs);
    result = await attempt(n);
  }
  return result;
}
