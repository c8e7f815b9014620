import { RateLimitedError, isRetryableError } from '../errors.js';

export interface RetryPolicy {
  /** Total tries per request, the first one included. */
  maxAttempts: number;
  baseDelayMs: number;
  maxJitterMs: number;
  /** Rate-limit waits longer than this fail the request instead of sleeping. */
  maxRateLimitWaitMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 5_000,
  maxJitterMs: 3_000,
  maxRateLimitWaitMs: 120_000,
};

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff with jitter for the given zero-based attempt.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  return policy.baseDelayMs * 2 ** attempt + Math.floor(random() * policy.maxJitterMs);
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or the policy's
 * attempts run out. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {},
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const random = hooks.random ?? Math.random;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isRetryableError(err) || attempt + 1 >= policy.maxAttempts) throw err;

      let delayMs = backoffDelay(policy, attempt, random);
      if (err instanceof RateLimitedError && err.retryAfterMs !== undefined) {
        if (err.retryAfterMs > policy.maxRateLimitWaitMs) throw err;
        delayMs = err.retryAfterMs;
      }

      hooks.onRetry?.({ attempt, delayMs, error: err });
      await wait(delayMs);
    }
  }
}
