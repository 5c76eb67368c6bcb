import { RateLimitedError, isRetryable } from "../errors";

export type BackoffType = "exponential" | "fixed";

/**
 * Same shape as a queue job's `{ attempts, backoff: { type, delay } }` options,
 * plus the predicate that separates transient failures from terminal ones.
 */
export interface RetryPolicy {
  /** Total tries, including the first one. */
  attempts: number;
  backoff: {
    type: BackoffType;
    delay: number;
    maxDelay?: number;
  };
  isRetryable: (error: unknown) => boolean;
}

export interface RetryHooks {
  onRetry?: (info: { attempt: number; delay: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function createRetryPolicy(
  overrides: Partial<Omit<RetryPolicy, "backoff">> & { delay?: number; maxDelay?: number } = {},
): RetryPolicy {
  return {
    attempts: overrides.attempts ?? 3,
    backoff: {
      type: "exponential",
      delay: overrides.delay ?? 1000,
      maxDelay: overrides.maxDelay ?? 30_000,
    },
    isRetryable: overrides.isRetryable ?? isRetryable,
  };
}

/** Delay before retry number `attempt` (1 = first retry). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const { type, delay, maxDelay } = policy.backoff;
  const raw = type === "exponential" ? delay * 2 ** (attempt - 1) : delay;
  return maxDelay === undefined ? raw : Math.min(raw, maxDelay);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !policy.isRetryable(error)) throw error;

      let delay = backoffDelay(policy, attempt);
      if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
        delay = Math.max(delay, error.retryAfterMs);
      }
      hooks.onRetry?.({ attempt, delay, error });
      await sleep(delay);
    }
  }
}
