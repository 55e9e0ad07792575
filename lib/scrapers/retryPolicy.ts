import { FetchError } from "@/lib/errors";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  isRetryable: (error: unknown) => boolean;
}

export function isTransientFetchError(error: unknown): boolean {
  return error instanceof FetchError && error.kind === "transient";
}

export function createRetryPolicy(overrides?: Partial<RetryPolicy>): RetryPolicy {
  return {
    maxAttempts: 4,
    baseDelayMs: 2_000,
    maxDelayMs: 60_000,
    isRetryable: isTransientFetchError,
    ...overrides,
  };
}

/**
 * Delay before the next attempt after `attempt` (1-based) failed.
 * A server-supplied Retry-After wins over the exponential schedule, still capped.
 */
export function backoffDelayMs(policy: RetryPolicy, attempt: number, error?: unknown): number {
  if (error instanceof FetchError && error.retryAfterSeconds != null) {
    return Math.min(error.retryAfterSeconds * 1000, policy.maxDelayMs);
  }
  const delay = policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `task` under `policy`. Non-retryable errors and the last failure are rethrown.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  task: (attempt: number) => Promise<T>,
  opts?: { sleep?: Sleep; onRetry?: (attempt: number, delayMs: number, error: unknown) => void }
): Promise<T> {
  const sleep = opts?.sleep ?? realSleep;
  let attempt = 1;
  for (;;) {
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt >= policy.maxAttempts || !policy.isRetryable(error)) throw error;
      const delay = backoffDelayMs(policy, attempt, error);
      opts?.onRetry?.(attempt, delay, error);
      await sleep(delay);
      attempt++;
    }
  }
}
