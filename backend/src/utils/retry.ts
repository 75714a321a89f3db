import { errorMessage, errorStatus } from './errors';
import { log } from './logger';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const RETRYABLE_STATUSES = new Set([408, 409, 429]);

export const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/** Rate limits, timeouts, 5xx and connection failures (no status) are worth another try. */
export function isRetryable(error: unknown): boolean {
  const status = errorStatus(error);
  if (status === undefined) return true;
  return RETRYABLE_STATUSES.has(status) || status >= 500;
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const delay = policy.baseDelayMs * 2 ** (attempt - 1);
  return policy.maxDelayMs !== undefined ? Math.min(delay, policy.maxDelayMs) : delay;
}

/**
 * Runs `operation` until it succeeds, a non-retryable error is thrown, or
 * `maxAttempts` is reached. The last error is rethrown unchanged.
 */
export async function withRetry<T>(label: string, policy: RetryPolicy, operation: () => Promise<T>): Promise<T> {
  const sleep = policy.sleep ?? defaultSleep;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await operation();
    } catch (error) {
      if (attempt >= policy.maxAttempts || !isRetryable(error)) {
        throw error;
      }
      const delay = backoffDelay(attempt, policy);
      log('warn', `${label} failed, retrying`, {
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs: delay,
        error: errorMessage(error),
      });
      await sleep(delay);
    }
  }
}
