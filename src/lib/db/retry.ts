import { dbLogger } from '../../logger';
import { isSerializationFailure } from '../../db';

export interface RetryPolicy {
  /** Total tries, the first included. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  retryable: (error: unknown) => boolean;
}

/** Serialization failures (40001) and deadlocks (40P01) re-run the whole unit. */
export const TRANSACTION_RETRY: RetryPolicy = {
  attempts: 4,
  baseDelayMs: 50,
  maxDelayMs: 2000,
  retryable: isSerializationFailure,
};

/**
 * Full-jitter exponential backoff: a uniform draw below base * 2^(n-1),
 * capped at maxDelayMs. `failedAttempt` counts from 1.
 */
export function backoffDelay(
  failedAttempt: number,
  policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>,
  random: () => number = Math.random
): number {
  const ceiling = Math.min(policy.baseDelayMs * 2 ** (failedAttempt - 1), policy.maxDelayMs);
  return Math.floor(random() * ceiling);
}

export async function withRetry<T>(
  work: (attempt: number) => Promise<T>,
  overrides: Partial<RetryPolicy> = {}
): Promise<T> {
  const policy: RetryPolicy = { ...TRANSACTION_RETRY, ...overrides };

  for (let attempt = 1; ; attempt++) {
    try {
      return await work(attempt);
    } catch (error) {
      if (!policy.retryable(error)) {
        throw error;
      }
      if (attempt >= policy.attempts) {
        dbLogger.error({ err: error, attempts: attempt }, 'Transaction retries exhausted');
        throw error;
      }
      const delayMs = backoffDelay(attempt, policy);
      dbLogger.warn({ attempt, of: policy.attempts, delayMs, code: errorCode(error) }, 'Transaction conflict, retrying');
      await new Promise(resolve => setTimeout(resolve, delayMs));
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
