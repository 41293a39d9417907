/**
 * Retry with exponential backoff for recoverable failures.
 *
 * Lock timeouts, write-time checksum mismatches and fresh-id collisions
 * re-run the whole operation; every other error propagates immediately.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { RetryPolicy } from '../types/config.js';
import { TasklaneError } from './errors.js';
import { getLogger } from './logger.js';

export type { RetryPolicy };

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  initialDelayMs: 100,
  multiplier: 2,
  maxTotalMs: 5_000,
};

/** A policy that never retries. */
export const NO_RETRY: RetryPolicy = {
  maxAttempts: 1,
  initialDelayMs: 0,
  multiplier: 1,
  maxTotalMs: 0,
};

/** Whether an error may succeed when the whole operation is retried. */
export function isRetryableError(err: unknown): boolean {
  return err instanceof TasklaneError && err.recoverable;
}

/** Delay before the given retry (attempt 1 is the first retry). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.round(policy.initialDelayMs * Math.pow(policy.multiplier, attempt - 1));
}

/**
 * Run fn, retrying recoverable failures with exponential backoff.
 * Stops after maxAttempts, or when the next wait would push total
 * waiting past maxTotalMs, and rethrows the last error.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  operation = 'operation',
): Promise<T> {
  const log = getLogger('retry');
  let waited = 0;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isRetryableError(err) || attempt >= policy.maxAttempts) {
        throw err;
      }
      const delay = backoffDelay(policy, attempt);
      if (waited + delay > policy.maxTotalMs) {
        throw err;
      }
      log.debug({ operation, attempt, delay, err }, 'Recoverable failure, retrying');
      await sleep(delay);
      waited += delay;
    }
  }
}
