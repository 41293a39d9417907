/**
 * Tests for retry with exponential backoff.
 */

import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, isRetryableError, NO_RETRY, withRetry } from '../retry.js';
import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { RetryPolicy } from '../../types/config.js';

const FAST: RetryPolicy = { maxAttempts: 3, initialDelayMs: 1, multiplier: 2, maxTotalMs: 1_000 };

describe('backoffDelay', () => {
  it('grows by the multiplier', () => {
    const policy: RetryPolicy = { maxAttempts: 4, initialDelayMs: 100, multiplier: 2, maxTotalMs: 5_000 };
    expect([1, 2, 3].map((n) => backoffDelay(policy, n))).toEqual([100, 200, 400]);
  });
});

describe('isRetryableError', () => {
  it('accepts recoverable codes only', () => {
    expect(isRetryableError(new TasklaneError(ExitCode.LOCK_TIMEOUT, 'x'))).toBe(true);
    expect(isRetryableError(new TasklaneError(ExitCode.CHECKSUM_MISMATCH, 'x'))).toBe(true);
    expect(isRetryableError(new TasklaneError(ExitCode.SCOPE_CONFLICT, 'x'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });
});

describe('withRetry', () => {
  it('retries a recoverable failure until it succeeds', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TasklaneError(ExitCode.LOCK_TIMEOUT, 'busy'))
      .mockResolvedValueOnce('done');

    expect(await withRetry(fn, FAST)).toBe('done');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenLastCalledWith(2);
  });

  it('rethrows a non-recoverable failure at once', async () => {
    const fn = vi.fn(async () => {
      throw new TasklaneError(ExitCode.TASK_CLAIMED, 'claimed');
    });
    await expect(withRetry(fn, FAST)).rejects.toMatchObject({ code: ExitCode.TASK_CLAIMED });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('stops after maxAttempts', async () => {
    const fn = vi.fn(async () => {
      throw new TasklaneError(ExitCode.CHECKSUM_MISMATCH, 'moved');
    });
    await expect(withRetry(fn, FAST)).rejects.toMatchObject({ code: ExitCode.CHECKSUM_MISMATCH });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops when the next wait would exceed maxTotalMs', async () => {
    const fn = vi.fn(async () => {
      throw new TasklaneError(ExitCode.LOCK_TIMEOUT, 'busy');
    });
    const policy: RetryPolicy = { maxAttempts: 10, initialDelayMs: 5, multiplier: 2, maxTotalMs: 12 };
    await expect(withRetry(fn, policy)).rejects.toMatchObject({ code: ExitCode.LOCK_TIMEOUT });
    // waits 5 then 10 would reach 15 > 12
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('runs once under NO_RETRY', async () => {
    const fn = vi.fn(async () => {
      throw new TasklaneError(ExitCode.LOCK_TIMEOUT, 'busy');
    });
    await expect(withRetry(fn, NO_RETRY)).rejects.toThrow('busy');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
