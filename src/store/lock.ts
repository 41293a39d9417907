/**
 * File locking using proper-lockfile.
 * Exclusive advisory locks with a bounded wait, one per document.
 */

import lockfile from 'proper-lockfile';
import { errnoCode, TasklaneError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default lock options. */
export const DEFAULT_LOCK_TIMEOUT_MS = 30_000;
export const DEFAULT_LOCK_STALE_MS = 10_000;

const MIN_RETRY_INTERVAL_MS = 25;
const MAX_RETRY_INTERVAL_MS = 500;

/** A release function returned by proper-lockfile. */
export type ReleaseFn = () => Promise<void>;

/** A held lock. Release it with releaseLock() on every exit path. */
export interface LockHandle {
  readonly filePath: string;
  readonly acquiredAt: number;
  released: boolean;
  readonly release: ReleaseFn;
}

/** Options for acquireLock. */
export interface LockOptions {
  /** Maximum time to wait for the lock. */
  timeoutMs?: number;
  /** Age after which an abandoned lock is reclaimed. */
  staleMs?: number;
}

/**
 * Acquire an exclusive lock on a file, waiting up to timeoutMs.
 * Fails with a recoverable LOCK_TIMEOUT when the wait is exhausted.
 * The target file does not need to exist.
 */
export async function acquireLock(
  filePath: string,
  options?: LockOptions,
): Promise<LockHandle> {
  const timeoutMs = options?.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
  const staleMs = options?.staleMs ?? DEFAULT_LOCK_STALE_MS;

  try {
    const release = await lockfile.lock(filePath, {
      stale: staleMs,
      realpath: false,
      retries: {
        retries: Math.max(1, Math.ceil(timeoutMs / MIN_RETRY_INTERVAL_MS)),
        factor: 1.5,
        minTimeout: Math.min(MIN_RETRY_INTERVAL_MS, Math.max(1, timeoutMs)),
        maxTimeout: MAX_RETRY_INTERVAL_MS,
        maxRetryTime: timeoutMs,
      },
    });
    getLogger('lock').debug({ filePath }, 'Lock acquired');
    return { filePath, acquiredAt: Date.now(), released: false, release };
  } catch (err) {
    if (errnoCode(err) === 'ELOCKED') {
      throw new TasklaneError(
        ExitCode.LOCK_TIMEOUT,
        `Timed out after ${timeoutMs}ms waiting for lock: ${filePath}`,
        {
          fix: 'Another process may be writing to this file. Wait and retry.',
          cause: err,
        },
      );
    }
    throw new TasklaneError(
      ExitCode.FILE_ERROR,
      `Failed to acquire lock: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Release a held lock. Releasing twice is a no-op.
 */
export async function releaseLock(handle: LockHandle): Promise<void> {
  if (handle.released) return;
  handle.released = true;
  try {
    await handle.release();
    getLogger('lock').debug(
      { filePath: handle.filePath, heldMs: Date.now() - handle.acquiredAt },
      'Lock released',
    );
  } catch (err) {
    throw new TasklaneError(
      ExitCode.FILE_ERROR,
      `Failed to release lock: ${handle.filePath}`,
      { cause: err },
    );
  }
}

/**
 * Check if a file is currently locked.
 */
export async function isLocked(filePath: string): Promise<boolean> {
  return lockfile.check(filePath, { realpath: false });
}

/**
 * Execute a function while holding an exclusive lock on a file.
 * The lock is released when the function completes (or throws).
 */
export async function withLock<T>(
  filePath: string,
  fn: () => Promise<T>,
  options?: LockOptions,
): Promise<T> {
  const handle = await acquireLock(filePath, options);
  try {
    return await fn();
  } finally {
    await releaseLock(handle);
  }
}
