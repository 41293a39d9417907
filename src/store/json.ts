/**
 * JSON read/write with checksums and locking.
 * This is the primary data access layer for tasklane data files.
 */

import { createHash } from 'node:crypto';
import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { atomicWriteJson, safeReadFile, type AtomicWriteOptions, type AtomicWriteResult } from './atomic.js';
import { withLock, type LockOptions } from './lock.js';
import { TasklaneError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import type { DocumentValidator } from '../core/validation/document-validator.js';

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  try {
    return JSON.parse(content);
  } catch (err) {
    throw new TasklaneError(
      ExitCode.VALIDATION_ERROR,
      `Invalid JSON in: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read a JSON file, throwing if it doesn't exist.
 */
export async function readJsonRequired(filePath: string, fix?: string): Promise<unknown> {
  const data = await readJson(filePath);
  if (data === null) {
    throw new TasklaneError(
      ExitCode.NOT_FOUND,
      `Required file not found: ${filePath}`,
      { fix },
    );
  }
  return data;
}

/**
 * Compute a truncated SHA-256 checksum of a value (16 hex chars).
 */
export function computeChecksum(data: unknown): string {
  const json = JSON.stringify(data);
  const hash = createHash('sha256').update(json).digest('hex');
  return hash.substring(0, 16);
}

/** Options for saveJson. */
export interface SaveJsonOptions extends AtomicWriteOptions {
  indent?: number;
  validator?: DocumentValidator;
  lock?: LockOptions;
}

/**
 * Save a standalone JSON file under its own lock:
 *   1. Acquire lock
 *   2. Validate data
 *   3. Create backup of existing file
 *   4. Atomic write (temp file -> rename)
 *   5. Release lock
 *
 * Documents that take part in a two-document transaction are written by
 * the transaction while it holds both locks, never through this function.
 */
export async function saveJson(
  filePath: string,
  data: unknown,
  options?: SaveJsonOptions,
): Promise<AtomicWriteResult> {
  return withLock(filePath, () => atomicWriteJson(filePath, data, options), options?.lock);
}

/**
 * Append a line to a JSONL file.
 * Opens with O_APPEND; each call writes exactly one line.
 */
export async function appendJsonl(
  filePath: string,
  entry: unknown,
): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await appendFile(filePath, JSON.stringify(entry) + '\n', { encoding: 'utf8', flag: 'a' });
  } catch (err) {
    throw new TasklaneError(ExitCode.FILE_ERROR, `Failed to append to: ${filePath}`, { cause: err });
  }
}
