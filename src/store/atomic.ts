/**
 * Atomic file write operations using write-file-atomic.
 * Writes are crash-safe: validate -> backup -> temp file -> rename.
 * A reader never observes a half-written document.
 */

import writeFileAtomic from 'write-file-atomic';
import { copyFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { errnoCode, TasklaneError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';
import type { DocumentValidator, ValidationResult } from '../core/validation/document-validator.js';
import { createBackup } from './backup.js';

/** Checks staged content before it may replace the target. */
export type ContentValidator = (content: string) => ValidationResult;

/** Options for atomicWrite. */
export interface AtomicWriteOptions {
  /** Validation run against the staged content. Empty content is always rejected. */
  validate?: ContentValidator;
  /** Directory for numbered backups. If omitted, no backup is created. */
  backupDir?: string;
  /** Maximum number of backups to retain. */
  maxBackups?: number;
  mode?: number;
}

/** Outcome of a successful atomic write. */
export interface AtomicWriteResult {
  filePath: string;
  /** Rollback point taken before the replace, if any. */
  backupPath: string | null;
  bytes: number;
}

/**
 * Replace a file atomically.
 *
 * Any failure before the replace leaves the original untouched. A failure
 * during the replace triggers a best-effort recopy of the backup just made.
 */
export async function atomicWrite(
  filePath: string,
  content: string,
  options?: AtomicWriteOptions,
): Promise<AtomicWriteResult> {
  if (content.trim().length === 0) {
    throw new TasklaneError(
      ExitCode.VALIDATION_ERROR,
      `Refusing to write empty content: ${filePath}`,
      { details: { phase: 'validate' } },
    );
  }

  if (options?.validate) {
    const result = options.validate(content);
    if (!result.valid) {
      throw new TasklaneError(
        ExitCode.VALIDATION_ERROR,
        `Validation failed before write: ${filePath}`,
        { details: { phase: 'validate', errors: result.errors } },
      );
    }
  }

  try {
    await mkdir(dirname(filePath), { recursive: true });
  } catch (err) {
    throw new TasklaneError(ExitCode.FILE_ERROR, `Cannot create directory for: ${filePath}`, { cause: err });
  }

  const backupPath = options?.backupDir
    ? await createBackup(filePath, options.backupDir, options.maxBackups)
    : null;

  try {
    await writeFileAtomic(filePath, content, { encoding: 'utf8', mode: options?.mode });
  } catch (err) {
    if (backupPath) {
      await recopyBackup(backupPath, filePath);
    }
    throw new TasklaneError(
      ExitCode.FILE_ERROR,
      `Atomic write failed: ${filePath}`,
      { cause: err, details: { phase: 'write', backupPath } },
    );
  }

  return { filePath, backupPath, bytes: Buffer.byteLength(content, 'utf8') };
}

async function recopyBackup(backupPath: string, filePath: string): Promise<void> {
  const log = getLogger('atomic');
  try {
    await copyFile(backupPath, filePath);
    log.warn({ filePath, backupPath }, 'Restored original content from backup after failed replace');
  } catch (restoreErr) {
    log.error({ filePath, backupPath, err: restoreErr }, 'Rollback recopy failed');
  }
}

/**
 * Read a file and return its contents.
 * Returns null if the file does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (errnoCode(err) === 'ENOENT') {
      return null;
    }
    throw new TasklaneError(
      ExitCode.FILE_ERROR,
      `Failed to read: ${filePath}`,
      { cause: err },
    );
  }
}

/** Serialize a value the way every tasklane JSON document is written. */
export function serializeJson(data: unknown, indent = 2): string {
  return JSON.stringify(data, null, indent) + '\n';
}

/**
 * Build a ContentValidator that checks JSON syntax and, optionally,
 * a document's schema and semantic rules.
 */
export function jsonContentValidator(validator?: DocumentValidator): ContentValidator {
  return (content: string): ValidationResult => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      return { valid: false, errors: [`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`] };
    }
    return validator ? validator.validate(parsed) : { valid: true, errors: [] };
  };
}

/**
 * Write JSON data atomically with consistent formatting.
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options?: AtomicWriteOptions & { indent?: number; validator?: DocumentValidator },
): Promise<AtomicWriteResult> {
  return atomicWrite(filePath, serializeJson(data, options?.indent), {
    ...options,
    validate: options?.validate ?? jsonContentValidator(options?.validator),
  });
}
