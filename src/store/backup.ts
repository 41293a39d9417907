/**
 * Numbered backup system for tasklane documents.
 * Maintains a rotating window of recent backups for rollback protection:
 * `<file>.1` is always the newest, `<file>.N` the oldest retained.
 */

import { copyFile, mkdir, readdir, rename, stat, unlink } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { errnoCode, TasklaneError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

export const DEFAULT_MAX_BACKUPS = 10;

/** A backup file on disk. */
export interface BackupEntry {
  /** Backup number; 1 is newest. */
  index: number;
  path: string;
  size: number;
  modifiedAt: string;
}

function backupNumber(entry: string, prefix: string): number | null {
  if (!entry.startsWith(prefix)) return null;
  const suffix = entry.slice(prefix.length);
  return /^\d+$/.test(suffix) ? parseInt(suffix, 10) : null;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return false;
    throw err;
  }
}

/**
 * Create a numbered backup of a file as `<name>.1`.
 * Shifts existing backups up by one and removes any beyond maxBackups.
 * Returns null when the source does not exist yet (first write).
 */
export async function createBackup(
  filePath: string,
  backupDir: string,
  maxBackups: number = DEFAULT_MAX_BACKUPS,
): Promise<string | null> {
  if (maxBackups < 1) {
    throw new TasklaneError(ExitCode.CONFIG_ERROR, `maxBackups must be at least 1, got ${maxBackups}`);
  }

  try {
    if (!(await pathExists(filePath))) return null;

    await mkdir(backupDir, { recursive: true });
    const fileName = basename(filePath);

    // Shift .N-1 -> .N ... .1 -> .2; the old .N is overwritten
    for (let i = maxBackups - 1; i >= 1; i--) {
      const current = join(backupDir, `${fileName}.${i}`);
      if (await pathExists(current)) {
        await rename(current, join(backupDir, `${fileName}.${i + 1}`));
      }
    }

    const backupPath = join(backupDir, `${fileName}.1`);
    await copyFile(filePath, backupPath);
    await pruneBackups(fileName, backupDir, maxBackups);
    return backupPath;
  } catch (err) {
    if (err instanceof TasklaneError) throw err;
    throw new TasklaneError(
      ExitCode.FILE_ERROR,
      `Backup failed for: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Remove backups numbered above maxBackups (e.g. after the cap was lowered).
 * Returns the removed paths.
 */
export async function pruneBackups(
  fileName: string,
  backupDir: string,
  maxBackups: number,
): Promise<string[]> {
  const removed: string[] = [];
  for (const entry of await listBackups(fileName, backupDir)) {
    if (entry.index > maxBackups) {
      await unlink(entry.path);
      removed.push(entry.path);
    }
  }
  return removed;
}

/**
 * List existing backups for a file, newest first.
 */
export async function listBackups(
  fileName: string,
  backupDir: string,
): Promise<BackupEntry[]> {
  let entries: string[];
  try {
    entries = await readdir(backupDir);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return [];
    throw new TasklaneError(ExitCode.FILE_ERROR, `Cannot read backup directory: ${backupDir}`, { cause: err });
  }

  const prefix = `${fileName}.`;
  const numbered: Array<{ index: number; path: string }> = [];
  for (const entry of entries) {
    const index = backupNumber(entry, prefix);
    if (index !== null) numbered.push({ index, path: join(backupDir, entry) });
  }
  numbered.sort((a, b) => a.index - b.index);

  const result: BackupEntry[] = [];
  for (const { index, path } of numbered) {
    const info = await stat(path);
    result.push({ index, path, size: info.size, modifiedAt: info.mtime.toISOString() });
  }
  return result;
}

/**
 * Locate a backup by number (default: newest).
 */
export async function findBackup(
  fileName: string,
  backupDir: string,
  index?: number,
): Promise<BackupEntry> {
  const backups = await listBackups(fileName, backupDir);
  const match = index === undefined ? backups[0] : backups.find((b) => b.index === index);
  if (!match) {
    throw new TasklaneError(
      ExitCode.NOT_FOUND,
      index === undefined
        ? `No backups found for: ${fileName}`
        : `Backup ${fileName}.${index} not found`,
    );
  }
  return match;
}
