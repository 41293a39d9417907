/**
 * Path resolution for tasklane project data.
 *
 * Environment variables:
 *   TASKLANE_DIR - Project data directory (default: .tasklane)
 */

import { isAbsolute, join, resolve } from 'node:path';

/** Default data directory name inside a project. */
export const DEFAULT_DATA_DIR = '.tasklane';

export const TASK_STORE_FILE = 'tasks.json';
export const SESSIONS_FILE = 'sessions.json';
export const CONFIG_FILE = 'config.json';
export const AUDIT_LOG_FILE = 'audit.jsonl';
export const BACKUP_DIR = 'backups';

/**
 * Get the absolute path to the project data directory.
 * Respects TASKLANE_DIR; a relative value resolves against cwd.
 */
export function getDataDir(cwd?: string): string {
  const dir = process.env['TASKLANE_DIR'] ?? DEFAULT_DATA_DIR;
  if (isAbsolute(dir)) {
    return dir;
  }
  return resolve(cwd ?? process.cwd(), dir);
}

/** Get the path to the Task Store document. */
export function getTaskStorePath(cwd?: string): string {
  return join(getDataDir(cwd), TASK_STORE_FILE);
}

/** Get the path to the Session Registry document. */
export function getSessionsPath(cwd?: string): string {
  return join(getDataDir(cwd), SESSIONS_FILE);
}

/** Get the path to the project config file. */
export function getConfigPath(cwd?: string): string {
  return join(getDataDir(cwd), CONFIG_FILE);
}

/** Get the path to the audit log. */
export function getAuditLogPath(cwd?: string): string {
  return join(getDataDir(cwd), AUDIT_LOG_FILE);
}

/** Get the numbered-backup directory. */
export function getBackupDir(cwd?: string): string {
  return join(getDataDir(cwd), BACKUP_DIR);
}
