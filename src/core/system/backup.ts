/**
 * Backup listing and restore for the two documents.
 */

import { basename } from 'node:path';
import type { DocumentName } from '../errors.js';
import { getAccessor, type DataAccessor } from '../../store/data-accessor.js';
import { findBackup, listBackups, type BackupEntry } from '../../store/backup.js';
import { releaseLock } from '../../store/lock.js';
import { createAuditEvent } from './audit-log.js';
import { getLogger } from '../logger.js';

export interface RestoreResult {
  document: DocumentName;
  restoredFrom: string;
  /** Backup of the content that was replaced, or null if there was none. */
  safetyBackup: string | null;
}

function documentPath(accessor: DataAccessor, document: DocumentName): string {
  return document === 'tasks' ? accessor.paths.tasks : accessor.paths.sessions;
}

/** List numbered backups of a document, newest first. */
export async function listDocumentBackups(
  document: DocumentName,
  cwd?: string,
  accessor?: DataAccessor,
): Promise<BackupEntry[]> {
  const acc = await getAccessor(cwd, accessor);
  return listBackups(basename(documentPath(acc, document)), acc.paths.backups);
}

/**
 * Restore a document from backup `.index` (default: newest) under the
 * document's lock. The current content is backed up first, so a restore
 * can itself be undone.
 */
export async function restoreBackup(
  document: DocumentName,
  index?: number,
  cwd?: string,
  accessor?: DataAccessor,
): Promise<RestoreResult> {
  const acc = await getAccessor(cwd, accessor);
  const fileName = basename(documentPath(acc, document));

  const lock = document === 'tasks' ? await acc.lockTaskStore() : await acc.lockSessions();
  try {
    const backup = await findBackup(fileName, acc.paths.backups, index);
    const written = await acc.restoreDocument(document, backup.path, { keepCurrent: true });

    if (written.backupPath !== null) {
      await acc.appendAudit(
        createAuditEvent('backup_created', { details: { document, path: written.backupPath } }),
      );
    }
    await acc.appendAudit(
      createAuditEvent('backup_restored', {
        details: { document, index: backup.index, from: backup.path },
      }),
    );

    getLogger('backup').info({ document, index: backup.index }, 'Document restored');
    return { document, restoredFrom: backup.path, safetyBackup: written.backupPath };
  } finally {
    await releaseLock(lock);
  }
}
