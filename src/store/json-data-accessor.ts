/**
 * JSON file-based implementation of the DataAccessor interface.
 *
 * Every write goes through atomicWriteJson with the document's validator
 * and a numbered backup; locks come from proper-lockfile via acquireLock.
 */

import { readFile, stat } from 'node:fs/promises';
import { basename, dirname } from 'node:path';
import { z } from 'zod/v4';
import type { TaskStore } from '../types/task.js';
import type { SessionRegistry } from '../types/session.js';
import type { TasklaneConfig } from '../types/config.js';
import type { DataAccessor, DocumentPaths } from './data-accessor.js';
import { errnoCode, TasklaneError, type DocumentName } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { getLogger } from '../core/logger.js';
import {
  getAuditLogPath,
  getBackupDir,
  getDataDir,
  getSessionsPath,
  getTaskStorePath,
} from '../core/paths.js';
import {
  sessionRegistryValidator,
  taskStoreValidator,
} from '../core/validation/document-validator.js';
import { createAuditEvent } from '../core/system/audit-log.js';
import {
  atomicWrite,
  atomicWriteJson,
  jsonContentValidator,
  type AtomicWriteResult,
} from './atomic.js';
import { acquireLock, type LockHandle } from './lock.js';
import { appendJsonl, readJson, readJsonRequired } from './json.js';
import { parseTaskStore } from './task-store.js';
import { createEmptySessionRegistry, parseSessionRegistry } from './session-store.js';

const metaChecksumSchema = z.object({ _meta: z.object({ checksum: z.string() }) });

const NOT_INITIALIZED_FIX = "Run 'tasklane init' to create the project data directory";

/**
 * Create a JSON file-backed DataAccessor.
 */
export function createJsonDataAccessor(config: TasklaneConfig, cwd?: string): DataAccessor {
  const log = getLogger('store');
  const paths: DocumentPaths = {
    dataDir: getDataDir(cwd),
    tasks: getTaskStorePath(cwd),
    sessions: getSessionsPath(cwd),
    backups: getBackupDir(cwd),
    audit: getAuditLogPath(cwd),
  };
  const lockOptions = { timeoutMs: config.lock.timeoutMs, staleMs: config.lock.staleMs };

  async function ensureDataDir(): Promise<void> {
    try {
      await stat(paths.dataDir);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new TasklaneError(
          ExitCode.NOT_FOUND,
          `Project data directory not found: ${paths.dataDir}`,
          { fix: NOT_INITIALIZED_FIX },
        );
      }
      throw new TasklaneError(ExitCode.FILE_ERROR, `Cannot access: ${paths.dataDir}`, { cause: err });
    }
  }

  async function lockDocument(filePath: string): Promise<LockHandle> {
    await ensureDataDir();
    return acquireLock(filePath, lockOptions);
  }

  async function writeDocument(
    document: DocumentName,
    data: TaskStore | SessionRegistry,
  ): Promise<AtomicWriteResult> {
    const filePath = document === 'tasks' ? paths.tasks : paths.sessions;
    const result = await atomicWriteJson(filePath, data, {
      validator: document === 'tasks' ? taskStoreValidator : sessionRegistryValidator,
      backupDir: paths.backups,
      maxBackups: config.backup.maxBackups,
    });
    if (result.backupPath !== null) {
      await accessor.appendAudit(
        createAuditEvent('backup_created', {
          details: { document, path: result.backupPath },
        }),
      );
    }
    log.debug({ document, bytes: result.bytes }, 'Document written');
    return result;
  }

  const accessor: DataAccessor = {
    engine: 'json',
    config,
    paths,

    async loadTaskStore(): Promise<TaskStore> {
      const raw = await readJsonRequired(paths.tasks, NOT_INITIALIZED_FIX);
      return parseTaskStore(raw, paths.tasks);
    },

    async saveTaskStore(data: TaskStore): Promise<AtomicWriteResult> {
      return writeDocument('tasks', data);
    },

    async lockTaskStore(): Promise<LockHandle> {
      return lockDocument(paths.tasks);
    },

    async loadSessions(): Promise<SessionRegistry> {
      const raw = await readJson(paths.sessions);
      if (raw === null) {
        return createEmptySessionRegistry(basename(dirname(paths.dataDir)));
      }
      return parseSessionRegistry(raw, paths.sessions);
    },

    async saveSessions(data: SessionRegistry): Promise<AtomicWriteResult> {
      return writeDocument('sessions', data);
    },

    async lockSessions(): Promise<LockHandle> {
      return lockDocument(paths.sessions);
    },

    async readDiskChecksum(document: DocumentName): Promise<string | null> {
      const raw = await readJson(document === 'tasks' ? paths.tasks : paths.sessions);
      if (raw === null) return null;
      const parsed = metaChecksumSchema.safeParse(raw);
      return parsed.success ? parsed.data._meta.checksum : null;
    },

    async restoreDocument(document, backupPath, options = {}): Promise<AtomicWriteResult> {
      const filePath = document === 'tasks' ? paths.tasks : paths.sessions;
      let content: string;
      try {
        content = await readFile(backupPath, 'utf8');
      } catch (err) {
        throw new TasklaneError(ExitCode.FILE_ERROR, `Cannot read backup: ${backupPath}`, { cause: err });
      }
      const result = options.keepCurrent
        ? await atomicWrite(filePath, content, {
            validate: jsonContentValidator(
              document === 'tasks' ? taskStoreValidator : sessionRegistryValidator,
            ),
            backupDir: paths.backups,
            maxBackups: config.backup.maxBackups,
          })
        : await atomicWrite(filePath, content);
      log.warn({ document, backupPath }, 'Document restored from backup');
      return result;
    },

    async appendAudit(event): Promise<void> {
      try {
        await appendJsonl(paths.audit, event);
      } catch (err) {
        log.error({ err, action: event.action }, 'Failed to append audit event');
      }
    },
  };

  return accessor;
}
