/**
 * DataAccessor: the storage abstraction lifecycle and task operations use.
 *
 * Core modules never call readJson/atomicWrite on the two documents
 * directly; they receive a DataAccessor and go through it, normally via
 * runSessionTransaction / runTaskStoreTransaction.
 */

import type { TaskStore } from '../types/task.js';
import type { SessionRegistry } from '../types/session.js';
import type { TasklaneConfig } from '../types/config.js';
import type { DocumentName } from '../core/errors.js';
import type { AuditEvent } from '../core/system/audit-log.js';
import type { AtomicWriteResult } from './atomic.js';
import type { LockHandle } from './lock.js';
import { loadConfig } from '../core/config.js';

/** Absolute locations of the files an accessor manages. */
export interface DocumentPaths {
  dataDir: string;
  tasks: string;
  sessions: string;
  backups: string;
  audit: string;
}

export interface DataAccessor {
  /** The storage engine backing this accessor. */
  readonly engine: 'json';
  readonly config: TasklaneConfig;
  readonly paths: DocumentPaths;

  // ---- Task Store ----

  /** Load and validate the Task Store. NOT_FOUND before init. */
  loadTaskStore(): Promise<TaskStore>;

  /** Write the Task Store as given (callers stamp _meta). Backs up first. */
  saveTaskStore(data: TaskStore): Promise<AtomicWriteResult>;

  /** Acquire the Task Store lock. */
  lockTaskStore(): Promise<LockHandle>;

  // ---- Session Registry ----

  /** Load the Session Registry; an empty registry if the file is missing. */
  loadSessions(): Promise<SessionRegistry>;

  /** Write the Session Registry as given (callers stamp _meta). Backs up first. */
  saveSessions(data: SessionRegistry): Promise<AtomicWriteResult>;

  /** Acquire the Session Registry lock. */
  lockSessions(): Promise<LockHandle>;

  // ---- Shared ----

  /** The `_meta.checksum` currently on disk, or null if the file is absent. */
  readDiskChecksum(document: DocumentName): Promise<string | null>;

  /**
   * Put a backup's bytes back in place. With `keepCurrent`, the content is
   * validated and the current file is backed up first; without it (a
   * rollback) the bytes are written as they are.
   */
  restoreDocument(
    document: DocumentName,
    backupPath: string,
    options?: { keepCurrent?: boolean },
  ): Promise<AtomicWriteResult>;

  /** Append an event to the audit log. Failures are logged, never thrown. */
  appendAudit(event: AuditEvent): Promise<void>;
}

/**
 * Create a DataAccessor for the given working directory.
 * Loads the project config unless one is supplied.
 */
export async function createDataAccessor(
  cwd?: string,
  config?: TasklaneConfig,
): Promise<DataAccessor> {
  const resolved = config ?? (await loadConfig(cwd));
  const { createJsonDataAccessor } = await import('./json-data-accessor.js');
  return createJsonDataAccessor(resolved, cwd);
}

/** Convenience: use the given accessor or create one for cwd. */
export async function getAccessor(cwd?: string, accessor?: DataAccessor): Promise<DataAccessor> {
  return accessor ?? createDataAccessor(cwd);
}
