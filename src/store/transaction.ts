/**
 * Locked read-modify-write over one or both documents.
 *
 * Lock order is always Session Registry, then Task Store; locks are
 * released in reverse order on every path. Both bodies are validated
 * before either write starts, so a rejected mutation leaves both files
 * untouched.
 */

import type { TaskStore } from '../types/task.js';
import type { SessionRegistry } from '../types/session.js';
import type { AuditEvent } from '../core/system/audit-log.js';
import type { DataAccessor } from './data-accessor.js';
import type { AtomicWriteResult } from './atomic.js';
import { TasklaneError, type DocumentName } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { getLogger } from '../core/logger.js';
import {
  sessionRegistryValidator,
  taskStoreValidator,
} from '../core/validation/document-validator.js';
import { releaseLock } from './lock.js';
import { stampTaskStore } from './task-store.js';
import { stampSessionRegistry } from './session-store.js';

/** Both documents as loaded under lock, plus the operation's clock. */
export interface SessionSnapshot {
  sessions: SessionRegistry;
  tasks: TaskStore;
  now: string;
}

export interface TaskSnapshot {
  tasks: TaskStore;
  now: string;
}

/** What a transaction body hands back: its result and what it touched. */
export interface TransactionOutcome<T, D extends DocumentName = DocumentName> {
  result: T;
  /** Documents the body mutated. Unlisted documents are not written. */
  changed: readonly D[];
  /** Events appended to the audit log after a successful commit. */
  audit?: readonly AuditEvent[];
}

type Documents = { sessions?: SessionRegistry; tasks?: TaskStore };

const WRITE_ORDER: readonly DocumentName[] = ['sessions', 'tasks'];

function toTasklaneError(err: unknown, message: string): TasklaneError {
  return err instanceof TasklaneError
    ? err
    : new TasklaneError(ExitCode.FILE_ERROR, message, { cause: err });
}

function validateDocument(document: DocumentName, docs: Documents): string[] {
  const body = document === 'tasks' ? docs.tasks : docs.sessions;
  const validator = document === 'tasks' ? taskStoreValidator : sessionRegistryValidator;
  return validator.validate(body).errors;
}

async function writeDocument(
  accessor: DataAccessor,
  document: DocumentName,
  docs: Documents,
): Promise<AtomicWriteResult> {
  if (document === 'sessions' && docs.sessions) return accessor.saveSessions(docs.sessions);
  if (document === 'tasks' && docs.tasks) return accessor.saveTaskStore(docs.tasks);
  throw new TasklaneError(ExitCode.GENERAL_ERROR, `Document not loaded in this transaction: ${document}`);
}

/**
 * Put back documents already written in this commit.
 * Returns the documents that stay durably changed.
 */
async function rollback(
  accessor: DataAccessor,
  written: ReadonlyArray<{ document: DocumentName; backupPath: string | null }>,
): Promise<DocumentName[]> {
  const log = getLogger('transaction');
  const durable: DocumentName[] = [];
  for (const { document, backupPath } of [...written].reverse()) {
    if (backupPath === null) {
      log.error({ document }, 'No backup to roll back to; document stays written');
      durable.push(document);
      continue;
    }
    try {
      await accessor.restoreDocument(document, backupPath);
    } catch (err) {
      log.error({ err, document, backupPath }, 'Rollback failed; document stays written');
      durable.push(document);
    }
  }
  return durable;
}

/**
 * Validate, re-check disk checksums, then write the changed documents in
 * lock order. A failed second write rolls back the first.
 */
async function commit(
  accessor: DataAccessor,
  docs: Documents,
  changed: readonly DocumentName[],
  baseline: ReadonlyMap<DocumentName, string | null>,
  now: string,
): Promise<void> {
  const toWrite = WRITE_ORDER.filter((d) => changed.some((c) => c === d));

  if (docs.sessions && toWrite.includes('sessions')) stampSessionRegistry(docs.sessions, now);
  if (docs.tasks && toWrite.includes('tasks')) stampTaskStore(docs.tasks, now);

  for (const document of toWrite) {
    const errors = validateDocument(document, docs);
    if (errors.length > 0) {
      throw new TasklaneError(
        ExitCode.VALIDATION_ERROR,
        `Validation failed for ${document}: ${errors.join('; ')}`,
        { details: { document, errors, documentsWritten: [], phase: 'validate' } },
      );
    }
  }

  for (const document of toWrite) {
    const onDisk = await accessor.readDiskChecksum(document);
    if (onDisk !== baseline.get(document)) {
      throw new TasklaneError(
        ExitCode.CHECKSUM_MISMATCH,
        `${document} changed on disk while locked`,
        {
          fix: 'Retry the operation',
          details: { document, documentsWritten: [], phase: 'validate' },
        },
      );
    }
  }

  const written: Array<{ document: DocumentName; backupPath: string | null }> = [];
  for (const document of toWrite) {
    try {
      const result = await writeDocument(accessor, document, docs);
      written.push({ document, backupPath: result.backupPath });
    } catch (err) {
      const durable = await rollback(accessor, written);
      throw toTasklaneError(err, `Failed to write ${document}`).withDetails({
        documentsWritten: durable,
        phase: 'write',
      });
    }
  }
}

async function flushAudit(accessor: DataAccessor, events?: readonly AuditEvent[]): Promise<void> {
  for (const event of events ?? []) {
    await accessor.appendAudit(event);
  }
}

/**
 * Run a mutation over both documents under both locks.
 * The body must only mutate the snapshot it receives; it may throw a
 * TasklaneError to abort with no document touched.
 */
export async function runSessionTransaction<T>(
  accessor: DataAccessor,
  body: (snapshot: SessionSnapshot) => TransactionOutcome<T> | Promise<TransactionOutcome<T>>,
): Promise<T> {
  const sessionsLock = await accessor.lockSessions();
  try {
    const tasksLock = await accessor.lockTaskStore();
    try {
      const snapshot: SessionSnapshot = {
        sessions: await accessor.loadSessions(),
        tasks: await accessor.loadTaskStore(),
        now: new Date().toISOString(),
      };
      const baseline = new Map<DocumentName, string | null>([
        ['sessions', await accessor.readDiskChecksum('sessions')],
        ['tasks', await accessor.readDiskChecksum('tasks')],
      ]);

      const outcome = await body(snapshot);
      await commit(
        accessor,
        { sessions: snapshot.sessions, tasks: snapshot.tasks },
        outcome.changed,
        baseline,
        snapshot.now,
      );
      await flushAudit(accessor, outcome.audit);
      return outcome.result;
    } finally {
      await releaseLock(tasksLock);
    }
  } finally {
    await releaseLock(sessionsLock);
  }
}

/**
 * Run a mutation over the Task Store alone under its lock.
 */
export async function runTaskStoreTransaction<T>(
  accessor: DataAccessor,
  body: (
    snapshot: TaskSnapshot,
  ) => TransactionOutcome<T, 'tasks'> | Promise<TransactionOutcome<T, 'tasks'>>,
): Promise<T> {
  const tasksLock = await accessor.lockTaskStore();
  try {
    const snapshot: TaskSnapshot = {
      tasks: await accessor.loadTaskStore(),
      now: new Date().toISOString(),
    };
    const baseline = new Map<DocumentName, string | null>([
      ['tasks', await accessor.readDiskChecksum('tasks')],
    ]);

    const outcome = await body(snapshot);
    await commit(accessor, { tasks: snapshot.tasks }, outcome.changed, baseline, snapshot.now);
    await flushAudit(accessor, outcome.audit);
    return outcome.result;
  } finally {
    await releaseLock(tasksLock);
  }
}
