/**
 * Helpers shared by the session lifecycle operations.
 */

import type { Task, TaskStore } from '../../types/task.js';
import type { Session, SessionRegistry } from '../../types/session.js';
import type { SessionStatus, TaskStatus } from '../../store/status-registry.js';
import type { DataAccessor } from '../../store/data-accessor.js';
import {
  runSessionTransaction,
  type SessionSnapshot,
  type TransactionOutcome,
} from '../../store/transaction.js';
import { withRetry } from '../retry.js';
import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

/**
 * Run a two-document transaction, retrying recoverable failures under the
 * accessor's retry policy.
 */
export async function runLifecycle<T>(
  accessor: DataAccessor,
  operation: string,
  body: (snapshot: SessionSnapshot) => TransactionOutcome<T>,
): Promise<T> {
  return withRetry(
    () => runSessionTransaction(accessor, body),
    accessor.config.retry,
    operation,
  );
}

/** Fail with SESSION_WRONG_STATE unless the session is in the expected state. */
export function assertSessionStatus(
  session: Session,
  expected: SessionStatus,
  operation: string,
): void {
  if (session.status !== expected) {
    throw new TasklaneError(
      ExitCode.SESSION_WRONG_STATE,
      `Cannot ${operation} session ${session.id}: it is ${session.status}, not ${expected}`,
    );
  }
}

/** Set a task's status and stamp updatedAt. Returns false if unchanged. */
export function setTaskStatus(task: Task, status: TaskStatus, now: string): boolean {
  if (task.status === status) return false;
  task.status = status;
  task.updatedAt = now;
  return true;
}

/** Look up a task in a store without failing. */
export function findTask(store: TaskStore, taskId: string): Task | undefined {
  return store.tasks.find((t) => t.id === taskId);
}

/** Current focus task of every live session (active or suspended). */
export function liveFocusIds(registry: SessionRegistry, excludeSessionId?: string): Set<string> {
  const ids = new Set<string>();
  for (const s of registry.sessions) {
    if (s.id !== excludeSessionId && s.focus.currentTask !== null) {
      ids.add(s.focus.currentTask);
    }
  }
  return ids;
}

/** The active session, other than the given one, focused on taskId. */
export function findFocusOwner(
  registry: SessionRegistry,
  taskId: string,
  excludeSessionId?: string,
): Session | undefined {
  return registry.sessions.find(
    (s) => s.status === 'active' && s.id !== excludeSessionId && s.focus.currentTask === taskId,
  );
}
