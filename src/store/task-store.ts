/**
 * Task Store document helpers: creation, parsing, stamping, id issue.
 */

import type { Task, TaskStore } from '../types/task.js';
import { TasklaneError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';
import { computeChecksum } from './json.js';
import { formatIssues, taskStoreSchema } from './validation-schemas.js';

export const TASK_STORE_SCHEMA_VERSION = '1.0.0';

/** Create an empty Task Store for a project. */
export function createEmptyTaskStore(project: string, now = new Date().toISOString()): TaskStore {
  return {
    version: TASK_STORE_SCHEMA_VERSION,
    project,
    _meta: {
      schemaVersion: TASK_STORE_SCHEMA_VERSION,
      checksum: computeChecksum([]),
      lastModified: now,
      activeSessionCount: 0,
      multiSessionEnabled: true,
      taskSequence: 0,
    },
    tasks: [],
  };
}

/** Checksum over the task collection. */
export function taskStoreChecksum(store: TaskStore): string {
  return computeChecksum(store.tasks);
}

/**
 * Parse a raw JSON body into a typed Task Store.
 * A stored checksum that disagrees with the content is logged, not fatal:
 * it means the file was edited outside tasklane.
 */
export function parseTaskStore(raw: unknown, source: string): TaskStore {
  const parsed = taskStoreSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TasklaneError(
      ExitCode.VALIDATION_ERROR,
      `Invalid Task Store: ${source}`,
      { details: { errors: formatIssues(parsed.error) } },
    );
  }
  const store = parsed.data;
  const actual = taskStoreChecksum(store);
  if (store._meta.checksum !== actual) {
    getLogger('store').warn(
      { source, stored: store._meta.checksum, actual },
      'Task Store checksum does not match content',
    );
  }
  return store;
}

/** Refresh checksum and lastModified before a write. */
export function stampTaskStore(store: TaskStore, now: string): TaskStore {
  store._meta.checksum = taskStoreChecksum(store);
  store._meta.lastModified = now;
  return store;
}

/** Format a task number as an id (`T001`, `T1234`). */
export function formatTaskId(n: number): string {
  return `T${String(n).padStart(3, '0')}`;
}

/** Highest task number present in the store. */
function maxTaskNumber(tasks: readonly Task[]): number {
  let max = 0;
  for (const task of tasks) {
    const n = parseInt(task.id.slice(1), 10);
    if (n > max) max = n;
  }
  return max;
}

/**
 * Issue the next task id and advance the sequence.
 * The sequence never moves backwards, so ids are never reused.
 */
export function issueTaskId(store: TaskStore): string {
  const next = Math.max(store._meta.taskSequence, maxTaskNumber(store.tasks)) + 1;
  const id = formatTaskId(next);
  if (store.tasks.some((t) => t.id === id)) {
    throw new TasklaneError(ExitCode.ID_COLLISION, `Generated task id ${id} already exists`);
  }
  store._meta.taskSequence = next;
  return id;
}

/** Find a task by id or fail with NOT_FOUND. */
export function requireTask(store: TaskStore, taskId: string): Task {
  const task = store.tasks.find((t) => t.id === taskId);
  if (!task) {
    throw new TasklaneError(ExitCode.NOT_FOUND, `Task not found: ${taskId}`, {
      fix: "Use 'tasklane list' to see available tasks",
    });
  }
  return task;
}
