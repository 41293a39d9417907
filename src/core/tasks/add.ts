/**
 * Task creation logic.
 */

import type { Task, TaskPriority, TaskStatus } from '../../types/task.js';
import { getAccessor, type DataAccessor } from '../../store/data-accessor.js';
import { runTaskStoreTransaction } from '../../store/transaction.js';
import { issueTaskId } from '../../store/task-store.js';
import { isTaskPriority, TASK_PRIORITIES } from '../../store/status-registry.js';
import { createAuditEvent } from '../system/audit-log.js';
import { withRetry } from '../retry.js';
import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getLogger } from '../logger.js';
import { createHierarchyPolicy } from './hierarchy-policy.js';

/** Statuses a task may be created in. Active is reserved for session focus. */
export const CREATABLE_STATUSES = ['pending', 'blocked'] as const satisfies readonly TaskStatus[];

/** Options for creating a task. */
export interface AddTaskOptions {
  title: string;
  description?: string;
  status?: TaskStatus;
  priority?: TaskPriority;
  parentId?: string | null;
  phase?: string | null;
}

/** Result of adding a task. */
export interface AddTaskResult {
  task: Task;
}

export const MAX_TITLE_LENGTH = 200;

/** Validate a task title. */
export function validateTitle(title: string): void {
  if (!title || title.trim().length === 0) {
    throw new TasklaneError(ExitCode.INVALID_INPUT, 'Task title is required');
  }
  if (title.length > MAX_TITLE_LENGTH) {
    throw new TasklaneError(
      ExitCode.VALIDATION_ERROR,
      `Task title must be ${MAX_TITLE_LENGTH} characters or less`,
    );
  }
}

/**
 * Mapping from numeric priority (1-9) to priority names.
 * 1-2 = critical, 3-4 = high, 5-6 = medium, 7-9 = low.
 */
const NUMERIC_PRIORITY_MAP: ReadonlyMap<number, TaskPriority> = new Map([
  [1, 'critical'],
  [2, 'critical'],
  [3, 'high'],
  [4, 'high'],
  [5, 'medium'],
  [6, 'medium'],
  [7, 'low'],
  [8, 'low'],
  [9, 'low'],
]);

/**
 * Normalize priority to its canonical name.
 * Accepts names in any case and numeric 1-9 (as number or string).
 */
export function normalizePriority(priority: string | number): TaskPriority {
  const numeric = typeof priority === 'number' ? priority : Number(priority.trim());
  const mapped = Number.isInteger(numeric) ? NUMERIC_PRIORITY_MAP.get(numeric) : undefined;
  if (mapped) return mapped;

  if (typeof priority === 'string') {
    const lower = priority.toLowerCase().trim();
    if (isTaskPriority(lower)) return lower;
  }

  throw new TasklaneError(
    ExitCode.VALIDATION_ERROR,
    `Invalid priority: ${priority} (must be ${TASK_PRIORITIES.join('|')} or numeric 1-9)`,
  );
}

function validateCreatableStatus(status: TaskStatus): void {
  if (!CREATABLE_STATUSES.some((s) => s === status)) {
    throw new TasklaneError(
      ExitCode.INVALID_INPUT,
      `Tasks cannot be created as ${status} (must be ${CREATABLE_STATUSES.join('|')})`,
      { fix: "Start a session on the task to make it active" },
    );
  }
}

/**
 * Add a new task under the hierarchy policy.
 * Throws PARENT_NOT_FOUND, DEPTH_EXCEEDED or SIBLING_LIMIT when placement fails.
 */
export async function addTask(
  options: AddTaskOptions,
  cwd?: string,
  accessor?: DataAccessor,
): Promise<AddTaskResult> {
  validateTitle(options.title);
  const status = options.status ?? 'pending';
  validateCreatableStatus(status);

  const acc = await getAccessor(cwd, accessor);
  const policy = createHierarchyPolicy(acc.config.hierarchy);
  const parentId = options.parentId ?? null;

  const task = await withRetry(
    () =>
      runTaskStoreTransaction(acc, ({ tasks, now }) => {
        const placement = policy.canAcceptChild(parentId, tasks.tasks);
        if (!placement.valid && placement.error) {
          throw new TasklaneError(placement.error.code, placement.error.message);
        }

        const created: Task = {
          id: issueTaskId(tasks),
          title: options.title.trim(),
          ...(options.description !== undefined && { description: options.description }),
          status,
          priority: options.priority ?? 'medium',
          parentId,
          phase: options.phase ?? null,
          createdAt: now,
          updatedAt: now,
          completedAt: null,
        };
        tasks.tasks.push(created);

        return {
          result: created,
          changed: ['tasks'],
          audit: [
            createAuditEvent('task_created', {
              taskId: created.id,
              details: { title: created.title, parentId, priority: created.priority },
            }, now),
          ],
        };
      }),
    acc.config.retry,
    'task add',
  );

  getLogger('tasks').info({ taskId: task.id, parentId }, 'Task created');
  return { task };
}
