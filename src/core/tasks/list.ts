/**
 * Task listing with filters.
 */

import type { Task, TaskPriority, TaskStatus } from '../../types/task.js';
import { getAccessor, type DataAccessor } from '../../store/data-accessor.js';

/** Filter options for listing tasks. */
export interface ListTasksOptions {
  status?: TaskStatus;
  priority?: TaskPriority;
  /** Direct children of this task. `null` selects root tasks. */
  parentId?: string | null;
  phase?: string;
  limit?: number;
  offset?: number;
}

/** Result of listing tasks. */
export interface ListTasksResult {
  tasks: Task[];
  total: number;
  filtered: number;
}

/** Apply filters and pagination to a task list. Order is Task Store order. */
export function filterTasks(all: readonly Task[], options: ListTasksOptions = {}): ListTasksResult {
  let tasks = all.filter((t) => {
    if (options.status && t.status !== options.status) return false;
    if (options.priority && t.priority !== options.priority) return false;
    if (options.parentId !== undefined && t.parentId !== options.parentId) return false;
    if (options.phase !== undefined && t.phase !== options.phase) return false;
    return true;
  });
  const filtered = tasks.length;

  const offset = options.offset ?? 0;
  if (offset > 0 || options.limit !== undefined) {
    tasks = tasks.slice(offset, options.limit !== undefined ? offset + options.limit : undefined);
  }

  return { tasks, total: all.length, filtered };
}

/**
 * List tasks with optional filtering and pagination.
 */
export async function listTasks(
  options: ListTasksOptions = {},
  cwd?: string,
  accessor?: DataAccessor,
): Promise<ListTasksResult> {
  const acc = await getAccessor(cwd, accessor);
  const store = await acc.loadTaskStore();
  return filterTasks(store.tasks, options);
}
