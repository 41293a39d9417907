/**
 * Show a single task with its hierarchy context.
 */

import type { Task } from '../../types/task.js';
import { getAccessor, type DataAccessor } from '../../store/data-accessor.js';
import { requireTask } from '../../store/task-store.js';
import { getChildren, getParentChain } from './hierarchy.js';

export interface TaskDetail {
  task: Task;
  /** Ancestor ids from immediate parent to root. */
  ancestors: string[];
  children: string[];
  /** Live session whose current focus is this task, if any. */
  focusedBy: string | null;
}

/** Get a task by id. Throws NOT_FOUND. */
export async function showTask(
  taskId: string,
  cwd?: string,
  accessor?: DataAccessor,
): Promise<TaskDetail> {
  const acc = await getAccessor(cwd, accessor);
  const store = await acc.loadTaskStore();
  const registry = await acc.loadSessions();
  const task = requireTask(store, taskId);
  const owner = registry.sessions.find((s) => s.focus.currentTask === taskId);

  return {
    task,
    ancestors: getParentChain(taskId, store.tasks).map((t) => t.id),
    children: getChildren(taskId, store.tasks).map((t) => t.id),
    focusedBy: owner ? owner.id : null,
  };
}
