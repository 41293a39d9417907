/**
 * Task completion logic.
 */

import type { Task } from '../../types/task.js';
import { getAccessor, type DataAccessor } from '../../store/data-accessor.js';
import { requireTask } from '../../store/task-store.js';
import { createAuditEvent } from '../system/audit-log.js';
import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getLogger } from '../logger.js';
import { runLifecycle } from '../sessions/lifecycle.js';

export interface CompleteTaskResult {
  task: Task;
  /** Session whose focus this task was, now without a focus. */
  releasedFromSession: string | null;
}

/**
 * Mark a task done.
 *
 * If the task is a live session's focus, that session's currentTask is
 * cleared, previousTask records it and tasksCompleted increments; both
 * documents commit together.
 */
export async function completeTask(
  taskId: string,
  cwd?: string,
  accessor?: DataAccessor,
): Promise<CompleteTaskResult> {
  const acc = await getAccessor(cwd, accessor);

  const result = await runLifecycle(acc, 'task complete', ({ sessions, tasks, now }) => {
    const task = requireTask(tasks, taskId);
    if (task.status === 'done') {
      throw new TasklaneError(ExitCode.NO_CHANGE, `Task ${taskId} is already done`);
    }

    task.status = 'done';
    task.completedAt = now;
    task.updatedAt = now;

    const owner = sessions.sessions.find((s) => s.focus.currentTask === taskId);
    if (owner) {
      owner.focus.previousTask = taskId;
      owner.focus.currentTask = null;
      owner.focus.focusHistory.push({ taskId, timestamp: now, action: 'completed' });
      owner.stats.tasksCompleted += 1;
      owner.lastActivity = now;
    }

    return {
      result: { task, releasedFromSession: owner ? owner.id : null },
      changed: owner ? ['sessions', 'tasks'] : ['tasks'],
      audit: [
        createAuditEvent('task_completed', {
          taskId,
          ...(owner && { sessionId: owner.id }),
          details: {},
        }, now),
      ],
    };
  });

  getLogger('tasks').info({ taskId, sessionId: result.releasedFromSession }, 'Task completed');
  return result;
}
