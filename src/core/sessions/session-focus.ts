/**
 * Move an active session's focus to another task in its scope.
 */

import type { Session } from '../../types/session.js';
import { getAccessor, type DataAccessor } from '../../store/data-accessor.js';
import { requireSession } from '../../store/session-store.js';
import { requireTask } from '../../store/task-store.js';
import { createAuditEvent } from '../system/audit-log.js';
import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getLogger } from '../logger.js';
import {
  assertSessionStatus,
  findFocusOwner,
  findTask,
  liveFocusIds,
  runLifecycle,
  setTaskStatus,
} from './lifecycle.js';

/**
 * Set the focus of an active session.
 *
 * The task must be in the session's frozen scope and not another active
 * session's focus. The previous focus reverts to pending if still active
 * and no other live session holds it.
 * Re-focusing the current task is a no-op (NO_CHANGE).
 */
export async function setSessionFocus(
  sessionId: string,
  taskId: string,
  cwd?: string,
  accessor?: DataAccessor,
): Promise<Session> {
  const acc = await getAccessor(cwd, accessor);

  const session = await runLifecycle(acc, 'session focus', ({ sessions, tasks, now }) => {
    const target = requireSession(sessions, sessionId);
    assertSessionStatus(target, 'active', 'change focus of');

    if (!target.scope.computedTaskIds.includes(taskId)) {
      throw new TasklaneError(
        ExitCode.TASK_NOT_IN_SCOPE,
        `Task ${taskId} is not in the scope of session ${sessionId}`,
      );
    }
    if (target.focus.currentTask === taskId) {
      throw new TasklaneError(ExitCode.NO_CHANGE, `Task ${taskId} is already the focus`);
    }

    const owner = findFocusOwner(sessions, taskId, sessionId);
    if (owner) {
      throw new TasklaneError(
        ExitCode.TASK_CLAIMED,
        `Task ${taskId} is already the focus of session ${owner.id}`,
      );
    }

    const task = requireTask(tasks, taskId);
    if (task.status === 'done') {
      throw new TasklaneError(ExitCode.INVALID_INPUT, `Task ${taskId} is already done`);
    }

    const previous = target.focus.currentTask;
    if (previous !== null && !liveFocusIds(sessions, sessionId).has(previous)) {
      const prevTask = findTask(tasks, previous);
      if (prevTask && prevTask.status === 'active') {
        setTaskStatus(prevTask, 'pending', now);
      }
    }
    setTaskStatus(task, 'active', now);

    target.focus.previousTask = previous;
    target.focus.currentTask = taskId;
    target.focus.focusHistory.push({ taskId, timestamp: now, action: 'focused' });
    target.stats.focusChanges += 1;
    target.lastActivity = now;

    return {
      result: target,
      changed: ['sessions', 'tasks'],
      audit: [
        createAuditEvent('session_focus', {
          sessionId,
          taskId,
          details: { previousTask: previous },
        }, now),
      ],
    };
  });

  getLogger('sessions').info({ sessionId, taskId }, 'Session focus changed');
  return session;
}
