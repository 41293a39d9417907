/**
 * Resume a suspended session.
 */

import type { Session } from '../../types/session.js';
import { getAccessor, type DataAccessor } from '../../store/data-accessor.js';
import { requireSession } from '../../store/session-store.js';
import { createAuditEvent } from '../system/audit-log.js';
import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getLogger } from '../logger.js';
import { assertSessionStatus, findFocusOwner, findTask, runLifecycle, setTaskStatus } from './lifecycle.js';

/**
 * Resume a suspended session and restore its focus task to active.
 *
 * If another active session took the same focus task while this one was
 * suspended, resume fails with TASK_CLAIMED and nothing changes.
 */
export async function resumeSession(
  sessionId: string,
  cwd?: string,
  accessor?: DataAccessor,
): Promise<Session> {
  const acc = await getAccessor(cwd, accessor);

  const session = await runLifecycle(acc, 'session resume', ({ sessions, tasks, now }) => {
    const target = requireSession(sessions, sessionId);
    assertSessionStatus(target, 'suspended', 'resume');

    const focusId = target.focus.currentTask;
    if (focusId !== null) {
      const owner = findFocusOwner(sessions, focusId, sessionId);
      if (owner) {
        throw new TasklaneError(
          ExitCode.TASK_CLAIMED,
          `Task ${focusId} is now the focus of session ${owner.id}`,
          {
            fix: "End this session, or wait until the other session moves its focus",
            details: { conflict: { kind: 'hard', sessionId: owner.id, taskId: focusId } },
          },
        );
      }
      const task = findTask(tasks, focusId);
      if (task && task.status !== 'done') {
        setTaskStatus(task, 'active', now);
      }
    }

    target.status = 'active';
    target.suspendedAt = null;
    target.lastActivity = now;
    target.stats.resumeCount += 1;

    return {
      result: target,
      changed: ['sessions', 'tasks'],
      audit: [
        createAuditEvent('session_resume', {
          sessionId,
          ...(focusId !== null && { taskId: focusId }),
        }, now),
      ],
    };
  });

  getLogger('sessions').info({ sessionId }, 'Session resumed');
  return session;
}
