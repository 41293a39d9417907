/**
 * End a live session and move it into history.
 */

import type { Session, SessionHistoryEntry } from '../../types/session.js';
import { getAccessor, type DataAccessor } from '../../store/data-accessor.js';
import { requireSession } from '../../store/session-store.js';
import { createAuditEvent } from '../system/audit-log.js';
import { getLogger } from '../logger.js';
import { findTask, liveFocusIds, runLifecycle, setTaskStatus } from './lifecycle.js';

export interface EndSessionResult {
  history: SessionHistoryEntry;
  /** Focus task reverted to pending, if still active and no other live session holds it. */
  revertedTaskId: string | null;
}

function toHistoryEntry(session: Session, endedAt: string, note: string | null): SessionHistoryEntry {
  const scope = session.scope;
  return {
    id: session.id,
    name: session.name,
    agentId: session.agentId,
    scopeType: scope.type,
    rootTaskId: scope.type === 'custom' ? null : scope.rootTaskId,
    computedTaskIds: [...scope.computedTaskIds],
    lastFocus: session.focus.currentTask,
    startedAt: session.startedAt,
    endedAt,
    stats: { ...session.stats },
    endNote: note,
  };
}

/**
 * End a session from active or suspended.
 * Ending a session that is not live fails with SESSION_NOT_FOUND.
 */
export async function endSession(
  sessionId: string,
  note?: string,
  cwd?: string,
  accessor?: DataAccessor,
): Promise<EndSessionResult> {
  const acc = await getAccessor(cwd, accessor);

  const result = await runLifecycle(acc, 'session end', ({ sessions, tasks, now }) => {
    const target = requireSession(sessions, sessionId);

    let revertedTaskId: string | null = null;
    const focusId = target.focus.currentTask;
    if (focusId !== null && !liveFocusIds(sessions, sessionId).has(focusId)) {
      const task = findTask(tasks, focusId);
      if (task && task.status === 'active') {
        setTaskStatus(task, 'pending', now);
        revertedTaskId = focusId;
      }
    }

    const history = toHistoryEntry(target, now, note ?? null);
    sessions.sessions = sessions.sessions.filter((s) => s.id !== sessionId);
    sessions.sessionHistory.push(history);
    tasks._meta.activeSessionCount = Math.max(0, tasks._meta.activeSessionCount - 1);

    return {
      result: { history, revertedTaskId },
      changed: ['sessions', 'tasks'],
      audit: [
        createAuditEvent('session_end', {
          sessionId,
          ...(focusId !== null && { taskId: focusId }),
          details: { note: note ?? null, revertedTaskId, stats: history.stats },
        }, now),
      ],
    };
  });

  getLogger('sessions').info({ sessionId, revertedTaskId: result.revertedTaskId }, 'Session ended');
  return result;
}
