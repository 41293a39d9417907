/**
 * Suspend an active session.
 *
 * Only the Session Registry changes: the focus task keeps its status
 * while the session is suspended.
 */

import type { Session } from '../../types/session.js';
import { getAccessor, type DataAccessor } from '../../store/data-accessor.js';
import { requireSession } from '../../store/session-store.js';
import { createAuditEvent } from '../system/audit-log.js';
import { getLogger } from '../logger.js';
import { assertSessionStatus, runLifecycle } from './lifecycle.js';

/**
 * Suspend an active session, optionally recording a note.
 * Throws SESSION_NOT_FOUND or SESSION_WRONG_STATE.
 */
export async function suspendSession(
  sessionId: string,
  note?: string,
  cwd?: string,
  accessor?: DataAccessor,
): Promise<Session> {
  const acc = await getAccessor(cwd, accessor);

  const session = await runLifecycle(acc, 'session suspend', ({ sessions, now }) => {
    const target = requireSession(sessions, sessionId);
    assertSessionStatus(target, 'active', 'suspend');

    target.status = 'suspended';
    target.suspendedAt = now;
    target.lastActivity = now;
    target.stats.suspendCount += 1;
    if (note) {
      target.focus.sessionNote = note;
    }

    return {
      result: target,
      changed: ['sessions'],
      audit: [
        createAuditEvent('session_suspend', {
          sessionId,
          ...(target.focus.currentTask !== null && { taskId: target.focus.currentTask }),
          details: { note: note ?? null },
        }, now),
      ],
    };
  });

  getLogger('sessions').info({ sessionId }, 'Session suspended');
  return session;
}
