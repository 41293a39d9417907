/**
 * Session management: lifecycle operations and read-only queries.
 */

import type { Session, SessionHistoryEntry, SessionStatus } from '../../types/session.js';
import { getAccessor, type DataAccessor } from '../../store/data-accessor.js';
import { requireSession } from '../../store/session-store.js';

export { startSession, type StartSessionOptions, type StartSessionResult } from './session-start.js';
export { suspendSession } from './session-suspend.js';
export { resumeSession } from './session-resume.js';
export { endSession, type EndSessionResult } from './session-end.js';
export { setSessionFocus } from './session-focus.js';
export { resolveScope, describeScope, DEFAULT_SCOPE_MAX_DEPTH } from './scope.js';
export {
  detectScopeConflict,
  evaluateConflictPolicy,
  type ConflictKind,
  type ConflictVerdict,
  type PolicyDecision,
} from './conflict.js';
export { selectAutoFocus, rankFocusCandidates } from './auto-focus.js';
export { generateSessionId, isValidSessionId, extractSessionTimestamp } from './session-id.js';

export interface ListSessionsOptions {
  status?: SessionStatus;
}

/**
 * List live sessions, optionally filtered by status. Reads without locking:
 * atomic replace means a reader always sees a whole document.
 */
export async function listSessions(
  options: ListSessionsOptions = {},
  cwd?: string,
  accessor?: DataAccessor,
): Promise<Session[]> {
  const acc = await getAccessor(cwd, accessor);
  const registry = await acc.loadSessions();
  return options.status
    ? registry.sessions.filter((s) => s.status === options.status)
    : registry.sessions;
}

/** Get one live session. Throws SESSION_NOT_FOUND. */
export async function getSession(
  sessionId: string,
  cwd?: string,
  accessor?: DataAccessor,
): Promise<Session> {
  const acc = await getAccessor(cwd, accessor);
  return requireSession(await acc.loadSessions(), sessionId);
}

/** Ended sessions, most recent first. */
export async function listSessionHistory(
  limit?: number,
  cwd?: string,
  accessor?: DataAccessor,
): Promise<SessionHistoryEntry[]> {
  const acc = await getAccessor(cwd, accessor);
  const history = [...(await acc.loadSessions()).sessionHistory].reverse();
  return limit !== undefined && limit > 0 ? history.slice(0, limit) : history;
}
