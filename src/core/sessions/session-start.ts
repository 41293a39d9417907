/**
 * Start a session: claim a scope and a focus task in one locked commit.
 */

import type {
  ScopeDeclaration,
  Session,
  SessionRegistry,
  SessionScope,
} from '../../types/session.js';
import type { TaskStore } from '../../types/task.js';
import { getAccessor, type DataAccessor } from '../../store/data-accessor.js';
import { createAuditEvent } from '../system/audit-log.js';
import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getLogger } from '../logger.js';
import { requireTask } from '../../store/task-store.js';
import { describeScope, resolveScope } from './scope.js';
import { detectScopeConflict, evaluateConflictPolicy } from './conflict.js';
import { selectAutoFocus } from './auto-focus.js';
import { generateSessionId } from './session-id.js';
import { liveFocusIds, runLifecycle, setTaskStatus } from './lifecycle.js';

export interface StartSessionOptions {
  scope: ScopeDeclaration;
  /** Focus task id. Inferred from pending in-scope tasks when omitted. */
  focus?: string;
  name?: string;
  agentId?: string;
}

export interface StartSessionResult {
  session: Session;
  /** Policy warnings for permitted nested or overlapping scopes. */
  warnings: string[];
  /** Stale active tasks in the new scope that were reset to pending. */
  demotedTaskIds: string[];
}

function freezeScope(decl: ScopeDeclaration, computedTaskIds: string[], now: string): SessionScope {
  return { ...decl, computedTaskIds, computedAt: now };
}

/**
 * Choose the stale active tasks to demote so the scope ends up with at
 * most maxActiveTasksPerScope active tasks. The new focus and tasks that
 * are any live session's focus are never demoted but do count.
 */
function selectStaleTasks(
  tasks: TaskStore,
  registry: SessionRegistry,
  scopeIds: readonly string[],
  focusId: string,
): string[] {
  const claimed = liveFocusIds(registry);
  const statusOf = new Map(tasks.tasks.map((t) => [t.id, t.status]));
  const active = scopeIds.filter((id) => statusOf.get(id) === 'active');

  const kept = active.filter((id) => claimed.has(id) && id !== focusId).length + 1;
  const stale = active.filter((id) => !claimed.has(id) && id !== focusId);
  const room = Math.max(0, registry.config.maxActiveTasksPerScope - kept);
  return stale.slice(room);
}

/**
 * Start a new session.
 *
 * Checks, in order: duplicate name, live-session cap, scope resolution,
 * focus in scope (or inferred), conflict policy. Any failure leaves both
 * documents untouched.
 */
export async function startSession(
  options: StartSessionOptions,
  cwd?: string,
  accessor?: DataAccessor,
): Promise<StartSessionResult> {
  const acc = await getAccessor(cwd, accessor);
  const log = getLogger('sessions');

  const result = await runLifecycle(acc, 'session start', ({ sessions, tasks, now }) => {
    const name = options.name ?? null;
    if (name !== null && sessions.sessions.some((s) => s.name === name)) {
      throw new TasklaneError(ExitCode.SESSION_EXISTS, `A live session named '${name}' already exists`, {
        fix: 'Choose another name or end the existing session',
      });
    }

    const max = sessions.config.maxConcurrentSessions;
    if (sessions.sessions.length >= max) {
      throw new TasklaneError(
        ExitCode.MAX_SESSIONS_REACHED,
        `Maximum concurrent sessions reached (${max})`,
        { fix: "End a session with 'tasklane session end <id>'" },
      );
    }

    const scopeIds = resolveScope(tasks.tasks, options.scope);

    let focusId: string;
    if (options.focus !== undefined) {
      if (!scopeIds.includes(options.focus)) {
        throw new TasklaneError(
          ExitCode.TASK_NOT_IN_SCOPE,
          `Focus task ${options.focus} is not in scope ${describeScope(options.scope)}`,
          { details: { scope: scopeIds } },
        );
      }
      focusId = options.focus;
    } else {
      const claimed = new Set(
        sessions.sessions
          .filter((s) => s.status === 'active')
          .flatMap((s) => (s.focus.currentTask === null ? [] : [s.focus.currentTask])),
      );
      focusId = selectAutoFocus(tasks.tasks, scopeIds, claimed);
    }

    const focusTask = requireTask(tasks, focusId);
    if (focusTask.status === 'done') {
      throw new TasklaneError(ExitCode.INVALID_INPUT, `Focus task ${focusId} is already done`);
    }

    const verdict = detectScopeConflict(sessions.sessions, scopeIds, focusId);
    const decision = evaluateConflictPolicy(verdict, sessions.config);
    if (decision.action === 'block') {
      throw new TasklaneError(decision.code, decision.message, {
        fix: 'Choose a different scope or focus task',
        details: { conflict: verdict },
      });
    }
    const warnings = decision.action === 'warn' ? [decision.message] : [];

    const id = generateSessionId(new Date(now));
    if (
      sessions.sessions.some((s) => s.id === id) ||
      sessions.sessionHistory.some((h) => h.id === id)
    ) {
      throw new TasklaneError(ExitCode.ID_COLLISION, `Generated session id ${id} already exists`);
    }

    const demotedTaskIds = selectStaleTasks(tasks, sessions, scopeIds, focusId);
    for (const taskId of demotedTaskIds) {
      const stale = tasks.tasks.find((t) => t.id === taskId);
      if (stale) setTaskStatus(stale, 'pending', now);
    }
    setTaskStatus(focusTask, 'active', now);

    const session: Session = {
      id,
      status: 'active',
      name,
      agentId: options.agentId ?? null,
      scope: freezeScope(options.scope, scopeIds, now),
      focus: {
        currentTask: focusId,
        previousTask: null,
        focusHistory: [{ taskId: focusId, timestamp: now, action: 'focused' }],
        sessionNote: null,
      },
      stats: { tasksCompleted: 0, focusChanges: 1, suspendCount: 0, resumeCount: 0 },
      startedAt: now,
      lastActivity: now,
      suspendedAt: null,
    };

    sessions.sessions.push(session);
    sessions._meta.totalSessionsCreated += 1;
    tasks._meta.activeSessionCount += 1;
    tasks._meta.multiSessionEnabled = true;

    return {
      result: { session, warnings, demotedTaskIds },
      changed: ['sessions', 'tasks'],
      audit: [
        createAuditEvent('session_start', {
          sessionId: id,
          taskId: focusId,
          details: { scope: describeScope(options.scope), computedTaskIds: scopeIds, warnings, demotedTaskIds },
        }, now),
      ],
    };
  });

  for (const warning of result.warnings) {
    log.warn({ sessionId: result.session.id }, warning);
  }
  log.info(
    { sessionId: result.session.id, focus: result.session.focus.currentTask },
    'Session started',
  );
  return result;
}
