/**
 * Focus inference when a session starts without an explicit focus.
 */

import type { Task } from '../../types/task.js';
import { PRIORITY_RANK } from '../../store/status-registry.js';
import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

/**
 * Rank pending in-scope tasks: highest priority first, then oldest.
 */
export function rankFocusCandidates(tasks: readonly Task[], scopeIds: readonly string[]): Task[] {
  const inScope = new Set(scopeIds);
  return tasks
    .filter((t) => inScope.has(t.id) && t.status === 'pending')
    .sort((a, b) => {
      const byPriority = PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority];
      if (byPriority !== 0) return byPriority;
      return a.createdAt.localeCompare(b.createdAt);
    });
}

/**
 * Pick the focus task for a new session, or fail with FOCUS_REQUIRED.
 *
 * With no pending candidate, an in-scope task that is already some active
 * session's focus is returned instead, so the caller's conflict check
 * reports the claim rather than a missing focus.
 */
export function selectAutoFocus(
  tasks: readonly Task[],
  scopeIds: readonly string[],
  claimedIds: ReadonlySet<string> = new Set(),
): string {
  const [best] = rankFocusCandidates(tasks, scopeIds);
  if (best) return best.id;

  const claimed = scopeIds.find((id) => claimedIds.has(id));
  if (claimed !== undefined) return claimed;

  throw new TasklaneError(
    ExitCode.FOCUS_REQUIRED,
    'Focus required and none could be inferred: no pending task in scope',
    { fix: 'Pass an explicit focus task with --focus' },
  );
}
