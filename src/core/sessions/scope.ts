/**
 * Scope resolution: scope declaration + Task Store snapshot -> ordered id set.
 *
 * Pure and deterministic for a fixed snapshot. The resolved set is computed
 * once at session start and cached on the session; nothing re-resolves it.
 */

import type { Task } from '../../types/task.js';
import type { ScopeDeclaration } from '../../types/session.js';
import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { buildChildIndex, collectDescendantIds } from '../tasks/hierarchy.js';

/** Descendant walk bound when a declaration gives none. */
export const DEFAULT_SCOPE_MAX_DEPTH = 10;

function scopeInvalid(message: string): TasklaneError {
  return new TasklaneError(ExitCode.SCOPE_INVALID, message, {
    fix: "Check the scope's root task id with 'tasklane show'",
  });
}

function requireRoot(rootTaskId: string, ids: ReadonlySet<string>): void {
  if (!ids.has(rootTaskId)) {
    throw scopeInvalid(`Scope root task not found: ${rootTaskId}`);
  }
}

/** Human-readable label for a declaration, used in logs and messages. */
export function describeScope(decl: ScopeDeclaration): string {
  switch (decl.type) {
    case 'custom':
      return `custom[${decl.taskIds.join(',')}]`;
    case 'epicPhase':
      return `epicPhase:${decl.rootTaskId}/${decl.phaseFilter}`;
    default:
      return `${decl.type}:${decl.rootTaskId}`;
  }
}

/**
 * Resolve a scope declaration against a task list.
 *
 * - task: the root alone
 * - taskGroup: the root and its direct children
 * - subtree / epic: the root and its descendants down to maxDepth
 * - epicPhase: the subtree set filtered to phase == phaseFilter
 * - custom: the supplied ids, de-duplicated in order
 *
 * excludeTaskIds is subtracted last. An empty result is SCOPE_INVALID.
 */
export function resolveScope(tasks: readonly Task[], decl: ScopeDeclaration): string[] {
  const ids = new Set(tasks.map((t) => t.id));
  let resolved: string[];

  switch (decl.type) {
    case 'task':
      requireRoot(decl.rootTaskId, ids);
      resolved = [decl.rootTaskId];
      break;

    case 'taskGroup': {
      requireRoot(decl.rootTaskId, ids);
      const index = buildChildIndex(tasks);
      resolved = [decl.rootTaskId, ...collectDescendantIds(decl.rootTaskId, index, 1)];
      break;
    }

    case 'subtree':
    case 'epic': {
      requireRoot(decl.rootTaskId, ids);
      const index = buildChildIndex(tasks);
      const depth = decl.maxDepth ?? DEFAULT_SCOPE_MAX_DEPTH;
      resolved = [decl.rootTaskId, ...collectDescendantIds(decl.rootTaskId, index, depth)];
      break;
    }

    case 'epicPhase': {
      requireRoot(decl.rootTaskId, ids);
      const index = buildChildIndex(tasks);
      const depth = decl.maxDepth ?? DEFAULT_SCOPE_MAX_DEPTH;
      const phaseOf = new Map(tasks.map((t) => [t.id, t.phase]));
      resolved = [decl.rootTaskId, ...collectDescendantIds(decl.rootTaskId, index, depth)]
        .filter((id) => phaseOf.get(id) === decl.phaseFilter);
      break;
    }

    case 'custom': {
      const missing = decl.taskIds.filter((id) => !ids.has(id));
      if (missing.length > 0) {
        throw scopeInvalid(`Custom scope references unknown tasks: ${missing.join(', ')}`);
      }
      resolved = [...new Set(decl.taskIds)];
      break;
    }
  }

  const excluded = new Set(decl.excludeTaskIds ?? []);
  const result = resolved.filter((id) => !excluded.has(id));
  if (result.length === 0) {
    throw scopeInvalid(`Scope ${describeScope(decl)} resolves to no tasks`);
  }
  return result;
}
