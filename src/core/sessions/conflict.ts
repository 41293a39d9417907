/**
 * Scope conflict detection and policy.
 *
 * Detection is pure and classifies the first conflicting active session;
 * policy is a separate step that decides whether a verdict blocks.
 */

import type { Session, SessionPolicyConfig } from '../../types/session.js';
import { ExitCode } from '../../types/exit-codes.js';

export type ConflictVerdict =
  | { kind: 'none' }
  | { kind: 'hard'; sessionId: string; taskId: string }
  | { kind: 'identical'; sessionId: string; overlap: string[] }
  | { kind: 'nested'; sessionId: string; overlap: string[] }
  | { kind: 'partial'; sessionId: string; overlap: string[] };

export type ConflictKind = ConflictVerdict['kind'];

export type PolicyDecision =
  | { action: 'allow' }
  | { action: 'warn'; message: string }
  | {
      action: 'block';
      code: ExitCode.TASK_CLAIMED | ExitCode.SCOPE_CONFLICT;
      message: string;
    };

/**
 * Compare a candidate resolved set against every other active session.
 * A hard conflict (the candidate focus is some session's current focus)
 * outranks any overlap. Otherwise the first overlapping session decides:
 * identical, nested (one side contains the other), or partial.
 * Suspended sessions never conflict.
 */
export function detectScopeConflict(
  sessions: readonly Session[],
  candidateIds: readonly string[],
  candidateFocusId: string | null,
  excludeSessionId?: string,
): ConflictVerdict {
  const candidate = new Set(candidateIds);
  const others = sessions.filter((s) => s.status === 'active' && s.id !== excludeSessionId);

  if (candidateFocusId !== null) {
    const owner = others.find((s) => s.focus.currentTask === candidateFocusId);
    if (owner) {
      return { kind: 'hard', sessionId: owner.id, taskId: candidateFocusId };
    }
  }

  for (const other of others) {
    const otherIds = new Set(other.scope.computedTaskIds);
    const overlap = [...candidate].filter((id) => otherIds.has(id));
    if (overlap.length === 0) continue;

    if (overlap.length === candidate.size && overlap.length === otherIds.size) {
      return { kind: 'identical', sessionId: other.id, overlap };
    }
    if (overlap.length === candidate.size || overlap.length === otherIds.size) {
      return { kind: 'nested', sessionId: other.id, overlap };
    }
    return { kind: 'partial', sessionId: other.id, overlap };
  }

  return { kind: 'none' };
}

/**
 * Decide whether a verdict blocks under the registry's policy.
 * hard and identical always block; nested and partial follow the
 * allowNestedScopes / allowScopeOverlap flags and warn when permitted.
 */
export function evaluateConflictPolicy(
  verdict: ConflictVerdict,
  config: SessionPolicyConfig,
): PolicyDecision {
  switch (verdict.kind) {
    case 'none':
      return { action: 'allow' };
    case 'hard':
      return {
        action: 'block',
        code: ExitCode.TASK_CLAIMED,
        message: `Task ${verdict.taskId} is already the focus of session ${verdict.sessionId}`,
      };
    case 'identical':
      return {
        action: 'block',
        code: ExitCode.SCOPE_CONFLICT,
        message: `Scope is identical to session ${verdict.sessionId}`,
      };
    case 'nested': {
      const message = `Scope is nested with session ${verdict.sessionId} (${verdict.overlap.length} shared tasks)`;
      return config.allowNestedScopes
        ? { action: 'warn', message }
        : { action: 'block', code: ExitCode.SCOPE_CONFLICT, message };
    }
    case 'partial': {
      const message = `Scope partially overlaps session ${verdict.sessionId}: ${verdict.overlap.join(', ')}`;
      return config.allowScopeOverlap
        ? { action: 'warn', message }
        : { action: 'block', code: ExitCode.SCOPE_CONFLICT, message };
    }
  }
}
