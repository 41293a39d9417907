/**
 * Tests for scope conflict detection and policy.
 */

import { describe, it, expect } from 'vitest';
import { detectScopeConflict, evaluateConflictPolicy } from '../conflict.js';
import { DEFAULT_SESSION_POLICY } from '../../../store/session-store.js';
import { ExitCode } from '../../../types/exit-codes.js';
import type { Session, SessionStatus } from '../../../types/session.js';

const NOW = '2026-02-01T10:00:00.000Z';

function session(id: string, ids: string[], focus: string | null, status: SessionStatus = 'active'): Session {
  return {
    id,
    status,
    name: null,
    agentId: null,
    scope: { type: 'custom', taskIds: ids, computedTaskIds: ids, computedAt: NOW },
    focus: { currentTask: focus, previousTask: null, focusHistory: [], sessionNote: null },
    stats: { tasksCompleted: 0, focusChanges: 1, suspendCount: 0, resumeCount: 0 },
    startedAt: NOW,
    lastActivity: NOW,
    suspendedAt: status === 'suspended' ? NOW : null,
  };
}

describe('detectScopeConflict', () => {
  const existing = [session('s1', ['T001', 'T002', 'T003'], 'T001')];

  it('finds nothing for disjoint scopes', () => {
    expect(detectScopeConflict(existing, ['T010'], 'T010')).toEqual({ kind: 'none' });
  });

  it('reports a hard conflict on the same focus', () => {
    expect(detectScopeConflict(existing, ['T001'], 'T001')).toEqual({
      kind: 'hard',
      sessionId: 's1',
      taskId: 'T001',
    });
  });

  it('reports identical scopes', () => {
    expect(detectScopeConflict(existing, ['T003', 'T002', 'T001'], 'T002')).toEqual({
      kind: 'identical',
      sessionId: 's1',
      overlap: ['T003', 'T002', 'T001'],
    });
  });

  it('reports a candidate nested inside an existing scope', () => {
    expect(detectScopeConflict(existing, ['T002', 'T003'], 'T002')).toEqual({
      kind: 'nested',
      sessionId: 's1',
      overlap: ['T002', 'T003'],
    });
  });

  it('reports a candidate containing an existing scope', () => {
    expect(detectScopeConflict(existing, ['T001', 'T002', 'T003', 'T004'], 'T004')).toMatchObject({
      kind: 'nested',
    });
  });

  it('reports a partial overlap', () => {
    expect(detectScopeConflict(existing, ['T003', 'T004'], 'T004')).toEqual({
      kind: 'partial',
      sessionId: 's1',
      overlap: ['T003'],
    });
  });

  it('ignores suspended sessions', () => {
    const suspended = [session('s1', ['T001'], 'T001', 'suspended')];
    expect(detectScopeConflict(suspended, ['T001'], 'T001')).toEqual({ kind: 'none' });
  });

  it('ignores the excluded session', () => {
    expect(detectScopeConflict(existing, ['T001'], 'T001', 's1')).toEqual({ kind: 'none' });
  });

  it('returns the first overlapping session', () => {
    const two = [session('s1', ['T005'], 'T005'), session('s2', ['T001'], 'T001')];
    expect(detectScopeConflict(two, ['T001', 'T005', 'T006'], 'T006')).toMatchObject({
      kind: 'nested',
      sessionId: 's1',
    });
  });

  it('ranks a claimed focus above an earlier overlap', () => {
    const two = [session('s1', ['T005'], 'T005'), session('s2', ['T001'], 'T001')];
    expect(detectScopeConflict(two, ['T001', 'T005'], 'T001')).toEqual({
      kind: 'hard',
      sessionId: 's2',
      taskId: 'T001',
    });
  });
});

describe('evaluateConflictPolicy', () => {
  it('allows no conflict', () => {
    expect(evaluateConflictPolicy({ kind: 'none' }, DEFAULT_SESSION_POLICY)).toEqual({ action: 'allow' });
  });

  it('blocks a hard conflict with TASK_CLAIMED', () => {
    expect(
      evaluateConflictPolicy({ kind: 'hard', sessionId: 's1', taskId: 'T001' }, DEFAULT_SESSION_POLICY),
    ).toEqual({
      action: 'block',
      code: ExitCode.TASK_CLAIMED,
      message: 'Task T001 is already the focus of session s1',
    });
  });

  it('blocks identical scopes with SCOPE_CONFLICT', () => {
    expect(
      evaluateConflictPolicy({ kind: 'identical', sessionId: 's1', overlap: ['T001'] }, DEFAULT_SESSION_POLICY),
    ).toMatchObject({ action: 'block', code: ExitCode.SCOPE_CONFLICT });
  });

  it('warns on nested scopes when allowed', () => {
    expect(
      evaluateConflictPolicy({ kind: 'nested', sessionId: 's1', overlap: ['T001', 'T002'] }, DEFAULT_SESSION_POLICY),
    ).toEqual({ action: 'warn', message: 'Scope is nested with session s1 (2 shared tasks)' });
  });

  it('blocks nested scopes when disallowed', () => {
    const policy = { ...DEFAULT_SESSION_POLICY, allowNestedScopes: false };
    expect(
      evaluateConflictPolicy({ kind: 'nested', sessionId: 's1', overlap: ['T001'] }, policy),
    ).toMatchObject({ action: 'block', code: ExitCode.SCOPE_CONFLICT });
  });

  it('blocks partial overlap by default', () => {
    expect(
      evaluateConflictPolicy({ kind: 'partial', sessionId: 's1', overlap: ['T003', 'T004'] }, DEFAULT_SESSION_POLICY),
    ).toEqual({
      action: 'block',
      code: ExitCode.SCOPE_CONFLICT,
      message: 'Scope partially overlaps session s1: T003, T004',
    });
  });

  it('warns on partial overlap when allowed', () => {
    const policy = { ...DEFAULT_SESSION_POLICY, allowScopeOverlap: true };
    expect(
      evaluateConflictPolicy({ kind: 'partial', sessionId: 's1', overlap: ['T003'] }, policy),
    ).toEqual({ action: 'warn', message: 'Scope partially overlaps session s1: T003' });
  });
});
