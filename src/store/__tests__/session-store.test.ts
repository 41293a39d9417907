/**
 * Tests for Session Registry document helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  createEmptySessionRegistry,
  DEFAULT_SESSION_POLICY,
  parseSessionRegistry,
  requireSession,
  sessionRegistryChecksum,
  stampSessionRegistry,
} from '../session-store.js';
import { computeChecksum } from '../json.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Session, SessionHistoryEntry } from '../../types/session.js';

const NOW = '2026-02-01T10:00:00.000Z';

function makeSession(id: string): Session {
  return {
    id,
    status: 'active',
    name: null,
    agentId: null,
    scope: { type: 'task', rootTaskId: 'T001', computedTaskIds: ['T001'], computedAt: NOW },
    focus: {
      currentTask: 'T001',
      previousTask: null,
      focusHistory: [{ taskId: 'T001', timestamp: NOW, action: 'focused' }],
      sessionNote: null,
    },
    stats: { tasksCompleted: 0, focusChanges: 1, suspendCount: 0, resumeCount: 0 },
    startedAt: NOW,
    lastActivity: NOW,
    suspendedAt: null,
  };
}

function makeHistory(id: string): SessionHistoryEntry {
  return {
    id,
    name: null,
    agentId: null,
    scopeType: 'task',
    rootTaskId: 'T001',
    computedTaskIds: ['T001'],
    lastFocus: 'T001',
    startedAt: NOW,
    endedAt: NOW,
    stats: { tasksCompleted: 0, focusChanges: 1, suspendCount: 0, resumeCount: 0 },
    endNote: null,
  };
}

describe('createEmptySessionRegistry', () => {
  it('uses the default policy', () => {
    const registry = createEmptySessionRegistry('demo', NOW);
    expect(registry.config).toEqual(DEFAULT_SESSION_POLICY);
    expect(registry._meta.checksum).toBe(computeChecksum({ sessions: [], sessionHistory: [] }));
    expect(registry._meta.totalSessionsCreated).toBe(0);
  });

  it('merges policy overrides', () => {
    const registry = createEmptySessionRegistry('demo', NOW, { maxConcurrentSessions: 2 });
    expect(registry.config).toEqual({ ...DEFAULT_SESSION_POLICY, maxConcurrentSessions: 2 });
  });
});

describe('parseSessionRegistry', () => {
  it('round-trips a registry with a live session', () => {
    const registry = createEmptySessionRegistry('demo', NOW);
    registry.sessions.push(makeSession('ses_20260201100000_abcdef'));
    stampSessionRegistry(registry, NOW);
    expect(parseSessionRegistry(JSON.parse(JSON.stringify(registry)), 'sessions.json')).toEqual(registry);
  });

  it('rejects an unknown session status', () => {
    const registry = createEmptySessionRegistry('demo', NOW);
    const raw = { ...registry, sessions: [{ ...makeSession('s1'), status: 'ended' }] };
    expect(() => parseSessionRegistry(raw, 'sessions.json')).toThrow(
      'Invalid Session Registry: sessions.json',
    );
  });
});

describe('stampSessionRegistry', () => {
  it('covers live and historical sessions in the checksum', () => {
    const registry = createEmptySessionRegistry('demo', NOW);
    const before = registry._meta.checksum;
    registry.sessionHistory.push(makeHistory('s0'));
    stampSessionRegistry(registry, NOW);
    expect(registry._meta.checksum).not.toBe(before);
    expect(registry._meta.checksum).toBe(sessionRegistryChecksum(registry));
  });
});

describe('requireSession', () => {
  it('returns a live session', () => {
    const registry = createEmptySessionRegistry('demo', NOW);
    registry.sessions.push(makeSession('s1'));
    expect(requireSession(registry, 's1').id).toBe('s1');
  });

  it('reports an ended session distinctly', () => {
    const registry = createEmptySessionRegistry('demo', NOW);
    registry.sessionHistory.push(makeHistory('s0'));
    expect(() => requireSession(registry, 's0')).toThrow('Session already ended: s0');
  });

  it('fails with SESSION_NOT_FOUND for an unknown id', () => {
    const registry = createEmptySessionRegistry('demo', NOW);
    try {
      requireSession(registry, 'nope');
      expect.unreachable('lookup should fail');
    } catch (err) {
      expect(err).toMatchObject({ code: ExitCode.SESSION_NOT_FOUND, message: 'Session not found: nope' });
    }
  });
});
