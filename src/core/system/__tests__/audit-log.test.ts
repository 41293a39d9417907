/**
 * Tests for the audit log.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { appendFile, mkdir, mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createAuditEvent, readAuditLog } from '../audit-log.js';
import { appendJsonl } from '../../../store/json.js';

describe('createAuditEvent', () => {
  it('builds an event with a fresh id', () => {
    const event = createAuditEvent('session_end', { sessionId: 's1', details: { note: 'x' } }, '2026-01-01T00:00:00.000Z');
    expect(event).toEqual({
      id: expect.stringMatching(/^evt-[0-9a-f]{12}$/),
      timestamp: '2026-01-01T00:00:00.000Z',
      action: 'session_end',
      sessionId: 's1',
      details: { note: 'x' },
    });
    expect('taskId' in event).toBe(false);
  });
});

describe('readAuditLog', () => {
  let tempDir: string;
  let logPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tasklane-test-'));
    await mkdir(join(tempDir, '.tasklane'));
    logPath = join(tempDir, '.tasklane', 'audit.jsonl');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('returns an empty list before anything is logged', async () => {
    expect(await readAuditLog(tempDir)).toEqual([]);
  });

  it('reads events in order and filters them', async () => {
    await appendJsonl(logPath, createAuditEvent('session_start', { sessionId: 's1' }));
    await appendJsonl(logPath, createAuditEvent('session_start', { sessionId: 's2' }));
    await appendJsonl(logPath, createAuditEvent('session_end', { sessionId: 's1' }));

    expect((await readAuditLog(tempDir)).map((e) => e.action)).toEqual([
      'session_start', 'session_start', 'session_end',
    ]);
    expect((await readAuditLog(tempDir, { sessionId: 's1' })).map((e) => e.action)).toEqual([
      'session_start', 'session_end',
    ]);
    expect((await readAuditLog(tempDir, { action: 'session_end' })).map((e) => e.sessionId)).toEqual(['s1']);
  });

  it('skips a torn trailing line and unknown records', async () => {
    await appendJsonl(logPath, createAuditEvent('task_created', { taskId: 'T001' }));
    await appendJsonl(logPath, { id: 'x', timestamp: 'y', action: 'unknown' });
    await appendFile(logPath, '{"id":"evt-');

    const events = await readAuditLog(tempDir);
    expect(events.map((e) => e.taskId)).toEqual(['T001']);
  });
});
