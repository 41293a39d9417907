/**
 * Tests for task creation.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { addTask, normalizePriority, validateTitle } from '../add.js';
import { readAuditLog } from '../../system/audit-log.js';
import { ExitCode } from '../../../types/exit-codes.js';
import { createTestProject, type TestProject } from '../../../../tests/helpers/project.js';

let project: TestProject | undefined;

afterEach(async () => {
  await project?.cleanup();
  project = undefined;
});

describe('validateTitle', () => {
  it('requires a non-blank title', () => {
    expect(() => validateTitle('   ')).toThrow('Task title is required');
  });

  it('caps the length', () => {
    expect(() => validateTitle('x'.repeat(201))).toThrow('Task title must be 200 characters or less');
    expect(() => validateTitle('x'.repeat(200))).not.toThrow();
  });
});

describe('normalizePriority', () => {
  it.each([
    ['HIGH', 'high'],
    [' low ', 'low'],
    [1, 'critical'],
    ['4', 'high'],
    [6, 'medium'],
    [9, 'low'],
  ] as const)('maps %s to %s', (input, expected) => {
    expect(normalizePriority(input)).toBe(expected);
  });

  it('rejects anything else', () => {
    expect(() => normalizePriority('urgent')).toThrow(
      'Invalid priority: urgent (must be critical|high|medium|low or numeric 1-9)',
    );
    expect(() => normalizePriority(10)).toThrow('Invalid priority: 10');
  });
});

describe('addTask', () => {
  it('creates a pending task with the next id', async () => {
    project = await createTestProject([{ id: 'T001' }]);
    const { task } = await addTask({ title: '  Write docs ' }, undefined, project.accessor);

    expect(task).toMatchObject({
      id: 'T002',
      title: 'Write docs',
      status: 'pending',
      priority: 'medium',
      parentId: null,
      phase: null,
      completedAt: null,
    });
    const store = await project.accessor.loadTaskStore();
    expect(store.tasks.map((t) => t.id)).toEqual(['T001', 'T002']);
    expect(store._meta.taskSequence).toBe(2);
  });

  it('places a child under a parent with a phase', async () => {
    project = await createTestProject([{ id: 'T001' }]);
    const { task } = await addTask(
      { title: 'Child', parentId: 'T001', phase: 'core', priority: 'high', status: 'blocked' },
      undefined,
      project.accessor,
    );
    expect(task).toMatchObject({ parentId: 'T001', phase: 'core', priority: 'high', status: 'blocked' });
  });

  it('refuses to create an active task', async () => {
    project = await createTestProject();
    await expect(
      addTask({ title: 'Sneaky', status: 'active' }, undefined, project.accessor),
    ).rejects.toMatchObject({ code: ExitCode.INVALID_INPUT });
  });

  it('reports hierarchy violations', async () => {
    project = await createTestProject([
      { id: 'T001' },
      { id: 'T002', parentId: 'T001' },
      { id: 'T003', parentId: 'T002' },
    ]);
    await expect(
      addTask({ title: 'Too deep', parentId: 'T003' }, undefined, project.accessor),
    ).rejects.toMatchObject({ code: ExitCode.DEPTH_EXCEEDED });
    await expect(
      addTask({ title: 'Orphan', parentId: 'T404' }, undefined, project.accessor),
    ).rejects.toMatchObject({ code: ExitCode.PARENT_NOT_FOUND });
  });

  it('records a task_created audit event', async () => {
    project = await createTestProject();
    const { task } = await addTask({ title: 'Audited' }, undefined, project.accessor);
    const events = await readAuditLog(project.root, { action: 'task_created' });
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ taskId: task.id, details: { title: 'Audited', parentId: null } });
  });

  it('issues distinct ids to concurrent callers', async () => {
    project = await createTestProject([], {
      config: { retry: { maxAttempts: 20, initialDelayMs: 5, multiplier: 1, maxTotalMs: 10_000 } },
    });
    const accessor = project.accessor;
    const results = await Promise.all(
      ['a', 'b', 'c', 'd'].map((title) => addTask({ title }, undefined, accessor)),
    );
    expect(new Set(results.map((r) => r.task.id)).size).toBe(4);
    expect((await accessor.loadTaskStore()).tasks).toHaveLength(4);
  });
});
