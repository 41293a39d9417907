/**
 * Tests for task completion.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { completeTask } from '../complete.js';
import { startSession } from '../../sessions/session-start.js';
import { suspendSession } from '../../sessions/session-suspend.js';
import { getSession } from '../../sessions/index.js';
import { ExitCode } from '../../../types/exit-codes.js';
import { createTestProject, EPIC_SEEDS, type TestProject } from '../../../../tests/helpers/project.js';

describe('completeTask', () => {
  let project: TestProject | undefined;

  afterEach(async () => {
    await project?.cleanup();
  });

  it('marks an unclaimed task done without touching the Session Registry', async () => {
    project = await createTestProject(EPIC_SEEDS);
    const sessionsBefore = await readFile(project.accessor.paths.sessions, 'utf8');

    const { task, releasedFromSession } = await completeTask('T003', undefined, project.accessor);

    expect(task.status).toBe('done');
    expect(task.completedAt).toBe(task.updatedAt);
    expect(releasedFromSession).toBeNull();
    expect(await readFile(project.accessor.paths.sessions, 'utf8')).toBe(sessionsBefore);
  });

  it('releases the focus of the session working on it', async () => {
    project = await createTestProject(EPIC_SEEDS);
    const { session } = await startSession(
      { scope: { type: 'subtree', rootTaskId: 'T001' }, focus: 'T002' },
      undefined,
      project.accessor,
    );

    const { releasedFromSession } = await completeTask('T002', undefined, project.accessor);
    const after = await getSession(session.id, undefined, project.accessor);

    expect(releasedFromSession).toBe(session.id);
    expect(after.focus.currentTask).toBeNull();
    expect(after.focus.previousTask).toBe('T002');
    expect(after.focus.focusHistory.map((h) => h.action)).toEqual(['focused', 'completed']);
    expect(after.stats.tasksCompleted).toBe(1);
  });

  it('releases a suspended session focus too', async () => {
    project = await createTestProject(EPIC_SEEDS);
    const { session } = await startSession(
      { scope: { type: 'task', rootTaskId: 'T004' } },
      undefined,
      project.accessor,
    );
    await suspendSession(session.id, undefined, undefined, project.accessor);

    const { releasedFromSession } = await completeTask('T004', undefined, project.accessor);
    expect(releasedFromSession).toBe(session.id);
  });

  it('reports NO_CHANGE for a done task', async () => {
    project = await createTestProject([{ id: 'T001', status: 'done' }]);
    await expect(completeTask('T001', undefined, project.accessor)).rejects.toMatchObject({
      code: ExitCode.NO_CHANGE,
      message: 'Task T001 is already done',
    });
  });

  it('fails with NOT_FOUND for an unknown task', async () => {
    project = await createTestProject();
    await expect(completeTask('T404', undefined, project.accessor)).rejects.toMatchObject({
      code: ExitCode.NOT_FOUND,
    });
  });
});
