/**
 * Tests for document backup listing and restore.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { listDocumentBackups, restoreBackup } from '../backup.js';
import { readAuditLog } from '../audit-log.js';
import { addTask } from '../../tasks/add.js';
import { isLocked } from '../../../store/lock.js';
import { ExitCode } from '../../../types/exit-codes.js';
import { createTestProject, type TestProject } from '../../../../tests/helpers/project.js';

describe('document backups', () => {
  let project: TestProject;

  beforeEach(async () => {
    project = await createTestProject();
    // seed -> one task -> two tasks; backups .2 = seed, .1 = one task
    await addTask({ title: 'First' }, undefined, project.accessor);
    await addTask({ title: 'Second' }, undefined, project.accessor);
  });

  afterEach(async () => {
    await project.cleanup();
  });

  it('lists backups newest first', async () => {
    const backups = await listDocumentBackups('tasks', undefined, project.accessor);
    expect(backups.map((b) => b.index)).toEqual([1, 2]);
    expect(await listDocumentBackups('sessions', undefined, project.accessor)).toEqual([]);
  });

  it('restores the newest backup by default', async () => {
    const result = await restoreBackup('tasks', undefined, undefined, project.accessor);
    const store = await project.accessor.loadTaskStore();

    expect(store.tasks.map((t) => t.title)).toEqual(['First']);
    expect(result).toEqual({
      document: 'tasks',
      restoredFrom: join(project.accessor.paths.backups, 'tasks.json.1'),
      safetyBackup: join(project.accessor.paths.backups, 'tasks.json.1'),
    });
  });

  it('restores a numbered backup and keeps the replaced content', async () => {
    const current = await readFile(project.accessor.paths.tasks, 'utf8');
    await restoreBackup('tasks', 2, undefined, project.accessor);

    expect((await project.accessor.loadTaskStore()).tasks).toEqual([]);
    expect(await readFile(join(project.accessor.paths.backups, 'tasks.json.1'), 'utf8')).toBe(current);
  });

  it('records the restore in the audit log', async () => {
    await restoreBackup('tasks', 2, undefined, project.accessor);
    const events = await readAuditLog(project.root, { action: 'backup_restored' });
    expect(events).toHaveLength(1);
    expect(events[0]?.details).toMatchObject({ document: 'tasks', index: 2 });
  });

  it('fails with NOT_FOUND for a missing backup and releases the lock', async () => {
    await expect(restoreBackup('tasks', 7, undefined, project.accessor)).rejects.toMatchObject({
      code: ExitCode.NOT_FOUND,
      message: 'Backup tasks.json.7 not found',
    });
    expect(await isLocked(project.accessor.paths.tasks)).toBe(false);
  });

  it('refuses a backup that fails validation', async () => {
    const current = await readFile(project.accessor.paths.tasks, 'utf8');
    await writeFile(join(project.accessor.paths.backups, 'tasks.json.1'), '{"tasks": "nope"}');

    await expect(restoreBackup('tasks', 1, undefined, project.accessor)).rejects.toMatchObject({
      code: ExitCode.VALIDATION_ERROR,
    });
    expect(await readFile(project.accessor.paths.tasks, 'utf8')).toBe(current);
  });
});
