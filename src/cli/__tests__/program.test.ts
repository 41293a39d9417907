/**
 * CLI command tree tests: parse real argv against a temp data directory
 * and assert the printed envelopes.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('../../core/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../core/logger.js')>();
  return { ...actual, initLogger: vi.fn() };
});

import { createProgram } from '../program.js';

describe('tasklane CLI', () => {
  let tempDir: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tasklane-test-'));
    process.env['TASKLANE_DIR'] = join(tempDir, '.tasklane');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    delete process.env['TASKLANE_DIR'];
    process.exitCode = undefined;
    await rm(tempDir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<Record<string, unknown>> {
    await createProgram().exitOverride().parseAsync(['node', 'tasklane', ...args]);
    const envelope: unknown = JSON.parse(String(logSpy.mock.calls.at(-1)?.[0]));
    if (typeof envelope !== 'object' || envelope === null) {
      throw new Error('expected a JSON object envelope');
    }
    return { ...envelope };
  }

  it('initializes once, then reports NO_CHANGE', async () => {
    const first = await run('init', '--name', 'demo');
    expect(first).toMatchObject({ success: true, _meta: { operation: 'init' } });
    expect(process.exitCode).toBeUndefined();

    const second = await run('init', '--name', 'demo');
    expect(second).toMatchObject({ success: true, message: 'Already initialized' });
    expect(process.exitCode).toBe(102);
  });

  it('runs a task and session workflow', async () => {
    await run('init', '--name', 'demo');
    expect(await run('add', 'Epic')).toMatchObject({ result: { task: { id: 'T001' } } });
    expect(await run('add', 'Child', '--parent', 'T001', '--priority', '2')).toMatchObject({
      result: { task: { id: 'T002', parentId: 'T001', priority: 'critical' } },
    });

    const started = await run('session', 'start', '--scope', 'subtree:T001', '--name', 'cli');
    expect(started).toMatchObject({
      success: true,
      result: { session: { name: 'cli', focus: { currentTask: 'T002' } }, demotedTaskIds: [] },
    });

    const completed = await run('done', 'T002');
    expect(completed).toMatchObject({ result: { task: { status: 'done' } }, message: 'Task T002 completed' });

    const listed = await run('list', '--status', 'done');
    expect(listed).toMatchObject({ result: { filtered: 1, total: 2 } });

    const sessions = await run('session', 'list', '--status', 'active');
    expect(sessions).toMatchObject({ result: { count: 1 } });
    expect(process.exitCode).toBeUndefined();
  });

  it('prints an error envelope with the exit code', async () => {
    await run('init', '--name', 'demo');
    process.exitCode = undefined;

    const out = await run('session', 'start', '--scope', 'task:T404');
    expect(out).toMatchObject({
      success: false,
      result: null,
      error: { code: 33, name: 'SCOPE_INVALID', message: 'Scope root task not found: T404' },
    });
    expect(process.exitCode).toBe(33);
  });

  it('reports a missing project before init', async () => {
    const out = await run('list');
    expect(out).toMatchObject({ success: false, error: { name: 'NOT_FOUND' } });
    expect(process.exitCode).toBe(4);
  });

  it('rejects a malformed scope root as SCOPE_INVALID', async () => {
    await run('init', '--name', 'demo');
    const out = await run('session', 'start', '--scope', 'task:10');
    expect(out).toMatchObject({ error: { code: 33, message: 'Invalid task id in scope: task:10' } });
    expect(process.exitCode).toBe(33);
  });
});
