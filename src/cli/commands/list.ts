/**
 * CLI list command.
 */

import { Command } from 'commander';
import { listTasks, type ListTasksOptions } from '../../core/tasks/list.js';
import { normalizePriority } from '../../core/tasks/add.js';
import { isTaskStatus } from '../../store/status-registry.js';
import { TasklaneError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { parsePositiveInt } from './options.js';
import { runCommand } from '../renderers/index.js';

interface ListOptions {
  status?: string;
  priority?: string;
  parent?: string;
  root?: boolean;
  phase?: string;
  limit?: number;
  offset?: number;
}

/**
 * Register the list command.
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List tasks with optional filters')
    .option('-s, --status <status>', 'Filter by status')
    .option('--priority <priority>', 'Filter by priority')
    .option('--parent <parentId>', 'Direct children of a task')
    .option('--root', 'Root tasks only')
    .option('--phase <phase>', 'Filter by phase')
    .option('--limit <n>', 'Maximum results', parsePositiveInt)
    .option('--offset <n>', 'Skip the first n results', parsePositiveInt)
    .action(async (opts: ListOptions) => {
      await runCommand('tasks.list', async () => {
        const filter: ListTasksOptions = {};
        if (opts.status !== undefined) {
          if (!isTaskStatus(opts.status)) {
            throw new TasklaneError(ExitCode.INVALID_INPUT, `Invalid status: ${opts.status}`);
          }
          filter.status = opts.status;
        }
        if (opts.priority !== undefined) filter.priority = normalizePriority(opts.priority);
        if (opts.root) filter.parentId = null;
        else if (opts.parent !== undefined) filter.parentId = opts.parent;
        if (opts.phase !== undefined) filter.phase = opts.phase;
        if (opts.limit !== undefined) filter.limit = opts.limit;
        if (opts.offset !== undefined) filter.offset = opts.offset;
        return { data: await listTasks(filter) };
      });
    });
}
