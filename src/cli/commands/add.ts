/**
 * CLI add command.
 */

import { Command } from 'commander';
import { addTask, normalizePriority } from '../../core/tasks/add.js';
import { isTaskStatus } from '../../store/status-registry.js';
import { TasklaneError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { runCommand } from '../renderers/index.js';

interface AddOptions {
  parent?: string;
  priority?: string;
  phase?: string;
  status?: string;
  description?: string;
}

/**
 * Register the add command.
 */
export function registerAddCommand(program: Command): void {
  program
    .command('add <title>')
    .description('Create a new task')
    .option('-p, --parent <parentId>', 'Parent task id')
    .option('--priority <priority>', 'critical|high|medium|low or 1-9', 'medium')
    .option('--phase <phase>', 'Phase slug')
    .option('--status <status>', 'pending|blocked', 'pending')
    .option('-d, --description <text>', 'Task description')
    .action(async (title: string, opts: AddOptions) => {
      await runCommand('tasks.add', async () => {
        const status = opts.status ?? 'pending';
        if (!isTaskStatus(status)) {
          throw new TasklaneError(ExitCode.INVALID_INPUT, `Invalid status: ${status}`);
        }
        const { task } = await addTask({
          title,
          status,
          priority: normalizePriority(opts.priority ?? 'medium'),
          parentId: opts.parent ?? null,
          phase: opts.phase ?? null,
          ...(opts.description !== undefined && { description: opts.description }),
        });
        return { data: { task }, message: `Task ${task.id} created` };
      });
    });
}
