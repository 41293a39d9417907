/**
 * CLI show command.
 */

import { Command } from 'commander';
import { showTask } from '../../core/tasks/show.js';
import { runCommand } from '../renderers/index.js';

/**
 * Register the show command.
 */
export function registerShowCommand(program: Command): void {
  program
    .command('show <taskId>')
    .description('Show a task with its parents, children and focus owner')
    .action(async (taskId: string) => {
      await runCommand('tasks.show', async () => ({ data: await showTask(taskId) }));
    });
}
