/**
 * CLI complete command.
 */

import { Command } from 'commander';
import { completeTask } from '../../core/tasks/complete.js';
import { runCommand } from '../renderers/index.js';

/**
 * Register the complete command.
 */
export function registerCompleteCommand(program: Command): void {
  program
    .command('complete <taskId>')
    .alias('done')
    .description('Mark a task as done')
    .action(async (taskId: string) => {
      await runCommand('tasks.complete', async () => ({
        data: await completeTask(taskId),
        message: `Task ${taskId} completed`,
      }));
    });
}
