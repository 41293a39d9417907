/**
 * CLI init command.
 */

import { Command } from 'commander';
import { initProject } from '../../core/init.js';
import { ExitCode } from '../../types/exit-codes.js';
import { runCommand } from '../renderers/index.js';

/**
 * Register the init command.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create the project data directory and empty documents')
    .option('--name <name>', 'Project name (default: directory name)')
    .action(async (opts: { name?: string }) => {
      await runCommand('init', async () => {
        const result = await initProject(opts.name !== undefined ? { name: opts.name } : {});
        const unchanged = result.created.length === 0;
        return {
          data: result,
          message: unchanged ? 'Already initialized' : `Initialized ${result.dataDir}`,
          ...(unchanged && { exitCode: ExitCode.NO_CHANGE }),
        };
      });
    });
}
