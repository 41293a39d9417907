/**
 * CLI backup command group.
 */

import { Command } from 'commander';
import type { DocumentName } from '../../core/errors.js';
import { TasklaneError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { listDocumentBackups, restoreBackup } from '../../core/system/backup.js';
import { parsePositiveInt } from './options.js';
import { runCommand } from '../renderers/index.js';

/** Parse a document argument: tasks or sessions. */
export function parseDocumentArg(value: string): DocumentName {
  if (value === 'tasks' || value === 'sessions') return value;
  throw new TasklaneError(ExitCode.INVALID_INPUT, `Unknown document: ${value} (must be tasks|sessions)`);
}

/**
 * Register the backup command group.
 */
export function registerBackupCommand(program: Command): void {
  const backup = program
    .command('backup')
    .description('List and restore numbered document backups');

  backup
    .command('list <document>')
    .description('List backups of tasks or sessions, newest first')
    .action(async (document: string) => {
      await runCommand('backup.list', async () => {
        const backups = await listDocumentBackups(parseDocumentArg(document));
        return { data: { backups, count: backups.length } };
      });
    });

  backup
    .command('restore <document>')
    .description('Restore tasks or sessions from a backup')
    .option('-n, --index <n>', 'Backup number (default: newest)', parsePositiveInt)
    .action(async (document: string, opts: { index?: number }) => {
      await runCommand('backup.restore', async () => {
        const result = await restoreBackup(parseDocumentArg(document), opts.index);
        return { data: result, message: `Restored ${result.document} from ${result.restoredFrom}` };
      });
    });
}
