/**
 * Central output dispatch for CLI commands.
 *
 * Commands call runCommand(operation, fn); the result is printed as a
 * success envelope, a thrown error as an error envelope, and the process
 * exit code is set from the error's ExitCode.
 */

import { formatError, formatSuccess, type FormatOptions } from '../../core/output.js';
import { TasklaneError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getLogger } from '../../core/logger.js';

/** What a command handler returns. */
export interface CommandOutput<T> {
  data: T;
  message?: string;
  warnings?: string[];
  /** Exit code for a successful run that changed nothing. */
  exitCode?: ExitCode;
}

/** Print a success envelope to stdout. */
export function cliOutput<T>(data: T, opts: FormatOptions): void {
  console.log(formatSuccess(data, opts));
}

/** Print an error envelope to stdout and set the process exit code. */
export function cliError(err: unknown, operation: string): void {
  const error =
    err instanceof TasklaneError
      ? err
      : new TasklaneError(
          ExitCode.GENERAL_ERROR,
          err instanceof Error ? err.message : String(err),
          { cause: err },
        );
  if (!(err instanceof TasklaneError)) {
    getLogger('cli').error({ err, operation }, 'Unexpected failure');
  }
  console.log(formatError(error, operation));
  process.exitCode = error.code;
}

/** Run a command handler and render its outcome. */
export async function runCommand<T>(
  operation: string,
  handler: () => Promise<CommandOutput<T>>,
): Promise<void> {
  try {
    const out = await handler();
    cliOutput(out.data, { operation, message: out.message, warnings: out.warnings });
    if (out.exitCode !== undefined) {
      process.exitCode = out.exitCode;
    }
  } catch (err) {
    cliError(err, operation);
  }
}
