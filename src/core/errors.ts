/**
 * tasklane error type with exit code integration.
 */

import { ExitCode, getExitCodeName, isRecoverableCode } from '../types/exit-codes.js';

/** Documents a failed operation may have durably updated. */
export type DocumentName = 'sessions' | 'tasks';

/** Structured details attached to an error. */
export interface ErrorDetails {
  /** Documents durably written before the failure. Empty means neither. */
  documentsWritten?: DocumentName[];
  /** Whether the failure happened before any write was attempted. */
  phase?: 'validate' | 'write';
  [key: string]: unknown;
}

/**
 * Structured error class for tasklane operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class TasklaneError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;
  readonly details?: ErrorDetails;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      details?: ErrorDetails;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'TasklaneError';
    this.code = code;
    this.fix = options?.fix;
    this.details = options?.details;
  }

  /** Whether retrying the whole operation may succeed. */
  get recoverable(): boolean {
    return isRecoverableCode(this.code);
  }

  /** Return a copy of this error with extra details merged in. */
  withDetails(details: ErrorDetails): TasklaneError {
    return new TasklaneError(this.code, this.message, {
      fix: this.fix,
      details: { ...this.details, ...details },
      cause: this.cause,
    });
  }

  /** Structured JSON representation for CLI output. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        recoverable: this.recoverable,
        ...(this.fix && { fix: this.fix }),
        ...(this.details && { details: this.details }),
      },
    };
  }
}

/** Narrow an unknown error to a TasklaneError with the given code. */
export function isTasklaneError(err: unknown, code?: ExitCode): err is TasklaneError {
  return err instanceof TasklaneError && (code === undefined || err.code === code);
}

/** Read the errno code of a Node.js filesystem error, if any. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export { ExitCode };
