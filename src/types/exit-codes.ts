/**
 * tasklane exit codes.
 * Ranges: 0 = success, 1-99 = errors, 100+ = special (non-error) states.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  VALIDATION_ERROR = 6,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,

  // === HIERARCHY ERRORS (10-19) ===
  PARENT_NOT_FOUND = 10,
  DEPTH_EXCEEDED = 11,
  SIBLING_LIMIT = 12,

  // === CONCURRENCY ERRORS (20-29) ===
  CHECKSUM_MISMATCH = 20,
  CONCURRENT_MODIFICATION = 21,
  ID_COLLISION = 22,

  // === SESSION ERRORS (30-39) ===
  SESSION_EXISTS = 30,
  SESSION_NOT_FOUND = 31,
  SCOPE_CONFLICT = 32,
  SCOPE_INVALID = 33,
  TASK_NOT_IN_SCOPE = 34,
  TASK_CLAIMED = 35,
  SESSION_WRONG_STATE = 36,
  MAX_SESSIONS_REACHED = 37,
  FOCUS_REQUIRED = 38,

  // === SPECIAL CODES (100+) - NOT errors ===
  NO_DATA = 100,
  NO_CHANGE = 102,
}

/** Codes for which retrying the whole operation may succeed. */
const RECOVERABLE_CODES = new Set<ExitCode>([
  ExitCode.LOCK_TIMEOUT,
  ExitCode.CHECKSUM_MISMATCH,
  ExitCode.CONCURRENT_MODIFICATION,
  ExitCode.ID_COLLISION,
]);

/** Check if an exit code represents an error (1-99). */
export function isErrorCode(code: ExitCode): boolean {
  return code >= 1 && code < 100;
}

/** Check if an exit code represents success (0 or 100+). */
export function isSuccessCode(code: ExitCode): boolean {
  return code === 0 || code >= 100;
}

/** Check if an exit code is recoverable (retry may succeed). */
export function isRecoverableCode(code: ExitCode): boolean {
  return RECOVERABLE_CODES.has(code);
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
