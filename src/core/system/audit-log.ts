/**
 * Append-only audit log of lifecycle transitions and backup events.
 * One JSON event per line in `.tasklane/audit.jsonl`.
 */

import { randomBytes } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { errnoCode, TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getAuditLogPath } from '../paths.js';

export const AUDIT_ACTIONS = [
  'session_start',
  'session_suspend',
  'session_resume',
  'session_end',
  'session_focus',
  'task_created',
  'task_completed',
  'backup_created',
  'backup_restored',
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export interface AuditEvent {
  id: string;
  timestamp: string;
  action: AuditAction;
  sessionId?: string;
  taskId?: string;
  details: Record<string, unknown>;
}

/** Build an audit event with a fresh id and timestamp. */
export function createAuditEvent(
  action: AuditAction,
  fields: { sessionId?: string; taskId?: string; details?: Record<string, unknown> } = {},
  now = new Date().toISOString(),
): AuditEvent {
  return {
    id: `evt-${randomBytes(6).toString('hex')}`,
    timestamp: now,
    action,
    ...(fields.sessionId !== undefined && { sessionId: fields.sessionId }),
    ...(fields.taskId !== undefined && { taskId: fields.taskId }),
    details: fields.details ?? {},
  };
}

function isAuditEvent(value: unknown): value is AuditEvent {
  if (typeof value !== 'object' || value === null) return false;
  const action: unknown = Reflect.get(value, 'action');
  return (
    typeof Reflect.get(value, 'id') === 'string' &&
    typeof Reflect.get(value, 'timestamp') === 'string' &&
    AUDIT_ACTIONS.some((a) => a === action)
  );
}

/**
 * Read audit events, oldest first. Unparseable lines are skipped.
 */
export async function readAuditLog(
  cwd?: string,
  filter: { action?: AuditAction; sessionId?: string } = {},
): Promise<AuditEvent[]> {
  const path = getAuditLogPath(cwd);
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return [];
    throw new TasklaneError(ExitCode.FILE_ERROR, `Cannot read audit log: ${path}`, { cause: err });
  }

  const events: AuditEvent[] = [];
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      continue; // torn trailing line
    }
    if (!isAuditEvent(parsed)) continue;
    if (filter.action && parsed.action !== filter.action) continue;
    if (filter.sessionId && parsed.sessionId !== filter.sessionId) continue;
    events.push(parsed);
  }
  return events;
}
