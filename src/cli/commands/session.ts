/**
 * CLI session command group.
 */

import { Command } from 'commander';
import type { ScopeDeclaration } from '../../types/session.js';
import { isScopeType } from '../../store/status-registry.js';
import { TASK_ID_PATTERN } from '../../store/validation-schemas.js';
import { TasklaneError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import {
  endSession,
  getSession,
  listSessionHistory,
  listSessions,
  resumeSession,
  setSessionFocus,
  startSession,
  suspendSession,
} from '../../core/sessions/index.js';
import { parsePositiveInt } from './options.js';
import { runCommand } from '../renderers/index.js';

function invalidScope(message: string): TasklaneError {
  return new TasklaneError(ExitCode.SCOPE_INVALID, message, {
    fix: 'Use <type>:<rootTaskId>, epicPhase:<rootTaskId>:<phase> or custom:<id>,<id>',
  });
}

function requireTaskId(id: string | undefined, raw: string): string {
  if (!id || !TASK_ID_PATTERN.test(id)) {
    throw invalidScope(`Invalid task id in scope: ${raw}`);
  }
  return id;
}

/**
 * Parse a `--scope` argument.
 *
 *   task:T010  taskGroup:T001  subtree:T001  epic:T001
 *   epicPhase:T001:core
 *   custom:T001,T002,T005
 */
export function parseScopeArg(
  raw: string,
  extra: { maxDepth?: number; exclude?: string[] } = {},
): ScopeDeclaration {
  const [type, rest, phase] = raw.split(':');
  if (!type || !isScopeType(type)) {
    throw invalidScope(`Unknown scope type: ${type ?? raw}`);
  }
  const common = {
    ...(extra.maxDepth !== undefined && { maxDepth: extra.maxDepth }),
    ...(extra.exclude && extra.exclude.length > 0 && { excludeTaskIds: extra.exclude }),
  };

  switch (type) {
    case 'custom': {
      const taskIds = (rest ?? '').split(',').filter(Boolean);
      if (taskIds.length === 0) throw invalidScope('Custom scope needs at least one task id');
      return { type, taskIds: taskIds.map((id) => requireTaskId(id, raw)), ...common };
    }
    case 'epicPhase':
      if (!phase) throw invalidScope(`epicPhase scope needs a phase: ${raw}`);
      return { type, rootTaskId: requireTaskId(rest, raw), phaseFilter: phase, ...common };
    default:
      return { type, rootTaskId: requireTaskId(rest, raw), ...common };
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, ...value.split(',').filter(Boolean)];
}

interface StartOptions {
  scope: string;
  focus?: string;
  name?: string;
  agent?: string;
  maxDepth?: number;
  exclude: string[];
}

/**
 * Register the session command group.
 */
export function registerSessionCommand(program: Command): void {
  const session = program
    .command('session')
    .description('Manage work sessions');

  session
    .command('start')
    .description('Start a session claiming a scope and a focus task')
    .requiredOption('--scope <scope>', 'Scope: task|taskGroup|subtree|epic:<id>, epicPhase:<id>:<phase>, custom:<ids>')
    .option('--focus <taskId>', 'Focus task (default: highest-priority pending task in scope)')
    .option('--name <name>', 'Session name')
    .option('--agent <agentId>', 'Agent identifier')
    .option('--max-depth <n>', 'Descendant depth bound', parsePositiveInt)
    .option('--exclude <ids>', 'Task ids to leave out of the scope', collect, [])
    .action(async (opts: StartOptions) => {
      await runCommand('session.start', async () => {
        const result = await startSession({
          scope: parseScopeArg(opts.scope, { maxDepth: opts.maxDepth, exclude: opts.exclude }),
          ...(opts.focus !== undefined && { focus: opts.focus }),
          ...(opts.name !== undefined && { name: opts.name }),
          ...(opts.agent !== undefined && { agentId: opts.agent }),
        });
        return {
          data: { session: result.session, demotedTaskIds: result.demotedTaskIds },
          message: `Session ${result.session.id} started`,
          warnings: result.warnings,
        };
      });
    });

  session
    .command('suspend <sessionId>')
    .description('Suspend an active session')
    .option('--note <note>', 'Note to keep with the session')
    .action(async (sessionId: string, opts: { note?: string }) => {
      await runCommand('session.suspend', async () => ({
        data: { session: await suspendSession(sessionId, opts.note) },
      }));
    });

  session
    .command('resume <sessionId>')
    .description('Resume a suspended session')
    .action(async (sessionId: string) => {
      await runCommand('session.resume', async () => ({
        data: { session: await resumeSession(sessionId) },
      }));
    });

  session
    .command('end <sessionId>')
    .description('End a session and move it to history')
    .option('--note <note>', 'End note')
    .action(async (sessionId: string, opts: { note?: string }) => {
      await runCommand('session.end', async () => ({
        data: await endSession(sessionId, opts.note),
      }));
    });

  session
    .command('focus <sessionId> <taskId>')
    .description("Move a session's focus to another task in its scope")
    .action(async (sessionId: string, taskId: string) => {
      await runCommand('session.focus', async () => ({
        data: { session: await setSessionFocus(sessionId, taskId) },
      }));
    });

  session
    .command('list')
    .description('List live sessions')
    .option('--status <status>', 'Filter: active|suspended')
    .action(async (opts: { status?: string }) => {
      await runCommand('session.list', async () => {
        const status = opts.status;
        if (status !== undefined && status !== 'active' && status !== 'suspended') {
          throw new TasklaneError(ExitCode.INVALID_INPUT, `Invalid status: ${status} (must be active|suspended)`);
        }
        const sessions = await listSessions(status ? { status } : {});
        return { data: { sessions, count: sessions.length } };
      });
    });

  session
    .command('show <sessionId>')
    .description('Show a live session')
    .action(async (sessionId: string) => {
      await runCommand('session.show', async () => ({
        data: { session: await getSession(sessionId) },
      }));
    });

  session
    .command('history')
    .description('List ended sessions, most recent first')
    .option('--limit <n>', 'Maximum entries', parsePositiveInt)
    .action(async (opts: { limit?: number }) => {
      await runCommand('session.history', async () => {
        const history = await listSessionHistory(opts.limit);
        return { data: { history, count: history.length } };
      });
    });
}
