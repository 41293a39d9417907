/**
 * Tests for CLI argument parsers.
 */

import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseScopeArg } from '../commands/session.js';
import { parseDocumentArg } from '../commands/backup.js';
import { parsePositiveInt } from '../commands/options.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('parseScopeArg', () => {
  it('parses anchored scopes', () => {
    expect(parseScopeArg('task:T010')).toEqual({ type: 'task', rootTaskId: 'T010' });
    expect(parseScopeArg('subtree:T001')).toEqual({ type: 'subtree', rootTaskId: 'T001' });
  });

  it('parses an epicPhase scope', () => {
    expect(parseScopeArg('epicPhase:T001:core')).toEqual({
      type: 'epicPhase',
      rootTaskId: 'T001',
      phaseFilter: 'core',
    });
  });

  it('parses a custom scope', () => {
    expect(parseScopeArg('custom:T001,T002,T005')).toEqual({
      type: 'custom',
      taskIds: ['T001', 'T002', 'T005'],
    });
  });

  it('carries maxDepth and exclusions', () => {
    expect(parseScopeArg('epic:T001', { maxDepth: 2, exclude: ['T004'] })).toEqual({
      type: 'epic',
      rootTaskId: 'T001',
      maxDepth: 2,
      excludeTaskIds: ['T004'],
    });
  });

  it.each([
    ['branch:T001', 'Unknown scope type: branch'],
    ['task', 'Invalid task id in scope: task'],
    ['task:10', 'Invalid task id in scope: task:10'],
    ['epicPhase:T001', 'epicPhase scope needs a phase: epicPhase:T001'],
    ['custom:', 'Custom scope needs at least one task id'],
    ['custom:T001,x', 'Invalid task id in scope: custom:T001,x'],
  ])('rejects %s', (raw, message) => {
    expect(() => parseScopeArg(raw)).toThrow(message);
  });

  it.each(['nope:T001', 'task:10', 'subtree:'])('reports %s as SCOPE_INVALID', (raw) => {
    try {
      parseScopeArg(raw);
      expect.unreachable('parse should fail');
    } catch (err) {
      expect(err).toMatchObject({ code: ExitCode.SCOPE_INVALID });
    }
  });
});

describe('parseDocumentArg', () => {
  it('accepts the two documents', () => {
    expect(parseDocumentArg('tasks')).toBe('tasks');
    expect(parseDocumentArg('sessions')).toBe('sessions');
  });

  it('rejects anything else', () => {
    expect(() => parseDocumentArg('config')).toThrow('Unknown document: config (must be tasks|sessions)');
  });
});

describe('parsePositiveInt', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('3')).toBe(3);
  });

  it('throws a commander argument error', () => {
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('1.5')).toThrow('Expected a positive integer, got: 1.5');
  });
});
