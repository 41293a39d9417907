/**
 * JSON output envelopes shared by every CLI command.
 *
 *   success: { success: true, _meta, result, message?, warnings? }
 *   failure: { success: false, _meta, result: null, error }
 */

import { randomUUID } from 'node:crypto';
import { getExitCodeName } from '../types/exit-codes.js';
import { TasklaneError } from './errors.js';

export interface EnvelopeMeta {
  operation: string;
  timestamp: string;
  requestId: string;
}

export interface SuccessEnvelope<T> {
  success: true;
  _meta: EnvelopeMeta;
  result: T;
  message?: string;
  warnings?: string[];
}

export interface ErrorEnvelope {
  success: false;
  _meta: EnvelopeMeta;
  result: null;
  error: {
    code: number;
    name: string;
    message: string;
    recoverable: boolean;
    fix?: string;
    details?: Record<string, unknown>;
  };
}

function createMeta(operation: string): EnvelopeMeta {
  return { operation, timestamp: new Date().toISOString(), requestId: randomUUID() };
}

export interface FormatOptions {
  operation: string;
  message?: string;
  warnings?: string[];
}

/** Build a success envelope. */
export function successEnvelope<T>(data: T, opts: FormatOptions): SuccessEnvelope<T> {
  return {
    success: true,
    _meta: createMeta(opts.operation),
    result: data,
    ...(opts.message && { message: opts.message }),
    ...(opts.warnings && opts.warnings.length > 0 && { warnings: opts.warnings }),
  };
}

/** Build an error envelope from a TasklaneError. */
export function errorEnvelope(error: TasklaneError, operation: string): ErrorEnvelope {
  return {
    success: false,
    _meta: createMeta(operation),
    result: null,
    error: {
      code: error.code,
      name: getExitCodeName(error.code),
      message: error.message,
      recoverable: error.recoverable,
      ...(error.fix && { fix: error.fix }),
      ...(error.details && { details: error.details }),
    },
  };
}

/** Format a success envelope as a JSON line. */
export function formatSuccess<T>(data: T, opts: FormatOptions): string {
  return JSON.stringify(successEnvelope(data, opts));
}

/** Format an error envelope as a JSON line. */
export function formatError(error: TasklaneError, operation: string): string {
  return JSON.stringify(errorEnvelope(error, operation));
}
