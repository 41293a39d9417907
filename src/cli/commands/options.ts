/**
 * Shared commander option parsers.
 */

import { InvalidArgumentError } from 'commander';

/** Parse a positive integer option value. */
export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got: ${value}`);
  }
  return n;
}
