/**
 * Session ID generation and validation.
 *
 * Format: ses_{YYYYMMDDHHmmss}_{6hex}
 *   - Human-readable, sortable by timestamp
 *   - 3 random bytes distinguish sessions started in the same second
 */

import { randomBytes } from 'node:crypto';

/**
 * Generate a session ID.
 *
 * Example: ses_20260227171900_a1b2c3
 */
export function generateSessionId(now: Date = new Date()): string {
  const ts = now.toISOString()
    .replace(/[-:T]/g, '')
    .substring(0, 14); // YYYYMMDDHHmmss
  const hex = randomBytes(3).toString('hex');
  return `ses_${ts}_${hex}`;
}

const SESSION_ID_RE = /^ses_(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})_[0-9a-f]{6}$/;

/** Check if a string is a well-formed session ID. */
export function isValidSessionId(id: string): boolean {
  return SESSION_ID_RE.test(id);
}

/**
 * Extract the creation timestamp encoded in a session ID.
 * Returns null if the ID is malformed.
 */
export function extractSessionTimestamp(id: string): Date | null {
  const m = SESSION_ID_RE.exec(id);
  if (!m) return null;
  const [, y, mo, d, h, mi, s] = m;
  return new Date(`${y}-${mo}-${d}T${h}:${mi}:${s}.000Z`);
}
