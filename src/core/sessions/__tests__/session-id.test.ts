/**
 * Tests for session id generation.
 */

import { describe, it, expect } from 'vitest';
import { extractSessionTimestamp, generateSessionId, isValidSessionId } from '../session-id.js';

describe('generateSessionId', () => {
  it('encodes the UTC timestamp', () => {
    const id = generateSessionId(new Date('2026-03-04T05:06:07.890Z'));
    expect(id).toMatch(/^ses_20260304050607_[0-9a-f]{6}$/);
    expect(isValidSessionId(id)).toBe(true);
  });

  it('differs for sessions started in the same second', () => {
    const now = new Date('2026-03-04T05:06:07.000Z');
    const ids = new Set(Array.from({ length: 20 }, () => generateSessionId(now)));
    expect(ids.size).toBeGreaterThan(1);
  });
});

describe('isValidSessionId', () => {
  it('rejects malformed ids', () => {
    expect(isValidSessionId('ses_2026_abc123')).toBe(false);
    expect(isValidSessionId('ses_20260304050607_ABCDEF')).toBe(false);
    expect(isValidSessionId('session-1')).toBe(false);
  });
});

describe('extractSessionTimestamp', () => {
  it('recovers the creation time', () => {
    expect(extractSessionTimestamp('ses_20260304050607_a1b2c3')?.toISOString()).toBe(
      '2026-03-04T05:06:07.000Z',
    );
  });

  it('returns null for a malformed id', () => {
    expect(extractSessionTimestamp('nope')).toBeNull();
  });
});
