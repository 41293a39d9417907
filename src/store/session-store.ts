/**
 * Session Registry document helpers: creation, parsing, stamping.
 */

import type { Session, SessionPolicyConfig, SessionRegistry } from '../types/session.js';
import { TasklaneError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';
import { computeChecksum } from './json.js';
import { formatIssues, sessionRegistrySchema } from './validation-schemas.js';

export const SESSION_REGISTRY_SCHEMA_VERSION = '1.0.0';

/** Default session policy written into a new registry. */
export const DEFAULT_SESSION_POLICY: SessionPolicyConfig = {
  maxConcurrentSessions: 5,
  maxActiveTasksPerScope: 1,
  allowNestedScopes: true,
  allowScopeOverlap: false,
};

/** Checksum over the live and historical session collections. */
export function sessionRegistryChecksum(registry: SessionRegistry): string {
  return computeChecksum({ sessions: registry.sessions, sessionHistory: registry.sessionHistory });
}

/** Create an empty Session Registry for a project. */
export function createEmptySessionRegistry(
  project: string,
  now = new Date().toISOString(),
  policy: Partial<SessionPolicyConfig> = {},
): SessionRegistry {
  const registry: SessionRegistry = {
    version: SESSION_REGISTRY_SCHEMA_VERSION,
    project,
    _meta: {
      schemaVersion: SESSION_REGISTRY_SCHEMA_VERSION,
      checksum: '',
      lastModified: now,
      totalSessionsCreated: 0,
    },
    config: { ...DEFAULT_SESSION_POLICY, ...policy },
    sessions: [],
    sessionHistory: [],
  };
  registry._meta.checksum = sessionRegistryChecksum(registry);
  return registry;
}

/**
 * Parse a raw JSON body into a typed Session Registry.
 */
export function parseSessionRegistry(raw: unknown, source: string): SessionRegistry {
  const parsed = sessionRegistrySchema.safeParse(raw);
  if (!parsed.success) {
    throw new TasklaneError(
      ExitCode.VALIDATION_ERROR,
      `Invalid Session Registry: ${source}`,
      { details: { errors: formatIssues(parsed.error) } },
    );
  }
  const registry = parsed.data;
  const actual = sessionRegistryChecksum(registry);
  if (registry._meta.checksum !== actual) {
    getLogger('store').warn(
      { source, stored: registry._meta.checksum, actual },
      'Session Registry checksum does not match content',
    );
  }
  return registry;
}

/** Refresh checksum and lastModified before a write. */
export function stampSessionRegistry(registry: SessionRegistry, now: string): SessionRegistry {
  registry._meta.checksum = sessionRegistryChecksum(registry);
  registry._meta.lastModified = now;
  return registry;
}

/** Find a live session by id or fail with SESSION_NOT_FOUND. */
export function requireSession(registry: SessionRegistry, sessionId: string): Session {
  const session = registry.sessions.find((s) => s.id === sessionId);
  if (!session) {
    const ended = registry.sessionHistory.some((h) => h.id === sessionId);
    throw new TasklaneError(
      ExitCode.SESSION_NOT_FOUND,
      ended ? `Session already ended: ${sessionId}` : `Session not found: ${sessionId}`,
      { fix: "Use 'tasklane session list' to see live sessions" },
    );
  }
  return session;
}
