/**
 * Document validator for the Task Store and Session Registry.
 *
 * Field-level constraints come from the zod schemas in
 * src/store/validation-schemas.ts; cross-record rules (unique ids,
 * dangling parent references, single focus claim) are checked here.
 */

import {
  formatIssues,
  sessionRegistrySchema,
  taskStoreSchema,
} from '../../store/validation-schemas.js';
import type { TaskStore } from '../../types/task.js';
import type { SessionRegistry } from '../../types/session.js';

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/** Validates a candidate document body before it is written. */
export interface DocumentValidator {
  readonly document: 'tasks' | 'sessions';
  validate(body: unknown): ValidationResult;
}

function duplicates(ids: string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) dupes.add(id);
    seen.add(id);
  }
  return [...dupes];
}

/** Cross-record checks for a schema-valid Task Store. */
export function checkTaskStoreSemantics(store: TaskStore): string[] {
  const errors: string[] = [];
  const ids = store.tasks.map((t) => t.id);

  for (const id of duplicates(ids)) {
    errors.push(`Duplicate task ID: ${id}`);
  }

  const idSet = new Set(ids);
  for (const task of store.tasks) {
    if (task.parentId !== null && !idSet.has(task.parentId)) {
      errors.push(`Task ${task.id} references non-existent parent: ${task.parentId}`);
    }
    if (task.parentId === task.id) {
      errors.push(`Task ${task.id} is its own parent`);
    }
  }

  return errors;
}

/** Cross-record checks for a schema-valid Session Registry. */
export function checkSessionRegistrySemantics(registry: SessionRegistry): string[] {
  const errors: string[] = [];
  const liveIds = registry.sessions.map((s) => s.id);

  for (const id of duplicates(liveIds)) {
    errors.push(`Duplicate session ID: ${id}`);
  }

  const historyIds = new Set(registry.sessionHistory.map((h) => h.id));
  for (const id of liveIds) {
    if (historyIds.has(id)) {
      errors.push(`Session ${id} is both live and ended`);
    }
  }

  const activeFoci = registry.sessions
    .filter((s) => s.status === 'active' && s.focus.currentTask !== null)
    .map((s) => s.focus.currentTask ?? '');
  for (const taskId of duplicates(activeFoci)) {
    errors.push(`Task ${taskId} is the focus of more than one active session`);
  }

  return errors;
}

export const taskStoreValidator: DocumentValidator = {
  document: 'tasks',
  validate(body: unknown): ValidationResult {
    const parsed = taskStoreSchema.safeParse(body);
    if (!parsed.success) {
      return { valid: false, errors: formatIssues(parsed.error) };
    }
    const errors = checkTaskStoreSemantics(parsed.data);
    return { valid: errors.length === 0, errors };
  },
};

export const sessionRegistryValidator: DocumentValidator = {
  document: 'sessions',
  validate(body: unknown): ValidationResult {
    const parsed = sessionRegistrySchema.safeParse(body);
    if (!parsed.success) {
      return { valid: false, errors: formatIssues(parsed.error) };
    }
    const errors = checkSessionRegistrySemantics(parsed.data);
    return { valid: errors.length === 0, errors };
  },
};
