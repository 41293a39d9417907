/**
 * Unified status registry: single source of truth for status and priority enums.
 *
 * Dependency direction:
 *   status-registry.ts → types/task.ts, types/session.ts, validation-schemas.ts
 */

// === WORKFLOW NAMESPACE ===

export const TASK_STATUSES = ['pending', 'active', 'blocked', 'done'] as const;

/** Live session statuses. Ended sessions leave the live collection. */
export const SESSION_STATUSES = ['active', 'suspended'] as const;

export const TASK_PRIORITIES = ['critical', 'high', 'medium', 'low'] as const;

export const SCOPE_TYPES = ['task', 'taskGroup', 'subtree', 'epicPhase', 'epic', 'custom'] as const;

// === DERIVED TYPES ===

export type TaskStatus    = typeof TASK_STATUSES[number];
export type SessionStatus = typeof SESSION_STATUSES[number];
export type TaskPriority  = typeof TASK_PRIORITIES[number];
export type ScopeType     = typeof SCOPE_TYPES[number];

// === TERMINAL STATE SETS ===

export const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set(['done']);

// === ORDERING ===

/** Priority rank used for auto-focus selection. Higher wins. */
export const PRIORITY_RANK: Record<TaskPriority, number> = {
  critical: 4,
  high:     3,
  medium:   2,
  low:      1,
};

// === REGISTRY (for runtime queryability) ===

export type EntityType = 'task' | 'session' | 'priority' | 'scope';

export const STATUS_REGISTRY: Record<EntityType, readonly string[]> = {
  task:     TASK_STATUSES,
  session:  SESSION_STATUSES,
  priority: TASK_PRIORITIES,
  scope:    SCOPE_TYPES,
} as const;

export function isValidStatus(entityType: EntityType, value: string): boolean {
  return STATUS_REGISTRY[entityType].includes(value);
}

export function isTaskStatus(value: string): value is TaskStatus {
  return isValidStatus('task', value);
}

export function isTaskPriority(value: string): value is TaskPriority {
  return isValidStatus('priority', value);
}

export function isScopeType(value: string): value is ScopeType {
  return isValidStatus('scope', value);
}
