/**
 * Zod validation schemas for the Task Store and Session Registry documents.
 *
 * These schemas turn a parsed JSON snapshot into the typed domain model once
 * per operation, and back the schema/semantic validator consulted by
 * atomicWrite before any document replace.
 *
 * @module validation-schemas
 */

import { z } from 'zod/v4';
import { SESSION_STATUSES, TASK_PRIORITIES, TASK_STATUSES } from './status-registry.js';
import type { Task, TaskStore } from '../types/task.js';
import type {
  ScopeDeclaration,
  Session,
  SessionHistoryEntry,
  SessionPolicyConfig,
  SessionRegistry,
  SessionScope,
} from '../types/session.js';

// === TASKS ===

/** Task ids are `T` followed by at least three digits. */
export const TASK_ID_PATTERN = /^T\d{3,}$/;

/** Task schema. Unknown descriptive fields are preserved on round-trip. */
export const taskSchema: z.ZodType<Task> = z.looseObject({
  id: z.string().regex(TASK_ID_PATTERN),
  title: z.string().min(1).max(200),
  description: z.string().max(2000).optional(),
  status: z.enum(TASK_STATUSES),
  priority: z.enum(TASK_PRIORITIES),
  parentId: z.union([z.string(), z.null()]),
  phase: z.union([z.string(), z.null()]),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.union([z.string(), z.null()]).optional(),
});

export const taskStoreSchema: z.ZodType<TaskStore> = z.object({
  version: z.string(),
  project: z.string(),
  _meta: z.object({
    schemaVersion: z.string(),
    checksum: z.string(),
    lastModified: z.string(),
    activeSessionCount: z.number().int().min(0),
    multiSessionEnabled: z.boolean(),
    taskSequence: z.number().int().min(0),
  }),
  tasks: z.array(taskSchema),
});

// === SCOPES ===

const scopeBase = {
  maxDepth: z.number().int().min(0).optional(),
  excludeTaskIds: z.array(z.string()).optional(),
};

const anchoredScopeSchema = z.object({
  type: z.enum(['task', 'taskGroup', 'subtree', 'epic']),
  rootTaskId: z.string().min(1),
  ...scopeBase,
});

const epicPhaseScopeSchema = z.object({
  type: z.literal('epicPhase'),
  rootTaskId: z.string().min(1),
  phaseFilter: z.string().min(1),
  ...scopeBase,
});

const customScopeSchema = z.object({
  type: z.literal('custom'),
  taskIds: z.array(z.string()).min(1),
  ...scopeBase,
});

/** A caller-supplied scope declaration. */
export const scopeDeclarationSchema: z.ZodType<ScopeDeclaration> = z.union([
  anchoredScopeSchema,
  epicPhaseScopeSchema,
  customScopeSchema,
]);

const frozenScope = {
  computedTaskIds: z.array(z.string()).min(1),
  computedAt: z.string(),
};

/** A stored session scope carrying its immutable resolved set. */
export const sessionScopeSchema: z.ZodType<SessionScope> = z.union([
  anchoredScopeSchema.extend(frozenScope),
  epicPhaseScopeSchema.extend(frozenScope),
  customScopeSchema.extend(frozenScope),
]);

// === SESSIONS ===

export const sessionStatsSchema = z.object({
  tasksCompleted: z.number().int().min(0),
  focusChanges: z.number().int().min(0),
  suspendCount: z.number().int().min(0),
  resumeCount: z.number().int().min(0),
});

export const sessionSchema: z.ZodType<Session> = z.object({
  id: z.string().min(1),
  status: z.enum(SESSION_STATUSES),
  name: z.union([z.string(), z.null()]),
  agentId: z.union([z.string(), z.null()]),
  scope: sessionScopeSchema,
  focus: z.object({
    currentTask: z.union([z.string(), z.null()]),
    previousTask: z.union([z.string(), z.null()]),
    focusHistory: z.array(z.object({
      taskId: z.string(),
      timestamp: z.string(),
      action: z.enum(['focused', 'completed']),
    })),
    sessionNote: z.union([z.string(), z.null()]),
  }),
  stats: sessionStatsSchema,
  startedAt: z.string(),
  lastActivity: z.string(),
  suspendedAt: z.union([z.string(), z.null()]),
});

export const sessionHistoryEntrySchema: z.ZodType<SessionHistoryEntry> = z.object({
  id: z.string().min(1),
  name: z.union([z.string(), z.null()]),
  agentId: z.union([z.string(), z.null()]),
  scopeType: z.enum(['task', 'taskGroup', 'subtree', 'epicPhase', 'epic', 'custom']),
  rootTaskId: z.union([z.string(), z.null()]),
  computedTaskIds: z.array(z.string()),
  lastFocus: z.union([z.string(), z.null()]),
  startedAt: z.string(),
  endedAt: z.string(),
  stats: sessionStatsSchema,
  endNote: z.union([z.string(), z.null()]),
});

export const sessionPolicyConfigSchema: z.ZodType<SessionPolicyConfig> = z.object({
  maxConcurrentSessions: z.number().int().min(1),
  maxActiveTasksPerScope: z.number().int().min(1),
  allowNestedScopes: z.boolean(),
  allowScopeOverlap: z.boolean(),
});

export const sessionRegistrySchema: z.ZodType<SessionRegistry> = z.object({
  version: z.string(),
  project: z.string(),
  _meta: z.object({
    schemaVersion: z.string(),
    checksum: z.string(),
    lastModified: z.string(),
    totalSessionsCreated: z.number().int().min(0),
  }),
  config: sessionPolicyConfigSchema,
  sessions: z.array(sessionSchema),
  sessionHistory: z.array(sessionHistoryEntrySchema),
});

/** Render zod issues as `path: message` strings. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
