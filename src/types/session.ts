/**
 * Session Registry type definitions (sessions.json).
 * Multi-agent session tracking with claimable task scopes.
 */

import type { SessionStatus, ScopeType } from '../store/status-registry.js';
export type { SessionStatus, ScopeType };

/** Fields shared by every scope declaration. */
interface ScopeBase {
  /** Recursion bound for descendant walks. Default: 10. */
  maxDepth?: number;
  /** Ids subtracted from the resolved set. */
  excludeTaskIds?: string[];
}

/** Scope anchored on a root task. */
export interface AnchoredScope extends ScopeBase {
  type: 'task' | 'taskGroup' | 'subtree' | 'epic';
  rootTaskId: string;
}

/** Anchored scope filtered to one phase. */
export interface EpicPhaseScope extends ScopeBase {
  type: 'epicPhase';
  rootTaskId: string;
  phaseFilter: string;
}

/** Explicit id list supplied by the caller. */
export interface CustomScope extends ScopeBase {
  type: 'custom';
  taskIds: string[];
}

/** Declarative description of which tasks a session may claim. */
export type ScopeDeclaration = AnchoredScope | EpicPhaseScope | CustomScope;

/** A scope declaration plus its resolved set, frozen at session creation. */
export type SessionScope = ScopeDeclaration & {
  computedTaskIds: string[];
  computedAt: string;
};

/** One entry of the append-only focus history. */
export interface FocusHistoryEntry {
  taskId: string;
  timestamp: string;
  action: 'focused' | 'completed';
}

/** Focus state within a session. */
export interface SessionFocus {
  currentTask: string | null;
  previousTask: string | null;
  focusHistory: FocusHistoryEntry[];
  sessionNote: string | null;
}

/** Session counters. */
export interface SessionStats {
  tasksCompleted: number;
  focusChanges: number;
  suspendCount: number;
  resumeCount: number;
}

/** A live session record. */
export interface Session {
  id: string;
  status: SessionStatus;
  name: string | null;
  agentId: string | null;
  scope: SessionScope;
  focus: SessionFocus;
  stats: SessionStats;
  startedAt: string;
  lastActivity: string;
  suspendedAt: string | null;
}

/** Immutable record of an ended session. */
export interface SessionHistoryEntry {
  id: string;
  name: string | null;
  agentId: string | null;
  scopeType: ScopeType;
  rootTaskId: string | null;
  computedTaskIds: string[];
  lastFocus: string | null;
  startedAt: string;
  endedAt: string;
  stats: SessionStats;
  endNote: string | null;
}

/** Session policy stored in the registry. */
export interface SessionPolicyConfig {
  maxConcurrentSessions: number;
  maxActiveTasksPerScope: number;
  allowNestedScopes: boolean;
  allowScopeOverlap: boolean;
}

/** Session Registry metadata block. */
export interface SessionRegistryMeta {
  schemaVersion: string;
  checksum: string;
  lastModified: string;
  totalSessionsCreated: number;
}

/** The Session Registry document. */
export interface SessionRegistry {
  version: string;
  project: string;
  _meta: SessionRegistryMeta;
  config: SessionPolicyConfig;
  sessions: Session[];
  sessionHistory: SessionHistoryEntry[];
}
