/**
 * Task Store type definitions (tasks.json).
 */

import type { TaskPriority, TaskStatus } from '../store/status-registry.js';
export type { TaskPriority, TaskStatus };

/** A single task record. Ids are stable and never reused. */
export interface Task {
  id: string;
  title: string;
  description?: string;
  status: TaskStatus;
  priority: TaskPriority;
  /** Hierarchy edge only; does not imply ownership. */
  parentId: string | null;
  phase: string | null;
  createdAt: string;
  updatedAt: string;
  completedAt?: string | null;
}

/** Task Store metadata block. */
export interface TaskStoreMeta {
  schemaVersion: string;
  checksum: string;
  lastModified: string;
  /** Number of live sessions currently holding a focus claim. */
  activeSessionCount: number;
  multiSessionEnabled: boolean;
  /** Last issued task number; ids are never reused. */
  taskSequence: number;
}

/** The Task Store document. */
export interface TaskStore {
  version: string;
  project: string;
  _meta: TaskStoreMeta;
  tasks: Task[];
}
