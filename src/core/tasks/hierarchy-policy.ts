/**
 * Hierarchy policy: answers whether a parent may accept another child.
 * Consulted by task-creation flows.
 */

import type { Task } from '../../types/task.js';
import type { HierarchyConfig } from '../../types/config.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getChildren, getDepth } from './hierarchy.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type HierarchyPolicy = HierarchyConfig;

export interface HierarchyValidationResult {
  valid: boolean;
  error?: {
    code: ExitCode.PARENT_NOT_FOUND | ExitCode.DEPTH_EXCEEDED | ExitCode.SIBLING_LIMIT;
    message: string;
  };
}

/** Collaborator interface consulted before a task is placed under a parent. */
export interface HierarchyPolicyService {
  canAcceptChild(parentId: string | null, tasks: readonly Task[]): HierarchyValidationResult;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Validate whether a new task can be placed under the given parent.
 * Root placement is always allowed. Done children do not count toward
 * the sibling limit; maxSiblings 0 means unlimited.
 */
export function validateHierarchyPlacement(
  parentId: string | null,
  tasks: readonly Task[],
  policy: HierarchyPolicy,
): HierarchyValidationResult {
  if (parentId === null) {
    return { valid: true };
  }

  if (!tasks.some((t) => t.id === parentId)) {
    return {
      valid: false,
      error: { code: ExitCode.PARENT_NOT_FOUND, message: `Parent task ${parentId} not found` },
    };
  }

  const parentDepth = getDepth(parentId, tasks);
  if (parentDepth + 1 >= policy.maxDepth) {
    return {
      valid: false,
      error: {
        code: ExitCode.DEPTH_EXCEEDED,
        message: `Maximum nesting depth ${policy.maxDepth} would be exceeded`,
      },
    };
  }

  if (policy.maxSiblings > 0) {
    const counted = getChildren(parentId, tasks).filter((t) => t.status !== 'done').length;
    if (counted >= policy.maxSiblings) {
      return {
        valid: false,
        error: {
          code: ExitCode.SIBLING_LIMIT,
          message: `Parent ${parentId} already has ${counted} children (limit: ${policy.maxSiblings})`,
        },
      };
    }
  }

  return { valid: true };
}

/** Create the default policy service from hierarchy config. */
export function createHierarchyPolicy(policy: HierarchyPolicy): HierarchyPolicyService {
  return {
    canAcceptChild: (parentId, tasks) => validateHierarchyPlacement(parentId, tasks, policy),
  };
}
