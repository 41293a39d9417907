/**
 * Task hierarchy operations - parent/child tree traversal.
 *
 * The parent→children index built here is shared by the scope resolver
 * and the hierarchy policy, so both walk the same edges.
 */

import type { Task } from '../../types/task.js';

/** Parent id → child ids, in Task Store order. */
export type ChildIndex = ReadonlyMap<string, readonly string[]>;

/**
 * Build a parent→children index over a task list in one pass.
 */
export function buildChildIndex(tasks: readonly Task[]): ChildIndex {
  const index = new Map<string, string[]>();
  for (const task of tasks) {
    if (task.parentId === null) continue;
    const siblings = index.get(task.parentId);
    if (siblings) {
      siblings.push(task.id);
    } else {
      index.set(task.parentId, [task.id]);
    }
  }
  return index;
}

/**
 * Get direct children of a task.
 */
export function getChildren(taskId: string, tasks: readonly Task[]): Task[] {
  return tasks.filter((t) => t.parentId === taskId);
}

/**
 * Collect descendant ids breadth-first, up to maxDepth levels below the root.
 * The visited set guarantees termination on cyclic parent data; the root
 * itself is never returned.
 */
export function collectDescendantIds(
  rootId: string,
  index: ChildIndex,
  maxDepth: number = Number.POSITIVE_INFINITY,
): string[] {
  const result: string[] = [];
  const visited = new Set<string>([rootId]);
  let frontier: string[] = [rootId];

  for (let depth = 1; depth <= maxDepth && frontier.length > 0; depth++) {
    const next: string[] = [];
    for (const parentId of frontier) {
      for (const childId of index.get(parentId) ?? []) {
        if (visited.has(childId)) continue;
        visited.add(childId);
        result.push(childId);
        next.push(childId);
      }
    }
    frontier = next;
  }

  return result;
}

/**
 * Get the parent chain (ancestors) from a task up to the root.
 * Returns ordered from immediate parent to root.
 */
export function getParentChain(taskId: string, tasks: readonly Task[]): Task[] {
  const chain: Task[] = [];
  const taskMap = new Map(tasks.map((t) => [t.id, t]));
  let current = taskMap.get(taskId);
  const visited = new Set<string>([taskId]);

  while (current && current.parentId !== null) {
    if (visited.has(current.parentId)) break; // circular reference guard
    visited.add(current.parentId);
    const parent = taskMap.get(current.parentId);
    if (!parent) break;
    chain.push(parent);
    current = parent;
  }

  return chain;
}

/**
 * Calculate depth of a task in the hierarchy (0-based).
 * Root tasks have depth 0, their children depth 1, etc.
 */
export function getDepth(taskId: string, tasks: readonly Task[]): number {
  return getParentChain(taskId, tasks).length;
}
