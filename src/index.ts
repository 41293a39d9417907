/**
 * tasklane public API.
 */

export * from './types/exit-codes.js';
export type * from './types/task.js';
export type * from './types/session.js';
export type * from './types/config.js';
export { TasklaneError, isTasklaneError, type DocumentName, type ErrorDetails } from './core/errors.js';
export { loadConfig, getConfigValue, setConfigValue, DEFAULTS } from './core/config.js';
export { withRetry, DEFAULT_RETRY_POLICY, NO_RETRY } from './core/retry.js';
export { initProject, type InitOptions, type InitResult } from './core/init.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';
export { readAuditLog, type AuditEvent, type AuditAction } from './core/system/audit-log.js';
export { listDocumentBackups, restoreBackup, type RestoreResult } from './core/system/backup.js';
export * from './core/sessions/index.js';
export { addTask, normalizePriority, type AddTaskOptions, type AddTaskResult } from './core/tasks/add.js';
export { listTasks, type ListTasksOptions, type ListTasksResult } from './core/tasks/list.js';
export { showTask, type TaskDetail } from './core/tasks/show.js';
export { completeTask, type CompleteTaskResult } from './core/tasks/complete.js';
export { createHierarchyPolicy, type HierarchyPolicyService } from './core/tasks/hierarchy-policy.js';
export { createDataAccessor, getAccessor, type DataAccessor } from './store/data-accessor.js';
export {
  runSessionTransaction,
  runTaskStoreTransaction,
  type SessionSnapshot,
  type TaskSnapshot,
  type TransactionOutcome,
} from './store/transaction.js';
export { atomicWrite, atomicWriteJson, type AtomicWriteResult } from './store/atomic.js';
export { acquireLock, releaseLock, withLock, type LockHandle } from './store/lock.js';
export { taskStoreValidator, sessionRegistryValidator } from './core/validation/document-validator.js';
