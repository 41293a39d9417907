/**
 * Configuration type definitions for tasklane.
 * Covers the project config with env-var cascade resolution.
 */

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Advisory lock configuration. */
export interface LockConfig {
  /** Maximum time to wait for a lock before LOCK_TIMEOUT. */
  timeoutMs: number;
  /** Age after which an abandoned lock is considered stale. */
  staleMs: number;
}

/** Backup configuration. */
export interface BackupConfig {
  /** Numbered backups retained per document. */
  maxBackups: number;
}

/** Retry policy for recoverable failures. */
export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  multiplier: number;
  /** Cap on total wall time spent waiting between attempts. */
  maxTotalMs: number;
}

/** Hierarchy configuration. */
export interface HierarchyConfig {
  maxDepth: number;
  /** Maximum non-done siblings under one parent. 0 = unlimited. */
  maxSiblings: number;
}

/** Logging configuration. */
export interface LoggingConfig {
  level: LogLevel;
  /** Log file path relative to the data directory. */
  filePath: string;
  maxFileSize: number;
  maxFiles: number;
}

/** tasklane project configuration. */
export interface TasklaneConfig {
  version: string;
  lock: LockConfig;
  backup: BackupConfig;
  retry: RetryPolicy;
  hierarchy: HierarchyConfig;
  logging: LoggingConfig;
}

/** Config source for resolution priority. */
export type ConfigSource = 'default' | 'project' | 'env';

/** Resolved config value with source tracking. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
