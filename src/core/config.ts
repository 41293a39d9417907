/**
 * Configuration engine for tasklane.
 *
 * Resolution priority: Environment vars > Project config > Defaults
 */

import { z } from 'zod/v4';
import type { ResolvedValue, TasklaneConfig } from '../types/config.js';
import { readJson, saveJson } from '../store/json.js';
import { formatIssues } from '../store/validation-schemas.js';
import { TasklaneError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { getConfigPath } from './paths.js';

/** Default configuration values. */
export const DEFAULTS: TasklaneConfig = {
  version: '1.0.0',
  lock: {
    timeoutMs: 30_000,
    staleMs: 10_000,
  },
  backup: {
    maxBackups: 10,
  },
  retry: {
    maxAttempts: 4,
    initialDelayMs: 100,
    multiplier: 2,
    maxTotalMs: 5_000,
  },
  hierarchy: {
    maxDepth: 3,
    maxSiblings: 0,
  },
  logging: {
    level: 'info',
    filePath: 'logs/tasklane.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

const configSchema: z.ZodType<TasklaneConfig> = z.object({
  version: z.string(),
  lock: z.object({
    timeoutMs: z.number().int().min(0),
    staleMs: z.number().int().min(2_000),
  }),
  backup: z.object({
    maxBackups: z.number().int().min(1),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1),
    initialDelayMs: z.number().min(0),
    multiplier: z.number().min(1),
    maxTotalMs: z.number().min(0),
  }),
  hierarchy: z.object({
    maxDepth: z.number().int().min(1),
    maxSiblings: z.number().int().min(0),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().min(1),
    maxFiles: z.number().int().min(1),
  }),
});

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'TASKLANE_LOCK_TIMEOUT_MS': 'lock.timeoutMs',
  'TASKLANE_LOCK_STALE_MS': 'lock.staleMs',
  'TASKLANE_BACKUP_MAX': 'backup.maxBackups',
  'TASKLANE_RETRY_MAX_ATTEMPTS': 'retry.maxAttempts',
  'TASKLANE_RETRY_INITIAL_DELAY_MS': 'retry.initialDelayMs',
  'TASKLANE_RETRY_MULTIPLIER': 'retry.multiplier',
  'TASKLANE_RETRY_MAX_TOTAL_MS': 'retry.maxTotalMs',
  'TASKLANE_HIERARCHY_MAX_DEPTH': 'hierarchy.maxDepth',
  'TASKLANE_HIERARCHY_MAX_SIBLINGS': 'hierarchy.maxSiblings',
  'TASKLANE_LOG_LEVEL': 'logging.level',
  'TASKLANE_LOG_FILE': 'logging.filePath',
};

/** Deep copy of the defaults as a mutable record. */
function cloneDefaults(): Record<string, unknown> {
  return JSON.parse(JSON.stringify(DEFAULTS));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

async function readProjectConfig(cwd?: string): Promise<Record<string, unknown> | null> {
  const configPath = getConfigPath(cwd);
  const raw = await readJson(configPath);
  if (raw === null) return null;
  if (!isPlainObject(raw)) {
    throw new TasklaneError(ExitCode.CONFIG_ERROR, `Config must be a JSON object: ${configPath}`);
  }
  return raw;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < project config < environment vars
 */
export async function loadConfig(cwd?: string): Promise<TasklaneConfig> {
  let merged = cloneDefaults();

  const projectConfig = await readProjectConfig(cwd);
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue));
    }
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new TasklaneError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration: ${formatIssues(parsed.error).join('; ')}`,
      { fix: `Check ${getConfigPath(cwd)} and TASKLANE_* environment variables` },
    );
  }
  return parsed.data;
}

/**
 * Get a single config value with source tracking.
 */
export async function getConfigValue(
  path: string,
  cwd?: string,
): Promise<ResolvedValue<unknown>> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue), source: 'env' };
    }
  }

  const projectConfig = await readProjectConfig(cwd);
  const projectVal = getNestedValue(projectConfig, path);
  if (projectVal !== undefined) {
    return { value: projectVal, source: 'project' };
  }

  return { value: getNestedValue(DEFAULTS, path), source: 'default' };
}

/**
 * Set a value in the project config file.
 * The result is validated against the full config schema before it is saved.
 */
export async function setConfigValue(
  path: string,
  value: unknown,
  cwd?: string,
): Promise<void> {
  const config = (await readProjectConfig(cwd)) ?? {};
  setNestedValue(config, path, value);

  const parsed = configSchema.safeParse(deepMerge(cloneDefaults(), config));
  if (!parsed.success) {
    throw new TasklaneError(
      ExitCode.CONFIG_ERROR,
      `Invalid value for ${path}: ${formatIssues(parsed.error).join('; ')}`,
    );
  }

  await saveJson(getConfigPath(cwd), config);
}
