/**
 * Project initialization: create the data directory and empty documents.
 */

import { mkdir, stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { atomicWriteJson } from '../store/atomic.js';
import { withLock } from '../store/lock.js';
import { createEmptyTaskStore } from '../store/task-store.js';
import { createEmptySessionRegistry } from '../store/session-store.js';
import {
  sessionRegistryValidator,
  taskStoreValidator,
  type DocumentValidator,
} from './validation/document-validator.js';
import { errnoCode, TasklaneError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { getDataDir, getSessionsPath, getTaskStorePath } from './paths.js';
import { getLogger } from './logger.js';

export interface InitOptions {
  /** Project name recorded in both documents. Default: the directory name. */
  name?: string;
}

export interface InitResult {
  dataDir: string;
  created: string[];
  skipped: string[];
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return false;
    throw new TasklaneError(ExitCode.FILE_ERROR, `Cannot access: ${path}`, { cause: err });
  }
}

/** Create a document under its lock unless it already exists. */
async function createIfMissing(
  filePath: string,
  body: unknown,
  validator: DocumentValidator,
): Promise<boolean> {
  return withLock(filePath, async () => {
    if (await exists(filePath)) return false;
    await atomicWriteJson(filePath, body, { validator });
    return true;
  });
}

/**
 * Initialize a project. Idempotent: existing documents are left alone and
 * reported under `skipped`; an empty `created` means nothing changed.
 */
export async function initProject(options: InitOptions = {}, cwd?: string): Promise<InitResult> {
  const dataDir = getDataDir(cwd);
  const project = options.name ?? basename(resolve(cwd ?? process.cwd()));
  const now = new Date().toISOString();

  try {
    await mkdir(dataDir, { recursive: true });
  } catch (err) {
    throw new TasklaneError(ExitCode.FILE_ERROR, `Cannot create data directory: ${dataDir}`, { cause: err });
  }

  const created: string[] = [];
  const skipped: string[] = [];

  const tasksPath = getTaskStorePath(cwd);
  if (await createIfMissing(tasksPath, createEmptyTaskStore(project, now), taskStoreValidator)) {
    created.push(tasksPath);
  } else {
    skipped.push(tasksPath);
  }

  const sessionsPath = getSessionsPath(cwd);
  if (await createIfMissing(sessionsPath, createEmptySessionRegistry(project, now), sessionRegistryValidator)) {
    created.push(sessionsPath);
  } else {
    skipped.push(sessionsPath);
  }

  getLogger('init').info({ dataDir, created: created.length }, 'Project initialized');
  return { dataDir, created, skipped };
}
