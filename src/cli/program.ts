/**
 * Command tree for the tasklane CLI.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerAddCommand } from './commands/add.js';
import { registerListCommand } from './commands/list.js';
import { registerShowCommand } from './commands/show.js';
import { registerCompleteCommand } from './commands/complete.js';
import { registerSessionCommand } from './commands/session.js';
import { registerBackupCommand } from './commands/backup.js';
import { initLogger, getLogger } from '../core/logger.js';
import { loadConfig } from '../core/config.js';
import { getDataDir } from '../core/paths.js';

/** Read the version from the nearest package.json above this module. */
export function getPackageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 5; i++) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      const version: unknown =
        typeof pkg === 'object' && pkg !== null ? Reflect.get(pkg, 'version') : undefined;
      return typeof version === 'string' ? version : '0.0.0';
    }
    dir = dirname(dir);
  }
  return '0.0.0';
}

/**
 * Start file logging once the project has a data directory; until then
 * the stderr fallback logger stays in place.
 */
async function setupLogging(): Promise<void> {
  const dataDir = getDataDir();
  if (!existsSync(dataDir)) return;
  try {
    const config = await loadConfig();
    initLogger(dataDir, config.logging);
  } catch (err) {
    getLogger('cli').warn({ err }, 'File logging unavailable, using stderr');
  }
}

/** Build the CLI program. */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('tasklane')
    .description('File-based task store with concurrent, scope-claiming sessions')
    .version(getPackageVersion());

  let loggerInitialized = false;
  program.hook('preAction', async () => {
    if (loggerInitialized) return;
    loggerInitialized = true;
    await setupLogging();
  });

  registerInitCommand(program);
  registerAddCommand(program);
  registerListCommand(program);
  registerShowCommand(program);
  registerCompleteCommand(program);
  registerSessionCommand(program);
  registerBackupCommand(program);

  return program;
}
