/**
 * pino logging for tasklane.
 *
 * One root logger per process, written to a rotating file under the data
 * directory through pino-roll. Modules take a child with getLogger(name).
 *
 * stdout is reserved for CLI JSON envelopes, so diagnostics go to the log
 * file, or to stderr before initLogger has run.
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

const LOGGER_OPTIONS = {
  formatters: {
    level: (label: string) => ({ level: label.toUpperCase() }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
} satisfies pino.LoggerOptions;

let rootLogger: pino.Logger | null = null;
let stderrLogger: pino.Logger | null = null;

/** pino-roll size string ('512k', '10m', '1g') for a byte count. */
function rollSize(bytes: number): string {
  const units: Array<[string, number]> = [['g', 1024 ** 3], ['m', 1024 ** 2], ['k', 1024]];
  for (const [suffix, scale] of units) {
    if (bytes >= scale) return `${Math.floor(bytes / scale)}${suffix}`;
  }
  return String(bytes);
}

/**
 * Route all subsequent logging to `<dataDir>/<config.filePath>`, rotated
 * daily or at maxFileSize and capped at maxFiles.
 */
export function initLogger(dataDir: string, config: LoggingConfig): pino.Logger {
  const file = join(dataDir, config.filePath);
  mkdirSync(dirname(file), { recursive: true });

  // Runs in a worker thread.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file,
      size: rollSize(config.maxFileSize),
      frequency: 'daily',
      mkdir: true,
      limit: { count: config.maxFiles },
    },
  });

  rootLogger = pino({ ...LOGGER_OPTIONS, level: config.level }, transport);
  return rootLogger;
}

/**
 * Child logger tagged with a subsystem ('sessions', 'store', 'audit', ...).
 * Before initLogger it logs to stderr at TASKLANE_LOG_LEVEL, default warn.
 */
export function getLogger(subsystem: string): pino.Logger {
  if (rootLogger) {
    return rootLogger.child({ subsystem });
  }
  stderrLogger ??= pino(
    { ...LOGGER_OPTIONS, level: process.env['TASKLANE_LOG_LEVEL'] ?? 'warn' },
    pino.destination(2),
  );
  return stderrLogger.child({ subsystem });
}

/** Flush the file logger and fall back to stderr. */
export function closeLogger(): void {
  rootLogger?.flush();
  rootLogger = null;
}
