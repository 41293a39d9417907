/**
 * Tests for the configuration engine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { DEFAULTS, getConfigValue, loadConfig, setConfigValue } from '../config.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('config', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tasklane-test-'));
    await mkdir(join(tempDir, '.tasklane'));
    configPath = join(tempDir, '.tasklane', 'config.json');
  });

  afterEach(async () => {
    delete process.env['TASKLANE_LOCK_TIMEOUT_MS'];
    delete process.env['TASKLANE_LOG_LEVEL'];
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('returns the defaults when there is no project config', async () => {
      expect(await loadConfig(tempDir)).toEqual(DEFAULTS);
    });

    it('deep-merges the project config over the defaults', async () => {
      await writeFile(configPath, JSON.stringify({ lock: { timeoutMs: 500 } }));
      const config = await loadConfig(tempDir);
      expect(config.lock).toEqual({ timeoutMs: 500, staleMs: 10_000 });
      expect(config.backup.maxBackups).toBe(10);
    });

    it('lets environment variables override the project config', async () => {
      await writeFile(configPath, JSON.stringify({ lock: { timeoutMs: 500 } }));
      process.env['TASKLANE_LOCK_TIMEOUT_MS'] = '750';
      process.env['TASKLANE_LOG_LEVEL'] = 'debug';
      const config = await loadConfig(tempDir);
      expect(config.lock.timeoutMs).toBe(750);
      expect(config.logging.level).toBe('debug');
    });

    it('fails with CONFIG_ERROR on an out-of-range value', async () => {
      await writeFile(configPath, JSON.stringify({ lock: { staleMs: 100 } }));
      await expect(loadConfig(tempDir)).rejects.toMatchObject({ code: ExitCode.CONFIG_ERROR });
    });

    it('fails with CONFIG_ERROR when the file is not an object', async () => {
      await writeFile(configPath, '[1, 2]');
      await expect(loadConfig(tempDir)).rejects.toMatchObject({
        code: ExitCode.CONFIG_ERROR,
        message: `Config must be a JSON object: ${configPath}`,
      });
    });

    it('does not share nested objects with DEFAULTS', async () => {
      const config = await loadConfig(tempDir);
      config.lock.timeoutMs = 1;
      expect(DEFAULTS.lock.timeoutMs).toBe(30_000);
    });
  });

  describe('getConfigValue', () => {
    it('reports the default source', async () => {
      expect(await getConfigValue('backup.maxBackups', tempDir)).toEqual({ value: 10, source: 'default' });
    });

    it('reports the project source', async () => {
      await writeFile(configPath, JSON.stringify({ backup: { maxBackups: 3 } }));
      expect(await getConfigValue('backup.maxBackups', tempDir)).toEqual({ value: 3, source: 'project' });
    });

    it('reports the env source', async () => {
      process.env['TASKLANE_LOCK_TIMEOUT_MS'] = '1200';
      expect(await getConfigValue('lock.timeoutMs', tempDir)).toEqual({ value: 1200, source: 'env' });
    });
  });

  describe('setConfigValue', () => {
    it('writes a nested value to the project config', async () => {
      await setConfigValue('hierarchy.maxSiblings', 4, tempDir);
      expect(JSON.parse(await readFile(configPath, 'utf8'))).toEqual({ hierarchy: { maxSiblings: 4 } });
      expect((await loadConfig(tempDir)).hierarchy).toEqual({ maxDepth: 3, maxSiblings: 4 });
    });

    it('rejects a value the schema refuses', async () => {
      await expect(setConfigValue('backup.maxBackups', 0, tempDir)).rejects.toMatchObject({
        code: ExitCode.CONFIG_ERROR,
      });
    });
  });
});
