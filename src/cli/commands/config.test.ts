import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { runConfigCommand } from './config.js';

describe('config command', () => {
  let testDir: string;
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(async () => {
    testDir = join(tmpdir(), `gui2web-config-cmd-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });

    originalEnv = { ...process.env };
    process.env['GUI2WEB_HOME'] = testDir;
  });

  afterEach(async () => {
    process.env = originalEnv;
    await rm(testDir, { recursive: true, force: true });
  });

  describe('show all config', () => {
    it('should show default config when no config file exists', async () => {
      const output = await runConfigCommand();

      expect(output).toContain('maxFiles: 1000');
      expect(output).toContain('cacheResults: true');
      expect(output).toContain('timeoutMs: 0');
    });

    it('should show saved config values', async () => {
      await writeFile(join(testDir, 'config.json'), JSON.stringify({ maxDepth: 3 }));

      const output = await runConfigCommand();
      expect(output).toContain('maxDepth: 3');
    });

    it('should output JSON', async () => {
      const output = await runConfigCommand(undefined, undefined, true);
      const parsed: unknown = JSON.parse(output);
      expect(parsed).toMatchObject({ command: 'config', config: { maxFiles: 1000 } });
    });
  });

  describe('get single value', () => {
    it('should print one value', async () => {
      expect(await runConfigCommand('maxDepth')).toBe('10');
    });

    it('should read a stored value back', async () => {
      await runConfigCommand('excludes', 'build, dist');
      expect(await runConfigCommand('excludes')).toBe('build, dist');
      expect(await runConfigCommand('excludes', undefined, true)).toBe(
        '{"command":"config","config":{"excludes":["build","dist"]}}'
      );
    });

    it('should reject unknown keys', async () => {
      await expect(runConfigCommand('model')).rejects.toThrow('Unknown config key: model');
    });
  });

  describe('set value', () => {
    it('should persist a number', async () => {
      const output = await runConfigCommand('maxFiles', '250');
      expect(output).toBe('Set maxFiles = 250');

      const saved: unknown = JSON.parse(await readFile(join(testDir, 'config.json'), 'utf-8'));
      expect(saved).toMatchObject({ maxFiles: 250 });
    });

    it('should persist a list', async () => {
      const output = await runConfigCommand('excludes', 'venv,build');
      expect(output).toBe('Set excludes = venv, build');
      expect(await runConfigCommand('excludes')).toBe('venv, build');
    });

    it('should persist a boolean', async () => {
      expect(await runConfigCommand('cacheResults', 'false')).toBe('Set cacheResults = false');
    });

    it('should reject values the schema does not accept', async () => {
      await expect(runConfigCommand('maxFiles', '-1')).rejects.toThrow();
      await expect(runConfigCommand('cacheResults', 'maybe')).rejects.toThrow('expected true or false');
    });

    it('should report the updated key in JSON', async () => {
      const output = await runConfigCommand('timeoutMs', '5000', true);
      expect(JSON.parse(output)).toEqual({ command: 'config', config: { timeoutMs: 5000 }, updated: 'timeoutMs' });
    });
  });
});
