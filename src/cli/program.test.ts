import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createProgram, VERSION } from './program.js';

describe('CLI program', () => {
  let homeDir: string;
  let projectDir: string;
  let originalEnv: NodeJS.ProcessEnv;
  let logged: string[];

  beforeEach(async () => {
    homeDir = await mkdtemp(join(tmpdir(), 'gui2web-cli-home-'));
    projectDir = await mkdtemp(join(tmpdir(), 'gui2web-cli-project-'));
    originalEnv = { ...process.env };
    process.env['GUI2WEB_HOME'] = homeDir;
    logged = [];
    vi.spyOn(console, 'log').mockImplementation((message: unknown) => {
      logged.push(String(message));
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.env = originalEnv;
    process.exitCode = undefined;
    await rm(homeDir, { recursive: true, force: true });
    await rm(projectDir, { recursive: true, force: true });
  });

  it('should register the analyze, extract, config and cache commands', () => {
    const program = createProgram();
    expect(program.name()).toBe('gui2web');
    expect(program.version()).toBe(VERSION);
    expect(program.commands.map(command => command.name())).toEqual(['analyze', 'extract', 'config', 'cache']);
  });

  it('should print the analysis as JSON', async () => {
    await writeFile(join(projectDir, 'calc.py'), 'def add(a, b):\n    total = a + b\n    return total\n');

    await createProgram().parseAsync(['analyze', projectDir, '--name', 'calc', '--json'], { from: 'user' });

    expect(logged).toHaveLength(1);
    const output: unknown = JSON.parse(logged[0] ?? '');
    expect(output).toMatchObject({
      command: 'analyze',
      cached: false,
      result: { projectName: 'calc', webReadyPercentage: 100 },
    });
    expect(process.exitCode).toBeUndefined();
  });

  it('should report failures as JSON and set the exit code', async () => {
    await createProgram().parseAsync(['analyze', join(projectDir, 'missing'), '--json'], { from: 'user' });

    const output: unknown = JSON.parse(logged[0] ?? '');
    expect(output).toMatchObject({ code: 'INVALID_INPUT' });
    expect(process.exitCode).toBe(1);
  });

  it('should print the file table as CSV', async () => {
    await writeFile(join(projectDir, 'calc.py'), 'def add(a, b):\n    total = a + b\n    return total\n');
    const written: string[] = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });

    await createProgram().parseAsync(['analyze', projectDir, '--format', 'csv'], { from: 'user' });

    expect(written).toContain(
      'File Path,Lines of Code,UI Percentage (%),Pure Functions,Classification,Web Ready\ncalc.py,3,0.0,1,Logic,Yes\n'
    );
    expect(logged).toEqual([]);
  });

  it('should extract pure functions into a directory', async () => {
    await writeFile(join(projectDir, 'calc.py'), 'def add(a, b):\n    total = a + b\n    return total\n');
    const outDir = join(homeDir, 'export');

    await createProgram().parseAsync(['extract', projectDir, '-o', outDir, '--json'], { from: 'user' });

    const output: unknown = JSON.parse(logged[0] ?? '');
    expect(output).toMatchObject({ command: 'extract', outDir, files: ['calc_pure.py', 'README.md'], functionCount: 1 });
  });

  it('should print a text report', async () => {
    await writeFile(join(projectDir, 'calc.py'), 'def add(a, b):\n    total = a + b\n    return total\n');

    await createProgram().parseAsync(['analyze', projectDir, '--name', 'calc'], { from: 'user' });

    expect(logged[0]?.split('\n')[0]).toBe('Project: calc');
  });
});
