import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runExtractCommand } from './extract.js';

const PRICING = `def net_price(price, quantity):
    subtotal = price * quantity
    return subtotal * 1.2
`;

describe('runExtractCommand', () => {
  let homeDir: string;
  let projectDir: string;
  let outDir: string;
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(async () => {
    homeDir = await mkdtemp(join(tmpdir(), 'gui2web-home-'));
    projectDir = await mkdtemp(join(tmpdir(), 'gui2web-project-'));
    outDir = join(homeDir, 'export');
    originalEnv = { ...process.env };
    process.env['GUI2WEB_HOME'] = homeDir;
    await mkdir(join(projectDir, 'shop'));
    await writeFile(join(projectDir, 'shop', 'pricing.py'), PRICING);
  });

  afterEach(async () => {
    process.env = originalEnv;
    await rm(homeDir, { recursive: true, force: true });
    await rm(projectDir, { recursive: true, force: true });
  });

  it('should write the pure modules and a README', async () => {
    const outcome = await runExtractCommand(projectDir, { outDir, name: 'shop' });

    expect(outcome.outDir).toBe(outDir);
    expect(outcome.functionCount).toBe(1);
    expect(outcome.files).toEqual(['shop/pricing_pure.py', 'README.md']);

    const module = await readFile(join(outDir, 'shop', 'pricing_pure.py'), 'utf-8');
    expect(module.split('\n').slice(-5)).toEqual([
      '# Original location: lines 1-3',
      'def net_price(price, quantity):',
      '    subtotal = price * quantity',
      '    return subtotal * 1.2',
      '',
    ]);

    const readme = await readFile(join(outDir, 'README.md'), 'utf-8');
    expect(readme.split('\n')[0]).toBe('# Extracted pure functions: shop');
  });

  it('should reuse the cached analysis', async () => {
    const first = await runExtractCommand(projectDir, { outDir });
    const second = await runExtractCommand(projectDir, { outDir: join(homeDir, 'again') });

    expect(second.jobId).toBe(first.jobId);
    expect(second.files).toEqual(first.files);
  });
});
