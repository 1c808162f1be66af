/**
 * Extract CLI command - write the pure functions of a project as web-ready modules
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { buildExtraction } from '../../core/extractor.js';
import { createChildLogger } from '../../utils/logger.js';
import { runAnalyzeCommand, type AnalyzeCommandOptions } from './analyze.js';

export interface ExtractCommandOptions extends Omit<AnalyzeCommandOptions, 'output'> {
  /** Directory the modules are written to */
  outDir: string;
}

export interface ExtractCommandResult {
  jobId: string;
  outDir: string;
  /** Written files relative to outDir, README last */
  files: string[];
  functionCount: number;
}

/**
 * Run the extract command
 */
export async function runExtractCommand(
  sourcePath: string,
  options: ExtractCommandOptions
): Promise<ExtractCommandResult> {
  const log = createChildLogger('extract-command');
  const { outDir, ...analyzeOptions } = options;

  const outcome = await runAnalyzeCommand(sourcePath, analyzeOptions);
  const extraction = buildExtraction(outcome.result, outcome.input.files);

  const root = resolve(outDir);
  for (const file of extraction.files) {
    const target = join(root, file.path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, file.content, 'utf-8');
  }
  log.debug({ outDir: root, files: extraction.files.length }, 'Extraction written');

  return {
    jobId: outcome.jobId,
    outDir: root,
    files: extraction.files.map(file => file.path),
    functionCount: extraction.functionCount,
  };
}
