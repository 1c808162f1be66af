/**
 * Analyze CLI command - score a desktop GUI project for web readiness
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { analyzeProject } from '../../core/analyzer.js';
import { collectProject } from '../../core/collector.js';
import { createJobId } from '../../core/hash.js';
import { getResult, openResultCache, setResult } from '../../storage/cache.js';
import { loadConfig } from '../../storage/config.js';
import type { AnalysisInput, ProgressSink, ProjectAnalysisResult } from '../../types/analysis.js';
import { getResultsPath } from '../utils/paths.js';
import { createChildLogger } from '../../utils/logger.js';

/**
 * Options for analyze command
 */
export interface AnalyzeCommandOptions {
  /** Project name (defaults to the directory name) */
  name?: string;
  /** Write the JSON result to this file */
  output?: string;
  /** Use the result cache (default: config.cacheResults) */
  cache?: boolean;
  /** Run timeout in milliseconds (default: config.timeoutMs) */
  timeout?: number;
  onProgress?: ProgressSink;
}

export interface AnalyzeCommandResult {
  jobId: string;
  cached: boolean;
  result: ProjectAnalysisResult;
  /** The collected sources the result describes */
  input: AnalysisInput;
  /** Files skipped for size */
  oversized: string[];
  /** Whether the file limit cut collection short */
  truncated: boolean;
}

/**
 * Run the analyze command
 */
export async function runAnalyzeCommand(
  sourcePath: string,
  options: AnalyzeCommandOptions = {}
): Promise<AnalyzeCommandResult> {
  const config = await loadConfig();
  const log = createChildLogger('analyze-command');

  const collected = await collectProject(sourcePath, {
    name: options.name,
    excludes: config.excludes,
    maxFiles: config.maxFiles,
    maxDepth: config.maxDepth,
    maxFileSize: config.maxFileSize,
  });
  const jobId = createJobId(collected.input);

  const useCache = options.cache !== false && config.cacheResults;
  const cache = useCache ? await openResultCache(getResultsPath()) : null;

  let result = cache ? await getResult(cache, jobId) : null;
  const cached = result !== null;

  if (result) {
    log.debug({ jobId }, 'Using cached result');
    options.onProgress?.({ percent: 100, status: 'completed', message: 'Loaded cached analysis' });
  } else {
    result = await analyzeProject(collected.input, {
      onProgress: options.onProgress,
      timeoutMs: options.timeout ?? config.timeoutMs,
    });
    if (cache) {
      await setResult(cache, jobId, result);
    }
  }

  if (options.output) {
    const target = resolve(options.output);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, JSON.stringify(result, null, 2), 'utf-8');
  }

  return {
    jobId,
    cached,
    result,
    input: collected.input,
    oversized: collected.oversized,
    truncated: collected.truncated,
  };
}
