import type { ConfigKey, Gui2WebConfig } from '../../storage/config.js';
import type { ProjectAnalysisResult } from '../../types/analysis.js';

/**
 * JSON error format
 */
export interface JsonError {
  error: string;
  code: string;
}

/**
 * JSON output for the analyze command
 */
export interface JsonAnalyzeOutput {
  command: 'analyze';
  jobId: string;
  /** Whether the result came from the cache */
  cached: boolean;
  result: ProjectAnalysisResult;
}

/**
 * JSON output for the extract command
 */
export interface JsonExtractOutput {
  command: 'extract';
  jobId: string;
  outDir: string;
  files: string[];
  functionCount: number;
}

/**
 * JSON output for the config command
 */
export interface JsonConfigOutput {
  command: 'config';
  config: Partial<Record<ConfigKey, Gui2WebConfig[ConfigKey]>>;
  /** Key that was just set */
  updated?: string;
}

/**
 * JSON output for the cache command
 */
export interface JsonCacheOutput {
  command: 'cache';
  action: 'stats' | 'clear';
  count: number;
  bytes?: number;
}

export type JsonOutput = JsonAnalyzeOutput | JsonExtractOutput | JsonConfigOutput | JsonCacheOutput;

/**
 * Serialize command output as a single JSON line
 */
export function formatAsJson(output: JsonOutput | JsonError): string {
  return JSON.stringify(output);
}

function hasCode(error: unknown): error is { code: string } {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

/**
 * Error payload for --json output. Errors that carry a code keep it.
 */
export function formatErrorJson(error: unknown): JsonError {
  const message = error instanceof Error ? error.message : String(error);

  let code = 'COMMAND_ERROR';
  if (hasCode(error)) {
    code = error.code;
  } else if (message.toLowerCase().includes('unknown')) {
    code = 'VALIDATION_ERROR';
  }

  return { error: message, code };
}
