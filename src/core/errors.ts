/**
 * Error kinds raised by the analysis engine.
 *
 * Per-file errors (ParseError, UnsupportedEncodingError) are recovered by the
 * analyzer and recorded on the file's result. Run-level errors move the run
 * to `failed`.
 */

import type { FileAnalysis } from './ast/types.js';

export abstract class AnalysisError extends Error {
  abstract readonly code: string;
  /** Whether the error aborts the whole run */
  abstract readonly fatal: boolean;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): { name: string; code: string; message: string } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

export class ParseError extends AnalysisError {
  readonly code = 'PARSE_ERROR';
  readonly fatal = false;

  constructor(
    public readonly path: string,
    public readonly line?: number,
    detail = 'invalid syntax'
  ) {
    super(line !== undefined ? `${path}:${line}: ${detail}` : `${path}: ${detail}`);
  }
}

export class UnsupportedEncodingError extends AnalysisError {
  readonly code = 'UNSUPPORTED_ENCODING';
  readonly fatal = false;

  constructor(public readonly path: string) {
    super(`${path}: content is not valid UTF-8 text`);
  }
}

export class EmptyInputError extends AnalysisError {
  readonly code = 'EMPTY_INPUT';
  readonly fatal = true;

  constructor() {
    super('No files to analyze');
  }
}

export class InvalidInputError extends AnalysisError {
  readonly code = 'INVALID_INPUT';
  readonly fatal = true;
}

export class AnalysisCancelledError extends AnalysisError {
  readonly code = 'CANCELLED';
  readonly fatal = true;

  /** Paths whose analysis finished before the run stopped */
  readonly completedPaths: readonly string[];

  constructor(
    /** Analyses of the files finished before the run stopped */
    public readonly partial: readonly FileAnalysis[]
  ) {
    super(`Analysis cancelled after ${partial.length} file(s)`);
    this.completedPaths = partial.map(file => file.path);
  }
}

export class AnalysisTimeoutError extends AnalysisError {
  readonly code = 'TIMEOUT';
  readonly fatal = true;

  constructor(public readonly timeoutMs: number) {
    super(`Analysis timed out after ${timeoutMs}ms`);
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}

/**
 * Render any thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
