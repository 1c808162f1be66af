/**
 * Analysis orchestrator: runs the per-file pipeline over a project and
 * aggregates the result.
 *
 * A run moves Pending → Running → Completed | Failed. Files are processed
 * one at a time in path order, yielding to the event loop between files so
 * cancellation and timeouts are observed before the next file starts.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { Logger } from 'pino';
import { classifyFile } from './ast/file-classifier.js';
import { analyzeStructure } from './ast/structure-analyzer.js';
import { DEFAULT_TOOLKIT_REGISTRY, type ToolkitRegistry } from './ast/toolkits.js';
import { loadPythonParser, type PythonParser } from './ast/tree-sitter/parser.js';
import type { FileAnalysis, FileError } from './ast/types.js';
import {
  AnalysisCancelledError,
  AnalysisTimeoutError,
  EmptyInputError,
  InvalidInputError,
  ParseError,
  UnsupportedEncodingError,
} from './errors.js';
import { buildConversionGuide, calculateWebReadiness, summarize } from './readiness.js';
import { generateStructuralRecommendations, generateSuggestions } from './suggestions.js';
import { DEFAULT_THRESHOLDS, type Thresholds } from './thresholds.js';
import { createChildLogger } from '../utils/logger.js';
import type {
  AnalysisInput,
  ProgressEvent,
  ProgressSink,
  ProjectAnalysisResult,
  RunStatus,
  SourceFile,
} from '../types/analysis.js';

/**
 * Options for an analysis run
 */
export interface AnalyzeOptions {
  /** Receives progress events, synchronously and in order */
  onProgress?: ProgressSink;
  /** Aborting cancels the run before the next file */
  signal?: AbortSignal;
  /** Fail the run when it takes longer than this (0 or unset: no limit) */
  timeoutMs?: number;
  thresholds?: Thresholds;
  registry?: ToolkitRegistry;
  /** Pre-loaded parser; the shared grammar is loaded when omitted */
  parser?: PythonParser;
}

export interface FileAnalysisOptions {
  thresholds?: Thresholds;
  registry?: ToolkitRegistry;
}

const START_PERCENT = 10;
const FILES_PERCENT_SPAN = 70;
const AGGREGATE_PERCENT = 90;

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode file content as strict UTF-8, dropping a byte-order mark.
 *
 * @throws UnsupportedEncodingError
 */
export function decodeSource(file: SourceFile): string {
  if (typeof file.content === 'string') {
    return file.content.startsWith('\uFEFF') ? file.content.slice(1) : file.content;
  }
  try {
    return decoder.decode(file.content);
  } catch {
    throw new UnsupportedEncodingError(file.path);
  }
}

function failedFile(path: string, error: FileError): FileAnalysis {
  return {
    path,
    imports: [],
    toolkits: [],
    classes: [],
    functions: [],
    loc: 0,
    pureLoc: 0,
    uiCallCount: 0,
    uiPercentage: 0,
    webReadyPercentage: 0,
    classification: 'unavailable',
    error,
  };
}

/**
 * Analyze and classify one file. Parse and encoding failures come back as
 * an `unavailable` entry carrying the error; nothing else is caught.
 */
export function analyzeFile(
  parser: PythonParser,
  file: SourceFile,
  options: FileAnalysisOptions = {}
): FileAnalysis {
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;

  let source: string;
  try {
    source = decodeSource(file);
  } catch (error) {
    if (error instanceof UnsupportedEncodingError) {
      return failedFile(file.path, { kind: 'encoding', message: error.message });
    }
    throw error;
  }

  try {
    const structure = analyzeStructure(parser, file.path, source, {
      registry: options.registry ?? DEFAULT_TOOLKIT_REGISTRY,
      thresholds,
    });
    const classified = classifyFile(structure, thresholds);

    return {
      path: structure.path,
      imports: structure.imports,
      toolkits: structure.toolkits,
      classes: structure.classes,
      functions: structure.functions,
      loc: structure.loc,
      pureLoc: classified.pureLoc,
      uiCallCount: structure.uiCallCount,
      uiPercentage: classified.uiPercentage,
      webReadyPercentage: classified.webReadyPercentage,
      classification: classified.classification,
    };
  } catch (error) {
    if (error instanceof ParseError) {
      const parseError: FileError = { kind: 'parse', message: error.message };
      if (error.line !== undefined) parseError.line = error.line;
      return failedFile(file.path, parseError);
    }
    throw error;
  }
}

/**
 * Combine analyzed files into the project result.
 */
export function aggregateResults(
  projectName: string,
  files: readonly FileAnalysis[],
  thresholds: Thresholds = DEFAULT_THRESHOLDS
): ProjectAnalysisResult {
  const summary = summarize(files);
  const webReadyPercentage = calculateWebReadiness(files);
  const suggestions = generateSuggestions(files, thresholds);

  return {
    projectName,
    files: [...files],
    summary,
    webReadyPercentage,
    extractionSuggestions: suggestions.extraction,
    refactoringSuggestions: suggestions.refactoring,
    structuralRecommendations: generateStructuralRecommendations(files, thresholds),
    guide: buildConversionGuide(files, summary, webReadyPercentage, suggestions, thresholds),
  };
}

function comparePaths(a: SourceFile, b: SourceFile): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

/**
 * One analysis run over a fixed input
 */
export class AnalysisRun {
  private currentStatus: RunStatus = 'pending';
  private failure: Error | undefined;
  private output: ProjectAnalysisResult | undefined;
  private running: Promise<ProjectAnalysisResult> | null = null;
  private cancelled = false;
  private lastPercent = 0;
  private readonly analyses: FileAnalysis[] = [];

  constructor(
    private readonly input: AnalysisInput,
    private readonly options: AnalyzeOptions = {}
  ) {}

  get status(): RunStatus {
    return this.currentStatus;
  }

  /** Why the run failed */
  get error(): Error | undefined {
    return this.failure;
  }

  get result(): ProjectAnalysisResult | undefined {
    return this.output;
  }

  /** Analyses of the files finished so far, in processing order */
  get partial(): FileAnalysis[] {
    return [...this.analyses];
  }

  /**
   * Start the run. Calling again returns the same promise.
   */
  start(): Promise<ProjectAnalysisResult> {
    if (!this.running) {
      this.running = this.execute();
    }
    return this.running;
  }

  /**
   * Ask the run to stop before its next file.
   */
  cancel(): void {
    this.cancelled = true;
  }

  private emit(percent: number, status: ProgressEvent['status'], message: string): void {
    this.lastPercent = Math.max(this.lastPercent, percent);
    this.options.onProgress?.({ percent: this.lastPercent, status, message });
  }

  private checkpoint(deadline: number | undefined): void {
    if (this.cancelled || this.options.signal?.aborted) {
      throw new AnalysisCancelledError([...this.analyses]);
    }
    if (deadline !== undefined && Date.now() > deadline) {
      throw new AnalysisTimeoutError(this.options.timeoutMs ?? 0);
    }
  }

  private async execute(): Promise<ProjectAnalysisResult> {
    const { projectName, files } = this.input;
    const thresholds = this.options.thresholds ?? DEFAULT_THRESHOLDS;
    const log = createChildLogger('analyzer', { project: projectName });

    try {
      if (files.length === 0) {
        throw new EmptyInputError();
      }
      const seen = new Set<string>();
      for (const file of files) {
        if (seen.has(file.path)) {
          throw new InvalidInputError(`Duplicate file path: ${file.path}`);
        }
        seen.add(file.path);
      }
    } catch (error) {
      return this.fail(error, log);
    }

    const timeoutMs = this.options.timeoutMs ?? 0;
    const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : undefined;
    const ordered = [...files].sort(comparePaths);

    this.currentStatus = 'running';
    this.emit(START_PERCENT, 'running', 'Starting analysis');
    log.info({ files: ordered.length }, 'Analysis started');

    try {
      const parser = this.options.parser ?? (await loadPythonParser());
      const analyses = this.analyses;

      for (const file of ordered) {
        await yieldToEventLoop();
        this.checkpoint(deadline);

        const started = Date.now();
        const analysis = analyzeFile(parser, file, {
          thresholds,
          registry: this.options.registry ?? DEFAULT_TOOLKIT_REGISTRY,
        });
        analyses.push(analysis);

        if (analysis.error) {
          log.warn({ file: file.path, error: analysis.error.message }, 'File could not be analyzed');
        } else {
          log.debug({ file: file.path, ms: Date.now() - started }, 'File analyzed');
        }

        const done = analyses.length;
        this.emit(
          START_PERCENT + Math.round((FILES_PERCENT_SPAN * done) / ordered.length),
          'running',
          `Analyzed ${file.path} (${done}/${ordered.length})`
        );
      }

      await yieldToEventLoop();
      this.checkpoint(deadline);
      this.emit(AGGREGATE_PERCENT, 'running', 'Aggregating results');

      const result = aggregateResults(projectName, analyses, thresholds);
      this.output = result;
      this.currentStatus = 'completed';
      this.emit(100, 'completed', 'Analysis completed');
      log.info(
        { webReadyPercentage: result.webReadyPercentage, failedFiles: result.summary.failedFiles },
        'Analysis completed'
      );
      return result;
    } catch (error) {
      return this.fail(error, log);
    }
  }

  private fail(error: unknown, log: Logger): never {
    const failure = error instanceof Error ? error : new Error(String(error));
    this.failure = failure;
    this.currentStatus = 'failed';
    this.emit(this.lastPercent, 'failed', failure.message);
    log.error({ err: failure }, 'Analysis failed');
    throw failure;
  }
}

/**
 * Analyze a project in one call.
 *
 * @throws EmptyInputError, InvalidInputError, AnalysisCancelledError or
 * AnalysisTimeoutError; the run is failed in each case
 */
export function analyzeProject(
  input: AnalysisInput,
  options: AnalyzeOptions = {}
): Promise<ProjectAnalysisResult> {
  return new AnalysisRun(input, options).start();
}
