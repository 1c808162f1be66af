/**
 * Project-level analysis types shared by the engine, the CLI and the cache
 */

import type { FileAnalysis } from '../core/ast/types.js';

export type Effort = 'low' | 'medium' | 'high';

export type Priority = 'low' | 'medium' | 'high';

export type Complexity = 'low' | 'medium' | 'high';

/**
 * A function proposed for lifting into a reusable module
 */
export interface Suggestion {
  file: string;
  /** Function name */
  function: string;
  qualifiedName: string;
  startLine: number;
  endLine: number;
  reason: string;
  effort: Effort;
  webReady: boolean;
  /** UI callees to remove first (empty for extraction) */
  uiCalls: string[];
  /** Non-private functions the target calls */
  dependencies: string[];
}

/** A pure function that can move as-is */
export type ExtractionSuggestion = Suggestion;

/** An impure function with few UI calls that can move after cleanup */
export type RefactoringSuggestion = Suggestion;

export interface StructuralRecommendation {
  file: string;
  issue: string;
  suggestion: string;
  priority: Priority;
}

export interface WebConversionGuide {
  summary: string;
  /** Files reusable unchanged */
  reusableModules: string[];
  /** UI files to replace with web components */
  componentsToReplace: string[];
  recommendedApproach: string;
  complexity: Complexity;
  recommendations: string[];
}

export interface ProjectSummary {
  totalFiles: number;
  analyzedFiles: number;
  failedFiles: number;
  totalLoc: number;
  uiFiles: number;
  logicFiles: number;
  mixedFiles: number;
  totalClasses: number;
  totalFunctions: number;
  pureFunctions: number;
  /** Distinct toolkits across the project, sorted */
  toolkits: string[];
}

/**
 * Complete, JSON-serializable result of one analysis run
 */
export interface ProjectAnalysisResult {
  projectName: string;
  /** Ordered by path */
  files: FileAnalysis[];
  summary: ProjectSummary;
  webReadyPercentage: number;
  extractionSuggestions: ExtractionSuggestion[];
  refactoringSuggestions: RefactoringSuggestion[];
  structuralRecommendations: StructuralRecommendation[];
  guide: WebConversionGuide;
}

/**
 * One file handed to the engine
 */
export interface SourceFile {
  /** Logical path relative to the project root */
  path: string;
  content: string | Uint8Array;
}

export interface AnalysisInput {
  projectName: string;
  files: readonly SourceFile[];
}

export type RunStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface ProgressEvent {
  /** 0-100, non-decreasing within a run */
  percent: number;
  status: 'running' | 'completed' | 'failed';
  message: string;
}

export type ProgressSink = (event: ProgressEvent) => void;
