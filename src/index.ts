/**
 * gui2web - static web-readiness analysis for desktop GUI Python projects
 */

// Orchestrator
export {
  analyzeProject,
  analyzeFile,
  aggregateResults,
  decodeSource,
  AnalysisRun,
  type AnalyzeOptions,
  type FileAnalysisOptions,
} from './core/analyzer.js';

// Per-file pipeline
export * from './core/ast/index.js';

// Project-level stages
export {
  generateSuggestions,
  generateStructuralRecommendations,
  isExtractionCandidate,
  isRefactoringCandidate,
  type SuggestionSet,
} from './core/suggestions.js';
export {
  summarize,
  calculateWebReadiness,
  estimateComplexity,
  mainToolkit,
  buildRecommendations,
  buildConversionGuide,
  RECOMMENDED_APPROACH,
} from './core/readiness.js';
export { DEFAULT_THRESHOLDS, type Thresholds } from './core/thresholds.js';
export * from './core/errors.js';

// Collaborators
export { collectProject, type CollectOptions, type CollectedProject } from './core/collector.js';
export { walkFiles, DEFAULT_EXCLUDES, type WalkOptions, type WalkResult } from './core/walker.js';
export { createJobId, hashContent } from './core/hash.js';
export {
  buildExtraction,
  pureModulePath,
  type ExtractedFile,
  type ExtractionExport,
} from './core/extractor.js';
export {
  openResultCache,
  getResult,
  setResult,
  getCacheStats,
  clearCache,
  type ResultCache,
  type CacheStats,
} from './storage/cache.js';
export { loadConfig, saveConfig, DEFAULT_CONFIG, type Gui2WebConfig } from './storage/config.js';

export type * from './types/analysis.js';
