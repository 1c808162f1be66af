/**
 * Web-readiness scoring and the conversion guide
 */

import { allFunctions, roundPercentage, webReadyLoc, webReadyRatio } from './ast/file-classifier.js';
import { isPure } from './ast/purity.js';
import type { FileAnalysis } from './ast/types.js';
import { DEFAULT_THRESHOLDS, type Thresholds } from './thresholds.js';
import type { SuggestionSet } from './suggestions.js';
import type { Complexity, ProjectSummary, WebConversionGuide } from '../types/analysis.js';

export const RECOMMENDED_APPROACH =
  'API-based separation: keep the logic layer behind an API and replace the UI layer with a web frontend';

function analyzed(files: readonly FileAnalysis[]): FileAnalysis[] {
  return files.filter(file => !file.error);
}

/**
 * Aggregate counts over the files that analyzed cleanly
 */
export function summarize(files: readonly FileAnalysis[]): ProjectSummary {
  const ok = analyzed(files);
  const toolkits = new Set<string>();
  let totalFunctions = 0;
  let pureFunctions = 0;

  for (const file of ok) {
    for (const toolkit of file.toolkits) toolkits.add(toolkit);
    const functions = allFunctions(file);
    totalFunctions += functions.length;
    pureFunctions += functions.filter(fn => isPure(fn)).length;
  }

  return {
    totalFiles: files.length,
    analyzedFiles: ok.length,
    failedFiles: files.length - ok.length,
    totalLoc: ok.reduce((sum, file) => sum + file.loc, 0),
    uiFiles: ok.filter(file => file.classification === 'ui').length,
    logicFiles: ok.filter(file => file.classification === 'logic').length,
    mixedFiles: ok.filter(file => file.classification === 'mixed').length,
    totalClasses: ok.reduce((sum, file) => sum + file.classes.length, 0),
    totalFunctions,
    pureFunctions,
    toolkits: [...toolkits].sort(),
  };
}

/**
 * (Logic-file LOC + pure-function LOC elsewhere) / total LOC, one decimal
 */
export function calculateWebReadiness(files: readonly FileAnalysis[]): number {
  const ok = analyzed(files);
  const totalLoc = ok.reduce((sum, file) => sum + file.loc, 0);
  if (totalLoc === 0) {
    return 0;
  }

  let readyLoc = 0;
  for (const file of ok) {
    readyLoc += webReadyLoc(file);
  }

  return roundPercentage((readyLoc / totalLoc) * 100);
}

export function estimateComplexity(
  webReadyPercentage: number,
  thresholds: Thresholds = DEFAULT_THRESHOLDS
): Complexity {
  if (webReadyPercentage >= thresholds.lowComplexityMin) return 'low';
  if (webReadyPercentage >= thresholds.mediumComplexityMin) return 'medium';
  return 'high';
}

/**
 * Toolkit imported by the most files; ties go to the first name.
 */
export function mainToolkit(files: readonly FileAnalysis[]): string | undefined {
  const counts = new Map<string, number>();
  for (const file of analyzed(files)) {
    for (const toolkit of file.toolkits) {
      counts.set(toolkit, (counts.get(toolkit) ?? 0) + 1);
    }
  }

  let best: string | undefined;
  let bestCount = 0;
  for (const [toolkit, count] of [...counts].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (count > bestCount) {
      best = toolkit;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Recommendation lines, always in the same order for the same counts
 */
export function buildRecommendations(
  files: readonly FileAnalysis[],
  summary: ProjectSummary,
  suggestions: SuggestionSet
): string[] {
  const ok = analyzed(files);
  const recommendations: string[] = [];

  if (summary.pureFunctions > 0) {
    const filesWithPure = ok.filter(file => allFunctions(file).some(fn => isPure(fn))).length;
    recommendations.push(
      `${summary.pureFunctions} pure functions in ${filesWithPure} files are web-ready and can be reused as-is`
    );
  }
  if (summary.mixedFiles > 0) {
    recommendations.push(`${summary.mixedFiles} mixed files need refactoring to separate UI from logic`);
  }
  if (suggestions.extraction.length > 0) {
    recommendations.push(
      `${suggestions.extraction.length} functions can be extracted into reusable modules without changes`
    );
  }
  if (suggestions.refactoring.length > 0) {
    recommendations.push(
      `${suggestions.refactoring.length} functions can become web-ready after removing a few UI dependencies`
    );
  }

  const toolkit = mainToolkit(files);
  if (toolkit) {
    recommendations.push(`Main UI toolkit: ${toolkit} - replace its widgets with web frontend components`);
  }

  if (summary.failedFiles > 0) {
    recommendations.push(`${summary.failedFiles} files could not be analyzed and were excluded from the score`);
  }

  const dynamic = ok.reduce(
    (sum, file) => sum + allFunctions(file).filter(fn => fn.usesDynamicImport).length,
    0
  );
  if (dynamic > 0) {
    recommendations.push(`${dynamic} functions load code dynamically; review their dependencies by hand`);
  }

  return recommendations;
}

/**
 * Assemble the conversion guide for a scored project
 */
export function buildConversionGuide(
  files: readonly FileAnalysis[],
  summary: ProjectSummary,
  webReadyPercentage: number,
  suggestions: SuggestionSet,
  thresholds: Thresholds = DEFAULT_THRESHOLDS
): WebConversionGuide {
  const ok = analyzed(files);

  return {
    summary:
      `Project has ${summary.logicFiles} web-ready files and ` +
      `${summary.uiFiles + summary.mixedFiles} files requiring UI conversion`,
    reusableModules: ok
      .filter(file => webReadyRatio(file) >= thresholds.reusableFileThreshold)
      .map(file => file.path),
    componentsToReplace: ok.filter(file => file.classification === 'ui').map(file => file.path),
    recommendedApproach: RECOMMENDED_APPROACH,
    complexity: estimateComplexity(webReadyPercentage, thresholds),
    recommendations: buildRecommendations(files, summary, suggestions),
  };
}
