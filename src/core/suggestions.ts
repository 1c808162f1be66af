/**
 * Suggestion generation: which functions can move to a web backend, and how
 */

import { allFunctions } from './ast/file-classifier.js';
import { isPure, isUiBound } from './ast/purity.js';
import type { FileAnalysis, FunctionInfo } from './ast/types.js';
import { DEFAULT_THRESHOLDS, type Thresholds } from './thresholds.js';
import type {
  ExtractionSuggestion,
  RefactoringSuggestion,
  StructuralRecommendation,
  Suggestion,
} from '../types/analysis.js';

export interface SuggestionSet {
  extraction: ExtractionSuggestion[];
  refactoring: RefactoringSuggestion[];
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function toSuggestion(
  fn: FunctionInfo,
  reason: string,
  effort: Suggestion['effort'],
  webReady: boolean
): Suggestion {
  return {
    file: fn.file,
    function: fn.name,
    qualifiedName: fn.qualifiedName,
    startLine: fn.startLine,
    endLine: fn.endLine,
    reason,
    effort,
    webReady,
    uiCalls: [...fn.uiCalls],
    dependencies: [...fn.calls],
  };
}

/**
 * Why an impure function still needs work before it can move
 */
function refactoringReason(fn: FunctionInfo): string {
  const parts: string[] = [];
  if (fn.uiCallCount > 0) {
    parts.push(`remove ${plural(fn.uiCallCount, 'UI call')} (${fn.uiCalls.join(', ')})`);
  }
  if (fn.accessesExternalState) {
    parts.push(`pass in external state (${fn.externalNames.join(', ')})`);
  }
  if (fn.usesDynamicImport) {
    parts.push('resolve dynamically loaded code');
  }
  return `Near-pure function: ${parts.join('; ')}`;
}

export function isExtractionCandidate(fn: FunctionInfo, thresholds: Thresholds = DEFAULT_THRESHOLDS): boolean {
  return isPure(fn) && fn.lineSpan >= thresholds.extractionMinSpan;
}

export function isRefactoringCandidate(fn: FunctionInfo, thresholds: Thresholds = DEFAULT_THRESHOLDS): boolean {
  return (
    !isPure(fn) &&
    fn.uiCallCount <= thresholds.refactoringMaxUiCalls &&
    fn.lineSpan >= thresholds.refactoringMinSpan
  );
}

/**
 * Run the extraction and refactoring passes over every analyzed file.
 * Output follows file order, then line order. A function lands in at most
 * one list; extraction wins.
 */
export function generateSuggestions(
  files: readonly FileAnalysis[],
  thresholds: Thresholds = DEFAULT_THRESHOLDS
): SuggestionSet {
  const extraction: ExtractionSuggestion[] = [];
  const refactoring: RefactoringSuggestion[] = [];

  for (const file of files) {
    if (file.error) continue;

    for (const fn of allFunctions(file)) {
      if (isExtractionCandidate(fn, thresholds)) {
        extraction.push(
          toSuggestion(fn, `Pure function (${plural(fn.lineSpan, 'line')}) with no UI calls or external state`, 'low', true)
        );
      } else if (isRefactoringCandidate(fn, thresholds)) {
        refactoring.push(toSuggestion(fn, refactoringReason(fn), 'medium', false));
      }
    }
  }

  return { extraction, refactoring };
}

/**
 * File-level restructuring advice: split mixed files, break up large UI
 * classes.
 */
export function generateStructuralRecommendations(
  files: readonly FileAnalysis[],
  thresholds: Thresholds = DEFAULT_THRESHOLDS
): StructuralRecommendation[] {
  const recommendations: StructuralRecommendation[] = [];

  for (const file of files) {
    if (file.error) continue;

    if (file.classification === 'mixed') {
      const functions = allFunctions(file);
      const pure = functions.filter(fn => isPure(fn)).length;
      const ui = functions.filter(fn => isUiBound(fn)).length;
      if (pure > 0 && ui > 0) {
        recommendations.push({
          file: file.path,
          issue: `Mixes ${plural(pure, 'pure function')} with ${plural(ui, 'UI-bound function')}`,
          suggestion: 'Move the pure functions into a separate module and keep this file as a thin UI layer',
          priority: pure >= thresholds.splitHighPriorityPureCount ? 'high' : 'medium',
        });
      }
    }

    for (const cls of file.classes) {
      if (cls.isUiClass && cls.loc > thresholds.largeUiClassLoc) {
        recommendations.push({
          file: file.path,
          issue: `UI class ${cls.name} has ${cls.loc} lines of code`,
          suggestion: `Break ${cls.name} into smaller components and move its non-UI methods into services`,
          priority: 'medium',
        });
      }
    }
  }

  return recommendations;
}
