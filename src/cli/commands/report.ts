/**
 * Plain-text report for the analyze command
 */

import type { FileAnalysis } from '../../core/ast/types.js';
import type { ProjectAnalysisResult, Suggestion } from '../../types/analysis.js';

function formatFileLine(file: FileAnalysis, width: number): string {
  const path = file.path.padEnd(width);
  if (file.error) {
    return `  ${path}  unavailable  ${file.error.message}`;
  }
  return (
    `  ${path}  ${file.classification.padEnd(11)}  ` +
    `ui ${file.uiPercentage.toFixed(1).padStart(5)}%  ` +
    `ready ${file.webReadyPercentage.toFixed(1).padStart(5)}%  ` +
    `${file.loc} loc`
  );
}

function formatSuggestion(suggestion: Suggestion): string {
  const location = `${suggestion.file}:${suggestion.startLine}-${suggestion.endLine}`;
  return `  ${location}  ${suggestion.qualifiedName}  ${suggestion.reason}`;
}

function section(title: string, lines: string[]): string[] {
  return ['', `${title} (${lines.length})`, ...lines];
}

/**
 * Render a project result for the terminal.
 */
export function formatReport(result: ProjectAnalysisResult): string {
  const { summary, guide } = result;
  const width = Math.max(...result.files.map(file => file.path.length), 4);

  const lines: string[] = [
    `Project: ${result.projectName}`,
    `Web readiness: ${result.webReadyPercentage.toFixed(1)}% (complexity: ${guide.complexity})`,
    '',
    `Files: ${summary.analyzedFiles} analyzed, ${summary.failedFiles} failed, ${summary.totalLoc} LOC`,
    `  UI: ${summary.uiFiles}  Logic: ${summary.logicFiles}  Mixed: ${summary.mixedFiles}`,
    `  Classes: ${summary.totalClasses}  Functions: ${summary.totalFunctions} (${summary.pureFunctions} pure)`,
    `  Toolkits: ${summary.toolkits.length > 0 ? summary.toolkits.join(', ') : 'none'}`,
  ];

  lines.push(...section('Files', result.files.map(file => formatFileLine(file, width))));
  lines.push(...section('Extraction suggestions', result.extractionSuggestions.map(formatSuggestion)));
  lines.push(...section('Refactoring suggestions', result.refactoringSuggestions.map(formatSuggestion)));
  lines.push(
    ...section(
      'Structural recommendations',
      result.structuralRecommendations.map(rec => `  [${rec.priority}] ${rec.file}: ${rec.issue}. ${rec.suggestion}`)
    )
  );

  lines.push('', 'Conversion guide', `  ${guide.summary}`, `  Approach: ${guide.recommendedApproach}`);
  if (guide.reusableModules.length > 0) {
    lines.push(`  Reusable modules: ${guide.reusableModules.join(', ')}`);
  }
  if (guide.componentsToReplace.length > 0) {
    lines.push(`  Components to replace: ${guide.componentsToReplace.join(', ')}`);
  }
  for (const recommendation of guide.recommendations) {
    lines.push(`  - ${recommendation}`);
  }

  return lines.join('\n');
}
