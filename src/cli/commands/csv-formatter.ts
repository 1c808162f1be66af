/**
 * CSV output for the analyze command: one row per file
 */

import { stringify } from 'csv-stringify/sync';
import { allFunctions } from '../../core/ast/file-classifier.js';
import { isPure } from '../../core/ast/purity.js';
import type { FileAnalysis, FileClassification } from '../../core/ast/types.js';
import type { ProjectAnalysisResult } from '../../types/analysis.js';

export const CSV_HEADER = [
  'File Path',
  'Lines of Code',
  'UI Percentage (%)',
  'Pure Functions',
  'Classification',
  'Web Ready',
] as const;

const LABELS: Record<FileClassification | 'unavailable', string> = {
  ui: 'UI',
  logic: 'Logic',
  mixed: 'Mixed',
  unavailable: 'Unavailable',
};

/**
 * Yes for Logic files, Partial for other files with pure functions
 */
function webReady(file: FileAnalysis, pureCount: number): string {
  if (file.classification === 'logic') return 'Yes';
  if (file.classification === 'mixed' && pureCount > 0) return 'Partial';
  return 'No';
}

export function csvRow(file: FileAnalysis): string[] {
  const pureCount = allFunctions(file).filter(fn => isPure(fn)).length;
  return [
    file.path,
    String(file.loc),
    file.uiPercentage.toFixed(1),
    String(pureCount),
    LABELS[file.classification],
    webReady(file, pureCount),
  ];
}

/**
 * Per-file table in path order, header first. Failed files are listed as
 * Unavailable.
 */
export function formatCsv(result: ProjectAnalysisResult): string {
  return stringify([[...CSV_HEADER], ...result.files.map(csvRow)]);
}
