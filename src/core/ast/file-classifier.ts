/**
 * File classification: UI / Logic / Mixed from the share of UI-bound code
 */

import { DEFAULT_THRESHOLDS, type Thresholds } from '../thresholds.js';
import { isPure, isUiBound } from './purity.js';
import type { FileStructure } from './structure-analyzer.js';
import type { ClassInfo, FileAnalysis, FileClassification, FunctionInfo } from './types.js';

export interface FileClassificationResult {
  pureLoc: number;
  uiPercentage: number;
  webReadyPercentage: number;
  classification: FileClassification;
}

/**
 * Round to one decimal place
 */
export function roundPercentage(value: number): number {
  return Math.round(value * 10) / 10;
}

function collect(fn: FunctionInfo, out: FunctionInfo[]): void {
  out.push(fn);
  for (const inner of fn.nested) collect(inner, out);
}

/**
 * Every function of a file: top-level, methods and nested definitions,
 * ordered by start line.
 */
export function allFunctions(file: { classes: readonly ClassInfo[]; functions: readonly FunctionInfo[] }): FunctionInfo[] {
  const result: FunctionInfo[] = [];
  for (const fn of file.functions) collect(fn, result);
  for (const cls of file.classes) {
    for (const method of cls.methods) collect(method, result);
  }
  return result.sort((a, b) => a.startLine - b.startLine || a.endLine - b.endLine);
}

/**
 * Classification rule. Boundaries are inclusive: 80 is UI, 20 with a pure
 * function is Logic.
 */
export function classify(
  uiPercentage: number,
  hasPureFunction: boolean,
  thresholds: Thresholds = DEFAULT_THRESHOLDS
): FileClassification {
  if (uiPercentage >= thresholds.uiFileMin) {
    return 'ui';
  }
  if (uiPercentage <= thresholds.logicFileMax && hasPureFunction) {
    return 'logic';
  }
  return 'mixed';
}

function linesIn(
  codeLines: ReadonlySet<number>,
  ranges: Iterable<{ startLine: number; endLine: number }>
): Set<number> {
  const lines = new Set<number>();
  for (const { startLine, endLine } of ranges) {
    for (let line = startLine; line <= endLine; line++) {
      if (codeLines.has(line)) lines.add(line);
    }
  }
  return lines;
}

/**
 * Code lines of pure functions. Overlapping nested definitions count once.
 */
export function pureLineCount(structure: Pick<FileStructure, 'classes' | 'functions' | 'codeLines'>): number {
  return linesIn(structure.codeLines, allFunctions(structure).filter(fn => isPure(fn))).size;
}

/**
 * Compute ui_percentage, the file label and the file's own readiness.
 */
export function classifyFile(
  structure: FileStructure,
  thresholds: Thresholds = DEFAULT_THRESHOLDS
): FileClassificationResult {
  if (structure.loc === 0) {
    return { pureLoc: 0, uiPercentage: 0, webReadyPercentage: 0, classification: 'mixed' };
  }

  const functions = allFunctions(structure);
  const uiRanges = [
    ...functions.filter(fn => isUiBound(fn)),
    ...structure.classes.filter(cls => cls.isUiClass),
  ];
  const uiLines = linesIn(structure.codeLines, uiRanges).size;
  const uiRatio = (uiLines / structure.loc) * 100;

  // the label comes from the unrounded share; rounding is for reporting only
  const classification = classify(
    uiRatio,
    functions.some(fn => isPure(fn)),
    thresholds
  );

  const pureLoc = pureLineCount(structure);
  const webReadyPercentage = roundPercentage(
    webReadyRatio({ loc: structure.loc, pureLoc, classification })
  );

  return { pureLoc, uiPercentage: roundPercentage(uiRatio), webReadyPercentage, classification };
}

/**
 * Code lines of a file that move to the web unchanged: all of a Logic
 * file, the pure functions of any other.
 */
export function webReadyLoc(file: Pick<FileAnalysis, 'loc' | 'pureLoc' | 'classification'>): number {
  return file.classification === 'logic' ? file.loc : file.pureLoc;
}

/**
 * Unrounded per-file readiness (0-100)
 */
export function webReadyRatio(file: Pick<FileAnalysis, 'loc' | 'pureLoc' | 'classification'>): number {
  return file.loc === 0 ? 0 : (webReadyLoc(file) / file.loc) * 100;
}
