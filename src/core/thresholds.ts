/**
 * Decision table for file classification, suggestions and scoring.
 *
 * These values are fixed per release. Components take a `Thresholds` argument
 * so the table can be exercised in isolation, but nothing reads them from user
 * configuration.
 */
export interface Thresholds {
  /** ui_percentage at or above which a file is UI */
  readonly uiFileMin: number;
  /** ui_percentage at or below which a file with a pure function is Logic */
  readonly logicFileMax: number;
  /** Minimum line span of a pure function proposed for extraction */
  readonly extractionMinSpan: number;
  /** Minimum line span of an impure function proposed for refactoring */
  readonly refactoringMinSpan: number;
  /** Maximum UI call sites of a function proposed for refactoring */
  readonly refactoringMaxUiCalls: number;
  /** Per-file readiness a file needs to be listed as a reusable module */
  readonly reusableFileThreshold: number;
  /** Project readiness at or above which conversion complexity is low */
  readonly lowComplexityMin: number;
  /** Project readiness at or above which conversion complexity is medium */
  readonly mediumComplexityMin: number;
  /** UI classes with more code lines than this get a split recommendation */
  readonly largeUiClassLoc: number;
  /** Pure functions in a mixed file that make its split recommendation high priority */
  readonly splitHighPriorityPureCount: number;
  /** Callee names kept per function */
  readonly maxDependencies: number;
}

export const DEFAULT_THRESHOLDS: Thresholds = Object.freeze({
  uiFileMin: 80,
  logicFileMax: 20,
  extractionMinSpan: 3,
  refactoringMinSpan: 5,
  refactoringMaxUiCalls: 2,
  reusableFileThreshold: 100,
  lowComplexityMin: 80,
  mediumComplexityMin: 50,
  largeUiClassLoc: 200,
  splitHighPriorityPureCount: 3,
  maxDependencies: 10,
});
