/**
 * Core type definitions for Python structural analysis
 */

/**
 * A name brought in by an import statement
 */
export interface ImportedName {
  /** Name as written (dotted module path for `import a.b`) */
  name: string;
  /** Local alias (`as x`) */
  alias?: string;
}

/**
 * One imported module
 */
export interface ImportInfo {
  /** `import x` or `from x import y` */
  kind: 'import' | 'from';
  /** Module path without leading dots */
  module: string;
  /** Imported names; `*` for a wildcard import */
  names: ImportedName[];
  /** Line of the import statement (1-based) */
  line: number;
  /** Leading dots of a relative import (0 for absolute imports) */
  level: number;
  /** Toolkit this import belongs to, if any */
  toolkit?: string;
}

/**
 * A function or method definition
 */
export interface FunctionInfo {
  name: string;
  /** Dotted path through enclosing classes and functions, e.g. "Window.build.on_click" */
  qualifiedName: string;
  /** Logical path of the owning file */
  file: string;
  /** Starting line number (1-based) */
  startLine: number;
  /** Ending line number (1-based) */
  endLine: number;
  /** endLine - startLine + 1 */
  lineSpan: number;
  /** Code lines inside the span (no blank or comment-only lines) */
  loc: number;
  parameters: string[];
  isMethod: boolean;
  isAsync: boolean;
  /** Whether any call resolves to a toolkit name */
  callsUiApi: boolean;
  /** Number of UI call sites */
  uiCallCount: number;
  /** Distinct UI callee texts, in source order */
  uiCalls: string[];
  /** Whether module, enclosing-scope or instance state is read or written */
  accessesExternalState: boolean;
  /** Outside names the function touches, in source order */
  externalNames: string[];
  /** Whether the body loads code dynamically (`__import__`, `exec`, ...) */
  usesDynamicImport: boolean;
  /** Distinct non-private callee names */
  calls: string[];
  isPure: boolean;
  /** Functions defined inside this one */
  nested: FunctionInfo[];
}

/**
 * A class definition
 */
export interface ClassInfo {
  name: string;
  file: string;
  startLine: number;
  endLine: number;
  loc: number;
  /** Base-class expressions as written */
  bases: string[];
  isUiClass: boolean;
  /** Methods in definition order */
  methods: FunctionInfo[];
}

export type FileClassification = 'ui' | 'logic' | 'mixed';

/**
 * Why a file could not be analyzed
 */
export interface FileError {
  kind: 'parse' | 'encoding';
  message: string;
  line?: number;
}

/**
 * Complete analysis result for a single file
 */
export interface FileAnalysis {
  /** Logical path relative to the project root */
  path: string;
  imports: ImportInfo[];
  /** Toolkits detected in this file, sorted */
  toolkits: string[];
  classes: ClassInfo[];
  /** Top-level functions */
  functions: FunctionInfo[];
  /** Lines of code (no blank or comment-only lines) */
  loc: number;
  /** Code lines inside pure functions */
  pureLoc: number;
  /** UI call sites in the file */
  uiCallCount: number;
  /** Share of code lines in UI-bound functions and classes (0-100) */
  uiPercentage: number;
  /** Share of code lines reusable as-is (0-100) */
  webReadyPercentage: number;
  classification: FileClassification | 'unavailable';
  error?: FileError;
}
