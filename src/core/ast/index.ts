/**
 * Python structural analysis - exports all modules
 */

// Type definitions
export type {
  ImportedName,
  ImportInfo,
  FunctionInfo,
  ClassInfo,
  FileClassification,
  FileError,
  FileAnalysis,
} from './types.js';

// Toolkit registry and import detection
export {
  TOOLKITS,
  UI_BASE_CLASSES,
  DEFAULT_TOOLKIT_REGISTRY,
  createToolkitRegistry,
  isUiBaseClass,
  type ToolkitDefinition,
  type ToolkitRegistry,
} from './toolkits.js';
export { extractImports } from './imports.js';
export { detectToolkit, detectToolkits, type ToolkitDetection } from './import-detector.js';

// Parsing and structure
export { loadPythonParser, type PythonParser } from './tree-sitter/parser.js';
export { analyzeStructure, analyzeTree, type FileStructure, type StructureOptions } from './structure-analyzer.js';

// Classification
export { isPure, isUiBound } from './purity.js';
export {
  classify,
  classifyFile,
  allFunctions,
  webReadyLoc,
  webReadyRatio,
  type FileClassificationResult,
} from './file-classifier.js';
