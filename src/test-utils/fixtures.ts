/**
 * Hand-built analysis records for tests of the aggregation stages
 */

import { isPure } from '../core/ast/purity.js';
import type { ClassInfo, FileAnalysis, FunctionInfo } from '../core/ast/types.js';

export function makeFunction(fields: Partial<FunctionInfo> & { name: string }): FunctionInfo {
  const startLine = fields.startLine ?? 1;
  const endLine = fields.endLine ?? startLine + 4;
  const uiCalls = fields.uiCalls ?? [];
  const externalNames = fields.externalNames ?? [];
  const base = {
    callsUiApi: fields.callsUiApi ?? uiCalls.length > 0,
    accessesExternalState: fields.accessesExternalState ?? externalNames.length > 0,
    usesDynamicImport: fields.usesDynamicImport ?? false,
  };

  return {
    qualifiedName: fields.name,
    file: 'app.py',
    lineSpan: endLine - startLine + 1,
    loc: endLine - startLine + 1,
    parameters: [],
    isMethod: false,
    isAsync: false,
    uiCallCount: uiCalls.length,
    calls: [],
    nested: [],
    ...fields,
    ...base,
    startLine,
    endLine,
    uiCalls,
    externalNames,
    isPure: fields.isPure ?? isPure(base),
  };
}

export function makeClass(fields: Partial<ClassInfo> & { name: string }): ClassInfo {
  return {
    file: 'app.py',
    startLine: 1,
    endLine: 10,
    loc: 10,
    bases: [],
    isUiClass: false,
    methods: [],
    ...fields,
  };
}

export function makeFile(fields: Partial<FileAnalysis> & { path: string }): FileAnalysis {
  return {
    imports: [],
    toolkits: [],
    classes: [],
    functions: [],
    loc: 10,
    pureLoc: 0,
    uiCallCount: 0,
    uiPercentage: 0,
    webReadyPercentage: 0,
    classification: 'mixed',
    ...fields,
  };
}
