/**
 * Pure-function export: the source of every extraction candidate, grouped
 * into one `<stem>_pure.py` module per analyzed file, plus a README.
 */

import { posix } from 'node:path';
import { decodeSource } from './analyzer.js';
import type { ImportInfo } from './ast/types.js';
import type { ExtractionSuggestion, ProjectAnalysisResult, SourceFile } from '../types/analysis.js';

export interface ExtractedFile {
  /** Output path relative to the export directory, with forward slashes */
  path: string;
  content: string;
}

export interface ExtractionExport {
  files: ExtractedFile[];
  /** Number of functions written */
  functionCount: number;
}

export const README_FILE = 'README.md';

/**
 * `pkg/models.py` -> `pkg/models_pure.py`
 */
export function pureModulePath(sourcePath: string): string {
  const { dir, name } = posix.parse(sourcePath.replace(/\\/g, '/'));
  const file = `${name}_pure.py`;
  return dir ? `${dir}/${file}` : file;
}

export function renderImport(info: ImportInfo): string {
  const names = info.names.map(({ name, alias }) => (alias ? `${name} as ${alias}` : name)).join(', ');
  if (info.kind === 'import') {
    return `import ${names}`;
  }
  return `from ${'.'.repeat(info.level)}${info.module} import ${names}`;
}

/**
 * Lines startLine..endLine, shifted left by the indentation of the first
 */
export function sliceFunction(lines: readonly string[], startLine: number, endLine: number): string[] {
  const body = lines.slice(startLine - 1, endLine);
  const indent = /^[ \t]*/.exec(body[0] ?? '')?.[0].length ?? 0;
  return body.map(line => {
    const leading = /^[ \t]*/.exec(line)?.[0].length ?? 0;
    return line.slice(Math.min(indent, leading)).trimEnd();
  });
}

/**
 * Drop suggestions that sit inside another extracted function of the same
 * file; the enclosing source already carries them.
 */
function outermost(suggestions: readonly ExtractionSuggestion[]): ExtractionSuggestion[] {
  return suggestions.filter(
    inner =>
      !suggestions.some(
        outer =>
          outer !== inner &&
          outer.startLine <= inner.startLine &&
          outer.endLine >= inner.endLine &&
          (outer.startLine < inner.startLine || outer.endLine > inner.endLine)
      )
  );
}

function renderModule(
  sourcePath: string,
  source: string,
  imports: readonly ImportInfo[],
  suggestions: readonly ExtractionSuggestion[]
): string {
  const lines = source.split(/\r?\n/);
  const out = [
    '"""',
    `Pure functions extracted from: ${sourcePath}`,
    '',
    'These functions have no UI dependencies and can be reused in a web backend.',
    '"""',
  ];

  const kept = imports.filter(info => !info.toolkit);
  if (kept.length > 0) {
    out.push('', '# Original imports', ...kept.map(renderImport));
  }

  for (const suggestion of suggestions) {
    out.push('', '');
    out.push(`# Function: ${suggestion.qualifiedName}`);
    out.push(`# Original location: lines ${suggestion.startLine}-${suggestion.endLine}`);
    if (suggestion.dependencies.length > 0) {
      out.push(`# Dependencies: ${suggestion.dependencies.join(', ')}`);
    }
    out.push(...sliceFunction(lines, suggestion.startLine, suggestion.endLine));
  }

  return out.join('\n') + '\n';
}

function renderReadme(
  result: ProjectAnalysisResult,
  modules: ReadonlyArray<{ path: string; count: number }>,
  functionCount: number
): string {
  const { guide, summary } = result;
  const out = [
    `# Extracted pure functions: ${result.projectName}`,
    '',
    `- Functions: ${functionCount}`,
    `- Source files: ${modules.length}`,
    `- Web readiness: ${result.webReadyPercentage.toFixed(1)}%`,
    `- Total LOC: ${summary.totalLoc} (UI files: ${summary.uiFiles}, logic files: ${summary.logicFiles}, mixed files: ${summary.mixedFiles})`,
    '',
    '## Modules',
    '',
    ...modules.map(module => `- \`${module.path}\`: ${module.count} functions`),
    '',
    '## Conversion guide',
    '',
    `${guide.summary}.`,
    '',
    `Approach: ${guide.recommendedApproach}`,
    `Complexity: ${guide.complexity}`,
  ];
  if (guide.recommendations.length > 0) {
    out.push('', ...guide.recommendations.map(recommendation => `- ${recommendation}`));
  }
  return out.join('\n') + '\n';
}

/**
 * Build the export for a finished analysis. `sources` must hold the files
 * the result was computed from.
 */
export function buildExtraction(
  result: ProjectAnalysisResult,
  sources: readonly SourceFile[]
): ExtractionExport {
  const byPath = new Map(sources.map(source => [source.path, source]));
  const files: ExtractedFile[] = [];
  const modules: Array<{ path: string; count: number }> = [];
  let functionCount = 0;

  for (const file of result.files) {
    const source = byPath.get(file.path);
    if (file.error || !source) continue;

    const suggestions = outermost(result.extractionSuggestions.filter(s => s.file === file.path));
    if (suggestions.length === 0) continue;

    const path = pureModulePath(file.path);
    files.push({ path, content: renderModule(file.path, decodeSource(source), file.imports, suggestions) });
    modules.push({ path, count: suggestions.length });
    functionCount += suggestions.length;
  }

  files.push({ path: README_FILE, content: renderReadme(result, modules, functionCount) });
  return { files, functionCount };
}
