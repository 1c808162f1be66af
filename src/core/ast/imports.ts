/**
 * Import extraction from a parsed Python module
 */

import { findNodesByTypes, type SyntaxNode } from './tree-sitter/parser.js';
import type { ImportedName, ImportInfo } from './types.js';

const IMPORT_TYPES = ['import_statement', 'import_from_statement'];

function toImportedName(node: SyntaxNode): ImportedName | null {
  switch (node.type) {
    case 'dotted_name':
      return { name: node.text };
    case 'aliased_import': {
      const name = node.childForFieldName('name');
      const alias = node.childForFieldName('alias');
      if (!name) return null;
      return alias ? { name: name.text, alias: alias.text } : { name: name.text };
    }
    case 'wildcard_import':
      return { name: '*' };
    default:
      return null;
  }
}

/**
 * Split a from-import's module reference into its dotted path and the number
 * of leading dots.
 */
function readModuleName(node: SyntaxNode): { module: string; level: number } {
  if (node.type !== 'relative_import') {
    return { module: node.text, level: 0 };
  }
  let level = 0;
  let module = '';
  for (const child of node.children) {
    if (child.type === 'import_prefix') {
      level = child.text.length;
    } else if (child.type === 'dotted_name') {
      module = child.text;
    }
  }
  return { module, level };
}

function fromPlainImport(node: SyntaxNode): ImportInfo[] {
  const line = node.startPosition.row + 1;
  const imports: ImportInfo[] = [];

  for (const child of node.namedChildren) {
    const imported = toImportedName(child);
    if (!imported) continue;
    imports.push({
      kind: 'import',
      module: imported.name,
      names: [imported],
      line,
      level: 0,
    });
  }

  return imports;
}

function fromFromImport(node: SyntaxNode): ImportInfo | null {
  const moduleNode = node.childForFieldName('module_name');
  // Unreadable statement: skip it rather than fail the file
  if (!moduleNode) return null;

  const { module, level } = readModuleName(moduleNode);
  const names: ImportedName[] = [];
  for (const child of node.namedChildren) {
    if (child.startIndex === moduleNode.startIndex) continue;
    const imported = toImportedName(child);
    if (imported) names.push(imported);
  }

  return {
    kind: 'from',
    module,
    names,
    line: node.startPosition.row + 1,
    level,
  };
}

/**
 * Extract every import in the module, including imports nested in functions,
 * in source order
 */
export function extractImports(root: SyntaxNode): ImportInfo[] {
  const imports: ImportInfo[] = [];

  for (const node of findNodesByTypes(root, IMPORT_TYPES)) {
    if (node.type === 'import_statement') {
      imports.push(...fromPlainImport(node));
    } else {
      const imp = fromFromImport(node);
      if (imp) imports.push(imp);
    }
  }

  return imports;
}
