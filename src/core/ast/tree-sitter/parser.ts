/**
 * Tree-sitter parser initialization for Python sources
 * Uses native tree-sitter bindings; the grammar is loaded once per process
 */

import type { Point, SyntaxNode, Tree, TreeSitterLanguage, TreeSitterParser } from './types.js';

export type { SyntaxNode, Tree, Point } from './types.js';

type ParserConstructor = new () => TreeSitterParser;

/** Default input buffer of the native binding; longer sources need a larger one */
const DEFAULT_BUFFER_SIZE = 32 * 1024;

/**
 * A ready-to-use Python parser. Parsing is synchronous once loaded.
 */
export interface PythonParser {
  parse(code: string): Tree;
}

let loading: Promise<PythonParser> | null = null;

async function createPythonParser(): Promise<PythonParser> {
  const TreeSitterModule = await import('tree-sitter');
  const Parser = TreeSitterModule.default as ParserConstructor;
  const grammarModule = await import('tree-sitter-python');
  const grammar = grammarModule.default as TreeSitterLanguage;

  const parser = new Parser();
  parser.setLanguage(grammar);

  return {
    parse(code: string): Tree {
      return parser.parse(code, null, {
        bufferSize: Math.max(DEFAULT_BUFFER_SIZE, code.length * 2 + 1),
      });
    },
  };
}

/**
 * Load the Python grammar (memoized)
 */
export function loadPythonParser(): Promise<PythonParser> {
  if (!loading) {
    loading = createPythonParser().catch(error => {
      loading = null;
      throw error;
    });
  }
  return loading;
}

/**
 * Walk a tree-sitter tree and find all nodes matching any of the given types
 * Iterative pre-order traversal; results come back in source order
 */
export function findNodesByTypes(
  root: SyntaxNode,
  types: string[]
): SyntaxNode[] {
  const typeSet = new Set(types);
  const results: SyntaxNode[] = [];
  const stack: SyntaxNode[] = [root];

  let node = stack.pop();
  while (node) {
    if (typeSet.has(node.type)) {
      results.push(node);
    }

    // Add children in reverse order for correct traversal
    for (let i = node.childCount - 1; i >= 0; i--) {
      const child = node.child(i);
      if (child) stack.push(child);
    }
    node = stack.pop();
  }

  return results;
}

/**
 * Walk a tree-sitter tree and find all nodes of a given type
 */
export function findNodes(root: SyntaxNode, type: string): SyntaxNode[] {
  return findNodesByTypes(root, [type]);
}

/**
 * Locate the first syntax error: an ERROR node or a token the parser had to
 * invent (a zero-width leaf). Returns null for a clean tree.
 */
export function findSyntaxError(root: SyntaxNode): Point | null {
  const stack: SyntaxNode[] = [root];

  let node = stack.pop();
  while (node) {
    if (node.type === 'ERROR') {
      return node.startPosition;
    }
    if (node !== root && node.childCount === 0 && node.startIndex === node.endIndex) {
      return node.startPosition;
    }
    for (let i = node.childCount - 1; i >= 0; i--) {
      const child = node.child(i);
      if (child) stack.push(child);
    }
    node = stack.pop();
  }

  return null;
}

/**
 * Zero-based rows holding code: any row touched by a token other than a
 * comment. String literals cover every row they span.
 */
export function collectCodeRows(root: SyntaxNode): Set<number> {
  const rows = new Set<number>();
  const stack: SyntaxNode[] = [root];

  let node = stack.pop();
  while (node) {
    if (node.type !== 'comment') {
      if (node.type === 'string' || node.childCount === 0) {
        // Zero-width tokens carry no code
        if (node.startIndex === node.endIndex) {
          node = stack.pop();
          continue;
        }
        for (let row = node.startPosition.row; row <= node.endPosition.row; row++) {
          rows.add(row);
        }
      } else {
        for (let i = node.childCount - 1; i >= 0; i--) {
          const child = node.child(i);
          if (child) stack.push(child);
        }
      }
    }
    node = stack.pop();
  }

  return rows;
}
