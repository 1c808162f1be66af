/**
 * Structural types for the parts of the native tree-sitter binding the
 * analyzer touches. The grammar module itself stays opaque.
 */

export type TreeSitterLanguage = object;

export interface ParseOptions {
  /** Size of the binding's input buffer in bytes */
  bufferSize?: number;
}

export interface TreeSitterParser {
  setLanguage(language: TreeSitterLanguage): void;
  parse(input: string, oldTree?: Tree | null, options?: ParseOptions): Tree;
}

/** Zero-based row and column */
export interface Point {
  row: number;
  column: number;
}

export interface SyntaxNode {
  type: string;
  text: string;
  startPosition: Point;
  endPosition: Point;
  startIndex: number;
  endIndex: number;
  parent: SyntaxNode | null;
  childCount: number;
  children: SyntaxNode[];
  namedChildren: SyntaxNode[];
  child(index: number): SyntaxNode | null;
  childForFieldName(name: string): SyntaxNode | null;
}

export interface Tree {
  rootNode: SyntaxNode;
}
