/**
 * Structural analysis of one Python module.
 *
 * Parses the source, extracts imports, classes and functions (methods and
 * nested definitions included) and attaches the usage facts the classifier
 * and suggestion passes work from. Everything here is local to the file.
 */

import { ParseError } from '../errors.js';
import { DEFAULT_THRESHOLDS, type Thresholds } from '../thresholds.js';
import { detectToolkits } from './import-detector.js';
import { extractImports } from './imports.js';
import { isPure } from './purity.js';
import { buildScopes, nodeKey, parameterNames } from './scopes.js';
import { DEFAULT_TOOLKIT_REGISTRY, isUiBaseClass, type ToolkitRegistry } from './toolkits.js';
import {
  collectCodeRows,
  findNodes,
  findSyntaxError,
  type PythonParser,
  type SyntaxNode,
} from './tree-sitter/parser.js';
import {
  analyzeUsage,
  isUiCall,
  toolkitSelfAttributes,
  type ClassContext,
  type MethodOwner,
  type UsageContext,
} from './usage.js';
import type { ClassInfo, FunctionInfo, ImportInfo } from './types.js';

/**
 * Structure of a parsed file, before classification
 */
export interface FileStructure {
  path: string;
  imports: ImportInfo[];
  toolkits: string[];
  /** Every class in the file, nested ones included, in source order */
  classes: ClassInfo[];
  /** Top-level functions */
  functions: FunctionInfo[];
  loc: number;
  /** Lines (1-based) holding code */
  codeLines: ReadonlySet<number>;
  /** Distinct UI call sites in the file */
  uiCallCount: number;
}

export interface StructureOptions {
  registry?: ToolkitRegistry;
  thresholds?: Thresholds;
}

type Owner =
  | { kind: 'module'; qualified: '' }
  | { kind: 'class'; qualified: string; info: ClassInfo; context: ClassContext }
  | { kind: 'function'; qualified: string; info: FunctionInfo; method: MethodOwner | null };

/**
 * Rows covered by a definition. A node that ends at column 0 stops before
 * that row.
 */
function rowRange(node: SyntaxNode): { start: number; end: number } {
  const start = node.startPosition.row;
  const { row, column } = node.endPosition;
  const end = column === 0 && row > start ? row - 1 : row;
  return { start, end };
}

function countRows(rows: ReadonlySet<number>, start: number, end: number): number {
  let count = 0;
  for (let row = start; row <= end; row++) {
    if (rows.has(row)) count++;
  }
  return count;
}

function decoratorNames(node: SyntaxNode): string[] {
  const parent = node.parent;
  if (!parent || parent.type !== 'decorated_definition') return [];
  return parent.namedChildren
    .filter(child => child.type === 'decorator')
    .map(child => child.text.replace(/^@/, '').trim());
}

/**
 * Receiver parameter of a method, if it has one
 */
function receiverName(node: SyntaxNode): string | undefined {
  if (decoratorNames(node).includes('staticmethod')) return undefined;
  const [first] = parameterNames(node.childForFieldName('parameters'));
  return first !== undefined && !first.startsWith('*') ? first : undefined;
}

function baseClasses(node: SyntaxNode): string[] {
  const superclasses = node.childForFieldName('superclasses');
  if (!superclasses) return [];
  return superclasses.namedChildren
    .filter(child => child.type !== 'keyword_argument' && child.type !== 'comment')
    .map(child => child.text);
}

/**
 * Function definitions owned directly by a class body (not by a nested
 * def or class)
 */
function methodNodes(body: SyntaxNode): SyntaxNode[] {
  const methods: SyntaxNode[] = [];
  const visit = (node: SyntaxNode): void => {
    for (const child of node.namedChildren) {
      if (child.type === 'function_definition') {
        methods.push(child);
      } else if (child.type !== 'class_definition') {
        visit(child);
      }
    }
  };
  visit(body);
  return methods;
}

function hasFunctionAncestor(node: SyntaxNode): boolean {
  let current = node.parent;
  while (current) {
    if (current.type === 'function_definition') return true;
    current = current.parent;
  }
  return false;
}

/**
 * Analyze an already-parsed module
 */
export function analyzeTree(
  root: SyntaxNode,
  path: string,
  options: StructureOptions = {}
): FileStructure {
  const registry = options.registry ?? DEFAULT_TOOLKIT_REGISTRY;
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;

  const errorAt = findSyntaxError(root);
  if (errorAt) {
    throw new ParseError(path, errorAt.row + 1);
  }

  const codeRows = collectCodeRows(root);
  const detection = detectToolkits(extractImports(root), registry);
  const tree = buildScopes(root, detection.bindings);
  const ctx: UsageContext = {
    tree,
    toolkitBindings: detection.bindings,
    maxDependencies: thresholds.maxDependencies,
  };

  const classes: ClassInfo[] = [];
  const functions: FunctionInfo[] = [];
  const uiCallKeys = new Set<string>();

  const qualify = (owner: Owner, name: string): string =>
    owner.qualified ? `${owner.qualified}.${name}` : name;

  function handleFunction(node: SyntaxNode, owner: Owner): void {
    const name = node.childForFieldName('name')?.text ?? '<anonymous>';
    const scope = tree.scopeOf(node);
    if (!scope) {
      throw new Error(`No scope recorded for function ${name} in ${path}`);
    }

    const isMethod = owner.kind === 'class';
    const selfName = isMethod ? receiverName(node) : undefined;
    let method: MethodOwner | null = null;
    if (owner.kind === 'class' && selfName) {
      method = { scope, selfName, cls: owner.context };
    } else if (owner.kind === 'function') {
      method = owner.method;
    }

    const facts = analyzeUsage(node, scope, ctx, selfName, method);
    for (const key of facts.uiCallKeys) uiCallKeys.add(key);

    const { start, end } = rowRange(node);
    const info: FunctionInfo = {
      name,
      qualifiedName: qualify(owner, name),
      file: path,
      startLine: start + 1,
      endLine: end + 1,
      lineSpan: end - start + 1,
      loc: countRows(codeRows, start, end),
      parameters: parameterNames(node.childForFieldName('parameters')),
      isMethod,
      isAsync: node.children.some(child => child.type === 'async'),
      callsUiApi: facts.callsUiApi,
      uiCallCount: facts.uiCallCount,
      uiCalls: facts.uiCalls,
      accessesExternalState: facts.accessesExternalState,
      externalNames: facts.externalNames,
      usesDynamicImport: facts.usesDynamicImport,
      calls: facts.calls,
      isPure: isPure(facts),
      nested: [],
    };

    switch (owner.kind) {
      case 'module':
        functions.push(info);
        break;
      case 'class':
        owner.info.methods.push(info);
        break;
      case 'function':
        owner.info.nested.push(info);
        break;
    }

    const body = node.childForFieldName('body');
    if (body) {
      walk(body, { kind: 'function', qualified: info.qualifiedName, info, method });
    }
  }

  function handleClass(node: SyntaxNode, owner: Owner): void {
    const name = node.childForFieldName('name')?.text ?? '<anonymous>';
    const bases = baseClasses(node);
    const body = node.childForFieldName('body');
    const methods = body ? methodNodes(body) : [];

    const toolkitAttributes = new Set<string>();
    for (const method of methods) {
      const selfName = receiverName(method);
      if (!selfName) continue;
      for (const attribute of toolkitSelfAttributes(method, selfName, ctx)) {
        toolkitAttributes.add(attribute);
      }
    }

    const context: ClassContext = {
      isUiClass: bases.some(base => isUiBaseClass(base, registry)),
      methodNames: new Set(
        methods.map(method => method.childForFieldName('name')?.text ?? '').filter(Boolean)
      ),
      toolkitAttributes,
    };

    const { start, end } = rowRange(node);
    const info: ClassInfo = {
      name,
      file: path,
      startLine: start + 1,
      endLine: end + 1,
      loc: countRows(codeRows, start, end),
      bases,
      isUiClass: context.isUiClass,
      methods: [],
    };
    classes.push(info);

    if (body) {
      walk(body, { kind: 'class', qualified: qualify(owner, name), info, context });
    }
  }

  function walk(node: SyntaxNode, owner: Owner): void {
    for (const child of node.namedChildren) {
      if (child.type === 'function_definition') {
        handleFunction(child, owner);
      } else if (child.type === 'class_definition') {
        handleClass(child, owner);
      } else {
        walk(child, owner);
      }
    }
  }

  walk(root, { kind: 'module', qualified: '' });

  // Toolkit calls outside any function (module scripts, class attributes)
  for (const call of findNodes(root, 'call')) {
    if (!hasFunctionAncestor(call) && isUiCall(call, ctx, null)) {
      uiCallKeys.add(nodeKey(call));
    }
  }

  return {
    path,
    imports: detection.imports,
    toolkits: detection.toolkits,
    classes,
    functions,
    loc: codeRows.size,
    codeLines: new Set([...codeRows].map(row => row + 1)),
    uiCallCount: uiCallKeys.size,
  };
}

/**
 * Parse and analyze one source file.
 *
 * @throws ParseError when the source is not valid Python
 */
export function analyzeStructure(
  parser: PythonParser,
  path: string,
  source: string,
  options: StructureOptions = {}
): FileStructure {
  const tree = parser.parse(source);
  return analyzeTree(tree.rootNode, path, options);
}
