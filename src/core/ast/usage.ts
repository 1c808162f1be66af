/**
 * Per-function usage facts: UI calls, outside state, dynamic loading, callees
 */

import { findNodes, type SyntaxNode } from './tree-sitter/parser.js';
import {
  chainRoot,
  descendantScopes,
  isToolkitExpression,
  isToolkitName,
  isWithin,
  nodeKey,
  resolve,
  sameNode,
  type Scope,
  type ScopeTree,
} from './scopes.js';

/** Callees that load code at run time */
const DYNAMIC_LOADERS = new Set([
  '__import__',
  'importlib.import_module',
  'import_module',
  'exec',
  'eval',
]);

const SCOPE_NODES = new Set([
  'function_definition',
  'lambda',
  'class_definition',
  'list_comprehension',
  'set_comprehension',
  'dictionary_comprehension',
  'generator_expression',
]);

/** Module-level names spelled as constants are not treated as state while only read */
const CONSTANT_NAME = /^[A-Z][A-Z0-9_]*$/;

/** Nodes that may wrap an assignment target (`a[0], b = ...`) */
const TARGET_WRAPPERS = new Set([
  'pattern_list',
  'tuple_pattern',
  'list_pattern',
  'tuple',
  'list',
  'parenthesized_expression',
  'expression_list',
]);

export interface UsageFacts {
  callsUiApi: boolean;
  uiCallCount: number;
  uiCalls: string[];
  /** Keys of the UI call nodes, for file-level de-duplication */
  uiCallKeys: string[];
  accessesExternalState: boolean;
  externalNames: string[];
  usesDynamicImport: boolean;
  calls: string[];
}

/**
 * What the analyzer knows about the class a method belongs to
 */
export interface ClassContext {
  isUiClass: boolean;
  /** Methods the class defines itself */
  methodNames: ReadonlySet<string>;
  /** `self` attributes assigned from toolkit objects anywhere in the class */
  toolkitAttributes: ReadonlySet<string>;
}

/**
 * The instance a method (or a function nested in one) reaches through its
 * first parameter
 */
export interface MethodOwner {
  /** Scope of the method declaring the receiver parameter */
  scope: Scope;
  /** Receiver parameter name (`self`, `cls`) */
  selfName: string;
  cls: ClassContext;
}

export interface UsageContext {
  tree: ScopeTree;
  toolkitBindings: ReadonlySet<string>;
  maxDependencies: number;
}

/**
 * Identifier root plus attribute names of a plain `a.b.c` chain.
 */
export function attributePath(node: SyntaxNode): { root: SyntaxNode; path: string[] } | null {
  const path: string[] = [];
  let current: SyntaxNode | null = node;
  while (current && current.type === 'attribute') {
    const attr = current.childForFieldName('attribute');
    if (!attr) return null;
    path.unshift(attr.text);
    current = current.childForFieldName('object');
  }
  if (!current || current.type !== 'identifier') {
    return null;
  }
  return { root: current, path };
}

/**
 * Innermost scope containing a node
 */
export function enclosingScope(node: SyntaxNode, tree: ScopeTree): Scope {
  let current = node.parent;
  while (current) {
    if (SCOPE_NODES.has(current.type)) {
      const scope = tree.scopeOf(current);
      if (scope) return scope;
    }
    current = current.parent;
  }
  return tree.module;
}

function calleeText(callee: SyntaxNode): string {
  return callee.text.replace(/\s+/g, '');
}

/**
 * Whether a call site reaches a toolkit API
 */
export function isUiCall(
  call: SyntaxNode,
  ctx: UsageContext,
  owner: MethodOwner | null
): boolean {
  const callee = call.childForFieldName('function');
  if (!callee) return false;
  const root = chainRoot(callee);
  if (!root) return false;

  const scope = enclosingScope(call, ctx.tree);
  if (isToolkitName(root, scope, ctx.toolkitBindings)) {
    return true;
  }
  if (!owner) return false;

  // super().method() inside a toolkit subclass
  if (root.text === 'super' && callee.type === 'attribute' && owner.cls.isUiClass) {
    return resolve('super', scope) === null;
  }

  const chain = attributePath(callee);
  if (!chain || chain.root.text !== owner.selfName) return false;
  const resolution = resolve(owner.selfName, scope);
  if (!resolution || resolution.scope !== owner.scope) return false;

  const [first] = chain.path;
  if (first === undefined) return false;
  if (chain.path.length >= 2 && owner.cls.toolkitAttributes.has(first)) {
    return true;
  }
  // Inherited toolkit method on a widget subclass
  return chain.path.length === 1 && owner.cls.isUiClass && !owner.cls.methodNames.has(first);
}

function isAttributeObject(identifier: SyntaxNode): string | null {
  const parent = identifier.parent;
  if (!parent || parent.type !== 'attribute') return null;
  if (!sameNode(parent.childForFieldName('object'), identifier)) return null;
  return parent.childForFieldName('attribute')?.text ?? null;
}

/**
 * Whether an identifier is the root of a store into the object it names:
 * `NAME[k] = v`, `NAME.x += 1`, `del NAME[k]`, or a method call on it
 * (`NAME.append(v)`).
 */
export function isMutatingUse(identifier: SyntaxNode): boolean {
  let current = identifier;
  for (;;) {
    const parent = current.parent;
    if (parent?.type === 'attribute' && sameNode(parent.childForFieldName('object'), current)) {
      current = parent;
    } else if (parent?.type === 'subscript' && sameNode(parent.childForFieldName('value'), current)) {
      current = parent;
    } else {
      break;
    }
  }
  if (sameNode(current, identifier)) return false;

  const parent = current.parent;
  if (parent?.type === 'call' && current.type === 'attribute') {
    return sameNode(parent.childForFieldName('function'), current);
  }

  let target = current;
  while (target.parent && TARGET_WRAPPERS.has(target.parent.type)) {
    target = target.parent;
  }
  const statement = target.parent;
  if (!statement) return false;
  if (statement.type === 'assignment' || statement.type === 'augmented_assignment') {
    return sameNode(statement.childForFieldName('left'), target);
  }
  return statement.type === 'delete_statement';
}

/**
 * Outside names a function reads or writes, in source order.
 */
export function externalStateNames(fnScope: Scope, selfName: string | undefined): string[] {
  const names: string[] = [];
  const seen = new Set<string>();
  const add = (name: string): void => {
    if (!seen.has(name)) {
      seen.add(name);
      names.push(name);
    }
  };

  for (const scope of descendantScopes(fnScope)) {
    for (const name of scope.globals) add(name);
    for (const name of scope.nonlocals) {
      // nonlocal of a variable the function itself owns stays inside it
      const target = scope.parent ? resolve(name, scope.parent) : null;
      if (!target || !isWithin(target.scope, fnScope)) add(name);
    }

    for (const ref of scope.references) {
      const resolution = resolve(ref.name, scope);
      if (!resolution) continue;

      if (isWithin(resolution.scope, fnScope)) {
        if (selfName && ref.name === selfName && resolution.scope === fnScope) {
          const attribute = isAttributeObject(ref.node);
          if (attribute) add(`${selfName}.${attribute}`);
        }
        continue;
      }

      if (resolution.scope.kind === 'module') {
        if (resolution.kind !== 'variable') continue;
        if (!CONSTANT_NAME.test(ref.name) || isMutatingUse(ref.node)) add(ref.name);
      } else if (resolution.scope.kind === 'function') {
        if (resolution.kind === 'variable' || resolution.kind === 'parameter') add(ref.name);
      }
    }
  }

  return names;
}

/**
 * Collect usage facts for one function definition.
 *
 * @param selfName - Receiver parameter when the function is an instance or class method
 * @param owner - Receiver context inherited by methods and the functions nested in them
 */
export function analyzeUsage(
  fnNode: SyntaxNode,
  fnScope: Scope,
  ctx: UsageContext,
  selfName: string | undefined,
  owner: MethodOwner | null
): UsageFacts {
  const uiCalls: string[] = [];
  const uiCallKeys: string[] = [];
  const calls: string[] = [];
  let usesDynamicImport = false;

  const body = fnNode.childForFieldName('body');
  const callNodes = body ? findNodes(body, 'call') : [];

  for (const call of callNodes) {
    const callee = call.childForFieldName('function');
    if (!callee) continue;
    const text = calleeText(callee);

    if (DYNAMIC_LOADERS.has(text)) {
      usesDynamicImport = true;
    }

    if (isUiCall(call, ctx, owner)) {
      uiCallKeys.push(nodeKey(call));
      if (!uiCalls.includes(text)) uiCalls.push(text);
    }

    const chain = attributePath(callee);
    if (chain || callee.type === 'identifier') {
      if (!text.startsWith('_') && !calls.includes(text) && calls.length < ctx.maxDependencies) {
        calls.push(text);
      }
    }
  }

  const externalNames = externalStateNames(fnScope, selfName);

  return {
    callsUiApi: uiCallKeys.length > 0,
    uiCallCount: uiCallKeys.length,
    uiCalls,
    uiCallKeys,
    accessesExternalState: externalNames.length > 0,
    externalNames,
    usesDynamicImport,
    calls,
  };
}

/**
 * `self` attributes a method assigns from toolkit objects
 * (`self.label = QLabel()`).
 */
export function toolkitSelfAttributes(
  methodNode: SyntaxNode,
  selfName: string,
  ctx: UsageContext
): string[] {
  const attributes: string[] = [];
  const body = methodNode.childForFieldName('body');
  if (!body) return attributes;

  for (const assignment of findNodes(body, 'assignment')) {
    const left = assignment.childForFieldName('left');
    const right = assignment.childForFieldName('right');
    if (!left || !right || left.type !== 'attribute') continue;
    const chain = attributePath(left);
    const [attribute] = chain?.path ?? [];
    if (!chain || chain.root.text !== selfName || chain.path.length !== 1 || attribute === undefined) continue;
    const scope = enclosingScope(assignment, ctx.tree);
    if (isToolkitExpression(right, scope, ctx.toolkitBindings)) {
      attributes.push(attribute);
    }
  }

  return attributes;
}
