/**
 * Lexical scope model for a parsed Python module.
 *
 * One walk builds the scope tree, records every binding and every name
 * reference, and remembers which names were assigned from toolkit
 * expressions. Resolution follows Python's rules: names assigned anywhere in a
 * function are local to it, `global`/`nonlocal` redirect, and class bodies are
 * invisible to the functions nested in them.
 */

import type { SyntaxNode } from './tree-sitter/parser.js';

export type ScopeKind = 'module' | 'class' | 'function';

export type BindingKind = 'variable' | 'parameter' | 'function' | 'class' | 'import';

export interface NameReference {
  name: string;
  node: SyntaxNode;
}

export interface Scope {
  kind: ScopeKind;
  /** Defining node; null for the module */
  node: SyntaxNode | null;
  parent: Scope | null;
  children: Scope[];
  bindings: Map<string, BindingKind>;
  globals: Set<string>;
  nonlocals: Set<string>;
  references: NameReference[];
  /** Names assigned from toolkit objects in this scope */
  toolkitNames: Set<string>;
}

export interface Resolution {
  scope: Scope;
  kind: BindingKind;
}

export interface ScopeTree {
  module: Scope;
  /** Scope opened by a def, lambda, class or comprehension node */
  scopeOf(node: SyntaxNode): Scope | undefined;
}

const COMPREHENSIONS = new Set([
  'list_comprehension',
  'set_comprehension',
  'dictionary_comprehension',
  'generator_expression',
]);

const TARGET_CONTAINERS = new Set([
  'pattern_list',
  'tuple_pattern',
  'list_pattern',
  'tuple',
  'list',
  'parenthesized_expression',
  'expression_list',
  'list_splat_pattern',
  'list_splat',
  'as_pattern_target',
]);

const PARAMETER_SEPARATORS = new Set(['keyword_separator', 'positional_separator', ',', '(', ')', ':']);

/**
 * Stable identity for a node; wrapper objects are not reused by the bindings.
 */
export function nodeKey(node: SyntaxNode): string {
  return `${node.type}:${node.startIndex}:${node.endIndex}`;
}

export function sameNode(a: SyntaxNode | null | undefined, b: SyntaxNode): boolean {
  return !!a && a.startIndex === b.startIndex && a.endIndex === b.endIndex && a.type === b.type;
}

/**
 * Parameter names as written (`x`, `*args`, `**kwargs`).
 */
export function parameterNames(parameters: SyntaxNode | null): string[] {
  if (!parameters) return [];
  const names: string[] = [];

  for (const param of parameters.namedChildren) {
    switch (param.type) {
      case 'identifier':
      case 'list_splat_pattern':
      case 'dictionary_splat_pattern':
        names.push(param.text);
        break;
      case 'default_parameter':
      case 'typed_default_parameter': {
        const name = param.childForFieldName('name');
        if (name) names.push(name.text);
        break;
      }
      case 'typed_parameter': {
        const first = param.namedChildren[0];
        if (first && first.type !== 'type') names.push(first.text);
        break;
      }
      default:
        break;
    }
  }

  return names;
}

export function stripSplat(name: string): string {
  return name.replace(/^\*+/, '');
}

/**
 * Root identifier of a callee or receiver chain: `a` for `a.b.c()`,
 * `super` for `super().x`, `QApplication` for `QApplication.instance().quit`.
 */
export function chainRoot(node: SyntaxNode): SyntaxNode | null {
  let current: SyntaxNode | null = node;
  while (current) {
    switch (current.type) {
      case 'identifier':
        return current;
      case 'attribute':
        current = current.childForFieldName('object');
        break;
      case 'call':
        current = current.childForFieldName('function');
        break;
      case 'subscript':
        current = current.childForFieldName('value');
        break;
      case 'parenthesized_expression':
        current = current.namedChildren[0] ?? null;
        break;
      default:
        return null;
    }
  }
  return null;
}

function newScope(kind: ScopeKind, node: SyntaxNode | null, parent: Scope | null): Scope {
  const scope: Scope = {
    kind,
    node,
    parent,
    children: [],
    bindings: new Map(),
    globals: new Set(),
    nonlocals: new Set(),
    references: [],
    toolkitNames: new Set(),
  };
  parent?.children.push(scope);
  return scope;
}

function bind(scope: Scope, name: string, kind: BindingKind): void {
  if (scope.globals.has(name) || scope.nonlocals.has(name)) {
    return;
  }
  const existing = scope.bindings.get(name);
  // Rebinding a def/class/import name by assignment makes it mutable state
  if (existing === 'variable' || existing === 'parameter') {
    return;
  }
  scope.bindings.set(name, kind);
}

function bindTargets(node: SyntaxNode, scope: Scope, out?: string[]): void {
  if (node.type === 'identifier') {
    bind(scope, node.text, 'variable');
    out?.push(node.text);
    return;
  }
  if (TARGET_CONTAINERS.has(node.type)) {
    for (const child of node.namedChildren) {
      bindTargets(child, scope, out);
    }
  }
}

/**
 * Resolve a name as seen from `scope`. Returns null for names bound nowhere
 * in the module (builtins, wildcard imports).
 */
export function resolve(name: string, scope: Scope): Resolution | null {
  if (scope.globals.has(name)) {
    return resolveInModule(name, scope);
  }

  let current: Scope | null = scope;
  let first = true;
  while (current) {
    if (!first && current.kind === 'class') {
      current = current.parent;
      continue;
    }
    if (first && current.nonlocals.has(name)) {
      first = false;
      current = current.parent;
      continue;
    }
    const kind = current.bindings.get(name);
    if (kind) {
      return { scope: current, kind };
    }
    first = false;
    current = current.parent;
  }

  return null;
}

function resolveInModule(name: string, scope: Scope): Resolution | null {
  let module: Scope = scope;
  while (module.parent) module = module.parent;
  const kind = module.bindings.get(name);
  return kind ? { scope: module, kind } : null;
}

/**
 * Whether `scope` is `ancestor` or nested inside it.
 */
export function isWithin(scope: Scope, ancestor: Scope): boolean {
  let current: Scope | null = scope;
  while (current) {
    if (current === ancestor) return true;
    current = current.parent;
  }
  return false;
}

/**
 * `scope` and all scopes nested in it, pre-order.
 */
export function descendantScopes(scope: Scope): Scope[] {
  const result: Scope[] = [];
  const stack: Scope[] = [scope];
  let current = stack.pop();
  while (current) {
    result.push(current);
    for (let i = current.children.length - 1; i >= 0; i--) {
      const child = current.children[i];
      if (child) stack.push(child);
    }
    current = stack.pop();
  }
  return result;
}

/**
 * Names bound by an import statement in the importing scope.
 */
function importedBindings(node: SyntaxNode): string[] {
  const names: string[] = [];
  const moduleNode = node.type === 'import_from_statement' ? node.childForFieldName('module_name') : null;

  for (const child of node.namedChildren) {
    if (moduleNode && sameNode(moduleNode, child)) continue;
    if (child.type === 'aliased_import') {
      const alias = child.childForFieldName('alias');
      if (alias) names.push(alias.text);
    } else if (child.type === 'dotted_name') {
      const text = child.text;
      names.push(node.type === 'import_statement' ? (text.split('.')[0] ?? text) : text);
    }
  }

  return names;
}

/**
 * Build the scope tree for a module.
 *
 * @param toolkitBindings - Local names bound by toolkit imports
 */
export function buildScopes(root: SyntaxNode, toolkitBindings: ReadonlySet<string>): ScopeTree {
  const module = newScope('module', null, null);
  const byNode = new Map<string, Scope>();
  const assignments: Array<{ node: SyntaxNode; scope: Scope }> = [];

  function open(kind: ScopeKind, node: SyntaxNode, parent: Scope): Scope {
    const scope = newScope(kind, node, parent);
    byNode.set(nodeKey(node), scope);
    return scope;
  }

  function visitChildren(node: SyntaxNode, scope: Scope): void {
    for (const child of node.children) {
      visit(child, scope);
    }
  }

  function visitParameters(parameters: SyntaxNode | null, outer: Scope, inner: Scope): void {
    if (!parameters) return;
    for (const param of parameters.namedChildren) {
      if (PARAMETER_SEPARATORS.has(param.type)) continue;
      // Defaults are evaluated where the function is defined
      const value = param.childForFieldName('value');
      if (value) visit(value, outer);
    }
    for (const name of parameterNames(parameters)) {
      bind(inner, stripSplat(name), 'parameter');
    }
  }

  function visit(node: SyntaxNode, scope: Scope): void {
    switch (node.type) {
      case 'function_definition': {
        const name = node.childForFieldName('name');
        if (name) bind(scope, name.text, 'function');
        const fnScope = open('function', node, scope);
        visitParameters(node.childForFieldName('parameters'), scope, fnScope);
        const body = node.childForFieldName('body');
        if (body) visitChildren(body, fnScope);
        return;
      }

      case 'lambda': {
        const lambdaScope = open('function', node, scope);
        visitParameters(node.childForFieldName('parameters'), scope, lambdaScope);
        const body = node.childForFieldName('body');
        if (body) visit(body, lambdaScope);
        return;
      }

      case 'class_definition': {
        const name = node.childForFieldName('name');
        if (name) bind(scope, name.text, 'class');
        const superclasses = node.childForFieldName('superclasses');
        if (superclasses) visit(superclasses, scope);
        const classScope = open('class', node, scope);
        const body = node.childForFieldName('body');
        if (body) visitChildren(body, classScope);
        return;
      }

      case 'import_statement':
      case 'import_from_statement':
        for (const name of importedBindings(node)) {
          bind(scope, name, 'import');
        }
        return;

      case 'future_import_statement':
        return;

      case 'global_statement':
        for (const child of node.namedChildren) {
          if (child.type === 'identifier') scope.globals.add(child.text);
        }
        return;

      case 'nonlocal_statement':
        for (const child of node.namedChildren) {
          if (child.type === 'identifier') scope.nonlocals.add(child.text);
        }
        return;

      case 'assignment':
      case 'augmented_assignment': {
        const left = node.childForFieldName('left');
        if (left) bindTargets(left, scope);
        assignments.push({ node, scope });
        visitChildren(node, scope);
        return;
      }

      case 'for_statement':
      case 'for_in_clause': {
        const left = node.childForFieldName('left');
        if (left) bindTargets(left, scope);
        visitChildren(node, scope);
        return;
      }

      case 'named_expression': {
        const name = node.childForFieldName('name');
        if (name) bind(scope, name.text, 'variable');
        visitChildren(node, scope);
        return;
      }

      case 'as_pattern': {
        const alias = node.childForFieldName('alias');
        if (alias) bindTargets(alias, scope);
        visitChildren(node, scope);
        return;
      }

      case 'except_clause': {
        let afterAs = false;
        for (const child of node.children) {
          if (afterAs && child.type === 'identifier') {
            bind(scope, child.text, 'variable');
          }
          afterAs = child.type === 'as';
        }
        visitChildren(node, scope);
        return;
      }

      case 'keyword_argument': {
        const value = node.childForFieldName('value');
        if (value) visit(value, scope);
        return;
      }

      case 'attribute': {
        const object = node.childForFieldName('object');
        if (object) visit(object, scope);
        return;
      }

      // Annotations never affect analysis
      case 'type':
        return;

      case 'identifier':
        scope.references.push({ name: node.text, node });
        return;

      default:
        if (COMPREHENSIONS.has(node.type)) {
          visitChildren(node, open('function', node, scope));
          return;
        }
        visitChildren(node, scope);
    }
  }

  visitChildren(root, module);

  // Toolkit taint runs after every binding is known
  for (const { node, scope } of assignments) {
    if (node.type !== 'assignment') continue;
    const right = node.childForFieldName('right');
    const left = node.childForFieldName('left');
    if (!right || !left) continue;
    if (!isToolkitExpression(right, scope, toolkitBindings)) continue;
    const targets: string[] = [];
    collectTargetNames(left, targets);
    for (const target of targets) {
      scope.toolkitNames.add(target);
    }
  }

  return {
    module,
    scopeOf: node => byNode.get(nodeKey(node)),
  };
}

function collectTargetNames(node: SyntaxNode, out: string[]): void {
  if (node.type === 'identifier') {
    out.push(node.text);
    return;
  }
  if (TARGET_CONTAINERS.has(node.type)) {
    for (const child of node.namedChildren) {
      collectTargetNames(child, out);
    }
  }
}

/**
 * Whether a root identifier, seen from `scope`, names a toolkit object:
 * a toolkit import or a name assigned from one.
 */
export function isToolkitName(
  identifier: SyntaxNode,
  scope: Scope,
  toolkitBindings: ReadonlySet<string>
): boolean {
  const name = identifier.text;
  const resolution = resolve(name, scope);
  if (!resolution) {
    // Unbound names can only come from a wildcard import
    return toolkitBindings.has(name);
  }
  if (resolution.kind === 'import') {
    return toolkitBindings.has(name);
  }
  return resolution.scope.toolkitNames.has(name);
}

/**
 * Whether an expression evaluates to a toolkit object (`QLabel(...)`,
 * `tk.Frame(root)`, `other_widget`).
 */
export function isToolkitExpression(
  node: SyntaxNode,
  scope: Scope,
  toolkitBindings: ReadonlySet<string>
): boolean {
  const root = chainRoot(node);
  return !!root && isToolkitName(root, scope, toolkitBindings);
}
