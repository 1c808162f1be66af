/**
 * Framework import detection: which imports of a file belong to a GUI toolkit
 */

import { ANY_SUBMODULE, DEFAULT_TOOLKIT_REGISTRY, type ToolkitRegistry } from './toolkits.js';
import type { ImportInfo } from './types.js';

/**
 * Result of scanning one file's imports
 */
export interface ToolkitDetection {
  /** Imports annotated with their toolkit */
  imports: ImportInfo[];
  /** Distinct toolkits, sorted */
  toolkits: string[];
  /** Local names bound to toolkit modules or classes */
  bindings: Set<string>;
}

/**
 * Toolkit an import belongs to, if any.
 * The root module must match a registry entry exactly; the submodule (or,
 * for `from Root import X`, the imported names) must be listed for it.
 */
export function detectToolkit(
  imp: ImportInfo,
  registry: ToolkitRegistry = DEFAULT_TOOLKIT_REGISTRY
): string | undefined {
  if (imp.level > 0 || !imp.module) {
    return undefined;
  }

  const [root = '', submodule] = imp.module.split('.');
  const submodules = registry.toolkits.get(root);
  if (!submodules) {
    return undefined;
  }

  if (submodules.has(ANY_SUBMODULE)) {
    return root;
  }

  if (submodule !== undefined) {
    return submodules.has(submodule) ? root : undefined;
  }

  // `import PyQt5` pulls in the whole package
  if (imp.kind === 'import') {
    return root;
  }

  return imp.names.some(n => submodules.has(n.name)) ? root : undefined;
}

/**
 * Names an import binds in the importing scope.
 */
export function boundNames(imp: ImportInfo, registry: ToolkitRegistry = DEFAULT_TOOLKIT_REGISTRY): string[] {
  const names: string[] = [];

  for (const imported of imp.names) {
    if (imported.alias) {
      names.push(imported.alias);
    } else if (imp.kind === 'import') {
      // `import a.b` binds `a`
      names.push(imported.name.split('.')[0] ?? imported.name);
    } else if (imported.name === '*') {
      if (imp.toolkit) {
        for (const base of registry.uiBaseClasses) {
          if (!base.includes('.')) names.push(base);
        }
      }
    } else {
      names.push(imported.name);
    }
  }

  return names;
}

/**
 * Classify a file's imports against the toolkit registry.
 * Purely local to the file; no cross-file resolution.
 */
export function detectToolkits(
  imports: readonly ImportInfo[],
  registry: ToolkitRegistry = DEFAULT_TOOLKIT_REGISTRY
): ToolkitDetection {
  const annotated: ImportInfo[] = [];
  const toolkits = new Set<string>();
  const bindings = new Set<string>();

  for (const imp of imports) {
    const toolkit = detectToolkit(imp, registry);
    if (toolkit) {
      const tagged: ImportInfo = { ...imp, toolkit };
      annotated.push(tagged);
      toolkits.add(toolkit);
      for (const name of boundNames(tagged, registry)) {
        bindings.add(name);
      }
    } else {
      annotated.push({ ...imp });
    }
  }

  return {
    imports: annotated,
    toolkits: [...toolkits].sort(),
    bindings,
  };
}
