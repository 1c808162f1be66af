/**
 * Stateless purity and UI-binding predicates over collected usage facts
 */

import type { FunctionInfo } from './types.js';

type PurityFacts = Pick<FunctionInfo, 'callsUiApi' | 'accessesExternalState' | 'usesDynamicImport'>;

/**
 * A function is pure when it neither calls a toolkit API, nor touches state
 * it does not own, nor loads code dynamically.
 */
export function isPure(facts: PurityFacts): boolean {
  return !facts.callsUiApi && !facts.accessesExternalState && !facts.usesDynamicImport;
}

export function isUiBound(facts: Pick<FunctionInfo, 'callsUiApi'>): boolean {
  return facts.callsUiApi;
}
