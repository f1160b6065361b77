import type { Diagnostic } from '../core/types.js';
import { errorAt, errorAtSpan } from '../core/errorBuilder.js';
import type { NameRef } from '../dsl/ast.js';

export type Capability = 'equality' | 'duplication' | 'formatting' | 'hashability';

// Emission order
export const CAPABILITIES: readonly Capability[] = ['formatting', 'duplication', 'equality', 'hashability'];

export const DEFAULT_DERIVES: readonly string[] = ['Debug', 'Clone', 'PartialEq', 'Eq'];

const DERIVE_NAMES: Readonly<Record<string, Capability>> = {
  Debug: 'formatting',
  Clone: 'duplication',
  Copy: 'duplication',
  PartialEq: 'equality',
  Eq: 'equality',
  Hash: 'hashability',
  formatting: 'formatting',
  duplication: 'duplication',
  equality: 'equality',
  hashability: 'hashability',
};

export interface DeriveSet {
  /** Derive names as written (or the defaults). */
  names: readonly string[];
  capabilities: readonly Capability[];
}

export function capabilityOf(name: string): Capability | undefined {
  return Object.prototype.hasOwnProperty.call(DERIVE_NAMES, name) ? DERIVE_NAMES[name] : undefined;
}

function unknownHint(): string {
  return `Known names: ${Object.keys(DERIVE_NAMES).join(', ')}.`;
}

/**
 * Map a derive list onto capabilities. `refs` is the list from the source;
 * when it is absent `fallback` applies.
 */
export function resolveDerives(
  key: 'derive_states' | 'derive_events',
  refs: readonly NameRef[] | undefined,
  fallback: readonly string[],
  errors: Diagnostic[]
): DeriveSet {
  const found = new Set<Capability>();
  const names: string[] = [];
  if (refs) {
    for (const ref of refs) {
      const cap = capabilityOf(ref.name);
      if (!cap) {
        errors.push(errorAtSpan(ref.span, 'UnknownCapabilityError', 'FSM-DERIVE-UNKNOWN',
          `Unknown capability '${ref.name}' in ${key}.`, { hint: unknownHint() }));
        continue;
      }
      names.push(ref.name);
      found.add(cap);
    }
  } else {
    for (const name of fallback) {
      const cap = capabilityOf(name);
      if (!cap) {
        errors.push(errorAt(1, 1, 'UnknownCapabilityError', 'FSM-DERIVE-UNKNOWN',
          `Unknown capability '${name}' in the default derive list for ${key}.`, { hint: unknownHint() }));
        continue;
      }
      names.push(name);
      found.add(cap);
    }
  }
  return { names, capabilities: CAPABILITIES.filter((c) => found.has(c)) };
}
