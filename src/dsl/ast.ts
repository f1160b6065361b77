import type { SourceSpan } from '../core/types.js';

export interface NameRef {
  name: string;
  span: SourceSpan;
}

export type StatePattern =
  | { kind: 'wildcard'; span: SourceSpan }
  | { kind: 'states'; names: NameRef[] };

export type TargetSpec =
  | { kind: 'state'; name: NameRef }
  // `= _`, or no `= target` at all
  | { kind: 'same'; implicit: boolean; span?: SourceSpan };

export interface Clause {
  /** Position in the transitions block, 0-based. */
  index: number;
  initial: boolean;
  source: StatePattern;
  events: NameRef[];
  target: TargetSpec;
  text: string;
  span: SourceSpan;
}

export interface MachineSource {
  namespace?: NameRef;
  deriveStates?: NameRef[];
  deriveEvents?: NameRef[];
  clauses: Clause[];
  /** The clause carrying the `*` marker. */
  initialClause: Clause;
  /** First alternative of the initial clause. */
  initial: NameRef;
}
