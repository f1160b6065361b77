import type { Diagnostic } from '../core/types.js';
import { errorAtSpan } from '../core/errorBuilder.js';
import type { Clause, NameRef } from '../dsl/ast.js';

export interface Transition {
  state: string;
  event: string;
  target: string;
  clause: Clause;
  /** Position of the event name inside the clause. */
  at: NameRef;
}

export interface WildcardRule {
  event: string;
  target: string;
  clause: Clause;
  at: NameRef;
}

export interface Expansion {
  transitions: Transition[];
  wildcards: WildcardRule[];
  errors: Diagnostic[];
}

/**
 * Expand one clause into concrete (state, event, target) triples, or into
 * wildcard rules when its source is `_`. Pure; the full state set is not
 * needed here.
 */
export function expandClause(clause: Clause): Expansion {
  const out: Expansion = { transitions: [], wildcards: [], errors: [] };
  const { source, target, events } = clause;

  if (source.kind === 'wildcard') {
    if (target.kind === 'same') {
      const message = target.implicit
        ? 'A wildcard-source clause needs an explicit target state.'
        : "A wildcard-source clause cannot use '_' as its target: there is no single source state to stay in.";
      out.errors.push(errorAtSpan(target.span ?? source.span, 'InvalidInternalTransitionError', 'FSM-INTERNAL-WILDCARD', message, {
        hint: 'Name the target state: _ + Reset = Idle',
        clause: clause.text,
      }));
      return out;
    }
    for (const ev of events) {
      out.wildcards.push({ event: ev.name, target: target.name.name, clause, at: ev });
    }
    return out;
  }

  for (const st of source.names) {
    const resolved = target.kind === 'state' ? target.name.name : st.name;
    for (const ev of events) {
      out.transitions.push({ state: st.name, event: ev.name, target: resolved, clause, at: ev });
    }
  }
  return out;
}
