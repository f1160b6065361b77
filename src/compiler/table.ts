import type { Diagnostic } from '../core/types.js';
import { errorAtSpan, warningAt } from '../core/errorBuilder.js';
import type { Clause, NameRef } from '../dsl/ast.js';
import type { Expansion, Transition, WildcardRule } from './expand.js';

export type EntryOrigin = 'explicit' | 'wildcard';

export interface TableEntry {
  state: string;
  event: string;
  target: string;
  origin: EntryOrigin;
  clause: Clause;
}

/**
 * Validated mapping from (state, event) to target state. Wildcard rules are
 * already resolved into per-state entries; pairs without an entry mean
 * "no transition".
 */
export class TransitionTable {
  private readonly rows: ReadonlyMap<string, ReadonlyMap<string, TableEntry>>;

  constructor(
    readonly states: readonly string[],
    readonly events: readonly string[],
    readonly wildcardRules: readonly WildcardRule[],
    entries: readonly TableEntry[]
  ) {
    const rows = new Map<string, Map<string, TableEntry>>();
    for (const entry of entries) {
      let row = rows.get(entry.state);
      if (!row) {
        row = new Map();
        rows.set(entry.state, row);
      }
      row.set(entry.event, entry);
    }
    this.rows = rows;
  }

  lookup(state: string, event: string): string | undefined {
    return this.rows.get(state)?.get(event)?.target;
  }

  entry(state: string, event: string): TableEntry | undefined {
    return this.rows.get(state)?.get(event);
  }

  /** Entries ordered by state, then event, in enumeration order. */
  entries(): TableEntry[] {
    const out: TableEntry[] = [];
    for (const state of this.states) {
      const row = this.rows.get(state);
      if (!row) continue;
      for (const event of this.events) {
        const entry = row.get(event);
        if (entry) out.push(entry);
      }
    }
    return out;
  }

  get size(): number {
    let n = 0;
    for (const row of this.rows.values()) n += row.size;
    return n;
  }
}

export interface TableResult {
  table?: TransitionTable;
  states: string[];
  events: string[];
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

function collectIdentifiers(clauses: readonly Clause[], initial: string) {
  const states = new Map<string, NameRef>();
  const events = new Map<string, NameRef>();
  const addState = (ref: NameRef) => {
    if (!states.has(ref.name)) states.set(ref.name, ref);
  };
  for (const clause of clauses) {
    if (clause.source.kind === 'states') clause.source.names.forEach(addState);
    if (clause.target.kind === 'state') addState(clause.target.name);
    for (const ev of clause.events) {
      if (!events.has(ev.name)) events.set(ev.name, ev);
    }
  }
  const ordered = [initial, ...[...states.keys()].filter((s) => s !== initial)];
  return { states: ordered, firstSeen: states, events: [...events.keys()] };
}

function duplicateError(prev: Transition, next: Transition): Diagnostic {
  const sameClause = prev.clause === next.clause;
  const where = sameClause ? 'earlier in this clause' : `by '${prev.clause.text}'`;
  return errorAtSpan(next.at.span, 'DuplicateTransitionError', 'FSM-TRANSITION-DUPLICATE',
    `Duplicate transition: state '${next.state}' + event '${next.event}' is already defined ${where} (targets '${prev.target}' and '${next.target}').`, {
      hint: 'Each source state and event pair can appear only once. Use distinct events, or move conditional logic into the host application.',
      clause: next.clause.text,
    });
}

/**
 * Build the canonical table from per-clause expansions. Explicit triples are
 * inserted first; wildcard rules then fill every state that has no explicit
 * rule for their event.
 */
export function buildTable(clauses: readonly Clause[], expansions: readonly Expansion[], initial: string): TableResult {
  const errors: Diagnostic[] = [];
  const warnings: Diagnostic[] = [];
  const { states, firstSeen, events } = collectIdentifiers(clauses, initial);

  const explicit = new Map<string, Transition>();
  const key = (state: string, event: string) => `${state}\u0000${event}`;
  for (const exp of expansions) {
    for (const tr of exp.transitions) {
      const k = key(tr.state, tr.event);
      const prev = explicit.get(k);
      if (prev) {
        errors.push(duplicateError(prev, tr));
        continue;
      }
      explicit.set(k, tr);
    }
  }

  const wildcards = new Map<string, WildcardRule>();
  for (const exp of expansions) {
    for (const rule of exp.wildcards) {
      const prev = wildcards.get(rule.event);
      if (!prev) {
        wildcards.set(rule.event, rule);
        continue;
      }
      if (prev.target !== rule.target) {
        errors.push(errorAtSpan(rule.at.span, 'AmbiguousWildcardError', 'FSM-WILDCARD-AMBIGUOUS',
          `Ambiguous wildcard: event '${rule.event}' has wildcard rules targeting '${prev.target}' and '${rule.target}'.`, {
            hint: `Keep a single '_ + ${rule.event} = Target' rule, or give specific states explicit rules.`,
            clause: rule.clause.text,
          }));
      } else {
        warnings.push(warningAt(rule.at.span, 'RedundantWildcardWarning', 'FSM-WILDCARD-REDUNDANT',
          `Wildcard rule for event '${rule.event}' is repeated with the same target '${rule.target}'.`, {
            hint: 'Remove the repeated rule.',
            clause: rule.clause.text,
          }));
      }
    }
  }

  if (errors.length > 0) return { states, events, errors, warnings };

  const entries: TableEntry[] = [];
  for (const tr of explicit.values()) {
    entries.push({ state: tr.state, event: tr.event, target: tr.target, origin: 'explicit', clause: tr.clause });
  }
  for (const rule of wildcards.values()) {
    for (const state of states) {
      if (explicit.has(key(state, rule.event))) continue;
      entries.push({ state, event: rule.event, target: rule.target, origin: 'wildcard', clause: rule.clause });
    }
  }

  const reachable = new Set<string>([initial, ...entries.map((e) => e.target)]);
  for (const state of states) {
    if (reachable.has(state)) continue;
    const ref = firstSeen.get(state);
    if (!ref) continue;
    warnings.push(warningAt(ref.span, 'UnreachableStateWarning', 'FSM-STATE-UNREACHABLE',
      `State '${state}' is not the initial state and no transition leads to it.`, {
        hint: `Add a transition targeting '${state}', or remove it.`,
      }));
  }

  const table = new TransitionTable(states, events, [...wildcards.values()], entries);
  return { table, states, events, errors, warnings };
}
