import type { CompileOptions, Diagnostic } from '../core/types.js';
import { parseMachine } from '../dsl/validate.js';
import { expandClause } from './expand.js';
import { buildTable, type TransitionTable } from './table.js';
import { DEFAULT_DERIVES, resolveDerives, type DeriveSet } from './capabilities.js';

export interface MachineSpec {
  namespace?: string;
  deriveStates: DeriveSet;
  deriveEvents: DeriveSet;
  /** Distinct states, initial first, then first-seen order. */
  states: readonly string[];
  /** Distinct events in first-seen order. */
  events: readonly string[];
  initial: string;
  table: TransitionTable;
}

export interface CompileResult {
  ok: boolean;
  machine?: MachineSpec;
  diagnostics: Diagnostic[];
}

export class FsmCompileError extends Error {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[]) {
    const errors = diagnostics.filter((d) => d.severity === 'error');
    const first = errors[0];
    const summary = first ? `${first.line}:${first.column} ${first.message}` : 'unknown error';
    super(`State machine failed to compile (${errors.length} error${errors.length === 1 ? '' : 's'}): ${summary}`);
    this.name = 'FsmCompileError';
    this.diagnostics = diagnostics;
  }
}

function applyStrict(diagnostics: Diagnostic[], strict: boolean): Diagnostic[] {
  if (!strict) return diagnostics;
  return diagnostics.map((d): Diagnostic => (d.severity === 'warning' ? { ...d, severity: 'error' } : d));
}

/**
 * Run the whole pipeline: parse, expand, build and validate the table.
 * Never throws on invalid input; `machine` is set only when `ok`.
 */
export function compile(text: string, options: CompileOptions = {}): CompileResult {
  const { strict = false, defaultDerives = DEFAULT_DERIVES } = options;
  const parsed = parseMachine(text);
  if (!parsed.machine) {
    return { ok: false, diagnostics: parsed.errors };
  }
  const src = parsed.machine;

  const errors: Diagnostic[] = [];
  const expansions = src.clauses.map(expandClause);
  for (const exp of expansions) errors.push(...exp.errors);

  const deriveStates = resolveDerives('derive_states', src.deriveStates, defaultDerives, errors);
  const deriveEvents = resolveDerives('derive_events', src.deriveEvents, defaultDerives, errors);

  const initial = src.initial.name;

  const built = buildTable(src.clauses, expansions, initial);
  errors.push(...built.errors);

  const diagnostics = applyStrict([...errors, ...built.warnings], strict);
  const ok = !diagnostics.some((d) => d.severity === 'error');
  if (!ok || !built.table) {
    return { ok: false, diagnostics };
  }

  return {
    ok: true,
    diagnostics,
    machine: {
      namespace: src.namespace?.name,
      deriveStates,
      deriveEvents,
      states: built.states,
      events: built.events,
      initial,
      table: built.table,
    },
  };
}

export function compileOrThrow(text: string, options: CompileOptions = {}): MachineSpec {
  const res = compile(text, options);
  if (!res.ok || !res.machine) throw new FsmCompileError(res.diagnostics);
  return res.machine;
}
