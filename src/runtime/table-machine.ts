import type { Capability } from '../compiler/capabilities.js';
import { FsmTableSchema, TABLE_FORMAT, TABLE_VERSION, type FsmTableDocument } from './schema.js';

export class FsmTableError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'FsmTableError';
    this.issues = issues;
  }
}

const ABSENT = -1;

function buildIndex(names: readonly string[], what: string): Map<string, number> {
  const index = new Map<string, number>();
  names.forEach((name, i) => {
    if (index.has(name)) throw new FsmTableError('Invalid table', [`${what} '${name}' is listed twice`]);
    index.set(name, i);
  });
  return index;
}

/**
 * Generic interpreter for a serialized transition table. Lookups go through a
 * dense `states × events` array; it holds no mutable state after construction.
 */
export class TableMachine {
  readonly namespace: string | undefined;
  readonly initial: string;
  readonly states: readonly string[];
  readonly events: readonly string[];
  readonly capabilities: { readonly states: readonly Capability[]; readonly events: readonly Capability[] };
  private readonly stateIndex: ReadonlyMap<string, number>;
  private readonly eventIndex: ReadonlyMap<string, number>;
  private readonly cells: Int32Array;

  private constructor(doc: FsmTableDocument) {
    this.stateIndex = buildIndex(doc.states, 'State');
    this.eventIndex = buildIndex(doc.events, 'Event');
    if (!this.stateIndex.has(doc.initial)) {
      throw new FsmTableError('Invalid table', [`initial state '${doc.initial}' is not in states`]);
    }
    this.namespace = doc.namespace ?? undefined;
    this.initial = doc.initial;
    this.states = Object.freeze([...doc.states]);
    this.events = Object.freeze([...doc.events]);
    this.capabilities = Object.freeze({
      states: Object.freeze([...doc.derive.states]),
      events: Object.freeze([...doc.derive.events]),
    });

    const width = doc.events.length;
    this.cells = new Int32Array(doc.states.length * width).fill(ABSENT);
    const issues: string[] = [];
    doc.transitions.forEach(([s, e, t], i) => {
      if (s >= doc.states.length || t >= doc.states.length || e >= width) {
        issues.push(`transitions[${i}] has an index out of range`);
        return;
      }
      const cell = s * width + e;
      if (this.cells[cell] !== ABSENT) {
        issues.push(`transitions[${i}] repeats state '${doc.states[s]}' + event '${doc.events[e]}'`);
        return;
      }
      this.cells[cell] = t;
    });
    if (issues.length > 0) throw new FsmTableError('Invalid table', issues);
  }

  /** Validate `document` and build a machine from it. */
  static load(document: unknown): TableMachine {
    const parsed = FsmTableSchema.safeParse(document);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((iss) => `${iss.path.join('.') || '(root)'}: ${iss.message}`);
      throw new FsmTableError('Invalid table document', issues);
    }
    return new TableMachine(parsed.data);
  }

  /**
   * Target state for `event` in `state`, or `undefined` when there is no
   * transition. Unknown names also yield `undefined`.
   */
  processEvent(state: string, event: string): string | undefined {
    const s = this.stateIndex.get(state);
    const e = this.eventIndex.get(event);
    if (s === undefined || e === undefined) return undefined;
    const t = this.cells[s * this.events.length + e];
    return t === ABSENT ? undefined : this.states[t];
  }

  transitionsFrom(state: string): { event: string; target: string }[] {
    const s = this.stateIndex.get(state);
    if (s === undefined) return [];
    const out: { event: string; target: string }[] = [];
    const width = this.events.length;
    for (let e = 0; e < width; e++) {
      const t = this.cells[s * width + e];
      if (t !== ABSENT) out.push({ event: this.events[e], target: this.states[t] });
    }
    return out;
  }

  toDocument(): FsmTableDocument {
    const transitions: [number, number, number][] = [];
    const width = this.events.length;
    for (let s = 0; s < this.states.length; s++) {
      for (let e = 0; e < width; e++) {
        const t = this.cells[s * width + e];
        if (t !== ABSENT) transitions.push([s, e, t]);
      }
    }
    return {
      format: TABLE_FORMAT,
      version: TABLE_VERSION,
      namespace: this.namespace ?? null,
      initial: this.initial,
      states: [...this.states],
      events: [...this.events],
      derive: { states: [...this.capabilities.states], events: [...this.capabilities.events] },
      transitions,
    };
  }
}

export function loadTable(document: unknown): TableMachine {
  return TableMachine.load(document);
}
