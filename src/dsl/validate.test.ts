import { describe, it, expect } from 'vitest';
import { parseMachine } from './validate.js';

function firstError(text: string) {
  const { machine, errors } = parseMachine(text);
  expect(machine).toBeUndefined();
  expect(errors.length).toBeGreaterThan(0);
  return errors[0];
}

describe('parseMachine', () => {
  describe('accepted input', () => {
    it('reads metadata and clauses', () => {
      const { machine, errors } = parseMachine(`name: Player,
transitions: {
  *Idle + Move = Walking,
  Walking + Stop = Idle,
}`);
      expect(errors).toEqual([]);
      expect(machine?.namespace?.name).toBe('Player');
      expect(machine?.clauses.map(c => c.text)).toEqual(['*Idle + Move = Walking', 'Walking + Stop = Idle']);
      expect(machine?.initial.name).toBe('Idle');
      expect(machine?.initial.span.line).toBe(3);
      expect(machine?.initial.span.column).toBe(4);
      expect(machine?.initialClause.index).toBe(0);
    });

    it('reads alternatives on both sides of the clause', () => {
      const { machine } = parseMachine('transitions: { *A | B + X | Y = C }');
      const clause = machine?.clauses[0];
      expect(clause?.source.kind).toBe('states');
      if (clause?.source.kind === 'states') {
        expect(clause.source.names.map(n => n.name)).toEqual(['A', 'B']);
      }
      expect(clause?.events.map(e => e.name)).toEqual(['X', 'Y']);
      expect(clause?.target.kind).toBe('state');
    });

    it('treats a missing target as an internal transition', () => {
      const { machine } = parseMachine('transitions: { *Moving + Tick, Moving + Stop = _ }');
      expect(machine?.clauses[0].target).toEqual({ kind: 'same', implicit: true });
      const explicit = machine?.clauses[1].target;
      expect(explicit?.kind).toBe('same');
      if (explicit?.kind === 'same') expect(explicit.implicit).toBe(false);
    });

    it('skips line and block comments', () => {
      const { machine, errors } = parseMachine(`// door
transitions: {
  /* start closed */ *Closed + Open = Opened, // opening
  Opened + Close = Closed
}`);
      expect(errors).toEqual([]);
      expect(machine?.clauses).toHaveLength(2);
    });

    it('reads derive lists', () => {
      const { machine } = parseMachine('derive_states: [Debug, Hash], derive_events: [], transitions: { *A + Go = B }');
      expect(machine?.deriveStates?.map(d => d.name)).toEqual(['Debug', 'Hash']);
      expect(machine?.deriveEvents).toEqual([]);
    });

    it('keeps identifiers that start with an underscore', () => {
      const { machine } = parseMachine('transitions: { *_idle + Go = _busy }');
      expect(machine?.initial.name).toBe('_idle');
    });
  });

  describe('syntax errors', () => {
    it('rejects a wildcard event', () => {
      const e = firstError('transitions: { *Idle + _ = Done }');
      expect(e.code).toBe('FSM-EVENT-WILDCARD');
      expect(e.kind).toBe('SyntaxError');
      expect([e.line, e.column]).toEqual([1, 24]);
      expect(e.clause).toBe('*Idle + _ = Done');
    });

    it('rejects an initial marker inside alternatives', () => {
      const e = firstError('transitions: { *A | *B + Go = A }');
      expect(e.code).toBe('FSM-INITIAL-MISPLACED');
      expect(e.kind).toBe('InitialStateError');
      expect([e.line, e.column]).toEqual([1, 21]);
    });

    it('reports a clause without an event', () => {
      const e = firstError('transitions: { *Idle = Running }');
      expect(e.code).toBe('FSM-CLAUSE-MISSING-EVENT');
      expect(e.message).toBe("Expected '+' and an event after the source state, found '='.");
      expect(e.column).toBe(22);
      expect(e.clause).toBe('*Idle = Running');
    });

    it('reports a missing target after =', () => {
      const e = firstError('transitions: { *Idle + Go = }');
      expect(e.code).toBe('FSM-TARGET-INVALID');
      expect(e.message).toBe("Expected a target state or '_' after '=', found '}'.");
      expect(e.column).toBe(29);
      expect(e.clause).toBe('*Idle + Go =');
    });

    it('reports an unclosed transitions block at the end of input', () => {
      const e = firstError('transitions: { *Idle + Go = Done');
      expect(e.code).toBe('FSM-BLOCK-MISSING-RBRACE');
      expect(e.message).toBe("Expected ',' or '}' in the transitions block, found end of input.");
      expect([e.line, e.column]).toEqual([1, 33]);
      expect(e.clause).toBe('*Idle + Go = Done');
    });

    it('reports a missing colon after a key', () => {
      const e = firstError('transitions { *A + Go = B }');
      expect(e.code).toBe('FSM-META-MISSING-COLON');
      expect(e.column).toBe(13);
      expect(e.clause).toBeUndefined();
    });

    it('names the failing clause among several', () => {
      const e = firstError('transitions: {\n  *A + Go = B,\n  B + Stop\n    = ,\n  C + Go = A,\n}');
      expect(e.code).toBe('FSM-TARGET-INVALID');
      expect([e.line, e.column]).toEqual([4, 7]);
      expect(e.clause).toBe('B + Stop =');
    });

    it('reports a malformed derive list', () => {
      const e = firstError('derive_states: [Debug Clone], transitions: { *A + Go = B }');
      expect(e.code).toBe('FSM-DERIVE-MALFORMED');
      expect(e.message).toBe("Malformed derive list near 'Clone'.");
      expect(e.column).toBe(23);
    });

    it('reports text after the last entry', () => {
      const e = firstError('transitions: { *A + Go = B } }');
      expect(e.code).toBe('FSM-SYNTAX');
      expect(e.message).toBe("Unexpected '}'; expected 'name:', 'derive_states:', 'derive_events:' or 'transitions:'.");
    });

    it('reports characters outside the alphabet', () => {
      const e = firstError('transitions: { *A + Go = B# }');
      expect(e.code).toBe('FSM-LEX');
      expect([e.line, e.column]).toEqual([1, 27]);
    });
  });

  describe('structure errors', () => {
    it('rejects unknown keys', () => {
      const e = firstError('states: [A], transitions: { *A + Go = B }');
      expect(e.code).toBe('FSM-META-UNKNOWN');
      expect(e.message).toBe("Unknown key 'states'. Expected one of: name, derive_states, derive_events, transitions.");
      expect([e.line, e.column, e.length]).toEqual([1, 1, 6]);
    });

    it('rejects a repeated key', () => {
      const e = firstError('name: A, name: B, transitions: { *X + Go = Y }');
      expect(e.code).toBe('FSM-META-DUPLICATE');
      expect(e.column).toBe(10);
    });

    it('rejects a value of the wrong shape', () => {
      const e = firstError('name: [A], transitions: { *X + Go = Y }');
      expect(e.code).toBe('FSM-META-VALUE');
      expect(e.hint).toBe('Example: name: Player');
    });

    it('requires a transitions block', () => {
      const e = firstError('name: A');
      expect(e.code).toBe('FSM-TRANSITIONS-MISSING');
      expect([e.line, e.column]).toEqual([1, 1]);
    });

    it('requires a transitions block in empty input', () => {
      const e = firstError('');
      expect(e.code).toBe('FSM-TRANSITIONS-MISSING');
    });

    it('rejects an empty transitions block', () => {
      const e = firstError('transitions: {}');
      expect(e.code).toBe('FSM-TRANSITIONS-EMPTY');
      expect([e.line, e.column, e.length]).toEqual([1, 14, 2]);
    });
  });

  describe('initial state', () => {
    it('requires a marked clause', () => {
      const e = firstError('transitions: { A + Go = B }');
      expect(e.code).toBe('FSM-INITIAL-MISSING');
      expect(e.kind).toBe('InitialStateError');
      expect(e.hint).toBe('Example: *A + ...');
      expect([e.line, e.column, e.length]).toEqual([1, 14, 1]);
    });

    it('rejects a second marked clause', () => {
      const { errors } = parseMachine('transitions: { *A + Go = B, *B + Back = A }');
      expect(errors).toHaveLength(1);
      expect(errors[0].code).toBe('FSM-INITIAL-MULTIPLE');
      expect(errors[0].message).toBe("Only one clause may be marked initial; '*A + Go = B' already is.");
      expect(errors[0].column).toBe(29);
      expect(errors[0].clause).toBe('*B + Back = A');
    });

    it('rejects a marked wildcard source', () => {
      const { errors } = parseMachine('transitions: { *_ + Go = B }');
      expect(errors).toHaveLength(1);
      expect(errors[0].code).toBe('FSM-INITIAL-WILDCARD');
      expect(errors[0].column).toBe(16);
    });
  });
});
