import { describe, it, expect } from 'vitest';
import { compileOrThrow } from '../compiler/compile.js';
import { TypeScriptEmitter } from './typescript-emitter.js';
import { emit } from './index.js';

const DOOR = `name: Door,
derive_states: [Debug],
derive_events: [PartialEq],
transitions: {
  *Closed + Open = Opened,
  Opened + Close = Closed,
  _ + Lock = Closed,
}`;

describe('TypeScriptEmitter', () => {
  it('emits enums, capability helpers and the lookup', () => {
    const out = new TypeScriptEmitter().emit(compileOrThrow(DOOR));
    expect(out).toBe([
      '/* Generated by fsm-table-compiler. Do not edit by hand. */',
      '',
      'export enum DoorState {',
      '  Closed = 0,',
      '  Opened = 1,',
      '}',
      '',
      'export function defaultDoorState(): DoorState {',
      '  return DoorState.Closed;',
      '}',
      '',
      "const DoorStateNames: readonly string[] = ['Closed', 'Opened'];",
      '',
      'export function formatDoorState(value: DoorState): string {',
      '  return DoorStateNames[value] ?? String(value);',
      '}',
      '',
      'export enum DoorEvent {',
      '  Open = 0,',
      '  Close = 1,',
      '  Lock = 2,',
      '}',
      '',
      'export function equalsDoorEvent(a: DoorEvent, b: DoorEvent): boolean {',
      '  return a === b;',
      '}',
      '',
      'export function processDoorEvent(state: DoorState, event: DoorEvent): DoorState | undefined {',
      '  switch (state) {',
      '    case DoorState.Closed:',
      '      switch (event) {',
      '        case DoorEvent.Open: return DoorState.Opened;',
      '        case DoorEvent.Lock: return DoorState.Closed; // _ + Lock = Closed',
      '        default: return undefined;',
      '      }',
      '    case DoorState.Opened:',
      '      switch (event) {',
      '        case DoorEvent.Close: return DoorState.Closed;',
      '        case DoorEvent.Lock: return DoorState.Closed; // _ + Lock = Closed',
      '        default: return undefined;',
      '      }',
      '    default:',
      '      return undefined;',
      '  }',
      '}',
      '',
    ].join('\n'));
  });

  it('uses unqualified names without a namespace', () => {
    const out = new TypeScriptEmitter({ banner: null }).emit(compileOrThrow('transitions: { *A + Go = B }'));
    expect(out.startsWith('export enum State {\n')).toBe(true);
    expect(out).toContain('export function defaultState(): State {');
    expect(out).toContain('export function processEvent(state: State, event: Event): State | undefined {');
    // B has no outgoing transitions
    expect(out).toContain('    case State.B:\n      return undefined;\n');
  });

  it('emits every requested capability', () => {
    const out = new TypeScriptEmitter().emit(
      compileOrThrow('derive_states: [Debug, Clone, PartialEq, Hash], derive_events: [], transitions: { *A + Go = B }')
    );
    expect(out).toContain("const StateNames: readonly string[] = ['A', 'B'];");
    expect(out).toContain('export function cloneState(value: State): State {');
    expect(out).toContain('export function equalsState(a: State, b: State): boolean {');
    expect(out).toContain('export function hashState(value: State): number {');
    expect(out).not.toContain('formatEvent');
    expect(out).not.toContain('cloneEvent');
  });

  it('honours a custom indent', () => {
    const out = new TypeScriptEmitter({ indent: '\t', banner: null }).emit(compileOrThrow('transitions: { *A + Go = B }'));
    expect(out).toContain('export enum State {\n\tA = 0,\n\tB = 1,\n}');
  });

  it('keeps several machines apart by namespace', () => {
    const player = compileOrThrow('name: Player, transitions: { *Idle + Move = Walking, Walking + Stop = Idle }');
    const enemy = compileOrThrow('name: Enemy, transitions: { *Patrol + Spot = Chasing, Chasing + Lose = Patrol }');
    const out = emit([player, enemy]);
    expect(out).toContain('export enum PlayerState {');
    expect(out).toContain('export enum EnemyState {');
    expect(out).toContain('export function processPlayerEvent(state: PlayerState, event: PlayerEvent): PlayerState | undefined {');
    expect(out).toContain('export function defaultEnemyState(): EnemyState {\n  return EnemyState.Patrol;\n}');
  });

  it('refuses two machines with the same namespace', () => {
    const a = compileOrThrow('transitions: { *A + Go = B }');
    const b = compileOrThrow('transitions: { *X + Go = Y }');
    expect(() => emit([a, b])).toThrow("Two machines share the default namespace; give each one a distinct 'name:'.");
  });

  it('keeps namespaces that differ only in case apart', () => {
    const lower = compileOrThrow('name: door, derive_states: [Debug], transitions: { *Closed + Open = Opened }');
    const upper = compileOrThrow('name: Door, derive_states: [Debug], transitions: { *Shut + Open = Ajar }');
    const out = emit([lower, upper]);
    expect(out).toContain('export enum doorState {');
    expect(out).toContain('export enum DoorState {');
    expect(out).toContain("const doorStateNames: readonly string[] = ['Closed', 'Opened'];");
    expect(out).toContain("const DoorStateNames: readonly string[] = ['Shut', 'Ajar'];");
  });

  it('gives the formatting constants of Foobar and FOOBar distinct names', () => {
    const a = compileOrThrow('name: Foobar, derive_states: [Debug], transitions: { *A + Go = B }');
    const b = compileOrThrow('name: FOOBar, derive_states: [Debug], transitions: { *A + Go = B }');
    const out = emit([a, b]);
    expect(out).toContain("const FoobarStateNames: readonly string[] = ['A', 'B'];");
    expect(out).toContain("const FOOBarStateNames: readonly string[] = ['A', 'B'];");
  });

  it('refuses namespaces whose declarations overlap', () => {
    // `name: formatX` declares `formatXState`, which is also the formatting helper of `X`
    const x = compileOrThrow('name: X, derive_states: [Debug], transitions: { *A + Go = B }');
    const formatX = compileOrThrow('name: formatX, derive_states: [], derive_events: [], transitions: { *A + Go = B }');
    expect(() => emit([x, formatX])).toThrow(
      "Machines in 'X' and 'formatX' both declare 'formatXState'; rename one of them."
    );
  });
});
