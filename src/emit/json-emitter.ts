import type { MachineSpec } from '../compiler/compile.js';
import { TABLE_FORMAT, TABLE_VERSION, type FsmTableDocument } from '../runtime/schema.js';
import type { EmitTarget, IEmitter } from './interfaces.js';
import { assertDistinctNamespaces } from './names.js';

export function toTableDocument(machine: MachineSpec): FsmTableDocument {
  const stateIndex = new Map(machine.states.map((s, i) => [s, i]));
  const eventIndex = new Map(machine.events.map((e, i) => [e, i]));
  const transitions: [number, number, number][] = [];
  for (const entry of machine.table.entries()) {
    const s = stateIndex.get(entry.state);
    const e = eventIndex.get(entry.event);
    const t = stateIndex.get(entry.target);
    if (s === undefined || e === undefined || t === undefined) {
      throw new Error(`Table entry ${entry.state} + ${entry.event} = ${entry.target} refers to an unknown identifier`);
    }
    transitions.push([s, e, t]);
  }
  return {
    format: TABLE_FORMAT,
    version: TABLE_VERSION,
    namespace: machine.namespace ?? null,
    initial: machine.initial,
    states: [...machine.states],
    events: [...machine.events],
    derive: {
      states: [...machine.deriveStates.capabilities],
      events: [...machine.deriveEvents.capabilities],
    },
    transitions,
  };
}

/**
 * Serialized table for the generic runtime (`loadTable`). Several machines
 * are written as a JSON array.
 */
export class JsonTableEmitter implements IEmitter {
  readonly target: EmitTarget = 'json';
  readonly extension = '.json';

  constructor(private readonly space: number | string = 2) {}

  emit(machine: MachineSpec): string {
    return JSON.stringify(toTableDocument(machine), null, this.space) + '\n';
  }

  emitAll(machines: readonly MachineSpec[]): string {
    assertDistinctNamespaces(machines);
    if (machines.length === 1) return this.emit(machines[0]);
    return JSON.stringify(machines.map(toTableDocument), null, this.space) + '\n';
  }
}
