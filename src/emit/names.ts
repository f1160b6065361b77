import type { MachineSpec } from '../compiler/compile.js';
import type { Capability } from '../compiler/capabilities.js';

export interface EmittedNames {
  stateType: string;
  eventType: string;
  defaultFn: string;
  processFn: string;
}

type NamedMachine = Pick<MachineSpec, 'namespace' | 'deriveStates' | 'deriveEvents'>;

/**
 * Names qualified by the machine's namespace, spelled exactly as written
 * (`name: Player` gives `PlayerState`); `State`/`Event` without one.
 */
export function emittedNames(machine: Pick<MachineSpec, 'namespace'>): EmittedNames {
  const ns = machine.namespace ?? '';
  return {
    stateType: `${ns}State`,
    eventType: `${ns}Event`,
    defaultFn: `default${ns}State`,
    processFn: `process${ns}Event`,
  };
}

/** Lookup constant behind the `formatting` helper. */
export function namesConstant(typeName: string): string {
  return `${typeName}Names`;
}

export function capabilityNames(cap: Capability, typeName: string): string[] {
  switch (cap) {
    case 'formatting':
      return [namesConstant(typeName), `format${typeName}`];
    case 'duplication':
      return [`clone${typeName}`];
    case 'equality':
      return [`equals${typeName}`];
    case 'hashability':
      return [`hash${typeName}`];
  }
}

/** Every top-level identifier the TypeScript emitter declares for `machine`. */
export function declaredNames(machine: NamedMachine): string[] {
  const names = emittedNames(machine);
  return [
    names.stateType,
    names.eventType,
    names.defaultFn,
    names.processFn,
    ...machine.deriveStates.capabilities.flatMap((cap) => capabilityNames(cap, names.stateType)),
    ...machine.deriveEvents.capabilities.flatMap((cap) => capabilityNames(cap, names.eventType)),
  ];
}

function label(namespace: string | undefined): string {
  return namespace === undefined ? 'the default namespace' : `'${namespace}'`;
}

export interface NameClash {
  /** Positions of the two clashing machines in the input list */
  first: number;
  second: number;
  name: string;
  message: string;
}

/** The first pair of machines whose emitted artifacts would declare the same name. */
export function findNameClash(machines: readonly NamedMachine[]): NameClash | undefined {
  const owners = new Map<string, number>();
  for (let index = 0; index < machines.length; index++) {
    const machine = machines[index];
    for (const name of new Set(declaredNames(machine))) {
      const first = owners.get(name);
      if (first === undefined) {
        owners.set(name, index);
        continue;
      }
      const other = machines[first].namespace;
      const message = other === machine.namespace
        ? `Two machines share ${label(other)}; give each one a distinct 'name:'.`
        : `Machines in ${label(other)} and ${label(machine.namespace)} both declare '${name}'; rename one of them.`;
      return { first, second: index, name, message };
    }
  }
  return undefined;
}

export function assertDistinctNamespaces(machines: readonly NamedMachine[]): void {
  const clash = findNameClash(machines);
  if (clash) throw new Error(clash.message);
}
