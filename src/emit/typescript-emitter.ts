import type { MachineSpec } from '../compiler/compile.js';
import type { Capability, DeriveSet } from '../compiler/capabilities.js';
import type { TableEntry } from '../compiler/table.js';
import type { EmitTarget, IEmitter } from './interfaces.js';
import { assertDistinctNamespaces, emittedNames, namesConstant } from './names.js';

export interface TypeScriptEmitterOptions {
  /** Indentation unit (default: two spaces) */
  indent?: string;
  /** Banner comment placed at the top of the module */
  banner?: string | null;
}

const DEFAULT_BANNER = '/* Generated by fsm-table-compiler. Do not edit by hand. */';

/**
 * Emits a TypeScript module: numeric enums for states and events, the
 * default-state accessor, the requested capability helpers and a
 * `process<Ns>Event` lookup built from nested switches.
 */
export class TypeScriptEmitter implements IEmitter {
  readonly target: EmitTarget = 'typescript';
  readonly extension = '.ts';
  private readonly indent: string;
  private readonly banner: string | null;

  constructor(options: TypeScriptEmitterOptions = {}) {
    this.indent = options.indent ?? '  ';
    this.banner = options.banner === undefined ? DEFAULT_BANNER : options.banner;
  }

  emit(machine: MachineSpec): string {
    return this.emitAll([machine]);
  }

  emitAll(machines: readonly MachineSpec[]): string {
    assertDistinctNamespaces(machines);
    const blocks: string[] = [];
    if (this.banner) blocks.push(this.banner);
    for (const machine of machines) blocks.push(...this.machineBlocks(machine));
    return blocks.join('\n\n') + '\n';
  }

  private machineBlocks(machine: MachineSpec): string[] {
    const names = emittedNames(machine);
    return [
      this.enumBlock(names.stateType, machine.states),
      [
        `export function ${names.defaultFn}(): ${names.stateType} {`,
        `${this.indent}return ${names.stateType}.${machine.initial};`,
        '}',
      ].join('\n'),
      ...this.capabilityBlocks(names.stateType, machine.states, machine.deriveStates),
      this.enumBlock(names.eventType, machine.events),
      ...this.capabilityBlocks(names.eventType, machine.events, machine.deriveEvents),
      this.processBlock(machine),
    ];
  }

  private enumBlock(typeName: string, members: readonly string[]): string {
    const lines = [`export enum ${typeName} {`];
    members.forEach((m, i) => lines.push(`${this.indent}${m} = ${i},`));
    lines.push('}');
    return lines.join('\n');
  }

  private capabilityBlocks(typeName: string, members: readonly string[], derive: DeriveSet): string[] {
    return derive.capabilities.map((cap) => this.capabilityBlock(cap, typeName, members));
  }

  private capabilityBlock(cap: Capability, typeName: string, members: readonly string[]): string {
    const i = this.indent;
    switch (cap) {
      case 'formatting': {
        const table = namesConstant(typeName);
        const list = members.map((m) => `'${m}'`).join(', ');
        return [
          `const ${table}: readonly string[] = [${list}];`,
          '',
          `export function format${typeName}(value: ${typeName}): string {`,
          `${i}return ${table}[value] ?? String(value);`,
          '}',
        ].join('\n');
      }
      case 'duplication':
        return [
          `export function clone${typeName}(value: ${typeName}): ${typeName} {`,
          `${i}return value;`,
          '}',
        ].join('\n');
      case 'equality':
        return [
          `export function equals${typeName}(a: ${typeName}, b: ${typeName}): boolean {`,
          `${i}return a === b;`,
          '}',
        ].join('\n');
      case 'hashability':
        return [
          `export function hash${typeName}(value: ${typeName}): number {`,
          `${i}return value;`,
          '}',
        ].join('\n');
    }
  }

  private caseLine(entry: TableEntry, stateType: string, eventType: string): string {
    const ret = `case ${eventType}.${entry.event}: return ${stateType}.${entry.target};`;
    return entry.origin === 'wildcard' ? `${ret} // ${entry.clause.text}` : ret;
  }

  private processBlock(machine: MachineSpec): string {
    const { stateType, eventType, processFn } = emittedNames(machine);
    const i = this.indent;
    const lines = [
      `export function ${processFn}(state: ${stateType}, event: ${eventType}): ${stateType} | undefined {`,
      `${i}switch (state) {`,
    ];
    const entries = machine.table.entries();
    for (const state of machine.states) {
      const row = entries.filter((e) => e.state === state);
      lines.push(`${i}${i}case ${stateType}.${state}:`);
      if (row.length === 0) {
        lines.push(`${i}${i}${i}return undefined;`);
        continue;
      }
      lines.push(`${i}${i}${i}switch (event) {`);
      for (const entry of row) lines.push(`${i}${i}${i}${i}${this.caseLine(entry, stateType, eventType)}`);
      lines.push(`${i}${i}${i}${i}default: return undefined;`);
      lines.push(`${i}${i}${i}}`);
    }
    lines.push(`${i}${i}default:`);
    lines.push(`${i}${i}${i}return undefined;`);
    lines.push(`${i}}`);
    lines.push('}');
    return lines.join('\n');
  }
}
