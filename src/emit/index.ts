import type { MachineSpec } from '../compiler/compile.js';
import type { EmitTarget, IEmitter } from './interfaces.js';
import { TypeScriptEmitter } from './typescript-emitter.js';
import { JsonTableEmitter } from './json-emitter.js';

export interface EmitOptions {
  target?: EmitTarget;
  /** Custom emitter (overrides `target`) */
  emitter?: IEmitter;
}

export function createEmitter(target: EmitTarget): IEmitter {
  switch (target) {
    case 'typescript':
      return new TypeScriptEmitter();
    case 'json':
      return new JsonTableEmitter();
  }
}

function isMachineList(m: MachineSpec | readonly MachineSpec[]): m is readonly MachineSpec[] {
  return Array.isArray(m);
}

/**
 * Emit one or more validated machines as a single artifact.
 */
export function emit(machines: MachineSpec | readonly MachineSpec[], options: EmitOptions = {}): string {
  const emitter = options.emitter ?? createEmitter(options.target ?? 'typescript');
  const list = isMachineList(machines) ? machines : [machines];
  return emitter.emitAll(list);
}

export type { EmitTarget, IEmitter } from './interfaces.js';
export { TypeScriptEmitter } from './typescript-emitter.js';
export type { TypeScriptEmitterOptions } from './typescript-emitter.js';
export { JsonTableEmitter, toTableDocument } from './json-emitter.js';
