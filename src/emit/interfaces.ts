import type { MachineSpec } from '../compiler/compile.js';

export type EmitTarget = 'typescript' | 'json';

/**
 * Interface for emitters that turn a validated machine into an artifact
 */
export interface IEmitter {
  readonly target: EmitTarget;
  /** File extension for written artifacts, including the dot */
  readonly extension: string;
  /**
   * Generate the artifact for one machine
   * @returns Source text of the artifact
   */
  emit(machine: MachineSpec): string;
  /**
   * Generate a single artifact holding several machines. Their namespaces
   * must be distinct.
   */
  emitAll(machines: readonly MachineSpec[]): string;
}
