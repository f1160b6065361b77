import type { CompileOptions } from '../core/types.js';
import { compileOrThrow } from '../compiler/compile.js';
import { toTableDocument } from '../emit/json-emitter.js';
import { TableMachine } from './table-machine.js';

/**
 * Compile a machine description straight into a runtime table.
 * Throws `FsmCompileError` when the description does not compile.
 *
 * @example
 * ```typescript
 * const door = createMachine(`transitions: { *Closed + Open = Opened, Opened + Close = Closed }`);
 * let state = door.initial;                         // "Closed"
 * state = door.processEvent(state, 'Open') ?? state; // "Opened"
 * ```
 */
export function createMachine(source: string, options: CompileOptions = {}): TableMachine {
  return TableMachine.load(toTableDocument(compileOrThrow(source, options)));
}
