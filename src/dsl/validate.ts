import type { Diagnostic } from '../core/types.js';
import { runChevrotain } from '../core/pipeline.js';
import { mapParserError } from '../core/diagnostics.js';
import { tokenize } from './lexer.js';
import { parse } from './parser.js';
import { analyzeMachine } from './semantics.js';
import type { MachineSource } from './ast.js';

/**
 * Parse a machine description into its clause list and metadata shell.
 * `machine` is only set when there are no errors.
 */
export function parseMachine(text: string): { machine?: MachineSource; errors: Diagnostic[] } {
  const { result, errors } = runChevrotain(text, {
    tokenize,
    parse,
    analyze: (cst, src) => {
      const res = analyzeMachine(cst, src);
      return { result: res.machine, errors: res.errors };
    },
    mapParserError,
  });
  return { machine: result, errors };
}
