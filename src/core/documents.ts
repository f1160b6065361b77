import type { CompileOptions, Diagnostic } from './types.js';
import { compile, type MachineSpec } from '../compiler/compile.js';
import { findNameClash } from '../emit/names.js';
import { extractFsmBlocks, offsetDiagnostics, type FsmBlock } from './markdown.js';

export type DocumentKind = 'fsm' | 'markdown' | 'auto';

export interface DocumentResult {
  /** Machines that compiled, in document order. */
  machines: MachineSpec[];
  /** Number of machine descriptions found (compiled or not). */
  machineCount: number;
  /** Diagnostics with lines relative to the whole document. */
  diagnostics: Diagnostic[];
}

const MARKDOWN_EXT = /\.(md|markdown|mdx)$/i;

export function documentKind(filename: string | undefined): DocumentKind {
  if (!filename || filename === '<stdin>') return 'auto';
  return MARKDOWN_EXT.test(filename) ? 'markdown' : 'fsm';
}

/**
 * Compile every machine in a document. Markdown contributes its fenced
 * `fsm`/`statemachine` blocks; anything else is one machine description.
 * In `auto` mode fenced blocks win when present.
 */
export function compileDocument(content: string, kind: DocumentKind, options: CompileOptions = {}): DocumentResult {
  const blocks = kind === 'fsm' ? [] : extractFsmBlocks(content);
  if (blocks.length === 0) {
    if (kind === 'markdown') return { machines: [], machineCount: 0, diagnostics: [] };
    const res = compile(content, options);
    return { machines: res.machine ? [res.machine] : [], machineCount: 1, diagnostics: res.diagnostics };
  }

  const machines: MachineSpec[] = [];
  const sources: FsmBlock[] = [];
  const diagnostics: Diagnostic[] = [];
  for (const b of blocks) {
    const res = compile(b.content, options);
    if (res.machine) {
      machines.push(res.machine);
      sources.push(b);
    }
    diagnostics.push(...offsetDiagnostics(res.diagnostics, b.startLine - 1));
  }

  // Machines from one document end up in one artifact
  const clash = findNameClash(machines);
  if (clash) {
    const block = sources[clash.second];
    diagnostics.push({
      line: block.startLine,
      column: 1,
      severity: 'error',
      kind: 'NamespaceClashError',
      code: 'FSM-NAMESPACE-CLASH',
      message: clash.message,
      hint: `The other machine starts on line ${sources[clash.first].startLine}.`,
    });
  }
  return { machines, machineCount: blocks.length, diagnostics };
}
