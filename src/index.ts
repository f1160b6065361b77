// Public SDK surface for programmatic use
export type {
  Diagnostic,
  DiagnosticKind,
  Severity,
  CompileOptions,
  SourceSpan,
} from './core/types.js';

// Front end
export { parseMachine } from './dsl/validate.js';
export type { MachineSource, Clause, StatePattern, TargetSpec, NameRef } from './dsl/ast.js';

// Compiler
export { compile, compileOrThrow, FsmCompileError } from './compiler/compile.js';
export type { CompileResult, MachineSpec } from './compiler/compile.js';
export { expandClause } from './compiler/expand.js';
export type { Expansion, Transition, WildcardRule } from './compiler/expand.js';
export { buildTable, TransitionTable } from './compiler/table.js';
export type { TableEntry, EntryOrigin } from './compiler/table.js';
export { CAPABILITIES, DEFAULT_DERIVES } from './compiler/capabilities.js';
export type { Capability, DeriveSet } from './compiler/capabilities.js';

// Artifacts
export { emit, createEmitter, TypeScriptEmitter, JsonTableEmitter, toTableDocument } from './emit/index.js';
export type { EmitOptions, EmitTarget, IEmitter, TypeScriptEmitterOptions } from './emit/index.js';

// Runtime
export { loadTable, TableMachine, FsmTableError } from './runtime/table-machine.js';
export { createMachine } from './runtime/create-machine.js';
export { FsmTableSchema, TABLE_FORMAT, TABLE_VERSION } from './runtime/schema.js';
export type { FsmTableDocument } from './runtime/schema.js';

// Reporting and documents
export { textReport, toJsonResult } from './core/format.js';
export type { JsonResult, OutputFormat } from './core/format.js';
export type { FsmBlock } from './core/markdown.js';
export { extractFsmBlocks, offsetDiagnostics } from './core/markdown.js';
export { compileDocument, documentKind } from './core/documents.js';
export type { DocumentKind, DocumentResult } from './core/documents.js';
