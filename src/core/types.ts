export type Severity = 'error' | 'warning';

export type DiagnosticKind =
  | 'SyntaxError'
  | 'InitialStateError'
  | 'DuplicateTransitionError'
  | 'AmbiguousWildcardError'
  | 'InvalidInternalTransitionError'
  | 'UnknownCapabilityError'
  | 'NamespaceClashError'
  | 'UnreachableStateWarning'
  | 'RedundantWildcardWarning'
  | 'InternalError';

export interface Diagnostic {
  line: number;
  column: number;
  message: string;
  severity: Severity;
  kind: DiagnosticKind;
  code: string;
  hint?: string;
  length?: number;
  /** Source text of the clause the diagnostic points at, when there is one. */
  clause?: string;
}

export interface CompileOptions {
  /** Treat warnings as errors. */
  strict?: boolean;
  /** Derive list used when `derive_states` / `derive_events` are omitted. */
  defaultDerives?: readonly string[];
}

// 1-based line/column span of a piece of source
export interface SourceSpan {
  line: number;
  column: number;
  length: number;
  offset: number;
}
