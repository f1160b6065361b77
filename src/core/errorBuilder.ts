import type { IToken } from 'chevrotain';
import type { Diagnostic, DiagnosticKind, SourceSpan } from './types.js';
import { coercePos } from './diagnostics.js';

type Common = {
  hint?: string;
  length?: number;
  clause?: string;
};

export function errorAt(
  line: number | null | undefined,
  column: number | null | undefined,
  kind: DiagnosticKind,
  code: string,
  message: string,
  extra: Common = {}
): Diagnostic {
  const pos = coercePos(line ?? null, column ?? null, 1, 1);
  return { line: pos.line, column: pos.column, message, severity: 'error', kind, code, ...extra };
}

export function errorAtToken(tok: IToken | undefined | null, kind: DiagnosticKind, code: string, message: string, extra: Common = {}): Diagnostic {
  const length = extra.length ?? (tok?.image ? tok.image.length : undefined);
  return errorAt(tok?.startLine, tok?.startColumn, kind, code, message, { ...extra, length });
}

export function errorAtSpan(span: SourceSpan, kind: DiagnosticKind, code: string, message: string, extra: Common = {}): Diagnostic {
  return errorAt(span.line, span.column, kind, code, message, { length: span.length, ...extra });
}

export function warningAt(span: SourceSpan, kind: DiagnosticKind, code: string, message: string, extra: Common = {}): Diagnostic {
  const pos = coercePos(span.line, span.column, 1, 1);
  return { line: pos.line, column: pos.column, message, severity: 'warning', kind, code, length: span.length, ...extra };
}
