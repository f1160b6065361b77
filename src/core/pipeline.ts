import type { CstNode, ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { Diagnostic } from './types.js';
import { fromLexerError } from './diagnostics.js';

export interface FrontEndAdapters<T> {
  tokenize: (text: string) => { tokens: IToken[]; errors: ILexingError[] };
  parse: (tokens: IToken[]) => { cst: CstNode | undefined; errors: IRecognitionException[] };
  analyze: (cst: CstNode, text: string) => { result?: T; errors: Diagnostic[] };
  mapParserError: (err: IRecognitionException, text: string, tokens: readonly IToken[]) => Diagnostic;
}

/**
 * Lex, parse and analyze `text`. Each stage only runs when the previous one
 * produced no errors, so a result is returned only for clean input.
 */
export function runChevrotain<T>(text: string, adapters: FrontEndAdapters<T>): { result?: T; errors: Diagnostic[] } {
  const lex = adapters.tokenize(text);
  if (lex.errors.length > 0) {
    return { errors: lex.errors.map(fromLexerError) };
  }

  const parseRes = adapters.parse(lex.tokens);
  if (parseRes.errors.length > 0 || !parseRes.cst) {
    return { errors: parseRes.errors.map((e) => adapters.mapParserError(e, text, lex.tokens)) };
  }

  try {
    return adapters.analyze(parseRes.cst, text);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return {
      errors: [{ line: 1, column: 1, severity: 'error', kind: 'InternalError', code: 'FSM-INTERNAL', message: `Internal semantic analysis error: ${message}` }],
    };
  }
}
