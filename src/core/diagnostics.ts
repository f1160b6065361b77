import type { ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { Diagnostic } from './types.js';

export function coercePos(line?: number | null, column?: number | null, fallbackLine = 1, fallbackColumn = 1) {
  const ln = typeof line === 'number' && Number.isFinite(line) && line > 0 ? line : fallbackLine;
  const col = typeof column === 'number' && Number.isFinite(column) && column > 0 ? column : fallbackColumn;
  return { line: ln, column: col };
}

export function endOfTextPos(text: string) {
  const lines = text.split(/\r?\n/);
  const line = lines.length;
  const last = lines[lines.length - 1] ?? '';
  const column = Math.max(1, last.length + 1);
  return { line, column };
}

export function codeFrame(
  text: string,
  line: number,
  column: number,
  length = 1,
  contextLines = 1
): string {
  const lines = text.split(/\r?\n/);
  const idx = Math.max(0, Math.min(lines.length - 1, line - 1));
  const start = Math.max(0, idx - contextLines);
  const end = Math.min(lines.length - 1, idx + contextLines);
  const numWidth = String(end + 1).length;

  const parts: string[] = [];
  for (let i = start; i <= end; i++) {
    const lno = String(i + 1).padStart(numWidth, ' ');
    parts.push(`${lno} | ${lines[i] ?? ''}`);
    if (i === idx) {
      const caretPad = ' '.repeat(Math.max(0, column - 1));
      const marker = '^'.repeat(Math.max(1, Math.min(length, (lines[i] ?? '').length - column + 1)));
      parts.push(`${' '.repeat(numWidth)} | ${caretPad}${marker}`);
    }
  }
  return parts.join('\n');
}

export function fromLexerError(e: ILexingError): Diagnostic {
  const { line, column } = coercePos(e.line, e.column);
  return {
    line,
    column,
    severity: 'error',
    kind: 'SyntaxError',
    code: 'FSM-LEX',
    message: e.message,
    hint: "Names are letters, digits and '_'; operators are * + = | , : { } [ ].",
    length: e.length,
  };
}

// Helpers
function tokenImage(t?: IToken | null) {
  const img = t?.image ?? '';
  return img === '' ? 'end of input' : `'${img}'`;
}

function isInRule(err: IRecognitionException, name: string) {
  return err.context.ruleStack.includes(name);
}

function innermostRule(err: IRecognitionException): string | undefined {
  const stack = err.context.ruleStack;
  return stack[stack.length - 1];
}

function expecting(err: IRecognitionException, tokenName: string) {
  // Chevrotain does not always expose expected tokens structurally; fall back to message text.
  return (err.message || '').includes(`--> ${tokenName} <--`);
}

const CLAUSE_BOUNDARY = new Set(['LCurly', 'RCurly', 'Comma']);

// Source text of the clause around the failing token, bounded by '{', ',' and '}'
function clauseAround(err: IRecognitionException, text: string, tokens: readonly IToken[]): string | undefined {
  if (!isInRule(err, 'transitionsBlock')) return undefined;
  const at = err.token.tokenType?.name === 'EOF'
    ? tokens.length
    : tokens.findIndex((t) => t.startOffset === err.token.startOffset);
  if (at < 0) return undefined;
  let start = at;
  while (start > 0 && !CLAUSE_BOUNDARY.has(tokens[start - 1].tokenType.name)) start--;
  let end = at;
  while (end < tokens.length && !CLAUSE_BOUNDARY.has(tokens[end].tokenType.name)) end++;
  if (end <= start) return undefined;
  const last = tokens[end - 1];
  const clause = text.slice(tokens[start].startOffset, last.startOffset + last.image.length).replace(/\s+/g, ' ').trim();
  return clause || undefined;
}

export function mapParserError(err: IRecognitionException, text: string, tokens: readonly IToken[] = []): Diagnostic {
  const tok = err.token;
  const posFallback = endOfTextPos(text);
  const atEof = tok.tokenType?.name === 'EOF';
  const { line, column } = atEof
    ? posFallback
    : coercePos(tok.startLine ?? null, tok.startColumn ?? null, posFallback.line, posFallback.column);
  const tokType = tok.tokenType?.name;
  const len = !atEof && tok.image.length > 0 ? tok.image.length : 1;
  const found = atEof ? 'end of input' : tokenImage(tok);
  const clause = clauseAround(err, text, tokens);
  const base = { line, column, severity: 'error' as const, length: len, ...(clause ? { clause } : {}) };
  const rule = innermostRule(err);

  // '_' where an event belongs
  if (rule === 'eventPattern' && tokType === 'Underscore') {
    return { ...base, kind: 'SyntaxError', code: 'FSM-EVENT-WILDCARD', message: "Events cannot be wildcards; list every event explicitly.", hint: 'Example: _ + Reset = Idle' };
  }

  // '*' inside an alternative list: A | *B
  if (rule === 'statePattern' && tokType === 'Star') {
    return { ...base, kind: 'InitialStateError', code: 'FSM-INITIAL-MISPLACED', message: "The initial marker '*' must prefix the whole state pattern.", hint: 'Write *A | B + Event = Target; the first alternative becomes the initial state.' };
  }

  if (rule === 'clause' && expecting(err, 'Plus')) {
    return { ...base, kind: 'SyntaxError', code: 'FSM-CLAUSE-MISSING-EVENT', message: `Expected '+' and an event after the source state, found ${found}.`, hint: 'Example: Idle + Start = Running' };
  }

  if (rule === 'target') {
    return { ...base, kind: 'SyntaxError', code: 'FSM-TARGET-INVALID', message: `Expected a target state or '_' after '=', found ${found}.`, hint: "Use '_' for an internal transition: Moving + Tick = _" };
  }

  if (isInRule(err, 'transitionsBlock') && expecting(err, 'RCurly')) {
    return { ...base, kind: 'SyntaxError', code: 'FSM-BLOCK-MISSING-RBRACE', message: `Expected ',' or '}' in the transitions block, found ${found}.`, hint: "Separate clauses with ',' and close the block with '}'." };
  }

  if (isInRule(err, 'deriveList')) {
    return { ...base, kind: 'SyntaxError', code: 'FSM-DERIVE-MALFORMED', message: `Malformed derive list near ${found}.`, hint: 'Example: derive_states: [Debug, Clone, PartialEq, Eq]' };
  }

  if (rule === 'entry' && expecting(err, 'Colon')) {
    return { ...base, kind: 'SyntaxError', code: 'FSM-META-MISSING-COLON', message: `Expected ':' after the key, found ${found}.`, hint: 'Example: transitions: { ... }' };
  }

  if (rule === 'machine' || rule === 'entry') {
    return { ...base, kind: 'SyntaxError', code: 'FSM-SYNTAX', message: `Unexpected ${found}; expected 'name:', 'derive_states:', 'derive_events:' or 'transitions:'.`, hint: 'A machine is a list of key: value entries ending with transitions: { ... }' };
  }

  return { ...base, kind: 'SyntaxError', code: 'FSM-SYNTAX', message: err.message || 'Parser error', hint: 'Clauses read: Source + Event = Target' };
}
