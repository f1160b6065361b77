import { createToken, Lexer } from 'chevrotain';

export const Identifier = createToken({ name: 'Identifier', pattern: /[A-Za-z_][A-Za-z0-9_]*/ });
// A lone underscore: wildcard source or internal target. `_foo` stays an Identifier.
export const Underscore = createToken({ name: 'Underscore', pattern: /_/, longer_alt: Identifier });

export const Star = createToken({ name: 'Star', pattern: /\*/ });
export const Plus = createToken({ name: 'Plus', pattern: /\+/ });
export const Equals = createToken({ name: 'Equals', pattern: /=/ });
export const Pipe = createToken({ name: 'Pipe', pattern: /\|/ });
export const Comma = createToken({ name: 'Comma', pattern: /,/ });
export const Colon = createToken({ name: 'Colon', pattern: /:/ });

export const LCurly = createToken({ name: 'LCurly', pattern: /\{/ });
export const RCurly = createToken({ name: 'RCurly', pattern: /\}/ });
export const LBracket = createToken({ name: 'LBracket', pattern: /\[/ });
export const RBracket = createToken({ name: 'RBracket', pattern: /\]/ });

export const LineComment = createToken({ name: 'LineComment', pattern: /\/\/[^\n\r]*/, group: Lexer.SKIPPED });
export const BlockComment = createToken({ name: 'BlockComment', pattern: /\/\*[\s\S]*?\*\//, line_breaks: true, group: Lexer.SKIPPED });
export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t\r\n]+/, line_breaks: true, group: Lexer.SKIPPED });

export const allTokens = [
  // skipped
  WhiteSpace,
  LineComment,
  BlockComment,
  // punctuation
  Star,
  Plus,
  Equals,
  Pipe,
  Comma,
  Colon,
  LCurly, RCurly,
  LBracket, RBracket,
  // '_' before Identifier so the lone form wins
  Underscore,
  Identifier,
];

export const FsmLexer = new Lexer(allTokens);

export function tokenize(text: string) {
  return FsmLexer.tokenize(text);
}
