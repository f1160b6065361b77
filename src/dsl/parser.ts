import { CstParser, EOF, type CstNode, type IToken } from 'chevrotain';
import * as t from './lexer.js';

export class FsmParser extends CstParser {
  constructor() {
    super(t.allTokens, { nodeLocationTracking: 'full' });
    this.performSelfAnalysis();
  }

  // name: X, derive_states: [...], derive_events: [...], transitions: { ... }
  public machine = this.RULE('machine', () => {
    this.MANY(() => this.SUBRULE(this.entry));
    this.CONSUME(EOF);
  });

  private entry = this.RULE('entry', () => {
    this.CONSUME(t.Identifier);
    this.CONSUME(t.Colon);
    this.OR([
      { ALT: () => this.CONSUME2(t.Identifier) },
      { ALT: () => this.SUBRULE(this.deriveList) },
      { ALT: () => this.SUBRULE(this.transitionsBlock) },
    ]);
    this.OPTION(() => this.CONSUME(t.Comma));
  });

  private deriveList = this.RULE('deriveList', () => {
    this.CONSUME(t.LBracket);
    this.MANY_SEP({
      SEP: t.Comma,
      DEF: () => this.CONSUME(t.Identifier),
    });
    this.CONSUME(t.RBracket);
  });

  private transitionsBlock = this.RULE('transitionsBlock', () => {
    this.CONSUME(t.LCurly);
    this.MANY(() => {
      this.SUBRULE(this.clause);
      this.OPTION(() => this.CONSUME(t.Comma));
    });
    this.CONSUME(t.RCurly);
  });

  // *A | B + E1 | E2 = T
  private clause = this.RULE('clause', () => {
    this.SUBRULE(this.statePattern);
    this.CONSUME(t.Plus);
    this.SUBRULE(this.eventPattern);
    this.OPTION(() => {
      this.CONSUME(t.Equals);
      this.SUBRULE(this.target);
    });
  });

  private statePattern = this.RULE('statePattern', () => {
    this.OPTION(() => this.CONSUME(t.Star));
    this.OR([
      { ALT: () => this.CONSUME(t.Underscore) },
      {
        ALT: () => {
          this.CONSUME(t.Identifier);
          this.MANY(() => {
            this.CONSUME(t.Pipe);
            this.CONSUME2(t.Identifier);
          });
        }
      },
    ]);
  });

  private eventPattern = this.RULE('eventPattern', () => {
    this.CONSUME(t.Identifier);
    this.MANY(() => {
      this.CONSUME(t.Pipe);
      this.CONSUME2(t.Identifier);
    });
  });

  private target = this.RULE('target', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.Underscore) },
      { ALT: () => this.CONSUME(t.Identifier) },
    ]);
  });
}

export const parserInstance = new FsmParser();

export function parse(tokens: IToken[]): { cst: CstNode | undefined; errors: FsmParser['errors'] } {
  parserInstance.input = tokens;
  const cst: CstNode | undefined = parserInstance.machine();
  return { cst, errors: parserInstance.errors };
}
