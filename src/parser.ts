// Token cursor shared by the entry and search grammars.

import { DatebookError, type DatebookErrorKind, type Span } from "./error.js";
import { type Token, scan } from "./lexer.js";

export interface ParseOptions {
  /** Infer am/pm for bare hours on today's date. Defaults to true. */
  infer12h?: boolean;
}

export class TokenCursor {
  protected tokens: Token[];
  protected pos: number;
  protected input: string;

  constructor(input: string) {
    this.tokens = scan(input);
    this.pos = 0;
    this.input = input;
  }

  peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  peekWord(): string | undefined {
    return this.tokens[this.pos]?.word;
  }

  advance(): Token | undefined {
    const tok = this.tokens[this.pos];
    if (tok) this.pos++;
    return tok;
  }

  currentSpan(): Span {
    const tok = this.peek();
    if (tok) return tok.span;
    return this.endSpan();
  }

  endSpan(): Span {
    const last = this.tokens[this.tokens.length - 1];
    if (last) return { start: last.span.end, end: last.span.end };
    return { start: 0, end: 0 };
  }

  error(kind: DatebookErrorKind, message: string, span: Span): DatebookError {
    return DatebookError.at(kind, message, span, this.input);
  }

  /** Take the next token or fail at the end of input. */
  require(kind: DatebookErrorKind, expected: string): Token {
    const tok = this.advance();
    if (!tok) {
      throw this.error(kind, `expected ${expected}`, this.endSpan());
    }
    return tok;
  }

  /** Run a token-level resolver, pinning its failure to the token's span. */
  resolve<T>(tok: Token, fn: (text: string) => T): T {
    try {
      return fn(tok.text);
    } catch (err) {
      throw DatebookError.within(err, tok.span, this.input);
    }
  }
}
