import type { Span } from "./error.js";

/**
 * A whitespace-delimited unit of a statement. `word` is the lower-cased form
 * used for keyword matching; `text` keeps the original casing for free text.
 */
export interface Token {
  text: string;
  word: string;
  span: Span;
}

export function scan(input: string): Token[] {
  const scanner = new Scanner(input);
  return scanner.scan();
}

class Scanner {
  private input: string;
  private pos: number;

  constructor(input: string) {
    this.input = input;
    this.pos = 0;
  }

  scan(): Token[] {
    const tokens: Token[] = [];
    while (true) {
      this.skipWhitespace();
      if (this.pos >= this.input.length) break;
      tokens.push(this.lexWord());
    }
    return tokens;
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length && isWhitespace(this.input[this.pos])) {
      this.pos++;
    }
  }

  private lexWord(): Token {
    const start = this.pos;
    while (
      this.pos < this.input.length &&
      !isWhitespace(this.input[this.pos])
    ) {
      this.pos++;
    }
    const text = this.input.slice(start, this.pos);
    return { text, word: text.toLowerCase(), span: { start, end: this.pos } };
  }
}

function isWhitespace(ch: string): boolean {
  return /\s/.test(ch);
}
