/** Character range within the input string. */
export interface Span {
  start: number;
  end: number;
}

export type DatebookErrorKind =
  | "malformedDuration"
  | "unparsableDate"
  | "invalidDate"
  | "invalidTime"
  | "missingShape"
  | "missingDetail"
  | "unknownSearchTerm"
  | "ambiguousRange"
  | "nonMonotonicState"
  | "notFound"
  | "config";

/** All errors produced by datebook. */
export class DatebookError extends Error {
  readonly kind: DatebookErrorKind;
  readonly span?: Span;
  readonly input?: string;

  constructor(
    kind: DatebookErrorKind,
    message: string,
    span?: Span,
    input?: string,
  ) {
    super(message);
    this.name = "DatebookError";
    this.kind = kind;
    this.span = span;
    this.input = input;
  }

  /** An error pointing at a token of a statement. */
  static at(
    kind: DatebookErrorKind,
    message: string,
    span: Span,
    input: string,
  ): DatebookError {
    return new DatebookError(kind, message, span, input);
  }

  static nonMonotonic(message: string): DatebookError {
    return new DatebookError("nonMonotonicState", message);
  }

  static notFound(message: string): DatebookError {
    return new DatebookError("notFound", message);
  }

  static config(message: string): DatebookError {
    return new DatebookError("config", message);
  }

  /** Re-anchor an error raised on a lone token to its place in a statement. */
  static within(err: unknown, span: Span, input: string): unknown {
    if (err instanceof DatebookError && err.input === undefined) {
      return DatebookError.at(err.kind, err.message, span, input);
    }
    return err;
  }

  displayRich(): string {
    if (this.span && this.input !== undefined) {
      let out = `error: ${this.message}\n`;
      out += `  ${this.input}\n`;
      const padding = " ".repeat(this.span.start + 2);
      const underline = "^".repeat(Math.max(this.span.end - this.span.start, 1));
      out += padding + underline;
      return out;
    }
    return `error: ${this.message}`;
  }
}
