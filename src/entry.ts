// Entry Parser — `[recur D] date (at T | from T to T | all day) [notify D] detail`.

import { Temporal } from "@js-temporal/polyfill";
import type { Duration, EntryDraft, TemporalShape } from "./ast.js";
import { resolveDate } from "./date.js";
import { durationSign, parseDuration } from "./duration.js";
import { type ParseOptions, TokenCursor } from "./parser.js";
import { resolveTime } from "./time.js";

class EntryParser extends TokenCursor {
  private now: Temporal.ZonedDateTime;
  private infer12h: boolean;

  constructor(input: string, now: Temporal.ZonedDateTime, options: ParseOptions) {
    super(input);
    this.now = now;
    this.infer12h = options.infer12h ?? true;
  }

  parseEntry(): EntryDraft {
    let recurrence: Duration | null = null;
    if (this.peekWord() === "recur") {
      this.advance();
      recurrence = this.parseInterval();
    }

    const dateTok = this.require("unparsableDate", "a date");
    const today = this.now.toPlainDate();
    const date = this.resolve(dateTok, (t) => resolveDate(t, today));
    const shape = this.parseShape(date);

    let notify: Duration | null = null;
    if (this.peekWord() === "notify") {
      this.advance();
      if (this.peekWord() === "me") this.advance();
      notify = this.parseNotify();
    }

    const first = this.peek();
    if (!first) {
      throw this.error("missingDetail", "expected a description", this.endSpan());
    }
    const detail = this.input.slice(first.span.start).trimEnd();

    return { recurrence, shape, notify, detail };
  }

  private parseInterval(): Duration {
    const tok = this.require("malformedDuration", "a duration after 'recur'");
    const interval = this.resolve(tok, parseDuration);
    if (durationSign(interval) <= 0) {
      throw this.error(
        "malformedDuration",
        "recurrence interval must be positive",
        tok.span,
      );
    }
    return interval;
  }

  private parseNotify(): Duration {
    const tok = this.require("malformedDuration", "a duration after 'notify'");
    const notify = this.resolve(tok, parseDuration);
    if (durationSign(notify) < 0) {
      throw this.error(
        "malformedDuration",
        "notify duration cannot be negative",
        tok.span,
      );
    }
    return notify;
  }

  private parseShape(date: Temporal.PlainDate): TemporalShape {
    const span = this.currentSpan();
    const word = this.advance()?.word;

    if (word === "at") {
      return { type: "instant", date, time: this.parseTime(date, "'at'") };
    }

    if (word === "from") {
      const start = this.parseTime(date, "'from'");
      const sep = this.peekWord();
      if (sep !== "to" && sep !== "until") {
        throw this.error(
          "missingShape",
          "expected 'to' after the start time",
          this.currentSpan(),
        );
      }
      this.advance();
      const end = this.parseTime(date, "'to'");
      // an end before the start crosses midnight
      const endDate =
        Temporal.PlainTime.compare(end, start) < 0 ? date.add({ days: 1 }) : date;
      return { type: "span", date, start, end, endDate };
    }

    if (word === "all") {
      if (this.peekWord() !== "day") {
        throw this.error(
          "missingShape",
          "expected 'day' after 'all'",
          this.currentSpan(),
        );
      }
      this.advance();
      return { type: "allDay", date };
    }

    throw this.error("missingShape", "expected 'at', 'from' or 'all day'", span);
  }

  private parseTime(date: Temporal.PlainDate, after: string): Temporal.PlainTime {
    const tok = this.require("invalidTime", `a time after ${after}`);
    const ctx = {
      today: date.equals(this.now.toPlainDate()),
      now: this.now.toPlainTime(),
      infer12h: this.infer12h,
    };
    return this.resolve(tok, (t) => resolveTime(t, ctx));
  }
}

/** Parse an entry statement into a draft calendar item. */
export function parseEntry(
  input: string,
  now: Temporal.ZonedDateTime,
  options: ParseOptions = {},
): EntryDraft {
  const parser = new EntryParser(input, now, options);
  return parser.parseEntry();
}
