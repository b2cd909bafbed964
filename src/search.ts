// Search Parser and evaluator — an AND-only conjunction of clauses.

import { Temporal } from "@js-temporal/polyfill";
import type { SearchClause, SearchPredicate, TemporalShape } from "./ast.js";
import { resolveDate } from "./date.js";
import { TokenCursor } from "./parser.js";
import type { CalendarItem } from "./record.js";
import { resolveTime } from "./time.js";

const RECURRENCE_ID = /^\d+$/;

class SearchParser extends TokenCursor {
  private today: Temporal.PlainDate;

  constructor(input: string, now: Temporal.ZonedDateTime) {
    super(input);
    this.today = now.toPlainDate();
  }

  parseSearch(): SearchPredicate {
    const clauses: SearchClause[] = [];
    while (this.peek()) {
      clauses.push(this.parseClause());
    }
    if (clauses.length === 0) {
      throw this.error("unknownSearchTerm", "expected a search term", this.endSpan());
    }
    return { clauses };
  }

  private parseClause(): SearchClause {
    const span = this.currentSpan();
    const word = this.advance()?.word;

    switch (word) {
      case "field":
        return this.parseField();
      case "date":
        return this.parseDateClause();
      case "time":
        return this.parseTimeClause();
      case "detail": {
        const tok = this.require("unknownSearchTerm", "text after 'detail'");
        return { type: "detail", text: tok.text };
      }
      case "recur": {
        const tok = this.require("unknownSearchTerm", "a recurrence id after 'recur'");
        if (!RECURRENCE_ID.test(tok.word)) {
          throw this.error(
            "unknownSearchTerm",
            `expected a recurrence id, got '${tok.text}'`,
            tok.span,
          );
        }
        return { type: "recur", id: Number(tok.word) };
      }
      case "finished":
        return { type: "completion", finished: true };
      case "unfinished":
        return { type: "completion", finished: false };
    }

    throw this.error(
      "unknownSearchTerm",
      "expected field, date, time, detail, recur, finished or unfinished",
      span,
    );
  }

  // field key K [value V] | field value V key K
  private parseField(): SearchClause {
    const tok = this.require("unknownSearchTerm", "'key' or 'value' after 'field'");

    if (tok.word === "key") {
      const key = this.require("unknownSearchTerm", "a field name after 'key'").text;
      if (this.peekWord() === "value") {
        this.advance();
        const value = this.require("unknownSearchTerm", "a value after 'value'").text;
        return { type: "field", key, value };
      }
      return { type: "field", key, value: null };
    }

    if (tok.word === "value") {
      const value = this.require("unknownSearchTerm", "a value after 'value'").text;
      const next = this.require("unknownSearchTerm", "'key' after the field value");
      if (next.word !== "key") {
        throw this.error(
          "unknownSearchTerm",
          "cannot search field values without a key",
          next.span,
        );
      }
      const key = this.require("unknownSearchTerm", "a field name after 'key'").text;
      return { type: "field", key, value };
    }

    throw this.error(
      "unknownSearchTerm",
      "expected 'key' or 'value' after 'field'",
      tok.span,
    );
  }

  private parseDateClause(): SearchClause {
    if (this.peekWord() !== "from") {
      return { type: "date", date: this.parseDate() };
    }
    this.advance();
    const from = this.parseDate();
    this.expectTo();
    const endTok = this.peek();
    const to = this.parseDate();
    if (Temporal.PlainDate.compare(to, from) < 0) {
      throw this.error(
        "ambiguousRange",
        `date range ends before it starts (${from.toString()} to ${to.toString()})`,
        endTok ? endTok.span : this.endSpan(),
      );
    }
    return { type: "dateRange", from, to };
  }

  private parseTimeClause(): SearchClause {
    if (this.peekWord() !== "from") {
      return { type: "time", time: this.parseTime() };
    }
    this.advance();
    const from = this.parseTime();
    this.expectTo();
    const to = this.parseTime();
    return { type: "timeRange", from, to };
  }

  private expectTo(): void {
    const tok = this.require("unknownSearchTerm", "'to' in range");
    if (tok.word !== "to") {
      throw this.error("unknownSearchTerm", "syntax: from <a> to <b>", tok.span);
    }
  }

  private parseDate(): Temporal.PlainDate {
    const tok = this.require("unparsableDate", "a date");
    return this.resolve(tok, (t) => resolveDate(t, this.today));
  }

  private parseTime(): Temporal.PlainTime {
    const tok = this.require("invalidTime", "a time");
    // search times are never inferred: without am/pm they read as 24h
    const ctx = {
      today: false,
      now: Temporal.PlainTime.from("00:00"),
      infer12h: false,
    };
    return this.resolve(tok, (t) => resolveTime(t, ctx));
  }
}

/** Parse a search statement into a predicate. */
export function parseSearch(input: string, now: Temporal.ZonedDateTime): SearchPredicate {
  const parser = new SearchParser(input, now);
  return parser.parseSearch();
}

// --- Evaluation ---

const LAST_SECOND = 86_399;

type Range = [number, number];

function secondOfDay(t: Temporal.PlainTime): number {
  return t.hour * 3600 + t.minute * 60 + t.second;
}

/** Inclusive range, split in two when it wraps past midnight. */
function ranges(from: Temporal.PlainTime, to: Temporal.PlainTime): Range[] {
  const lo = secondOfDay(from);
  const hi = secondOfDay(to);
  if (hi < lo) return [[lo, LAST_SECOND], [0, hi]];
  return [[lo, hi]];
}

function shapeRanges(shape: TemporalShape): Range[] {
  switch (shape.type) {
    case "instant":
      return ranges(shape.time, shape.time);
    case "span":
      return ranges(shape.start, shape.end);
    case "allDay":
      return [];
  }
}

function intersects(a: Range[], b: Range[]): boolean {
  return a.some(([lo1, hi1]) => b.some(([lo2, hi2]) => lo1 <= hi2 && lo2 <= hi1));
}

function matchesClause(clause: SearchClause, item: CalendarItem): boolean {
  switch (clause.type) {
    case "field": {
      if (!Object.hasOwn(item.fields, clause.key)) return false;
      return clause.value === null || item.fields[clause.key] === clause.value;
    }
    case "date":
      return item.shape.date.equals(clause.date);
    case "dateRange":
      return (
        Temporal.PlainDate.compare(item.shape.date, clause.from) >= 0 &&
        Temporal.PlainDate.compare(item.shape.date, clause.to) <= 0
      );
    case "time":
      return intersects(shapeRanges(item.shape), ranges(clause.time, clause.time));
    case "timeRange":
      return intersects(shapeRanges(item.shape), ranges(clause.from, clause.to));
    case "detail":
      return item.detail.toLowerCase().includes(clause.text.toLowerCase());
    case "recur":
      return item.recurrenceId === clause.id;
    case "completion":
      return item.completed === clause.finished;
  }
}

/** True when every clause holds for the item. */
export function evaluate(predicate: SearchPredicate, item: CalendarItem): boolean {
  return predicate.clauses.every((clause) => matchesClause(clause, item));
}
