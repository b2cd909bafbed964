// Display for datebook values — canonical statements that parse back to equal values.

import type { Temporal } from "@js-temporal/polyfill";
import type {
  Duration,
  EntryDraft,
  SearchClause,
  SearchPredicate,
  TemporalShape,
} from "./ast.js";
import { durationSign } from "./duration.js";

const LETTERS: [keyof Duration, string][] = [
  ["years", "y"],
  ["months", "m"],
  ["weeks", "w"],
  ["days", "d"],
  ["hours", "h"],
  ["minutes", "m"],
  ["seconds", "s"],
];

/**
 * Render a duration literal. Months are followed by an explicit `0d` when
 * nothing else would mark their `m` as months rather than minutes.
 */
export function formatDuration(d: Duration): string {
  let out = durationSign(d) < 0 ? "-" : "";
  const monthsNeedMarker =
    d.months !== 0 && d.weeks === 0 && d.days === 0 && d.hours === 0;

  for (const [unit, letter] of LETTERS) {
    const value = Math.abs(d[unit]);
    if (value !== 0) {
      out += `${value}${letter}`;
    } else if (unit === "days" && monthsNeedMarker) {
      out += "0d";
    }
  }
  return out === "" || out === "-" ? "0s" : out;
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : `${n}`;
}

/** `YYYY/MM/DD` — the year/month/day form the date resolver reads back. */
export function formatDate(date: Temporal.PlainDate): string {
  return `${date.year}/${pad2(date.month)}/${pad2(date.day)}`;
}

/** `HH:MM:SS`, which always reads back as 24h. */
export function formatTime(time: Temporal.PlainTime): string {
  return `${pad2(time.hour)}:${pad2(time.minute)}:${pad2(time.second)}`;
}

export function displayShape(shape: TemporalShape): string {
  const date = formatDate(shape.date);
  switch (shape.type) {
    case "instant":
      return `${date} at ${formatTime(shape.time)}`;
    case "span":
      return `${date} from ${formatTime(shape.start)} to ${formatTime(shape.end)}`;
    case "allDay":
      return `${date} all day`;
  }
}

/** Render an entry draft as its canonical statement. */
export function displayEntry(draft: EntryDraft): string {
  let out = "";
  if (draft.recurrence) {
    out += `recur ${formatDuration(draft.recurrence)} `;
  }
  out += displayShape(draft.shape);
  if (draft.notify) {
    out += ` notify ${formatDuration(draft.notify)}`;
  }
  return `${out} ${draft.detail}`;
}

function displayClause(clause: SearchClause): string {
  switch (clause.type) {
    case "field":
      return clause.value === null
        ? `field key ${clause.key}`
        : `field key ${clause.key} value ${clause.value}`;
    case "date":
      return `date ${formatDate(clause.date)}`;
    case "dateRange":
      return `date from ${formatDate(clause.from)} to ${formatDate(clause.to)}`;
    case "time":
      return `time ${formatTime(clause.time)}`;
    case "timeRange":
      return `time from ${formatTime(clause.from)} to ${formatTime(clause.to)}`;
    case "detail":
      return `detail ${clause.text}`;
    case "recur":
      return `recur ${clause.id}`;
    case "completion":
      return clause.finished ? "finished" : "unfinished";
  }
}

/** Render a search predicate as its canonical query. */
export function displaySearch(predicate: SearchPredicate): string {
  return predicate.clauses.map(displayClause).join(" ");
}
