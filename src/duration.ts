// Duration Resolver — compact literals such as `2h15m12s` or `1m2d`.

import { Temporal } from "@js-temporal/polyfill";
import {
  DURATION_UNITS,
  type Duration,
  type DurationUnit,
  zeroDuration,
} from "./ast.js";
import { DatebookError } from "./error.js";

const SEGMENT = /(\d+)([ywdhms])/y;

interface Segment {
  value: number;
  letter: string;
  offset: number;
}

/**
 * Parse a duration literal. A leading `-` negates every component.
 *
 * `m` is ambiguous between months and minutes: it reads as months when a
 * `w`, `d` or `h` segment follows later in the literal, and as minutes
 * otherwise.
 */
export function parseDuration(input: string): Duration {
  const literal = input.trim().toLowerCase();
  let pos = 0;
  let negative = false;
  if (literal.startsWith("-")) {
    negative = true;
    pos = 1;
  }

  const segments: Segment[] = [];
  while (pos < literal.length) {
    SEGMENT.lastIndex = pos;
    const m = SEGMENT.exec(literal);
    if (m === null) {
      throw malformed(`unexpected '${literal.slice(pos)}' in duration '${input}'`);
    }
    const value = Number(m[1]);
    if (!Number.isSafeInteger(value)) {
      throw malformed(`duration component '${m[0]}' is too large`);
    }
    segments.push({ value, letter: m[2], offset: pos });
    pos = SEGMENT.lastIndex;
  }
  if (segments.length === 0) {
    throw malformed(`expected a duration like 1h30m, got '${input}'`);
  }

  const out = zeroDuration();
  let lastRank = -1;
  segments.forEach((seg, i) => {
    const unit = unitOf(seg.letter, segments.slice(i + 1));
    const rank = DURATION_UNITS.indexOf(unit);
    if (rank === lastRank) {
      throw malformed(`${unit} repeated in duration '${input}'`);
    }
    if (rank < lastRank) {
      throw malformed(`${unit} out of order in duration '${input}'`);
    }
    lastRank = rank;
    out[unit] = negative && seg.value !== 0 ? -seg.value : seg.value;
  });
  return out;
}

function unitOf(letter: string, rest: Segment[]): DurationUnit {
  switch (letter) {
    case "y":
      return "years";
    case "w":
      return "weeks";
    case "d":
      return "days";
    case "h":
      return "hours";
    case "s":
      return "seconds";
    default:
      return rest.some((s) => s.letter === "w" || s.letter === "d" || s.letter === "h")
        ? "months"
        : "minutes";
  }
}

function malformed(message: string): DatebookError {
  return new DatebookError("malformedDuration", message);
}

/** Every component equal; no normalization across units. */
export function durationEquals(a: Duration, b: Duration): boolean {
  return DURATION_UNITS.every((unit) => a[unit] === b[unit]);
}

/** -1, 0 or 1. Components of a parsed duration always share a sign. */
export function durationSign(d: Duration): number {
  for (const unit of DURATION_UNITS) {
    if (d[unit] !== 0) return Math.sign(d[unit]);
  }
  return 0;
}

export function isZeroDuration(d: Duration): boolean {
  return durationSign(d) === 0;
}

export function scaleDuration(d: Duration, factor: number): Duration {
  const out = zeroDuration();
  for (const unit of DURATION_UNITS) {
    out[unit] = d[unit] === 0 ? 0 : d[unit] * factor;
  }
  return out;
}

export function toTemporalDuration(d: Duration): Temporal.Duration {
  return Temporal.Duration.from({
    years: d.years,
    months: d.months,
    weeks: d.weeks,
    days: d.days,
    hours: d.hours,
    minutes: d.minutes,
    seconds: d.seconds,
  });
}
