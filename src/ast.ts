// Value types for datebook statements — discriminated unions over Temporal values.

import type { Temporal } from "@js-temporal/polyfill";

export type Weekday =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

/**
 * Signed count of calendar and clock units. Years and months are
 * calendar-relative; the rest are fixed-length. Components are never
 * normalized into one another.
 */
export interface Duration {
  years: number;
  months: number;
  weeks: number;
  days: number;
  hours: number;
  minutes: number;
  seconds: number;
}

export type DurationUnit = keyof Duration;

/** Precedence order of duration units, largest first. */
export const DURATION_UNITS: readonly DurationUnit[] = [
  "years",
  "months",
  "weeks",
  "days",
  "hours",
  "minutes",
  "seconds",
];

// --- Temporal shape ---

export type TemporalShape =
  | { type: "instant"; date: Temporal.PlainDate; time: Temporal.PlainTime }
  | {
      type: "span";
      date: Temporal.PlainDate;
      start: Temporal.PlainTime;
      end: Temporal.PlainTime;
      // start date + 1 when the span crosses midnight
      endDate: Temporal.PlainDate;
    }
  | { type: "allDay"; date: Temporal.PlainDate };

// --- Entry ---

export interface EntryDraft {
  recurrence: Duration | null;
  shape: TemporalShape;
  notify: Duration | null;
  detail: string;
}

// --- Search ---

export type SearchClause =
  | { type: "field"; key: string; value: string | null }
  | { type: "date"; date: Temporal.PlainDate }
  | { type: "dateRange"; from: Temporal.PlainDate; to: Temporal.PlainDate }
  | { type: "time"; time: Temporal.PlainTime }
  | { type: "timeRange"; from: Temporal.PlainTime; to: Temporal.PlainTime }
  | { type: "detail"; text: string }
  | { type: "recur"; id: number }
  | { type: "completion"; finished: boolean };

/** Conjunction of clauses; there is no OR. */
export interface SearchPredicate {
  clauses: SearchClause[];
}

// --- Helper functions ---

/** ISO 8601 day number: Monday=1, Sunday=7. */
export function weekdayNumber(day: Weekday): number {
  const map: Record<Weekday, number> = {
    monday: 1,
    tuesday: 2,
    wednesday: 3,
    thursday: 4,
    friday: 5,
    saturday: 6,
    sunday: 7,
  };
  return map[day];
}

export function parseWeekday(s: string): Weekday | null {
  const map: Record<string, Weekday> = {
    monday: "monday",
    mon: "monday",
    tuesday: "tuesday",
    tue: "tuesday",
    tues: "tuesday",
    wednesday: "wednesday",
    wed: "wednesday",
    thursday: "thursday",
    thu: "thursday",
    thur: "thursday",
    thurs: "thursday",
    friday: "friday",
    fri: "friday",
    saturday: "saturday",
    sat: "saturday",
    sunday: "sunday",
    sun: "sunday",
  };
  return map[s.toLowerCase()] ?? null;
}

export function zeroDuration(): Duration {
  return {
    years: 0,
    months: 0,
    weeks: 0,
    days: 0,
    hours: 0,
    minutes: 0,
    seconds: 0,
  };
}
