// Date Resolver — relative words, weekday names, ordinals and numeric dates.

import { Temporal } from "@js-temporal/polyfill";
import { parseWeekday, weekdayNumber } from "./ast.js";
import { DatebookError } from "./error.js";

const DAY_OF_MONTH = /^(\d+)(st|nd|rd|th)?$/;
const NUMERIC = /^\d+$/;
const SEPARATOR = /[/.-]/;

/**
 * Resolve a date token against the reference date. First match wins:
 * today/tomorrow/yesterday, weekday name, day of month, month/day,
 * year/month/day.
 */
export function resolveDate(
  token: string,
  today: Temporal.PlainDate,
): Temporal.PlainDate {
  const word = token.trim().toLowerCase();

  switch (word) {
    case "today":
      return today;
    case "tomorrow":
      return today.add({ days: 1 });
    case "yesterday":
      return today.subtract({ days: 1 });
  }

  const weekday = parseWeekday(word);
  if (weekday !== null) {
    // today-or-later: naming today's weekday resolves to today
    const offset = (weekdayNumber(weekday) - today.dayOfWeek + 7) % 7;
    return today.add({ days: offset });
  }

  const ordinal = DAY_OF_MONTH.exec(word);
  if (ordinal !== null) {
    return calendarDate(today.year, today.month, Number(ordinal[1]), token);
  }

  const parts = word.split(SEPARATOR);
  if (parts.every((p) => NUMERIC.test(p))) {
    const [a, b, c] = parts.map(Number);
    if (parts.length === 2) {
      return calendarDate(today.year, a, b, token);
    }
    if (parts.length === 3) {
      return calendarDate(a, b, c, token);
    }
  }

  throw new DatebookError("unparsableDate", `cannot parse date '${token}'`);
}

function calendarDate(
  year: number,
  month: number,
  day: number,
  token: string,
): Temporal.PlainDate {
  if (year < 1 || year > 9999) {
    throw new DatebookError("invalidDate", `invalid year in '${token}'`);
  }
  if (month < 1 || month > 12) {
    throw new DatebookError("invalidDate", `invalid month in '${token}'`);
  }
  const first = Temporal.PlainDate.from({ year, month, day: 1 });
  if (day < 1 || day > first.daysInMonth) {
    throw new DatebookError(
      "invalidDate",
      `'${token}' is not a day of ${first.toPlainYearMonth().toString()}`,
    );
  }
  return first.with({ day });
}
