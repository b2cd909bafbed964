import { Temporal } from "@js-temporal/polyfill";
import { parseEntry } from "../src/entry.js";
import { DatebookError } from "../src/error.js";
import { type CalendarItem, newItem, templateFromDraft } from "../src/record.js";

/** Friday 2024-03-01, 09:00 UTC. */
export const NOW = zoned("2024-03-01T09:00:00");

export function zoned(local: string): Temporal.ZonedDateTime {
  return Temporal.ZonedDateTime.from(`${local}+00:00[UTC]`);
}

/** Run `fn` and return the DatebookError it throws. */
export function catchError(fn: () => unknown): DatebookError {
  try {
    fn();
  } catch (err) {
    if (err instanceof DatebookError) return err;
    throw err;
  }
  throw new Error("expected a DatebookError");
}

/** An uncommitted item parsed from an entry statement. */
export function itemOf(
  input: string,
  now: Temporal.ZonedDateTime = NOW,
  extra: Partial<CalendarItem> = {},
): CalendarItem {
  return { ...newItem(templateFromDraft(parseEntry(input, now))), ...extra };
}
