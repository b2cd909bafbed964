// Time windows around "now": the well, the list query window, notifications.

import { Temporal } from "@js-temporal/polyfill";
import type { Duration } from "./ast.js";
import { toTemporalDuration } from "./duration.js";
import { type CalendarItem, shapeEnd, shapeStart } from "./record.js";

export interface TimeWindow {
  from: Temporal.PlainDateTime;
  to: Temporal.PlainDateTime;
}

const MIDNIGHT = Temporal.PlainTime.from({ hour: 0, minute: 0 });

function overlaps(a: TimeWindow, b: TimeWindow): boolean {
  return (
    Temporal.PlainDateTime.compare(a.from, b.to) <= 0 &&
    Temporal.PlainDateTime.compare(b.from, a.to) <= 0
  );
}

export function itemWindow(item: CalendarItem): TimeWindow {
  return { from: shapeStart(item.shape), to: shapeEnd(item.shape) };
}

/** Symmetric window `[now - well, now + well]`. */
export function wellAround(now: Temporal.ZonedDateTime, well: Duration): TimeWindow {
  const at = now.toPlainDateTime();
  const d = toTemporalDuration(well);
  return { from: at.subtract(d), to: at.add(d) };
}

/** The item's time overlaps the well around `now`. */
export function inWell(
  item: CalendarItem,
  now: Temporal.ZonedDateTime,
  well: Duration,
): boolean {
  return overlaps(itemWindow(item), wellAround(now, well));
}

/**
 * Range listed by default: from the start of today minus `window` to the
 * midnight beginning the day of `now + window`.
 */
export function queryWindow(now: Temporal.ZonedDateTime, window: Duration): TimeWindow {
  const d = toTemporalDuration(window);
  const today = now.toPlainDate().toPlainDateTime(MIDNIGHT);
  const ahead = now.toPlainDateTime().add(d).toPlainDate().toPlainDateTime(MIDNIGHT);
  return { from: today.subtract(d), to: ahead };
}

export function inQueryWindow(item: CalendarItem, window: TimeWindow): boolean {
  const start = shapeStart(item.shape);
  return (
    Temporal.PlainDateTime.compare(start, window.from) >= 0 &&
    Temporal.PlainDateTime.compare(start, window.to) <= 0
  );
}

export interface Notification {
  start: Temporal.PlainDateTime;
  notifyAt: Temporal.PlainDateTime;
}

/** When an item wants its reminder, or null without a notify duration. */
export function notificationOf(item: CalendarItem): Notification | null {
  if (item.notify === null) return null;
  const start = shapeStart(item.shape);
  return { start, notifyAt: start.subtract(toTemporalDuration(item.notify)) };
}

/** Within the notify window, not yet notified and not completed. */
export function isNotificationDue(
  item: CalendarItem,
  now: Temporal.ZonedDateTime,
): boolean {
  const notification = notificationOf(item);
  if (notification === null || item.notified || item.completed) return false;
  const at = now.toPlainDateTime();
  return (
    Temporal.PlainDateTime.compare(notification.notifyAt, at) <= 0 &&
    Temporal.PlainDateTime.compare(at, notification.start) < 0
  );
}
