import { describe, expect, it } from "vitest";
import {
  Calendar,
  DatebookError,
  createLogger,
  defaultConfig,
  displaySearch,
  parseDuration,
} from "../src/index.js";
import { NOW, zoned } from "./helpers.js";

function newCalendar(use24hTime = false): Calendar {
  return new Calendar({
    config: { ...defaultConfig(), use24hTime, logLevel: "silent" },
    logger: createLogger("silent"),
  });
}

describe("Calendar", () => {
  it("records and searches entries", () => {
    const calendar = newCalendar();
    const shower = calendar.entry("tomorrow at 8pm notify 30m Take a Shower", NOW);
    expect(shower.id).toBe(1);
    expect(shower.shape.date.toString()).toBe("2024-03-02");

    expect(calendar.search("detail shower", NOW).map((i) => i.id)).toEqual([1]);
    expect(calendar.search("date today", NOW)).toEqual([]);
  });

  it("reads bare hours as 24h when configured", () => {
    const afternoon = zoned("2024-03-01T15:00:00");
    const inferred = newCalendar().parseEntry("today at 8 Coffee", afternoon);
    const literal = newCalendar(true).parseEntry("today at 8 Coffee", afternoon);
    if (inferred.shape.type !== "instant" || literal.shape.type !== "instant") {
      throw new Error("expected instants");
    }
    expect(inferred.shape.time.toString()).toBe("20:00:00");
    expect(literal.shape.time.toString()).toBe("08:00:00");
  });

  it("reads search times as 24h whatever the setting", () => {
    const afternoon = zoned("2024-03-01T15:00:00");
    for (const calendar of [newCalendar(), newCalendar(true)]) {
      expect(displaySearch(calendar.parseSearch("time 8", afternoon))).toBe("time 08:00:00");
    }
  });

  it("lists the query window unless asked for everything", () => {
    const calendar = newCalendar();
    calendar.entry("tomorrow at 8pm Dinner", NOW);
    calendar.entry("2024/06/01 all day Festival", NOW);
    expect(calendar.list(NOW).map((i) => i.detail)).toEqual(["Dinner"]);
    expect(calendar.list(NOW, { all: true }).map((i) => i.detail)).toEqual([
      "Dinner",
      "Festival",
    ]);
  });

  it("reports current items and due notifications", () => {
    const calendar = newCalendar();
    calendar.entry("tomorrow at 8pm notify 30m Take a Shower", NOW);

    const reminderTime = zoned("2024-03-02T19:45:00");
    const notified = calendar.notifications(reminderTime);
    expect(notified.map((i) => [i.id, i.notified])).toEqual([[1, true]]);
    expect(calendar.notifications(reminderTime)).toEqual([]);

    expect(calendar.current(zoned("2024-03-02T20:00:30")).map((i) => i.id)).toEqual([1]);
    expect(calendar.current(zoned("2024-03-02T20:05:00"))).toEqual([]);
    expect(
      calendar.current(zoned("2024-03-02T20:05:00"), parseDuration("10m")).map((i) => i.id),
    ).toEqual([1]);
  });

  it("completes and deletes items", () => {
    const calendar = newCalendar();
    calendar.entry("tomorrow at 8pm Dinner", NOW);
    calendar.entry("recur 1w monday all day Standup", NOW);
    calendar.complete(1, NOW);
    expect(calendar.list(NOW).map((i) => i.id)).toEqual([2]);

    calendar.deleteRecurring(1, NOW);
    expect(calendar.list(NOW, { includeCompleted: true }).map((i) => i.id)).toEqual([1]);

    calendar.delete(1, NOW);
    expect(calendar.list(NOW, { includeCompleted: true, all: true })).toEqual([]);
    expect(() => calendar.delete(1, NOW)).toThrow(DatebookError);
  });

  it("validates statements", () => {
    expect(Calendar.validateEntry("tomorrow at 8pm Dinner", NOW)).toBe(true);
    expect(Calendar.validateEntry("tomorrow Buy milk", NOW)).toBe(false);
    expect(Calendar.validateSearch("unfinished", NOW)).toBe(true);
    expect(Calendar.validateSearch("date from 3/10 to 3/1", NOW)).toBe(false);
  });
});
