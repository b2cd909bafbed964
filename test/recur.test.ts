import { describe, expect, it } from "vitest";
import type { TemporalShape } from "../src/ast.js";
import { parseDuration } from "../src/duration.js";
import { parseEntry } from "../src/entry.js";
import { type RecurringTask, templateFromDraft } from "../src/record.js";
import {
  assertSequences,
  editRecurringTask,
  materializeDue,
  newRecurringTask,
  nextDue,
  occurrenceStart,
} from "../src/recur.js";
import { NOW, catchError, zoned } from "./helpers.js";

function task(interval: string, entry: string, lastSequence = 0): RecurringTask {
  const template = templateFromDraft(parseEntry(entry, NOW));
  return { ...newRecurringTask(7, parseDuration(interval), template), lastSequence };
}

function describeShape(shape: TemporalShape): string {
  switch (shape.type) {
    case "instant":
      return `${shape.date} ${shape.time}`;
    case "span":
      return `${shape.date} ${shape.start}-${shape.end} ${shape.endDate}`;
    case "allDay":
      return `${shape.date}`;
  }
}

describe("occurrenceStart", () => {
  it("computes each start from the template without compounding the clamp", () => {
    const rent = task("1m0d", "1/31 at 9:00 Rent");
    expect(occurrenceStart(rent, 0).toString()).toBe("2024-01-31T09:00:00");
    expect(occurrenceStart(rent, 1).toString()).toBe("2024-02-29T09:00:00");
    expect(occurrenceStart(rent, 2).toString()).toBe("2024-03-31T09:00:00");
    expect(occurrenceStart(rent, 3).toString()).toBe("2024-04-30T09:00:00");
  });

  it("starts all-day shapes at midnight", () => {
    const standup = task("1w", "monday all day Standup");
    expect(occurrenceStart(standup, 2).toString()).toBe("2024-03-18T00:00:00");
  });
});

describe("materializeDue", () => {
  it("returns the occurrences due after the last one", () => {
    const rent = task("1m0d", "1/31 at 9:00 Rent");
    const due = materializeDue(rent, NOW);
    expect(due.map((o) => o.sequence)).toEqual([1]);
    expect(describeShape(due[0].shape)).toBe("2024-02-29 09:00:00");
    expect(due[0].id).toBeNull();
    expect(due[0].recurrenceId).toBe(7);
    expect(due[0].detail).toBe("Rent");
  });

  it("includes an occurrence starting exactly at now", () => {
    const standup = task("1w", "monday all day Standup");
    const due = materializeDue(standup, zoned("2024-03-25T00:00:00"));
    expect(due.map((o) => describeShape(o.shape))).toEqual([
      "2024-03-11",
      "2024-03-18",
      "2024-03-25",
    ]);
  });

  it("is idempotent without a commit", () => {
    const rent = task("1m0d", "1/31 at 9:00 Rent");
    const later = zoned("2024-04-01T00:00:00");
    const first = materializeDue(rent, later);
    const second = materializeDue(rent, later);
    expect(first.map((o) => o.sequence)).toEqual([1, 2]);
    expect(second.map((o) => o.sequence)).toEqual([1, 2]);
    expect(second.map((o) => describeShape(o.shape))).toEqual(
      first.map((o) => describeShape(o.shape)),
    );
    expect(rent.lastSequence).toBe(0);
  });

  it("continues after the last materialized occurrence", () => {
    const rent = task("1m0d", "1/31 at 9:00 Rent", 2);
    expect(materializeDue(rent, zoned("2024-04-01T00:00:00"))).toEqual([]);
    expect(nextDue(rent).toString()).toBe("2024-04-30T09:00:00");
  });

  it("keeps the length of spans crossing midnight", () => {
    const shift = task("1d", "today from 22:00 to 2:00 Night shift");
    const due = materializeDue(shift, zoned("2024-03-03T00:00:00"));
    expect(due.map((o) => describeShape(o.shape))).toEqual([
      "2024-03-02 22:00:00-02:00:00 2024-03-03",
    ]);
  });

  it("copies the template into each occurrence", () => {
    const base = task("1d", "today at 8 notify 10m Pills");
    const withFields: RecurringTask = {
      ...base,
      template: { ...base.template, fields: { dose: "1" } },
    };
    const [occurrence] = materializeDue(withFields, zoned("2024-03-02T08:00:00"));
    expect(occurrence.fields).toEqual({ dose: "1" });
    expect(occurrence.notify).toEqual(parseDuration("10m"));
    expect(occurrence.completed).toBe(false);
    expect(occurrence.notified).toBe(false);
  });
});

describe("editRecurringTask", () => {
  it("steps a new interval from the last materialized occurrence", () => {
    const rent = task("1w", "1/31 at 9:00 Rent", 2);
    const monthly = editRecurringTask(rent, { interval: parseDuration("1m0d") });
    expect(monthly.anchor.toString()).toBe("2024-02-14T09:00:00");
    expect(monthly.anchorSequence).toBe(2);
    expect(occurrenceStart(monthly, 3).toString()).toBe("2024-03-14T09:00:00");
    expect(occurrenceStart(monthly, 4).toString()).toBe("2024-04-14T09:00:00");
  });

  it("takes a new shape as the last materialized occurrence", () => {
    const rent = task("1w", "1/31 at 9:00 Rent", 2);
    const { shape } = parseEntry("2/20 at 18:00 Rent", NOW);
    const moved = editRecurringTask(rent, { template: { shape } });
    expect(moved.anchor.toString()).toBe("2024-02-20T18:00:00");
    expect(nextDue(moved).toString()).toBe("2024-02-27T18:00:00");
    expect(moved.template.detail).toBe("Rent");
  });

  it("leaves an unedited schedule alone", () => {
    const rent = task("1m0d", "1/31 at 9:00 Rent");
    const renamed = editRecurringTask(rent, { template: { detail: "Pay rent" } });
    expect(occurrenceStart(renamed, 2).toString()).toBe("2024-03-31T09:00:00");
    expect(renamed.template.detail).toBe("Pay rent");
  });
});

describe("state checks", () => {
  it("rejects an invalid sequence index", () => {
    const err = catchError(() => materializeDue(task("1d", "today at 8 x", -1), NOW));
    expect(err.kind).toBe("nonMonotonicState");
    expect(err.message).toBe("recurring task 7 has invalid sequence index -1");
  });

  it("rejects intervals that do not move forward", () => {
    const zero: RecurringTask = { ...task("1d", "today at 8 x"), interval: parseDuration("0d") };
    const mixed: RecurringTask = {
      ...task("1d", "today at 8 x"),
      interval: { ...parseDuration("1d"), hours: -1 },
    };
    for (const bad of [zero, mixed]) {
      const err = catchError(() => materializeDue(bad, NOW));
      expect(err.kind).toBe("nonMonotonicState");
      expect(err.message).toBe("recurring task 7 has a non-positive interval");
    }
  });

  it("rejects an anchor beyond the last occurrence", () => {
    const bad: RecurringTask = { ...task("1d", "today at 8 x", 1), anchorSequence: 2 };
    const err = catchError(() => materializeDue(bad, NOW));
    expect(err.kind).toBe("nonMonotonicState");
    expect(err.message).toBe("recurring task 7 has invalid anchor index 2");
  });

  it("rejects repeated or future occurrence indices", () => {
    const t = task("1d", "today at 8 x", 2);
    expect(() => assertSequences(t, [0, 2])).not.toThrow();
    expect(catchError(() => assertSequences(t, [0, 1, 1])).message).toBe(
      "recurring task 7 has an unexpected occurrence 1",
    );
    expect(catchError(() => assertSequences(t, [3])).kind).toBe("nonMonotonicState");
  });
});
