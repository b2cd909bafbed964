// Calendar items, recurring tasks and their ordering.

import { Temporal } from "@js-temporal/polyfill";
import type { Duration, EntryDraft, TemporalShape } from "./ast.js";

export type Fields = Record<string, string>;

/** The parts of an item a recurring task copies into every occurrence. */
export interface ItemTemplate {
  shape: TemporalShape;
  notify: Duration | null;
  detail: string;
  fields: Fields;
}

export interface CalendarItem extends ItemTemplate {
  /** Assigned by the store; null while an occurrence is provisional. */
  id: number | null;
  /** Parent recurring task, a non-owning back-reference. */
  recurrenceId: number | null;
  /** Position in the parent's occurrence sequence (template = 0). */
  sequence: number | null;
  completed: boolean;
  notified: boolean;
}

export interface Occurrence extends CalendarItem {
  recurrenceId: number;
  sequence: number;
}

/** A committed item; the store has given it an id. */
export interface StoredItem extends CalendarItem {
  id: number;
}

export interface RecurringTask {
  id: number;
  interval: Duration;
  template: ItemTemplate;
  /** Sequence index of the most recently materialized occurrence. */
  lastSequence: number;
  /** Wall-clock time of the most recent materialization. */
  materializedAt: Temporal.PlainDateTime | null;
  /**
   * Start of occurrence `anchorSequence`. Later occurrences step from here;
   * it is the template start until the task is edited.
   */
  anchor: Temporal.PlainDateTime;
  anchorSequence: number;
}

/** Editable parts of a recurring task. */
export interface RecurringPatch {
  interval?: Duration;
  template?: Partial<ItemTemplate>;
}

export function templateFromDraft(draft: EntryDraft): ItemTemplate {
  return {
    shape: draft.shape,
    notify: draft.notify,
    detail: draft.detail,
    fields: {},
  };
}

export function copyTemplate(template: ItemTemplate): ItemTemplate {
  return {
    ...template,
    notify: template.notify && { ...template.notify },
    fields: { ...template.fields },
  };
}

export function copyItem<T extends CalendarItem>(item: T): T {
  return { ...item, notify: item.notify && { ...item.notify }, fields: { ...item.fields } };
}

export function copyTask(task: RecurringTask): RecurringTask {
  return { ...task, interval: { ...task.interval }, template: copyTemplate(task.template) };
}

export function newItem(template: ItemTemplate): CalendarItem {
  return {
    ...template,
    fields: { ...template.fields },
    id: null,
    recurrenceId: null,
    sequence: null,
    completed: false,
    notified: false,
  };
}

const MIDNIGHT = Temporal.PlainTime.from({ hour: 0, minute: 0 });

/** Start instant of a shape; all-day shapes start at midnight. */
export function shapeStart(shape: TemporalShape): Temporal.PlainDateTime {
  switch (shape.type) {
    case "instant":
      return shape.date.toPlainDateTime(shape.time);
    case "span":
      return shape.date.toPlainDateTime(shape.start);
    case "allDay":
      return shape.date.toPlainDateTime(MIDNIGHT);
  }
}

/** End instant of a shape; all-day shapes end at the following midnight. */
export function shapeEnd(shape: TemporalShape): Temporal.PlainDateTime {
  switch (shape.type) {
    case "instant":
      return shape.date.toPlainDateTime(shape.time);
    case "span":
      return shape.endDate.toPlainDateTime(shape.end);
    case "allDay":
      return shape.date.add({ days: 1 }).toPlainDateTime(MIDNIGHT);
  }
}

/** Same shape kind and length, moved to start at `start`. */
export function moveShape(
  shape: TemporalShape,
  start: Temporal.PlainDateTime,
): TemporalShape {
  const date = start.toPlainDate();
  switch (shape.type) {
    case "instant":
      return { type: "instant", date, time: start.toPlainTime() };
    case "allDay":
      return { type: "allDay", date };
    case "span": {
      const length = shapeStart(shape).until(shapeEnd(shape));
      const end = start.add(length);
      return {
        type: "span",
        date,
        start: start.toPlainTime(),
        end: end.toPlainTime(),
        endDate: end.toPlainDate(),
      };
    }
  }
}

/** Order by date, then all-day first, then start time, then id. */
export function compareItems(a: CalendarItem, b: CalendarItem): number {
  const byDate = Temporal.PlainDate.compare(a.shape.date, b.shape.date);
  if (byDate !== 0) return byDate;

  const aAllDay = a.shape.type === "allDay";
  const bAllDay = b.shape.type === "allDay";
  if (aAllDay !== bAllDay) return aAllDay ? -1 : 1;

  const byStart = Temporal.PlainDateTime.compare(shapeStart(a.shape), shapeStart(b.shape));
  if (byStart !== 0) return byStart;

  // provisional occurrences (no id yet) sort after committed items
  if (a.id !== null && b.id !== null) return a.id - b.id;
  if (a.id !== null) return -1;
  if (b.id !== null) return 1;
  const byTask = (a.recurrenceId ?? 0) - (b.recurrenceId ?? 0);
  return byTask !== 0 ? byTask : (a.sequence ?? 0) - (b.sequence ?? 0);
}

export function sortItems(items: CalendarItem[]): CalendarItem[] {
  return [...items].sort(compareItems);
}
