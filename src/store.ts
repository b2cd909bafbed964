// In-memory storage collaborator. Committed items and recurring tasks live
// here; due occurrences stay provisional until the next mutation commits them.

import type { Temporal } from "@js-temporal/polyfill";
import type { Duration, EntryDraft, SearchPredicate } from "./ast.js";
import { DatebookError } from "./error.js";
import { type Logger, createLogger } from "./logger.js";
import {
  type CalendarItem,
  type Fields,
  type ItemTemplate,
  type Occurrence,
  type RecurringPatch,
  type RecurringTask,
  type StoredItem,
  copyItem,
  copyTask,
  newItem,
  sortItems,
  templateFromDraft,
} from "./record.js";
import {
  assertSequences,
  editRecurringTask,
  materializeDue,
  newRecurringTask,
} from "./recur.js";
import { evaluate } from "./search.js";
import { type TimeWindow, inQueryWindow, inWell, isNotificationDue } from "./window.js";

export interface ListOptions {
  includeCompleted?: boolean;
  /** Only items starting inside this window. */
  window?: TimeWindow;
}

/** Editable parts of a committed item. */
export type ItemPatch = Partial<ItemTemplate & { completed: boolean; notified: boolean }>;

/** Everything the store holds, as saved and restored. */
export interface StoreState {
  items: StoredItem[];
  tasks: RecurringTask[];
}

export class MemoryStore {
  private items = new Map<number, StoredItem>();
  private tasks = new Map<number, RecurringTask>();
  private nextItemId = 1;
  private nextTaskId = 1;
  private logger: Logger;

  constructor(logger: Logger = createLogger()) {
    this.logger = logger.child({ module: "store" });
  }

  /** A store holding previously saved state; ids continue after the highest. */
  static fromState(state: StoreState, logger?: Logger): MemoryStore {
    const store = new MemoryStore(logger);
    for (const item of state.items) {
      store.items.set(item.id, copyItem(item));
      store.nextItemId = Math.max(store.nextItemId, item.id + 1);
    }
    for (const task of state.tasks) {
      store.tasks.set(task.id, copyTask(task));
      store.nextTaskId = Math.max(store.nextTaskId, task.id + 1);
    }
    return store;
  }

  /** Committed items and tasks; provisional occurrences are not included. */
  toState(): StoreState {
    return {
      items: [...this.items.values()].map(copyItem),
      tasks: this.sortedTasks().map(copyTask),
    };
  }

  // --- Commit ---

  /**
   * Give every due provisional occurrence an identity, in ascending
   * (task, sequence) order. Runs before each mutation.
   */
  commit(now: Temporal.ZonedDateTime): StoredItem[] {
    const committed: StoredItem[] = [];
    for (const task of this.sortedTasks()) {
      assertSequences(task, this.sequencesOf(task.id));
      const due = materializeDue(task, now);
      for (const occurrence of due) {
        committed.push(copyItem(this.insert(occurrence)));
        task.lastSequence = occurrence.sequence;
      }
      if (due.length > 0) {
        task.materializedAt = now.toPlainDateTime();
        this.logger.debug(
          { taskId: task.id, count: due.length, lastSequence: task.lastSequence },
          "committed occurrences",
        );
      }
    }
    return committed;
  }

  /** Due occurrences that have not been committed; nothing is persisted. */
  provisional(now: Temporal.ZonedDateTime): Occurrence[] {
    const out: Occurrence[] = [];
    for (const task of this.sortedTasks()) {
      assertSequences(task, this.sequencesOf(task.id));
      out.push(...materializeDue(task, now));
    }
    return out;
  }

  // --- Mutations ---

  /** Store a parsed entry. A recurring entry also creates its task. */
  record(draft: EntryDraft, now: Temporal.ZonedDateTime): StoredItem {
    this.commit(now);
    const template = templateFromDraft(draft);

    if (draft.recurrence === null) {
      const item = this.insert(newItem(template));
      this.logger.info({ id: item.id }, "recorded item");
      return copyItem(item);
    }

    const task = newRecurringTask(this.nextTaskId++, draft.recurrence, template);
    task.materializedAt = now.toPlainDateTime();
    this.tasks.set(task.id, task);
    const first = this.insert({
      ...newItem(template),
      recurrenceId: task.id,
      sequence: 0,
    });
    this.logger.info({ id: first.id, taskId: task.id }, "recorded recurring task");
    return copyItem(first);
  }

  update(id: number, patch: ItemPatch, now: Temporal.ZonedDateTime): StoredItem {
    this.commit(now);
    const item = this.mustGet(id);
    const updated: StoredItem = copyItem({ ...item, ...patch, id });
    this.items.set(id, updated);
    this.logger.info({ id }, "updated item");
    return copyItem(updated);
  }

  complete(id: number, now: Temporal.ZonedDateTime): StoredItem {
    return this.update(id, { completed: true }, now);
  }

  setField(id: number, key: string, value: string, now: Temporal.ZonedDateTime): StoredItem {
    const fields: Fields = { ...this.mustGet(id).fields, [key]: value };
    return this.update(id, { fields }, now);
  }

  delete(id: number, now: Temporal.ZonedDateTime): void {
    this.commit(now);
    this.mustGet(id);
    this.items.delete(id);
    this.logger.info({ id }, "deleted item");
  }

  /** Delete a recurring task and every occurrence referencing it. */
  deleteRecurring(taskId: number, now: Temporal.ZonedDateTime): void {
    this.commit(now);
    this.mustGetTask(taskId);
    this.tasks.delete(taskId);
    let removed = 0;
    for (const [id, item] of this.items) {
      if (item.recurrenceId === taskId) {
        this.items.delete(id);
        removed++;
      }
    }
    this.logger.info({ taskId, removed }, "deleted recurring task");
  }

  /**
   * Edit a task. Occurrences already materialized stay; the ones after them
   * follow the new definition, stepping from the last materialized one.
   */
  updateRecurring(
    taskId: number,
    patch: RecurringPatch,
    now: Temporal.ZonedDateTime,
  ): RecurringTask {
    this.commit(now);
    const updated = copyTask(editRecurringTask(this.mustGetTask(taskId), patch));
    this.tasks.set(taskId, updated);
    this.logger.info(
      { taskId, anchorSequence: updated.anchorSequence },
      "updated recurring task",
    );
    return copyTask(updated);
  }

  /**
   * Record that a reminder went out. A provisional occurrence is committed
   * first and then found by its task and sequence.
   */
  markNotified(item: CalendarItem, now: Temporal.ZonedDateTime): StoredItem {
    this.commit(now);
    const id = item.id ?? this.findOccurrence(item)?.id ?? null;
    if (id === null) {
      throw DatebookError.notFound("occurrence is no longer due");
    }
    return this.update(id, { notified: true }, now);
  }

  // --- Reads ---

  // Reads hand out copies; stored state only changes through mutations.

  get(id: number): StoredItem | undefined {
    const item = this.items.get(id);
    return item && copyItem(item);
  }

  getRecurring(taskId: number): RecurringTask | undefined {
    const task = this.tasks.get(taskId);
    return task && copyTask(task);
  }

  listRecurring(): RecurringTask[] {
    return this.sortedTasks().map(copyTask);
  }

  /** Committed items plus provisional occurrences, ordered. */
  snapshot(now: Temporal.ZonedDateTime): CalendarItem[] {
    const committed: CalendarItem[] = [...this.items.values()].map(copyItem);
    return sortItems([...committed, ...this.provisional(now)]);
  }

  list(now: Temporal.ZonedDateTime, options: ListOptions = {}): CalendarItem[] {
    const { includeCompleted = false, window } = options;
    return this.snapshot(now).filter(
      (item) =>
        (includeCompleted || !item.completed) &&
        (window === undefined || inQueryWindow(item, window)),
    );
  }

  search(predicate: SearchPredicate, now: Temporal.ZonedDateTime): CalendarItem[] {
    return this.snapshot(now).filter((item) => evaluate(predicate, item));
  }

  /** Items whose time overlaps the well around `now`. */
  eventsNow(
    now: Temporal.ZonedDateTime,
    well: Duration,
    includeCompleted = false,
  ): CalendarItem[] {
    return this.snapshot(now).filter(
      (item) => (includeCompleted || !item.completed) && inWell(item, now, well),
    );
  }

  pendingNotifications(now: Temporal.ZonedDateTime): CalendarItem[] {
    return this.snapshot(now).filter((item) => isNotificationDue(item, now));
  }

  // --- Internals ---

  private insert(item: CalendarItem): StoredItem {
    const id = this.nextItemId++;
    const stored: StoredItem = { ...item, id };
    this.items.set(id, stored);
    return stored;
  }

  private mustGet(id: number): StoredItem {
    const item = this.items.get(id);
    if (!item) {
      throw DatebookError.notFound(`no calendar item with id ${id}`);
    }
    return item;
  }

  private mustGetTask(taskId: number): RecurringTask {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw DatebookError.notFound(`no recurring task with id ${taskId}`);
    }
    return task;
  }

  private findOccurrence(item: CalendarItem): StoredItem | undefined {
    for (const stored of this.items.values()) {
      if (
        stored.recurrenceId !== null &&
        stored.recurrenceId === item.recurrenceId &&
        stored.sequence === item.sequence
      ) {
        return stored;
      }
    }
    return undefined;
  }

  private sequencesOf(taskId: number): number[] {
    const out: number[] = [];
    for (const item of this.items.values()) {
      if (item.recurrenceId === taskId && item.sequence !== null) {
        out.push(item.sequence);
      }
    }
    return out;
  }

  private sortedTasks(): RecurringTask[] {
    return [...this.tasks.values()].sort((a, b) => a.id - b.id);
  }
}
