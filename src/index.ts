// datebook — Public API

import type { Temporal } from "@js-temporal/polyfill";
import type { Duration, EntryDraft, SearchPredicate } from "./ast.js";
import { type Config, defaultConfig } from "./config.js";
import { parseEntry } from "./entry.js";
import { type Logger, createLogger } from "./logger.js";
import type { ParseOptions } from "./parser.js";
import type { CalendarItem } from "./record.js";
import { parseSearch } from "./search.js";
import { MemoryStore } from "./store.js";
import { queryWindow } from "./window.js";

export interface CalendarOptions {
  config?: Config;
  store?: MemoryStore;
  logger?: Logger;
}

export interface ListCommandOptions {
  includeCompleted?: boolean;
  /** List everything instead of the configured query window. */
  all?: boolean;
}

/**
 * A calendar driven by entry and search statements. Every front end (command
 * line or terminal UI) goes through this one object.
 */
export class Calendar {
  readonly config: Config;
  readonly store: MemoryStore;

  constructor(options: CalendarOptions = {}) {
    this.config = options.config ?? defaultConfig();
    const logger = options.logger ?? createLogger(this.config.logLevel);
    this.store = options.store ?? new MemoryStore(logger);
  }

  /** Check if an input string is a valid entry statement. */
  static validateEntry(input: string, now: Temporal.ZonedDateTime): boolean {
    try {
      parseEntry(input, now);
      return true;
    } catch {
      return false;
    }
  }

  /** Check if an input string is a valid search statement. */
  static validateSearch(input: string, now: Temporal.ZonedDateTime): boolean {
    try {
      parseSearch(input, now);
      return true;
    } catch {
      return false;
    }
  }

  private get parseOptions(): ParseOptions {
    return { infer12h: !this.config.use24hTime };
  }

  /** Parse an entry statement without storing it. */
  parseEntry(input: string, now: Temporal.ZonedDateTime): EntryDraft {
    return parseEntry(input, now, this.parseOptions);
  }

  /** Parse a search statement. Search times never use 12h inference. */
  parseSearch(input: string, now: Temporal.ZonedDateTime): SearchPredicate {
    return parseSearch(input, now);
  }

  /** Parse and store an entry statement. */
  entry(input: string, now: Temporal.ZonedDateTime): CalendarItem {
    return this.store.record(this.parseEntry(input, now), now);
  }

  search(input: string, now: Temporal.ZonedDateTime): CalendarItem[] {
    return this.store.search(this.parseSearch(input, now), now);
  }

  list(now: Temporal.ZonedDateTime, options: ListCommandOptions = {}): CalendarItem[] {
    return this.store.list(now, {
      includeCompleted: options.includeCompleted,
      window: options.all ? undefined : queryWindow(now, this.config.queryWindow),
    });
  }

  /** Unfinished items inside the well around `now`. */
  current(now: Temporal.ZonedDateTime, well: Duration = this.config.well): CalendarItem[] {
    return this.store.eventsNow(now, well);
  }

  /** Items whose reminder is due; each is marked notified. */
  notifications(now: Temporal.ZonedDateTime): CalendarItem[] {
    return this.store
      .pendingNotifications(now)
      .map((item) => this.store.markNotified(item, now));
  }

  complete(id: number, now: Temporal.ZonedDateTime): CalendarItem {
    return this.store.complete(id, now);
  }

  delete(id: number, now: Temporal.ZonedDateTime): void {
    this.store.delete(id, now);
  }

  deleteRecurring(taskId: number, now: Temporal.ZonedDateTime): void {
    this.store.deleteRecurring(taskId, now);
  }
}

export { Temporal } from "@js-temporal/polyfill";
export type {
  Duration,
  DurationUnit,
  EntryDraft,
  SearchClause,
  SearchPredicate,
  TemporalShape,
  Weekday,
} from "./ast.js";
export { type Config, ConfigSchema, defaultConfig, loadConfig } from "./config.js";
export type { LoadConfigOptions } from "./config.js";
export { resolveDate } from "./date.js";
export {
  displayEntry,
  displaySearch,
  formatDate,
  formatDuration,
  formatTime,
} from "./display.js";
export {
  durationEquals,
  durationSign,
  isZeroDuration,
  parseDuration,
  toTemporalDuration,
} from "./duration.js";
export { parseEntry } from "./entry.js";
export type { DatebookErrorKind, Span } from "./error.js";
export { DatebookError } from "./error.js";
export { type Token, scan } from "./lexer.js";
export { type Logger, createLogger } from "./logger.js";
export type { ParseOptions } from "./parser.js";
export type {
  CalendarItem,
  Fields,
  ItemTemplate,
  Occurrence,
  RecurringPatch,
  RecurringTask,
  StoredItem,
} from "./record.js";
export { compareItems, shapeEnd, shapeStart, sortItems } from "./record.js";
export {
  editRecurringTask,
  materializeDue,
  newRecurringTask,
  nextDue,
  occurrenceStart,
} from "./recur.js";
export { evaluate, parseSearch } from "./search.js";
export { type ItemPatch, type ListOptions, MemoryStore, type StoreState } from "./store.js";
export { type TimeContext, resolveTime } from "./time.js";
export {
  type Notification,
  type TimeWindow,
  inWell,
  isNotificationDue,
  notificationOf,
  queryWindow,
} from "./window.js";
