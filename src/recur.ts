// Recurrence Generator — materializes the occurrences of a recurring task
// that have come due since the last materialized one.

import { Temporal } from "@js-temporal/polyfill";
import { DURATION_UNITS, type Duration } from "./ast.js";
import { durationSign, scaleDuration, toTemporalDuration } from "./duration.js";
import { DatebookError } from "./error.js";
import {
  type ItemTemplate,
  type Occurrence,
  type RecurringPatch,
  type RecurringTask,
  moveShape,
  newItem,
  shapeStart,
} from "./record.js";

// =============================================================================
// Anchor drift
// =============================================================================
// The nominal start of occurrence n is computed in one calendar-aware step
// from the task's anchor, the start of occurrence `anchorSequence`:
//
//   start(n) = anchor + (n - anchorSequence) * interval
//
// Month and year components clamp the day to the end of a shorter month, but
// the clamp never carries into later occurrences. A monthly task on Jan 31
// lands on Feb 28 (or 29) and then on Mar 31 again.
//
// A new task is anchored on its template (occurrence 0). Editing the interval
// or the template's shape re-anchors it on the last materialized occurrence,
// so the new definition only applies from there on.
// =============================================================================

/** Nominal start of occurrence `sequence`. */
export function occurrenceStart(
  task: RecurringTask,
  sequence: number,
): Temporal.PlainDateTime {
  const step = scaleDuration(task.interval, sequence - task.anchorSequence);
  return task.anchor.add(toTemporalDuration(step));
}

/** A task anchored on its template, with occurrence 0 materialized. */
export function newRecurringTask(
  id: number,
  interval: Duration,
  template: ItemTemplate,
): RecurringTask {
  return {
    id,
    interval,
    template,
    lastSequence: 0,
    materializedAt: null,
    anchor: shapeStart(template.shape),
    anchorSequence: 0,
  };
}

/**
 * Apply an edit. Occurrences up to `lastSequence` are kept; a changed
 * interval steps from the last one, and a changed shape takes its place.
 */
export function editRecurringTask(
  task: RecurringTask,
  patch: RecurringPatch,
): RecurringTask {
  const anchor = patch.template?.shape
    ? shapeStart(patch.template.shape)
    : occurrenceStart(task, task.lastSequence);
  return {
    ...task,
    interval: patch.interval ?? task.interval,
    template: { ...task.template, ...patch.template },
    anchor,
    anchorSequence: task.lastSequence,
  };
}

/** A provisional occurrence: no identity until the store commits it. */
export function occurrenceAt(task: RecurringTask, sequence: number): Occurrence {
  const item = newItem(task.template);
  return {
    ...item,
    shape: moveShape(task.template.shape, occurrenceStart(task, sequence)),
    recurrenceId: task.id,
    sequence,
  };
}

/**
 * Every occurrence due by `now` after the last materialized one, in sequence
 * order. Pure: the task is not modified, so repeated calls without a commit
 * return the same occurrences.
 */
export function materializeDue(
  task: RecurringTask,
  now: Temporal.ZonedDateTime,
): Occurrence[] {
  assertMonotonic(task);

  const limit = now.toPlainDateTime();
  const due: Occurrence[] = [];
  for (let sequence = task.lastSequence + 1; ; sequence++) {
    const start = occurrenceStart(task, sequence);
    if (Temporal.PlainDateTime.compare(start, limit) > 0) break;
    due.push(occurrenceAt(task, sequence));
  }
  return due;
}

/** Start of the first occurrence not yet materialized. */
export function nextDue(task: RecurringTask): Temporal.PlainDateTime {
  assertMonotonic(task);
  return occurrenceStart(task, task.lastSequence + 1);
}

/** Reject stored state the generator cannot advance from. */
export function assertMonotonic(task: RecurringTask): void {
  if (!Number.isInteger(task.lastSequence) || task.lastSequence < 0) {
    throw DatebookError.nonMonotonic(
      `recurring task ${task.id} has invalid sequence index ${task.lastSequence}`,
    );
  }
  if (
    !Number.isInteger(task.anchorSequence) ||
    task.anchorSequence < 0 ||
    task.anchorSequence > task.lastSequence
  ) {
    throw DatebookError.nonMonotonic(
      `recurring task ${task.id} has invalid anchor index ${task.anchorSequence}`,
    );
  }
  if (
    durationSign(task.interval) <= 0 ||
    DURATION_UNITS.some((unit) => task.interval[unit] < 0)
  ) {
    throw DatebookError.nonMonotonic(
      `recurring task ${task.id} has a non-positive interval`,
    );
  }
}

/**
 * Check the sequence indices of a task's stored occurrences: no index twice,
 * none beyond the task's last materialized index.
 */
export function assertSequences(task: RecurringTask, sequences: number[]): void {
  const seen = new Set<number>();
  for (const sequence of sequences) {
    if (seen.has(sequence) || sequence > task.lastSequence) {
      throw DatebookError.nonMonotonic(
        `recurring task ${task.id} has an unexpected occurrence ${sequence}`,
      );
    }
    seen.add(sequence);
  }
}
