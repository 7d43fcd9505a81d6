/**
 * Snapshot Reconstructor
 *
 * Recovers the value a field held at the start of a past day from the
 * entity's current value and its ordered change history:
 *
 * - the first change on or after the target day tells us what the value was
 *   before it fired (`removed`), which is the start-of-day value;
 * - with no such change, the value has not moved since, so it is the current one.
 *
 * A change that happens on day D is therefore not visible in D's snapshot,
 * only in D+1's.
 *
 * @module @trailstats/core/reconstruction/snapshot
 */

import type {
  AuditEvent,
  CategoryField,
  EntityCurrentState,
  FieldHistory,
} from '../storage/interfaces.js';

interface Cursor {
  /** Index of the first event with dayNumber >= lastDay */
  index: number;
  lastDay: number;
}

const NO_EVENTS: readonly AuditEvent[] = [];

export class SnapshotReconstructor {
  private readonly histories: Record<CategoryField, FieldHistory>;
  private readonly cursors: Record<CategoryField, Map<number, Cursor>> = {
    status: new Map(),
    resolution: new Map(),
  };

  constructor(histories: Record<CategoryField, FieldHistory>) {
    this.histories = histories;
  }

  /**
   * Value of `field` at the start of `targetDay`, or null when it is unknown
   * (the value was set from nothing, or is empty).
   *
   * Calls for one entity with non-decreasing target days only ever move its
   * cursor forward; an earlier target day restarts the scan.
   */
  valueAt(entity: EntityCurrentState, field: CategoryField, targetDay: number): string | null {
    const events = this.histories[field].get(entity.entityId) ?? NO_EVENTS;
    const cursors = this.cursors[field];

    let cursor = cursors.get(entity.entityId);
    if (!cursor || targetDay < cursor.lastDay) {
      cursor = { index: 0, lastDay: targetDay };
      cursors.set(entity.entityId, cursor);
    }

    while (cursor.index < events.length && events[cursor.index].dayNumber < targetDay) {
      cursor.index++;
    }
    cursor.lastDay = targetDay;

    const value = cursor.index < events.length ? events[cursor.index].removed : entity[field];
    return value === '' ? null : value;
  }
}
