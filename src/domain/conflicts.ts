import type { CampusEvent } from './campus.js';
import { intervalsOverlap } from './overlap.js';
import { parseTimeOfDay, type TimeInterval } from './time.js';

/** Fields of an event that take part in conflict detection. */
export type ScheduleSlot = Pick<CampusEvent, 'date' | 'venue' | 'start_time' | 'end_time'>;

export function slotInterval(slot: Pick<ScheduleSlot, 'start_time' | 'end_time'>): TimeInterval {
  return {
    start: parseTimeOfDay(slot.start_time),
    end: parseTimeOfDay(slot.end_time),
  };
}

/** Same date, same venue, overlapping half-open intervals. */
export function slotsConflict(a: ScheduleSlot, b: ScheduleSlot): boolean {
  return a.date === b.date
    && a.venue === b.venue
    && intervalsOverlap(slotInterval(a), slotInterval(b));
}

/**
 * Returns the IDs of every previously inserted event that conflicts
 * with `candidate`.
 *
 * `inserted` must be in insertion order; the result keeps that order.
 * Invalid events are still considered: an event that lost its own
 * slot can still invalidate a later one.
 */
export function detectConflicts(
  candidate: ScheduleSlot,
  inserted: readonly CampusEvent[],
): string[] {
  const conflicts: string[] = [];

  for (const existing of inserted) {
    if (slotsConflict(existing, candidate)) {
      conflicts.push(existing.event_id);
    }
  }

  return conflicts;
}
