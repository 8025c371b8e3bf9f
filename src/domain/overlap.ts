import type { TimeInterval } from './time.js';

/**
 * Returns true iff `[aStart, aEnd)` and `[bStart, bEnd)` overlap.
 *
 * Both intervals are same-day times of day. Touching intervals
 * (`aEnd === bStart`) do not overlap.
 */
export function timesOverlap(aStart: number, aEnd: number, bStart: number, bEnd: number): boolean {
  return !(aEnd <= bStart || aStart >= bEnd);
}

export function intervalsOverlap(a: TimeInterval, b: TimeInterval): boolean {
  return timesOverlap(a.start, a.end, b.start, b.end);
}
