import type { RegistrationStatus } from './campus.js';
import { ParseError } from './errors.js';

/**
 * First-come-first-serve seat allocation.
 *
 * `confirmedCount` must be read from the current registration set
 * immediately before the new registration is stored.
 */
export function allocateSeat(confirmedCount: number, maxSeats: number): RegistrationStatus {
  return confirmedCount < maxSeats ? 'Confirmed' : 'Waitlisted';
}

/** Capacity must be a non-negative integer; zero waitlists everyone. */
export function parseSeatCount(value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ParseError(String(value), 'seat count (expected a non-negative integer)');
  }
  return value;
}
