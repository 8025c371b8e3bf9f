import { REQUEST_STATUSES, type RequestStatus } from './campus.js';
import { InvalidTransitionError } from './errors.js';

/** Linear progression: Open -> In-Progress -> Resolved. Resolved is terminal. */
export const REQUEST_TRANSITIONS: Readonly<Record<RequestStatus, readonly RequestStatus[]>> = {
  'Open': ['In-Progress'],
  'In-Progress': ['Resolved'],
  'Resolved': [],
};

export const INITIAL_REQUEST_STATUS: RequestStatus = 'Open';

export function isRequestStatus(value: string): value is RequestStatus {
  return (REQUEST_STATUSES as readonly string[]).includes(value);
}

export function canTransition(from: RequestStatus, to: RequestStatus): boolean {
  return REQUEST_TRANSITIONS[from].includes(to);
}

/**
 * Validates a transition and returns the narrowed target status.
 *
 * Same-state moves and skips are rejected like any other edge
 * missing from the table.
 */
export function assertTransition(from: RequestStatus, to: string): RequestStatus {
  if (!isRequestStatus(to) || !canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
  return to;
}
