/**
 * Core domain types for campus events, students, registrations
 * and service requests.
 *
 * These types carry no framework dependencies. Dates are canonical
 * `YYYY-MM-DD` strings and times are `HH:MM` strings; both are
 * validated on the way in (see `time.ts`).
 */

/**
 * A scheduled event at a venue.
 *
 * `is_valid` and `violations` are decided once, when the event is
 * inserted, and never revisited: the first event registered for an
 * overlapping venue/date/time slot wins.
 */
export interface CampusEvent {
  readonly event_id: string;
  readonly title: string;
  readonly organizer: string;
  readonly date: string;
  readonly start_time: string;
  readonly end_time: string;
  readonly venue: string;
  readonly max_seats: number;
  readonly is_valid: boolean;
  /** IDs of earlier overlapping events, in their insertion order. */
  readonly violations: readonly string[];
}

export interface Student {
  readonly student_id: string;
  readonly name: string;
  readonly dept: string;
  readonly year: number;
  readonly contact: string;
}

export const REGISTRATION_STATUSES = ['Confirmed', 'Waitlisted'] as const;
export type RegistrationStatus = (typeof REGISTRATION_STATUSES)[number];

export function isRegistrationStatus(value: string): value is RegistrationStatus {
  return (REGISTRATION_STATUSES as readonly string[]).includes(value);
}

export interface Registration {
  readonly student_id: string;
  readonly event_id: string;
  readonly status: RegistrationStatus;
  readonly registered_at: Date;
}

export const REQUEST_STATUSES = ['Open', 'In-Progress', 'Resolved'] as const;
export type RequestStatus = (typeof REQUEST_STATUSES)[number];

export interface ServiceRequest {
  readonly request_id: string;
  readonly student_id: string;
  readonly category: string;
  readonly location: string;
  readonly description: string;
  readonly status: RequestStatus;
  readonly created_at: Date;
  readonly updated_at: Date;
}
