import type { CampusEvent, ServiceRequest, RequestStatus } from '../domain/index.js';
import { NotFoundError } from '../domain/index.js';
import type { CampusStore } from './campus-store.js';

const MAX_EXAMPLES_PER_STATUS = 3;

export interface EventSummary {
  event_id: string;
  title: string;
  organizer: string;
  date: string;
  start_time: string;
  end_time: string;
  venue: string;
  seats: number;
  confirmed: number;
  waitlisted: number;
  violations: string[];
  status: 'Valid' | 'Invalid';
}

export interface ConflictEntry {
  event_id: string;
  violations: string[];
}

export interface RequestExample {
  request_id: string;
  category: string;
}

export interface ServiceRequestReport {
  counts: Record<RequestStatus, number>;
  examples: Record<RequestStatus, RequestExample[]>;
}

export function summarizeEvent(event: CampusEvent, confirmed: number, waitlisted: number): EventSummary {
  return {
    event_id: event.event_id,
    title: event.title,
    organizer: event.organizer,
    date: event.date,
    start_time: event.start_time,
    end_time: event.end_time,
    venue: event.venue,
    seats: event.max_seats,
    confirmed,
    waitlisted,
    violations: [...event.violations],
    status: event.is_valid ? 'Valid' : 'Invalid',
  };
}

async function summarizeWithCounts(store: CampusStore, event: CampusEvent): Promise<EventSummary> {
  const [confirmed, waitlisted] = await Promise.all([
    store.countRegistrations(event.event_id, 'Confirmed'),
    store.countRegistrations(event.event_id, 'Waitlisted'),
  ]);
  return summarizeEvent(event, confirmed, waitlisted);
}

/** Joins one event with its live registration counts. */
export async function buildEventSummary(store: CampusStore, eventId: string): Promise<EventSummary> {
  const event = await store.getEvent(eventId);
  if (!event) throw new NotFoundError('event', eventId);
  return summarizeWithCounts(store, event);
}

export async function buildAllEventSummaries(store: CampusStore): Promise<EventSummary[]> {
  const events = await store.listEvents();
  return Promise.all(events.map((event) => summarizeWithCounts(store, event)));
}

/** Invalid events with their violations, in registry order. */
export function collectConflicts(events: readonly CampusEvent[]): ConflictEntry[] {
  const entries: ConflictEntry[] = [];
  for (const event of events) {
    if (!event.is_valid && event.violations.length > 0) {
      entries.push({ event_id: event.event_id, violations: [...event.violations] });
    }
  }
  return entries;
}

/**
 * Counts requests per status and keeps the first few of each,
 * in the order given (creation order when read from a store).
 */
export function summarizeServiceRequests(requests: readonly ServiceRequest[]): ServiceRequestReport {
  const counts: Record<RequestStatus, number> = { 'Open': 0, 'In-Progress': 0, 'Resolved': 0 };
  const examples: Record<RequestStatus, RequestExample[]> = { 'Open': [], 'In-Progress': [], 'Resolved': [] };

  for (const request of requests) {
    counts[request.status] += 1;
    const bucket = examples[request.status];
    if (bucket.length < MAX_EXAMPLES_PER_STATUS) {
      bucket.push({ request_id: request.request_id, category: request.category });
    }
  }

  return { counts, examples };
}
