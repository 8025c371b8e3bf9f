import type {
  CampusEvent,
  Student,
  Registration,
  RegistrationStatus,
  ServiceRequest,
  RequestStatus,
  TimeInterval,
} from '../../domain/index.js';
import { intervalsOverlap, slotInterval } from '../../domain/index.js';
import type { CampusStore } from '../../application/campus-store.js';

/**
 * In-process campus store.
 *
 * Maps give identity lookups; arrays keep insertion order for listing.
 * Service requests are kept sorted by `created_at` as they arrive, so
 * reads never re-sort.
 *
 * Records are copied on the way in and out; callers cannot mutate
 * stored state through a returned object.
 */
export class InMemoryCampusStore implements CampusStore {
  readonly backend = 'memory' as const;

  private readonly events: Map<string, CampusEvent> = new Map();
  private readonly eventOrder: string[] = [];
  private readonly students: Map<string, Student> = new Map();
  private readonly registrations: Registration[] = [];
  private readonly requests: ServiceRequest[] = [];

  async hasEvent(eventId: string): Promise<boolean> {
    return this.events.has(eventId);
  }

  async getEvent(eventId: string): Promise<CampusEvent | undefined> {
    const event = this.events.get(eventId);
    return event ? copyEvent(event) : undefined;
  }

  async listEvents(): Promise<CampusEvent[]> {
    return this.orderedEvents().map(copyEvent);
  }

  async findOverlappingEvents(date: string, venue: string, interval: TimeInterval): Promise<CampusEvent[]> {
    return this.orderedEvents()
      .filter((event) =>
        event.date === date
        && event.venue === venue
        && intervalsOverlap(slotInterval(event), interval))
      .map(copyEvent);
  }

  async insertEvent(event: CampusEvent): Promise<void> {
    this.events.set(event.event_id, copyEvent(event));
    this.eventOrder.push(event.event_id);
  }

  async hasStudent(studentId: string): Promise<boolean> {
    return this.students.has(studentId);
  }

  async listStudents(): Promise<Student[]> {
    return [...this.students.values()].map((student) => ({ ...student }));
  }

  async insertStudent(student: Student): Promise<void> {
    this.students.set(student.student_id, { ...student });
  }

  async hasRegistration(studentId: string, eventId: string): Promise<boolean> {
    return this.registrations.some((r) => r.student_id === studentId && r.event_id === eventId);
  }

  async countRegistrations(eventId: string, status: RegistrationStatus): Promise<number> {
    let count = 0;
    for (const registration of this.registrations) {
      if (registration.event_id === eventId && registration.status === status) count++;
    }
    return count;
  }

  async listRegistrations(eventId?: string): Promise<Registration[]> {
    return this.registrations
      .filter((r) => eventId === undefined || r.event_id === eventId)
      .map(copyRegistration);
  }

  async insertRegistration(registration: Registration): Promise<void> {
    this.registrations.push(copyRegistration(registration));
  }

  async getServiceRequest(requestId: string): Promise<ServiceRequest | undefined> {
    const request = this.requests.find((r) => r.request_id === requestId);
    return request ? copyServiceRequest(request) : undefined;
  }

  async listServiceRequests(): Promise<ServiceRequest[]> {
    return this.requests.map(copyServiceRequest);
  }

  async insertServiceRequest(request: ServiceRequest): Promise<void> {
    this.requests.splice(this.insertionIndex(request.created_at), 0, copyServiceRequest(request));
  }

  async updateServiceRequestStatus(requestId: string, status: RequestStatus, updatedAt: Date): Promise<void> {
    const index = this.requests.findIndex((r) => r.request_id === requestId);
    const current = this.requests[index];
    if (current) {
      this.requests[index] = { ...current, status, updated_at: new Date(updatedAt) };
    }
  }

  async close(): Promise<void> {
    // nothing to release
  }

  private orderedEvents(): CampusEvent[] {
    const ordered: CampusEvent[] = [];
    for (const id of this.eventOrder) {
      const event = this.events.get(id);
      if (event) ordered.push(event);
    }
    return ordered;
  }

  /** Upper-bound binary search: equal timestamps land after existing ones. */
  private insertionIndex(createdAt: Date): number {
    const target = createdAt.getTime();
    let lo = 0;
    let hi = this.requests.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const probe = this.requests[mid];
      if (probe && probe.created_at.getTime() <= target) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}

function copyEvent(event: CampusEvent): CampusEvent {
  return { ...event, violations: [...event.violations] };
}

function copyRegistration(registration: Registration): Registration {
  return { ...registration, registered_at: new Date(registration.registered_at) };
}

/** Dates are copied too: the sort order depends on `created_at` never changing. */
function copyServiceRequest(request: ServiceRequest): ServiceRequest {
  return {
    ...request,
    created_at: new Date(request.created_at),
    updated_at: new Date(request.updated_at),
  };
}
