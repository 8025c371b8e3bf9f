import type { BaseLogger } from 'pino';
import type {
  CampusEvent,
  Student,
  Registration,
  RequestStatus,
  ServiceRequest,
} from '../domain/index.js';
import {
  DuplicateIdError,
  NotFoundError,
  INITIAL_REQUEST_STATUS,
  allocateSeat,
  assertTransition,
  detectConflicts,
  parseCalendarDate,
  parseSeatCount,
  parseTimeOfDay,
} from '../domain/index.js';
import type { CampusStore, StoreBackend } from './campus-store.js';
import { KeyedMutex } from './keyed-mutex.js';
import {
  buildEventSummary,
  buildAllEventSummaries,
  collectConflicts,
  summarizeServiceRequests,
} from './reports.js';
import type { EventSummary, ConflictEntry, ServiceRequestReport } from './reports.js';

/** Event fields supplied by callers; validity is decided on insertion. */
export type NewEventInput = Omit<CampusEvent, 'is_valid' | 'violations'>;

export type NewStudentInput = Student;

export interface RaiseRequestInput {
  request_id: string;
  student_id: string;
  category: string;
  location: string;
  description?: string;
  /** Seeding only: start somewhere other than Open. */
  status?: RequestStatus;
  created_at?: Date;
}

export interface CampusSystemOptions {
  store: CampusStore;
  log: BaseLogger;
  /** Clock for registration and request timestamps. */
  now?: () => Date;
}

const EVENTS_LOCK = 'events';
const STUDENTS_LOCK = 'students';
const REQUESTS_LOCK = 'requests';

/**
 * The campus registry: events with conflict detection, students,
 * seat allocation and service requests.
 *
 * Constructed once at startup around an explicit store and injected
 * wherever it is needed. Each mutation either applies fully or throws
 * with the store left unchanged.
 */
export class CampusSystem {
  private readonly store: CampusStore;
  private readonly log: BaseLogger;
  private readonly now: () => Date;
  private readonly locks = new KeyedMutex();

  constructor(options: CampusSystemOptions) {
    this.store = options.store;
    this.log = options.log;
    this.now = options.now ?? (() => new Date());
  }

  get backend(): StoreBackend {
    return this.store.backend;
  }

  /** Releases the underlying store. */
  async close(): Promise<void> {
    await this.store.close();
  }

  // ── Events ─────────────────────────────────────────────────

  /**
   * Inserts an event and fixes its validity.
   *
   * Earlier events at the same venue and date whose intervals overlap
   * become this event's violations; they are never touched themselves.
   */
  async addEvent(input: NewEventInput): Promise<CampusEvent> {
    const date = parseCalendarDate(input.date);
    const interval = {
      start: parseTimeOfDay(input.start_time),
      end: parseTimeOfDay(input.end_time),
    };
    const maxSeats = parseSeatCount(input.max_seats);

    return this.locks.runExclusive(EVENTS_LOCK, async () => {
      if (await this.store.hasEvent(input.event_id)) {
        throw new DuplicateIdError('event', input.event_id);
      }

      const candidates = await this.store.findOverlappingEvents(date, input.venue, interval);
      const violations = detectConflicts(input, candidates);

      const event: CampusEvent = {
        event_id: input.event_id,
        title: input.title,
        organizer: input.organizer,
        date,
        start_time: input.start_time,
        end_time: input.end_time,
        venue: input.venue,
        max_seats: maxSeats,
        is_valid: violations.length === 0,
        violations,
      };

      await this.store.insertEvent(event);

      if (event.is_valid) {
        this.log.info({ event_id: event.event_id, venue: event.venue, date }, 'Event added');
      } else {
        this.log.warn({ event_id: event.event_id, violations }, 'Event added with venue conflicts');
      }

      return event;
    });
  }

  async listEvents(): Promise<CampusEvent[]> {
    return this.store.listEvents();
  }

  // ── Students ───────────────────────────────────────────────

  async addStudent(input: NewStudentInput): Promise<Student> {
    return this.locks.runExclusive(STUDENTS_LOCK, async () => {
      if (await this.store.hasStudent(input.student_id)) {
        throw new DuplicateIdError('student', input.student_id);
      }

      const student: Student = { ...input };
      await this.store.insertStudent(student);
      this.log.info({ student_id: student.student_id }, 'Student added');
      return student;
    });
  }

  async listStudents(): Promise<Student[]> {
    return this.store.listStudents();
  }

  // ── Registrations ──────────────────────────────────────────

  /**
   * Registers a student and allocates a seat.
   *
   * Confirmed while the live confirmed count is below capacity,
   * Waitlisted otherwise. A repeated (student, event) pair is rejected.
   */
  async register(studentId: string, eventId: string): Promise<Registration> {
    return this.locks.runExclusive(`registrations:${eventId}`, async () => {
      if (!(await this.store.hasStudent(studentId))) {
        throw new NotFoundError('student', studentId);
      }

      const event = await this.store.getEvent(eventId);
      if (!event) {
        throw new NotFoundError('event', eventId);
      }

      if (await this.store.hasRegistration(studentId, eventId)) {
        throw new DuplicateIdError('registration', `${studentId}/${eventId}`);
      }

      const confirmed = await this.store.countRegistrations(eventId, 'Confirmed');
      const registration: Registration = {
        student_id: studentId,
        event_id: eventId,
        status: allocateSeat(confirmed, event.max_seats),
        registered_at: this.now(),
      };

      await this.store.insertRegistration(registration);
      this.log.info(
        { student_id: studentId, event_id: eventId, status: registration.status },
        'Registration recorded',
      );
      return registration;
    });
  }

  async listRegistrations(eventId?: string): Promise<Registration[]> {
    return this.store.listRegistrations(eventId);
  }

  // ── Service requests ───────────────────────────────────────

  async raiseRequest(input: RaiseRequestInput): Promise<ServiceRequest> {
    return this.locks.runExclusive(REQUESTS_LOCK, async () => {
      if (!(await this.store.hasStudent(input.student_id))) {
        throw new NotFoundError('student', input.student_id);
      }
      if (await this.store.getServiceRequest(input.request_id)) {
        throw new DuplicateIdError('request', input.request_id);
      }

      const createdAt = input.created_at ?? this.now();
      const request: ServiceRequest = {
        request_id: input.request_id,
        student_id: input.student_id,
        category: input.category,
        location: input.location,
        description: input.description ?? '',
        status: input.status ?? INITIAL_REQUEST_STATUS,
        created_at: createdAt,
        updated_at: createdAt,
      };

      await this.store.insertServiceRequest(request);
      this.log.info(
        { request_id: request.request_id, status: request.status },
        'Service request raised',
      );
      return request;
    });
  }

  /** Advances a request along Open -> In-Progress -> Resolved. */
  async updateRequestStatus(requestId: string, newStatus: string): Promise<ServiceRequest> {
    return this.locks.runExclusive(`request:${requestId}`, async () => {
      const current = await this.store.getServiceRequest(requestId);
      if (!current) {
        throw new NotFoundError('request', requestId);
      }

      const next = assertTransition(current.status, newStatus);
      const updatedAt = this.now();
      await this.store.updateServiceRequestStatus(requestId, next, updatedAt);

      this.log.info({ request_id: requestId, from: current.status, to: next }, 'Service request status updated');
      return { ...current, status: next, updated_at: updatedAt };
    });
  }

  async listServiceRequests(): Promise<ServiceRequest[]> {
    return this.store.listServiceRequests();
  }

  // ── Reporting ──────────────────────────────────────────────

  async eventSummary(eventId: string): Promise<EventSummary> {
    return buildEventSummary(this.store, eventId);
  }

  async allEventSummaries(): Promise<EventSummary[]> {
    return buildAllEventSummaries(this.store);
  }

  async conflictReport(): Promise<ConflictEntry[]> {
    return collectConflicts(await this.store.listEvents());
  }

  async serviceRequestReport(): Promise<ServiceRequestReport> {
    return summarizeServiceRequests(await this.store.listServiceRequests());
  }
}
