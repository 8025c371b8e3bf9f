import { and, asc, count, eq, gt, lt } from 'drizzle-orm';
import type {
  CampusEvent,
  Student,
  Registration,
  RegistrationStatus,
  ServiceRequest,
  RequestStatus,
  TimeInterval,
} from '../../domain/index.js';
import { isRegistrationStatus, isRequestStatus, slotInterval } from '../../domain/index.js';
import type { CampusStore } from '../../application/campus-store.js';
import type { DbClient, Database } from './client.js';
import { campusEvents, students, registrations, serviceRequests } from './schema.js';
import type { CampusEventRow, StudentRow, RegistrationRow, ServiceRequestRow } from './schema.js';

export function toCampusEvent(row: CampusEventRow): CampusEvent {
  return {
    event_id: row.event_id,
    title: row.title,
    organizer: row.organizer,
    date: row.event_date,
    start_time: row.start_time,
    end_time: row.end_time,
    venue: row.venue,
    max_seats: row.max_seats,
    is_valid: row.is_valid,
    violations: [...row.violations],
  };
}

export function toStudent(row: StudentRow): Student {
  return {
    student_id: row.student_id,
    name: row.name,
    dept: row.dept,
    year: row.year,
    contact: row.contact,
  };
}

export function toRegistration(row: RegistrationRow): Registration {
  if (!isRegistrationStatus(row.status)) {
    throw new Error(`Unexpected registration status in database: ${row.status}`);
  }
  return {
    student_id: row.student_id,
    event_id: row.event_id,
    status: row.status,
    registered_at: row.registered_at,
  };
}

export function toServiceRequest(row: ServiceRequestRow): ServiceRequest {
  if (!isRequestStatus(row.status)) {
    throw new Error(`Unexpected service request status in database: ${row.status}`);
  }
  return {
    request_id: row.request_id,
    student_id: row.student_id,
    category: row.category,
    location: row.location,
    description: row.description,
    status: row.status,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/**
 * Campus store over Postgres via Drizzle.
 *
 * Insertion order is the `seq` serial column; the overlap query is
 * the half-open interval test written as
 * `start_minute < :end AND end_minute > :start`.
 */
export class PostgresCampusStore implements CampusStore {
  readonly backend = 'postgres' as const;

  private readonly db: Database;
  private readonly client: DbClient;

  constructor(client: DbClient) {
    this.client = client;
    this.db = client.db;
  }

  async hasEvent(eventId: string): Promise<boolean> {
    const rows = await this.db
      .select({ event_id: campusEvents.event_id })
      .from(campusEvents)
      .where(eq(campusEvents.event_id, eventId))
      .limit(1);
    return rows.length > 0;
  }

  async getEvent(eventId: string): Promise<CampusEvent | undefined> {
    const rows = await this.db
      .select()
      .from(campusEvents)
      .where(eq(campusEvents.event_id, eventId))
      .limit(1);
    const row = rows[0];
    return row ? toCampusEvent(row) : undefined;
  }

  async listEvents(): Promise<CampusEvent[]> {
    const rows = await this.db.select().from(campusEvents).orderBy(asc(campusEvents.seq));
    return rows.map(toCampusEvent);
  }

  async findOverlappingEvents(date: string, venue: string, interval: TimeInterval): Promise<CampusEvent[]> {
    const rows = await this.db
      .select()
      .from(campusEvents)
      .where(and(
        eq(campusEvents.event_date, date),
        eq(campusEvents.venue, venue),
        lt(campusEvents.start_minute, interval.end),
        gt(campusEvents.end_minute, interval.start),
      ))
      .orderBy(asc(campusEvents.seq));
    return rows.map(toCampusEvent);
  }

  async insertEvent(event: CampusEvent): Promise<void> {
    const interval = slotInterval(event);
    await this.db.insert(campusEvents).values({
      event_id: event.event_id,
      title: event.title,
      organizer: event.organizer,
      event_date: event.date,
      start_time: event.start_time,
      end_time: event.end_time,
      start_minute: interval.start,
      end_minute: interval.end,
      venue: event.venue,
      max_seats: event.max_seats,
      is_valid: event.is_valid,
      violations: [...event.violations],
    });
  }

  async hasStudent(studentId: string): Promise<boolean> {
    const rows = await this.db
      .select({ student_id: students.student_id })
      .from(students)
      .where(eq(students.student_id, studentId))
      .limit(1);
    return rows.length > 0;
  }

  async listStudents(): Promise<Student[]> {
    const rows = await this.db.select().from(students).orderBy(asc(students.seq));
    return rows.map(toStudent);
  }

  async insertStudent(student: Student): Promise<void> {
    await this.db.insert(students).values({
      student_id: student.student_id,
      name: student.name,
      dept: student.dept,
      year: student.year,
      contact: student.contact,
    });
  }

  async hasRegistration(studentId: string, eventId: string): Promise<boolean> {
    const rows = await this.db
      .select({ seq: registrations.seq })
      .from(registrations)
      .where(and(eq(registrations.student_id, studentId), eq(registrations.event_id, eventId)))
      .limit(1);
    return rows.length > 0;
  }

  async countRegistrations(eventId: string, status: RegistrationStatus): Promise<number> {
    const rows = await this.db
      .select({ value: count() })
      .from(registrations)
      .where(and(eq(registrations.event_id, eventId), eq(registrations.status, status)));
    return rows[0]?.value ?? 0;
  }

  async listRegistrations(eventId?: string): Promise<Registration[]> {
    const where = eventId === undefined ? undefined : eq(registrations.event_id, eventId);
    const rows = await this.db
      .select()
      .from(registrations)
      .where(where)
      .orderBy(asc(registrations.seq));
    return rows.map(toRegistration);
  }

  async insertRegistration(registration: Registration): Promise<void> {
    await this.db.insert(registrations).values({
      student_id: registration.student_id,
      event_id: registration.event_id,
      status: registration.status,
      registered_at: registration.registered_at,
    });
  }

  async getServiceRequest(requestId: string): Promise<ServiceRequest | undefined> {
    const rows = await this.db
      .select()
      .from(serviceRequests)
      .where(eq(serviceRequests.request_id, requestId))
      .limit(1);
    const row = rows[0];
    return row ? toServiceRequest(row) : undefined;
  }

  async listServiceRequests(): Promise<ServiceRequest[]> {
    const rows = await this.db
      .select()
      .from(serviceRequests)
      .orderBy(asc(serviceRequests.created_at), asc(serviceRequests.seq));
    return rows.map(toServiceRequest);
  }

  async insertServiceRequest(request: ServiceRequest): Promise<void> {
    await this.db.insert(serviceRequests).values({
      request_id: request.request_id,
      student_id: request.student_id,
      category: request.category,
      location: request.location,
      description: request.description,
      status: request.status,
      created_at: request.created_at,
      updated_at: request.updated_at,
    });
  }

  async updateServiceRequestStatus(requestId: string, status: RequestStatus, updatedAt: Date): Promise<void> {
    await this.db
      .update(serviceRequests)
      .set({ status, updated_at: updatedAt })
      .where(eq(serviceRequests.request_id, requestId));
  }

  async close(): Promise<void> {
    await this.client.sql.end();
  }
}
