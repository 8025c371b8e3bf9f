import type {
  CampusEvent,
  Student,
  Registration,
  RegistrationStatus,
  ServiceRequest,
  RequestStatus,
  TimeInterval,
} from '../domain/index.js';

export type StoreBackend = 'memory' | 'postgres';

/**
 * Storage port for the campus registry.
 *
 * Implementations only store and query; every rule (conflicts, seat
 * allocation, status transitions, identity checks) lives in the
 * domain and `CampusSystem`. Listing methods return insertion order
 * unless stated otherwise.
 */
export interface CampusStore {
  readonly backend: StoreBackend;

  hasEvent(eventId: string): Promise<boolean>;
  getEvent(eventId: string): Promise<CampusEvent | undefined>;
  listEvents(): Promise<CampusEvent[]>;
  /** Events on `date` at `venue` whose interval overlaps `interval`, in insertion order. */
  findOverlappingEvents(date: string, venue: string, interval: TimeInterval): Promise<CampusEvent[]>;
  insertEvent(event: CampusEvent): Promise<void>;

  hasStudent(studentId: string): Promise<boolean>;
  listStudents(): Promise<Student[]>;
  insertStudent(student: Student): Promise<void>;

  hasRegistration(studentId: string, eventId: string): Promise<boolean>;
  countRegistrations(eventId: string, status: RegistrationStatus): Promise<number>;
  listRegistrations(eventId?: string): Promise<Registration[]>;
  insertRegistration(registration: Registration): Promise<void>;

  getServiceRequest(requestId: string): Promise<ServiceRequest | undefined>;
  /** Ordered by `created_at` ascending; equal timestamps keep insertion order. */
  listServiceRequests(): Promise<ServiceRequest[]>;
  insertServiceRequest(request: ServiceRequest): Promise<void>;
  updateServiceRequestStatus(requestId: string, status: RequestStatus, updatedAt: Date): Promise<void>;

  /** Releases connections. The in-memory store has nothing to release. */
  close(): Promise<void>;
}
