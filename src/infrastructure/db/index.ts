export { campusEvents, students, registrations, serviceRequests } from './schema.js';
export type { CampusEventRow, StudentRow, RegistrationRow, ServiceRequestRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, Sql } from './client.js';
export { ensureSchema } from './migrate.js';
export {
  PostgresCampusStore,
  toCampusEvent,
  toStudent,
  toRegistration,
  toServiceRequest,
} from './postgres-store.js';
