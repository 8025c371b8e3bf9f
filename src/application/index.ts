export { CampusSystem } from './campus-system.js';
export type {
  CampusSystemOptions,
  NewEventInput,
  NewStudentInput,
  RaiseRequestInput,
} from './campus-system.js';
export type { CampusStore, StoreBackend } from './campus-store.js';
export { KeyedMutex } from './keyed-mutex.js';
export {
  eventInputSchema,
  studentInputSchema,
  registrationInputSchema,
  registrationQuerySchema,
  serviceRequestInputSchema,
  requestStatusUpdateSchema,
} from './campus-schema.js';
export type {
  EventInput,
  StudentInput,
  RegistrationInput,
  RegistrationQuery,
  ServiceRequestInput,
  RequestStatusUpdate,
} from './campus-schema.js';
export {
  summarizeEvent,
  buildEventSummary,
  buildAllEventSummaries,
  collectConflicts,
  summarizeServiceRequests,
} from './reports.js';
export type { EventSummary, ConflictEntry, ServiceRequestReport, RequestExample } from './reports.js';
export { formatEventSummary, formatConflictReport, formatServiceRequestReport } from './report-format.js';
export { seedDataset, loadSeedDataset, DEFAULT_SEED_PATH } from './seed.js';
export type { SeedDataset, SeedCounts } from './seed.js';
