export type {
  CampusEvent,
  Student,
  Registration,
  RegistrationStatus,
  ServiceRequest,
  RequestStatus,
} from './campus.js';
export { REGISTRATION_STATUSES, REQUEST_STATUSES, isRegistrationStatus } from './campus.js';
export {
  CampusError,
  DuplicateIdError,
  NotFoundError,
  InvalidTransitionError,
  ParseError,
} from './errors.js';
export type { CampusErrorCode, EntityKind } from './errors.js';
export type { TimeInterval } from './time.js';
export {
  parseCalendarDate,
  parseTimeOfDay,
  formatTimeOfDay,
  isCalendarDate,
  isTimeOfDay,
} from './time.js';
export { timesOverlap, intervalsOverlap } from './overlap.js';
export { detectConflicts, slotsConflict, slotInterval } from './conflicts.js';
export type { ScheduleSlot } from './conflicts.js';
export { allocateSeat, parseSeatCount } from './seat-allocation.js';
export {
  REQUEST_TRANSITIONS,
  INITIAL_REQUEST_STATUS,
  isRequestStatus,
  canTransition,
  assertTransition,
} from './request-status.js';
