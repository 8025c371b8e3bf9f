/**
 * Error taxonomy for the campus core.
 *
 * Every error carries a stable `code` so the HTTP layer (and any other
 * caller) can map it without string matching on messages.
 */

export type CampusErrorCode =
  | 'DUPLICATE_ID'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'PARSE_ERROR';

/** Entities addressed by identity in the campus registry. */
export type EntityKind = 'event' | 'student' | 'registration' | 'request';

export abstract class CampusError extends Error {
  abstract readonly code: CampusErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Identity collision on insert. */
export class DuplicateIdError extends CampusError {
  readonly code = 'DUPLICATE_ID' as const;

  constructor(
    readonly entity: EntityKind,
    readonly id: string,
  ) {
    super(`${entity} already exists: ${id}`);
  }
}

/** Reference to an event, student or request that does not exist. */
export class NotFoundError extends CampusError {
  readonly code = 'NOT_FOUND' as const;

  constructor(
    readonly entity: EntityKind,
    readonly id: string,
  ) {
    super(`Unknown ${entity}: ${id}`);
  }
}

/** Illegal service-request status change. Names both ends of the transition. */
export class InvalidTransitionError extends CampusError {
  readonly code = 'INVALID_TRANSITION' as const;

  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super(`Invalid status transition: ${from} -> ${to}`);
  }
}

/** Malformed date, time or seat-count input. */
export class ParseError extends CampusError {
  readonly code = 'PARSE_ERROR' as const;

  constructor(
    readonly input: string,
    readonly expected: string,
  ) {
    super(`Invalid ${expected}: "${input}"`);
  }
}
