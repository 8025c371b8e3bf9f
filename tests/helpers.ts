import pino from 'pino';
import type { Logger } from 'pino';
import { CampusSystem } from '../src/application/index.js';
import type { NewEventInput } from '../src/application/index.js';
import type { CampusEvent, Student } from '../src/domain/index.js';
import { InMemoryCampusStore } from '../src/infrastructure/store/index.js';

/** Fixed "now" for deterministic timestamps. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();

/** Clock that starts at FIXED_NOW and advances one minute per call. */
export function steppingClock(): () => Date {
  let tick = 0;
  return () => new Date(FIXED_NOW + 60_000 * tick++);
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Factory for event inputs with sensible defaults.
 * Defaults describe a 10:00–12:00 session at Seminar Hall on 2025-09-20.
 */
export function makeEventInput(overrides: Partial<NewEventInput> = {}): NewEventInput {
  return {
    event_id: overrides.event_id ?? 'E101',
    title: overrides.title ?? 'AI Workshop',
    organizer: overrides.organizer ?? 'AI Club',
    date: overrides.date ?? '2025-09-20',
    start_time: overrides.start_time ?? '10:00',
    end_time: overrides.end_time ?? '12:00',
    venue: overrides.venue ?? 'Seminar Hall',
    max_seats: overrides.max_seats ?? 50,
  };
}

/** A stored event: input defaults plus validity. */
export function makeEvent(overrides: Partial<CampusEvent> = {}): CampusEvent {
  return {
    ...makeEventInput(overrides),
    is_valid: overrides.is_valid ?? true,
    violations: overrides.violations ?? [],
  };
}

export function makeStudent(overrides: Partial<Student> = {}): Student {
  return {
    student_id: overrides.student_id ?? 'S01',
    name: overrides.name ?? 'Test Student',
    dept: overrides.dept ?? 'CSE',
    year: overrides.year ?? 2,
    contact: overrides.contact ?? 'student@example.com',
  };
}

export interface TestSystem {
  system: CampusSystem;
  store: InMemoryCampusStore;
  log: Logger;
}

/** CampusSystem over a fresh in-memory store, silent logger and stepping clock. */
export function createTestSystem(): TestSystem {
  const store = new InMemoryCampusStore();
  const log = silentLogger();
  const system = new CampusSystem({ store, log, now: steppingClock() });
  return { system, store, log };
}
