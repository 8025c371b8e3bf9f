import {
  pgTable,
  serial,
  varchar,
  integer,
  boolean,
  date,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the campus registry.
 *
 * Every table carries a `seq` serial column: identity lives in the
 * natural `*_id` keys, `seq` only records insertion order.
 */

/**
 * `start_minute` / `end_minute` mirror `start_time` / `end_time` as
 * minutes since midnight so the overlap test runs in SQL.
 */
export const campusEvents = pgTable('campus_events', {
  seq: serial('seq').notNull(),
  event_id: varchar('event_id', { length: 64 }).primaryKey(),
  title: varchar('title', { length: 255 }).notNull(),
  organizer: varchar('organizer', { length: 255 }).notNull(),
  event_date: date('event_date', { mode: 'string' }).notNull(),
  start_time: varchar('start_time', { length: 5 }).notNull(),
  end_time: varchar('end_time', { length: 5 }).notNull(),
  start_minute: integer('start_minute').notNull(),
  end_minute: integer('end_minute').notNull(),
  venue: varchar('venue', { length: 255 }).notNull(),
  max_seats: integer('max_seats').notNull(),
  is_valid: boolean('is_valid').notNull(),
  violations: jsonb('violations').$type<string[]>().notNull().default([]),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_campus_events_slot').on(table.event_date, table.venue),
  index('idx_campus_events_seq').on(table.seq),
]);

export const students = pgTable('students', {
  seq: serial('seq').notNull(),
  student_id: varchar('student_id', { length: 64 }).primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  dept: varchar('dept', { length: 255 }).notNull(),
  year: integer('year').notNull(),
  contact: varchar('contact', { length: 255 }).notNull(),
});

/** One row per (student, event); a second registration for the pair is refused. */
export const registrations = pgTable('registrations', {
  seq: serial('seq').notNull(),
  student_id: varchar('student_id', { length: 64 }).notNull(),
  event_id: varchar('event_id', { length: 64 }).notNull(),
  status: varchar('status', { length: 20 }).notNull(),
  registered_at: timestamp('registered_at', { withTimezone: true }).notNull(),
}, (table) => [
  uniqueIndex('uq_registrations_student_event').on(table.student_id, table.event_id),
  index('idx_registrations_event_status').on(table.event_id, table.status),
]);

export const serviceRequests = pgTable('service_requests', {
  seq: serial('seq').notNull(),
  request_id: varchar('request_id', { length: 64 }).primaryKey(),
  student_id: varchar('student_id', { length: 64 }).notNull(),
  category: varchar('category', { length: 255 }).notNull(),
  location: varchar('location', { length: 255 }).notNull(),
  description: varchar('description', { length: 2000 }).notNull().default(''),
  status: varchar('status', { length: 20 }).notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull(),
}, (table) => [
  index('idx_service_requests_created_at').on(table.created_at, table.seq),
]);

export type CampusEventRow = typeof campusEvents.$inferSelect;
export type StudentRow = typeof students.$inferSelect;
export type RegistrationRow = typeof registrations.$inferSelect;
export type ServiceRequestRow = typeof serviceRequests.$inferSelect;
