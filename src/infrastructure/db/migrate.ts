import type { BaseLogger } from 'pino';
import type { Sql } from './client.js';

/**
 * Creates the campus tables if they are missing.
 *
 * drizzle-kit (see drizzle.config.ts) generates proper migrations from
 * `schema.ts`; this keeps a fresh local database usable on first run.
 */
export async function ensureSchema(sql: Sql, log: BaseLogger): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS campus_events (
      seq           SERIAL       NOT NULL,
      event_id      VARCHAR(64)  PRIMARY KEY,
      title         VARCHAR(255) NOT NULL,
      organizer     VARCHAR(255) NOT NULL,
      event_date    DATE         NOT NULL,
      start_time    VARCHAR(5)   NOT NULL,
      end_time      VARCHAR(5)   NOT NULL,
      start_minute  INTEGER      NOT NULL,
      end_minute    INTEGER      NOT NULL,
      venue         VARCHAR(255) NOT NULL,
      max_seats     INTEGER      NOT NULL,
      is_valid      BOOLEAN      NOT NULL,
      violations    JSONB        NOT NULL DEFAULT '[]',
      created_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS students (
      seq         SERIAL       NOT NULL,
      student_id  VARCHAR(64)  PRIMARY KEY,
      name        VARCHAR(255) NOT NULL,
      dept        VARCHAR(255) NOT NULL,
      year        INTEGER      NOT NULL,
      contact     VARCHAR(255) NOT NULL
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS registrations (
      seq            SERIAL       NOT NULL,
      student_id     VARCHAR(64)  NOT NULL,
      event_id       VARCHAR(64)  NOT NULL,
      status         VARCHAR(20)  NOT NULL,
      registered_at  TIMESTAMPTZ  NOT NULL
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS service_requests (
      seq          SERIAL        NOT NULL,
      request_id   VARCHAR(64)   PRIMARY KEY,
      student_id   VARCHAR(64)   NOT NULL,
      category     VARCHAR(255)  NOT NULL,
      location     VARCHAR(255)  NOT NULL,
      description  VARCHAR(2000) NOT NULL DEFAULT '',
      status       VARCHAR(20)   NOT NULL,
      created_at   TIMESTAMPTZ   NOT NULL,
      updated_at   TIMESTAMPTZ   NOT NULL
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_campus_events_slot ON campus_events (event_date, venue)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_campus_events_seq ON campus_events (seq)`);
  await sql.unsafe(`CREATE UNIQUE INDEX IF NOT EXISTS uq_registrations_student_event ON registrations (student_id, event_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_registrations_event_status ON registrations (event_id, status)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_service_requests_created_at ON service_requests (created_at, seq)`);

  log.info('Database ready (campus_events + students + registrations + service_requests)');
}
