import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { DuplicateIdError } from '../domain/index.js';
import type { CampusSystem } from './campus-system.js';
import {
  eventInputSchema,
  studentInputSchema,
  registrationInputSchema,
  serviceRequestInputSchema,
} from './campus-schema.js';

export const DEFAULT_SEED_PATH = fileURLToPath(new URL('../../data/seed-dataset.json', import.meta.url));

const seedDatasetSchema = z.object({
  students: z.array(studentInputSchema),
  events: z.array(eventInputSchema),
  registrations: z.array(registrationInputSchema),
  requests: z.array(serviceRequestInputSchema.extend({
    created_at: z.string().datetime({ message: 'Must be a valid ISO-8601 datetime' }),
  })),
});

export type SeedDataset = z.infer<typeof seedDatasetSchema>;

export interface SeedCounts {
  students: number;
  events: number;
  registrations: number;
  requests: number;
}

/** Reads and validates a seed dataset file. Throws on unreadable or invalid content. */
export function loadSeedDataset(path: string = DEFAULT_SEED_PATH): SeedDataset {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return seedDatasetSchema.parse(raw);
}

/** Runs an insert, reporting false instead of throwing when the id is already taken. */
async function insertUnlessPresent(insert: () => Promise<unknown>): Promise<boolean> {
  try {
    await insert();
    return true;
  } catch (err: unknown) {
    if (err instanceof DuplicateIdError) return false;
    throw err;
  }
}

/**
 * Loads a dataset into the system in dependency order.
 *
 * Entries whose ids already exist are skipped, so seeding twice is
 * harmless. Any other failure aborts the seed.
 */
export async function seedDataset(system: CampusSystem, dataset: SeedDataset): Promise<SeedCounts> {
  const counts: SeedCounts = { students: 0, events: 0, registrations: 0, requests: 0 };

  for (const student of dataset.students) {
    if (await insertUnlessPresent(() => system.addStudent(student))) counts.students++;
  }

  for (const event of dataset.events) {
    if (await insertUnlessPresent(() => system.addEvent(event))) counts.events++;
  }

  for (const { student_id, event_id } of dataset.registrations) {
    if (await insertUnlessPresent(() => system.register(student_id, event_id))) counts.registrations++;
  }

  for (const request of dataset.requests) {
    const input = { ...request, created_at: new Date(request.created_at) };
    if (await insertUnlessPresent(() => system.raiseRequest(input))) counts.requests++;
  }

  return counts;
}
