import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { loadSeedDataset, seedDataset } from '../../src/application/index.js';
import type { CampusSystem } from '../../src/application/index.js';
import { createTestSystem } from '../helpers.js';

describe('seed dataset', () => {
  let system: CampusSystem;

  beforeEach(() => {
    ({ system } = createTestSystem());
  });

  it('loads the bundled dataset', () => {
    const dataset = loadSeedDataset();

    expect(dataset.students).toHaveLength(10);
    expect(dataset.events.map((e) => e.event_id)).toEqual(['E101', 'E102', 'E103', 'E104', 'E105', 'E201']);
    expect(dataset.requests[0]?.description).toBe('');
  });

  it('inserts everything once and skips existing ids on a second run', async () => {
    const dataset = loadSeedDataset();

    expect(await seedDataset(system, dataset)).toEqual({ students: 10, events: 6, registrations: 8, requests: 3 });
    expect(await seedDataset(system, dataset)).toEqual({ students: 0, events: 0, registrations: 0, requests: 0 });
    expect(await system.listEvents()).toHaveLength(6);
  });

  it('reproduces the overlap, waitlist and request scenarios', async () => {
    await seedDataset(system, loadSeedDataset());

    expect(await system.conflictReport()).toEqual([{ event_id: 'E102', violations: ['E101'] }]);

    const tiny = await system.eventSummary('E201');
    expect(tiny).toMatchObject({ seats: 1, confirmed: 1, waitlisted: 1, status: 'Valid' });

    const workshop = await system.eventSummary('E101');
    expect(workshop).toMatchObject({ confirmed: 3, waitlisted: 0 });

    const report = await system.serviceRequestReport();
    expect(report.counts).toEqual({ 'Open': 1, 'In-Progress': 1, 'Resolved': 1 });
    expect(report.examples['In-Progress']).toEqual([{ request_id: 'R002', category: 'Library Access' }]);
  });

  it('keeps the dataset timestamps on requests', async () => {
    await seedDataset(system, loadSeedDataset());

    const [first] = await system.listServiceRequests();
    expect(first?.request_id).toBe('R001');
    expect(first?.created_at.toISOString()).toBe('2025-09-18T09:00:00.000Z');
  });

  describe('invalid files', () => {
    const dir = mkdtempSync(join(tmpdir(), 'campus-seed-'));

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('rejects a dataset that fails validation', () => {
      const path = join(dir, 'bad.json');
      writeFileSync(path, JSON.stringify({ students: [], events: [{ event_id: 'E1' }], registrations: [], requests: [] }));

      expect(() => loadSeedDataset(path)).toThrow();
    });

    it('rejects a file that is not JSON', () => {
      const path = join(dir, 'broken.json');
      writeFileSync(path, '{ not json');

      expect(() => loadSeedDataset(path)).toThrow(SyntaxError);
    });
  });
});
