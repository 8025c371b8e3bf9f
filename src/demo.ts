import {
  CampusSystem,
  formatConflictReport,
  formatEventSummary,
  formatServiceRequestReport,
  loadSeedDataset,
  seedDataset,
} from './application/index.js';
import { createCampusStore, createLogger, loadConfig } from './infrastructure/index.js';

/**
 * Seeds the sample dataset into the configured store and prints the
 * E101/E102 summaries, the conflict report and the request summary.
 *
 * Logging is held at `error` so stdout carries only the reports.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger('error');

  const store = await createCampusStore(config.store, log);
  const system = new CampusSystem({ store, log });

  try {
    await seedDataset(system, loadSeedDataset());

    const blocks = [
      formatEventSummary(await system.eventSummary('E101')),
      formatEventSummary(await system.eventSummary('E102')),
      formatConflictReport(await system.conflictReport()),
      formatServiceRequestReport(await system.serviceRequestReport()),
    ];

    process.stdout.write(`${blocks.join('\n\n')}\n`);
  } finally {
    await system.close();
  }
}

main().catch((err: unknown) => {
  console.error('Demo failed', err);
  process.exit(1);
});
