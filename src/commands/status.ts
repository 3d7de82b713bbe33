import { existsSync } from 'node:fs';
import { dbPath, type Config } from '../config.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';
import { Tracker } from '../ingest/tracker.js';
import { TABLE_NAMES } from '../storage/schema.js';
import { GeneStore } from '../storage/store.js';

export async function runStatus(config: Config): Promise<void> {
  const tracker = new Tracker(config.storage.data_dir);
  await tracker.load();
  const state = tracker.getStats();

  console.log('\n=== genekb status ===\n');
  console.log(`Sources ingested: ${state.sourceCount} (KGML ${state.byKind.kgml}, GAF ${state.byKind.gaf}, OBO ${state.byKind.obo})`);
  console.log(`Last ingest:      ${state.lastIngest || 'never'}`);

  const path = dbPath(config);
  if (!existsSync(path)) {
    console.log(`\nDatabase: not created yet (${path})\n`);
    return;
  }

  const store = new GeneStore({ path, readonly: true });
  try {
    store.open();
    const counts = store.getCounts();
    console.log(`\nDatabase: ${path}`);
    for (const table of TABLE_NAMES) {
      console.log(`  ${table.padEnd(22)} ${counts[table]}`);
    }
    const orphans = store.countOrphans();
    if (orphans > 0) console.log(`  orphaned association rows: ${orphans}`);
  } catch (err) {
    logger.warn(`Could not open database: ${errorMessage(err)}`);
    console.log('\nDatabase: not available');
  } finally {
    store.close();
  }

  console.log('');
}
