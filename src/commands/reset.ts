import { createInterface } from 'node:readline';
import { rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { dbPath, type Config } from '../config.js';
import { logger } from '../utils/logger.js';
import { STATE_FILE } from '../ingest/tracker.js';

export async function runReset(config: Config, opts: { yes: boolean }): Promise<void> {
  if (!opts.yes) {
    const confirmed = await confirm('This will delete the gene database and ingest state. Continue?');
    if (!confirmed) {
      logger.info('Aborted');
      return;
    }
  }

  const db = dbPath(config);
  // SQLite WAL mode keeps two side files next to the database
  const targets = [db, `${db}-wal`, `${db}-shm`, join(config.storage.data_dir, STATE_FILE)];
  for (const target of targets) {
    if (existsSync(target)) {
      rmSync(target);
      logger.info(`Removed ${target}`);
    }
  }

  logger.info('Reset complete');
}

function confirm(message: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    rl.question(`${message} [y/N] `, (answer) => {
      rl.close();
      resolve(answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes');
    });
  });
}
