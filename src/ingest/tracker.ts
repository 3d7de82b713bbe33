import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { createReadStream, existsSync } from 'node:fs';
import { createHash } from 'node:crypto';
import { join } from 'node:path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

const log = logger.child('tracker');

export const STATE_FILE = 'ingest-state.json';

const SourceEntrySchema = z.object({
  kind: z.enum(['kgml', 'gaf', 'obo']),
  hash: z.string(),
  ingestedAt: z.string(),
  rows: z.number().int().nonnegative(),
});

const IngestStateSchema = z.object({
  version: z.literal(1),
  sources: z.record(SourceEntrySchema),
  lastIngest: z.string().nullable(),
});

export type SourceKind = z.infer<typeof SourceEntrySchema>['kind'];
export type SourceEntry = z.infer<typeof SourceEntrySchema>;
type IngestState = z.infer<typeof IngestStateSchema>;

/** Content hash of a source file, streamed so large GAF files stay out of memory. */
export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * Remembers which source files were committed to the store, by content hash,
 * so each data source is loaded once.
 */
export class Tracker {
  private dataDir: string;
  private statePath: string;
  private state: IngestState;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
    this.statePath = join(this.dataDir, STATE_FILE);
    this.state = { version: 1, sources: {}, lastIngest: null };
  }

  async load(): Promise<void> {
    if (!existsSync(this.statePath)) return;

    try {
      const parsed = IngestStateSchema.safeParse(JSON.parse(await readFile(this.statePath, 'utf-8')));
      if (parsed.success) {
        this.state = parsed.data;
      } else {
        log.warn(`Ignoring invalid ingest state in ${this.statePath}`);
      }
    } catch (err) {
      log.warn(`Failed to load ingest state: ${err}`);
    }
  }

  async save(): Promise<void> {
    if (!existsSync(this.dataDir)) {
      await mkdir(this.dataDir, { recursive: true });
    }
    this.state.lastIngest = new Date().toISOString();
    await writeFile(this.statePath, JSON.stringify(this.state, null, 2));
  }

  isIngested(filePath: string, hash: string): boolean {
    return this.state.sources[filePath]?.hash === hash;
  }

  markIngested(filePath: string, kind: SourceKind, hash: string, rows: number): void {
    this.state.sources[filePath] = {
      kind,
      hash,
      ingestedAt: new Date().toISOString(),
      rows,
    };
  }

  getStats(): { sourceCount: number; byKind: Record<SourceKind, number>; lastIngest: string | null } {
    const byKind: Record<SourceKind, number> = { kgml: 0, gaf: 0, obo: 0 };
    for (const entry of Object.values(this.state.sources)) byKind[entry.kind]++;
    return {
      sourceCount: Object.keys(this.state.sources).length,
      byKind,
      lastIngest: this.state.lastIngest,
    };
  }
}
