import { open } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { GoNamespaces, type GoAspect, type GoNamespace } from '../storage/schema.js';

const COMMENT_PREFIX = '!';
// GAF 2.0 lines may stop after column 15; 2.1 and 2.2 carry 17
const MIN_COLUMNS = 15;
const MAX_COLUMNS = 17;
const GO_ID_PATTERN = /^GO:\d{7}$/;

export interface GafRecord {
  /** DB_Object_Symbol, the gene key shared with KGML graphics symbols. */
  geneId: string;
  objectId: string;
  objectName: string | null;
  qualifier: string;
  negated: boolean;
  goId: string;
  namespace: GoNamespace;
  evidenceCode: string;
  lineNumber: number;
}

export interface GafStats {
  lines: number;
  comments: number;
  records: number;
  skipped: number;
}

export type GafLine =
  | { kind: 'comment' }
  | { kind: 'record'; record: GafRecord }
  | { kind: 'malformed'; reason: string };

function isAspect(value: string): value is GoAspect {
  return value in GoNamespaces;
}

/** Classify one line of a GAF file. */
export function parseGafLine(line: string, lineNumber = 0): GafLine {
  if (line.trim() === '' || line.startsWith(COMMENT_PREFIX)) return { kind: 'comment' };

  const cols = line.replace(/\r$/, '').split('\t');
  if (cols.length < MIN_COLUMNS || cols.length > MAX_COLUMNS) {
    return { kind: 'malformed', reason: `expected ${MIN_COLUMNS}-${MAX_COLUMNS} columns, got ${cols.length}` };
  }

  const [, objectId, symbol, qualifier, goId, , evidenceCode, , aspect, objectName] = cols.map(c => c.trim());
  if (!symbol) return { kind: 'malformed', reason: 'empty DB_Object_Symbol' };
  if (!GO_ID_PATTERN.test(goId)) return { kind: 'malformed', reason: `invalid GO id "${goId}"` };
  if (!isAspect(aspect)) return { kind: 'malformed', reason: `invalid aspect "${aspect}"` };

  return {
    kind: 'record',
    record: {
      geneId: symbol,
      objectId,
      objectName: objectName || null,
      qualifier,
      negated: qualifier.split('|').includes('NOT'),
      goId,
      namespace: GoNamespaces[aspect],
      evidenceCode,
      lineNumber,
    },
  };
}

/**
 * Lazy reader over a GAF file. Every iteration re-opens the file and starts
 * from the first line, so the same reader yields the same sequence each time.
 * `stats` describes the most recent iteration.
 */
export class GafReader implements AsyncIterable<GafRecord> {
  readonly filePath: string;
  private current: GafStats = emptyStats();
  private readonly onMalformed?: (lineNumber: number, reason: string) => void;

  constructor(filePath: string, opts: { onMalformed?: (lineNumber: number, reason: string) => void } = {}) {
    this.filePath = filePath;
    this.onMalformed = opts.onMalformed;
  }

  get stats(): Readonly<GafStats> {
    return this.current;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<GafRecord> {
    const stats = emptyStats();
    this.current = stats;

    // Opened up front so a missing file rejects instead of stalling readline
    const handle = await open(this.filePath, 'r');
    const input = handle.createReadStream({ encoding: 'utf-8' });
    const rl = createInterface({ input, crlfDelay: Infinity });

    try {
      for await (const line of rl) {
        stats.lines++;
        const parsed = parseGafLine(line, stats.lines);
        if (parsed.kind === 'comment') {
          stats.comments++;
        } else if (parsed.kind === 'malformed') {
          stats.skipped++;
          this.onMalformed?.(stats.lines, parsed.reason);
        } else {
          stats.records++;
          yield parsed.record;
        }
      }
    } finally {
      rl.close();
      input.destroy();
    }
  }
}

function emptyStats(): GafStats {
  return { lines: 0, comments: 0, records: 0, skipped: 0 };
}
