import { type Config, type KgmlSource } from '../config.js';
import { ParseError, ValidationError, errorMessage } from '../errors.js';
import { GafReader } from '../parsers/gaf.js';
import { parseKgmlFile } from '../parsers/kgml.js';
import { readOboTerms } from '../parsers/obo.js';
import { type TableCounts } from '../storage/schema.js';
import { type GeneStore } from '../storage/store.js';
import { logger } from '../utils/logger.js';
import { crawlKgml } from './crawler.js';
import { hashFile, type SourceKind, type Tracker } from './tracker.js';

const log = logger.child('ingest');

export interface IngestSources {
  kgml: KgmlSource[];
  gaf?: string | null;
  obo?: string | null;
}

export interface IngestOptions {
  /** Re-ingest sources the tracker has already seen with the same content. */
  force?: boolean;
  /** Keep GAF annotations qualified with NOT. */
  includeNegated?: boolean;
  tracker?: Tracker;
}

export type FileStatus = 'ingested' | 'unchanged' | 'failed';

export interface FileReport {
  path: string;
  kind: SourceKind;
  status: FileStatus;
  /** Rows written by this run; insert-or-ignore hits are not counted. */
  rows: number;
  /** GAF lines dropped as malformed. */
  skippedLines?: number;
  /** GAF annotations dropped for a NOT qualifier. */
  negated?: number;
  error?: string;
}

export interface IngestReport {
  files: FileReport[];
  failed: number;
  counts: TableCounts;
}

/**
 * Loads KGML, GAF and OBO sources into a store. Each file is applied in its
 * own transaction: a file that fails to parse or violates referential
 * integrity leaves nothing behind, and the remaining files still load.
 */
export class IngestPipeline {
  private readonly store: GeneStore;
  private readonly opts: IngestOptions;
  // Ids committed during this run; lets repeated genes and terms skip the insert
  private readonly knownGenes = new Set<string>();
  private readonly knownGoTerms = new Set<string>();

  constructor(store: GeneStore, opts: IngestOptions = {}) {
    this.store = store;
    this.opts = opts;
  }

  async run(sources: IngestSources): Promise<IngestReport> {
    const files: FileReport[] = [];

    // Term names first, so GAF-created terms land with descriptions
    if (sources.obo) files.push(await this.ingestObo(sources.obo));

    for (let i = 0; i < sources.kgml.length; i++) {
      files.push(await this.ingestKgml(sources.kgml[i]));
      logger.progress(i + 1, sources.kgml.length, 'KGML files');
    }

    if (sources.gaf) files.push(await this.ingestGaf(sources.gaf));

    if (this.opts.tracker) await this.opts.tracker.save();

    const failed = files.filter(f => f.status === 'failed').length;
    const counts = this.store.getCounts();
    log.info(`Ingested ${files.length - failed}/${files.length} sources; ${counts.genes} genes, ${counts.pathways} pathways, ${counts.go_terms} GO terms`);
    return { files, failed, counts };
  }

  async ingestKgml(source: KgmlSource): Promise<FileReport> {
    return this.ingestFile(source.path, 'kgml', async () => {
      const doc = await parseKgmlFile(source.path, { disease: source.disease });
      const genes = new Set<string>();

      const rows = await this.store.withTransaction(() => {
        let written = Number(this.store.insertPathway(doc.pathway));
        for (const gene of doc.genes) {
          // A gene seen without a symbol may get one from a later map
          if ((gene.symbol || !this.knownGenes.has(gene.id)) && this.store.insertGene(gene)) written++;
          genes.add(gene.id);
        }
        for (const membership of doc.memberships) {
          if (this.store.insertMembership(membership)) written++;
        }
        for (const relation of doc.relations) {
          if (this.store.insertRelation(relation)) written++;
        }
        return written;
      });

      for (const id of genes) this.knownGenes.add(id);
      log.debug(
        `${doc.pathway.id}: ${doc.genes.length} genes, ${doc.relations.length} relations ` +
        `(${doc.skippedEntries} entries and ${doc.skippedRelations} relations without genes)`,
      );
      return { rows };
    });
  }

  async ingestGaf(filePath: string): Promise<FileReport> {
    return this.ingestFile(filePath, 'gaf', async () => {
      const reader = new GafReader(filePath, {
        onMalformed: (line, reason) => log.debug(`${filePath}:${line} skipped: ${reason}`),
      });
      const genes = new Set<string>();
      const terms = new Set<string>();
      let negated = 0;

      const rows = await this.store.withTransaction(async () => {
        let written = 0;
        for await (const record of reader) {
          if (record.negated && !this.opts.includeNegated) {
            negated++;
            continue;
          }
          if (!this.knownGenes.has(record.geneId) && !genes.has(record.geneId)) {
            if (this.store.insertGene({ id: record.geneId, symbol: record.geneId, name: record.objectName })) written++;
            genes.add(record.geneId);
          }
          if (!this.knownGoTerms.has(record.goId) && !terms.has(record.goId)) {
            if (this.store.insertGoTerm({ id: record.goId, namespace: record.namespace, description: null })) written++;
            terms.add(record.goId);
          }
          if (this.store.insertGoAssociation({ geneId: record.geneId, goId: record.goId })) written++;
        }
        return written;
      });

      for (const id of genes) this.knownGenes.add(id);
      for (const id of terms) this.knownGoTerms.add(id);

      const { skipped, records } = reader.stats;
      if (skipped > 0) log.warn(`${filePath}: skipped ${skipped} malformed lines`);
      log.debug(`${filePath}: ${records} annotations, ${negated} negated`);
      return { rows, skippedLines: skipped, negated };
    });
  }

  async ingestObo(filePath: string): Promise<FileReport> {
    return this.ingestFile(filePath, 'obo', async () => {
      const terms = new Set<string>();
      const rows = await this.store.withTransaction(async () => {
        let written = 0;
        for await (const term of readOboTerms(filePath)) {
          if (this.store.describeGoTerm({ id: term.id, namespace: term.namespace, description: term.name })) written++;
          terms.add(term.id);
        }
        return written;
      });
      for (const id of terms) this.knownGoTerms.add(id);
      return { rows };
    });
  }

  private async ingestFile(
    filePath: string,
    kind: SourceKind,
    work: () => Promise<Omit<FileReport, 'path' | 'kind' | 'status'>>,
  ): Promise<FileReport> {
    const tracker = this.opts.tracker;
    try {
      const hash = tracker ? await hashFile(filePath) : null;
      if (tracker && hash && !this.opts.force && tracker.isIngested(filePath, hash)) {
        log.info(`Unchanged, skipping: ${filePath}`);
        return { path: filePath, kind, status: 'unchanged', rows: 0 };
      }

      const result = await work();
      if (tracker && hash) tracker.markIngested(filePath, kind, hash, result.rows);
      log.info(`Loaded ${kind.toUpperCase()} ${filePath} (${result.rows} new rows)`);
      return { path: filePath, kind, status: 'ingested', ...result };
    } catch (err) {
      if (err instanceof ParseError) {
        log.error(`Parse error, skipping file: ${err.withFile(filePath).toString()}`);
      } else if (err instanceof ValidationError) {
        log.error(`Integrity violation, rolled back ${filePath}: ${err.toString()}`);
      } else {
        log.error(`Failed to ingest ${filePath}: ${errorMessage(err)}`);
      }
      return { path: filePath, kind, status: 'failed', rows: 0, error: errorMessage(err) };
    }
  }
}

/**
 * Sources named by the configuration: the explicit KGML list (which may carry
 * disease labels) followed by any further files found under `kgml_dirs`.
 */
export async function resolveSources(config: Config): Promise<IngestSources> {
  const kgml: KgmlSource[] = [...config.sources.kgml];
  const seen = new Set(kgml.map(s => s.path));

  for await (const path of crawlKgml(config.sources.kgml_dirs, config.sources.ignore)) {
    if (seen.has(path)) continue;
    seen.add(path);
    kgml.push({ path });
  }

  return { kgml, gaf: config.sources.gaf, obo: config.sources.obo };
}
