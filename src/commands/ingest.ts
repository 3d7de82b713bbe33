import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { dbPath, type Config } from '../config.js';
import { logger } from '../utils/logger.js';
import { GeneStore } from '../storage/store.js';
import { IngestPipeline, resolveSources, type IngestReport } from '../ingest/pipeline.js';
import { Tracker } from '../ingest/tracker.js';

export interface IngestCommandOptions {
  /** KGML files given on the command line replace the configured list. */
  kgml: string[];
  gaf?: string;
  obo?: string;
  force: boolean;
  dryRun: boolean;
}

export async function runIngest(config: Config, opts: IngestCommandOptions): Promise<IngestReport | null> {
  const sources = await resolveSources(config);
  if (opts.kgml.length > 0) sources.kgml = opts.kgml.map(p => ({ path: resolve(p) }));
  if (opts.gaf) sources.gaf = resolve(opts.gaf);
  if (opts.obo) sources.obo = resolve(opts.obo);

  const missing = [
    ...sources.kgml.map(s => s.path),
    ...(sources.gaf ? [sources.gaf] : []),
    ...(sources.obo ? [sources.obo] : []),
  ].filter(p => !existsSync(p));
  for (const p of missing) logger.warn(`Source file does not exist: ${p}`);

  if (sources.kgml.length === 0 && !sources.gaf) {
    logger.error('No KGML or GAF sources configured');
    process.exitCode = 1;
    return null;
  }

  if (opts.dryRun) {
    logger.info('Would ingest these sources:');
    if (sources.obo) console.log(`  OBO   ${sources.obo}`);
    for (const s of sources.kgml) console.log(`  KGML  ${s.path}${s.disease ? `  (${s.disease})` : ''}`);
    if (sources.gaf) console.log(`  GAF   ${sources.gaf}`);
    return null;
  }

  const tracker = new Tracker(config.storage.data_dir);
  await tracker.load();

  const store = new GeneStore({ path: dbPath(config) }).open();
  try {
    const pipeline = new IngestPipeline(store, {
      tracker,
      force: opts.force,
      includeNegated: config.ingest.include_negated,
    });
    const report = await pipeline.run(sources);

    logger.info('\nIngest complete!');
    logger.info(`  Genes:                ${report.counts.genes}`);
    logger.info(`  Pathways:             ${report.counts.pathways}`);
    logger.info(`  Gene-pathway links:   ${report.counts.gene_pathways}`);
    logger.info(`  GO terms:             ${report.counts.go_terms}`);
    logger.info(`  Gene-GO annotations:  ${report.counts.gene_go_associations}`);
    logger.info(`  Gene relations:       ${report.counts.gene_relations}`);
    if (report.failed > 0) {
      logger.warn(`  Failed sources:       ${report.failed}`);
      process.exitCode = 1;
    }
    return report;
  } finally {
    store.close();
  }
}
