#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, type Config } from './config.js';
import { errorMessage } from './errors.js';
import { logger, setLogLevel } from './utils/logger.js';
import { QUERY_TOOLS, isQueryTool } from './commands/query.js';

const program: Command = new Command();

program
  .name('genekb')
  .description('Load KEGG pathways and GO annotations into SQLite and serve gene query tools over MCP')
  .version('0.1.0')
  .option('-c, --config <path>', 'path to config YAML file')
  .option('-v, --verbose', 'enable debug logging');

function setup(): Config {
  const opts = program.opts<{ config?: string; verbose?: boolean }>();
  const config = loadConfig(opts.config);
  setLogLevel(opts.verbose ? 'debug' : config.log_level);
  return config;
}

function parseDepth(value: string): number {
  const depth = Number.parseInt(value, 10);
  if (!Number.isInteger(depth) || depth < 1) {
    throw new InvalidArgumentError('depth must be a positive integer');
  }
  return depth;
}

program
  .command('ingest')
  .description('Parse KGML and GAF sources into the database')
  .argument('[kgml...]', 'KGML files to ingest (overrides config)')
  .option('--gaf <file>', 'GAF file (overrides config)')
  .option('--obo <file>', 'GO ontology file for term descriptions (overrides config)')
  .option('--force', 're-ingest sources that have not changed')
  .option('--dry-run', 'list sources that would be ingested')
  .action(async (kgml: string[], opts: { gaf?: string; obo?: string; force?: boolean; dryRun?: boolean }) => {
    const config = setup();
    const { runIngest } = await import('./commands/ingest.js');
    await runIngest(config, {
      kgml,
      gaf: opts.gaf,
      obo: opts.obo,
      force: opts.force ?? false,
      dryRun: opts.dryRun ?? false,
    });
  });

program
  .command('query')
  .description(`Run a query tool and print JSON (${QUERY_TOOLS.join(', ')})`)
  .argument('<tool>', `one of: ${QUERY_TOOLS.join(', ')}`)
  .argument('<gene_id>', 'KEGG gene id or gene symbol')
  .option('-d, --depth <n>', 'hops for downstream analysis', parseDepth)
  .action(async (tool: string, geneId: string, opts: { depth?: number }) => {
    if (!isQueryTool(tool)) {
      program.error(`Unknown tool "${tool}". Expected one of: ${QUERY_TOOLS.join(', ')}`);
    }
    const config = setup();
    const { runQuery } = await import('./commands/query.js');
    runQuery(config, tool, geneId, opts);
  });

program
  .command('serve')
  .description('Start the MCP server (stdio transport)')
  .action(async () => {
    const config = setup();
    const { runServe } = await import('./commands/serve.js');
    await runServe(config);
  });

program
  .command('status')
  .description('Show table row counts and ingested sources')
  .action(async () => {
    const config = setup();
    const { runStatus } = await import('./commands/status.js');
    await runStatus(config);
  });

program
  .command('reset')
  .description('Delete the database and ingest state')
  .option('--yes', 'skip confirmation prompt')
  .action(async (opts: { yes?: boolean }) => {
    const config = setup();
    const { runReset } = await import('./commands/reset.js');
    await runReset(config, { yes: opts.yes ?? false });
  });

program.parseAsync().catch((err: unknown) => {
  logger.error(errorMessage(err));
  process.exit(1);
});
