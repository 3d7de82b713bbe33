import { dbPath, type Config } from '../config.js';
import { GeneStore } from '../storage/store.js';
import { downstreamAnalysis, geneDiseaseAssociation, geneGoTerms } from '../tools/gene-tools.js';

export const QUERY_TOOLS = ['diseases', 'go-terms', 'downstream'] as const;
export type QueryTool = (typeof QUERY_TOOLS)[number];

export function isQueryTool(value: string): value is QueryTool {
  return QUERY_TOOLS.some(tool => tool === value);
}

/** Run one query tool against the store and print its JSON result on stdout. */
export function runQuery(config: Config, tool: QueryTool, geneId: string, opts: { depth?: number }): void {
  const store = new GeneStore({ path: dbPath(config), readonly: true }).open();
  try {
    let result: unknown;
    switch (tool) {
      case 'diseases':
        result = geneDiseaseAssociation(store, geneId);
        break;
      case 'go-terms':
        result = geneGoTerms(store, geneId);
        break;
      case 'downstream':
        result = downstreamAnalysis(store, geneId, {
          depth: opts.depth ?? config.query.default_depth,
          maxDepth: config.query.max_depth,
        });
        break;
    }
    console.log(JSON.stringify(result, null, 2));
  } finally {
    store.close();
  }
}
