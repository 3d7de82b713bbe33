import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { type GeneStore } from '../storage/store.js';
import { downstreamAnalysis, geneDiseaseAssociation, geneGoTerms } from '../tools/gene-tools.js';
import { errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('mcp');

export const ToolNames = {
  GeneDiseaseAssociation: 'gene_disease_association',
  GeneGoTerms: 'gene_go_terms',
  DownstreamAnalysis: 'downstream_analysis',
} as const;

export interface ToolDefaults {
  defaultDepth: number;
  maxDepth: number;
}

const geneIdParam = z.string().describe('Gene identifier: a KEGG gene id (e.g. "hsa:5594") or a gene symbol (e.g. "MAPK1")');

function jsonResult(value: unknown): CallToolResult {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

// Unknown genes answer with empty lists; only unexpected failures become tool errors
function run(tool: string, fn: () => unknown): CallToolResult {
  try {
    return jsonResult(fn());
  } catch (err) {
    log.error(`${tool} failed: ${errorMessage(err)}`);
    return {
      content: [
        {
          type: 'text' as const,
          text: `Tool error: ${errorMessage(err)}`,
        },
      ],
      isError: true,
    };
  }
}

export function registerTools(server: McpServer, store: GeneStore, defaults: ToolDefaults): void {
  server.registerTool(
    ToolNames.GeneDiseaseAssociation,
    {
      description: 'List diseases linked to a gene through the KEGG pathways it belongs to. Returns {"diseases": [...]}, empty when nothing is known.',
      inputSchema: {
        gene_id: geneIdParam,
      },
    },
    async ({ gene_id }) => run(ToolNames.GeneDiseaseAssociation, () => geneDiseaseAssociation(store, gene_id)),
  );

  server.registerTool(
    ToolNames.GeneGoTerms,
    {
      description: 'List Gene Ontology terms annotated to a gene. Returns {"go_terms": [{"id", "description"}]}, empty when nothing is known.',
      inputSchema: {
        gene_id: geneIdParam,
      },
    },
    async ({ gene_id }) => run(ToolNames.GeneGoTerms, () => geneGoTerms(store, gene_id)),
  );

  server.registerTool(
    ToolNames.DownstreamAnalysis,
    {
      description:
        'Find genes downstream of a gene in KEGG interaction graphs (activation, inhibition, binding, ...). ' +
        `Returns {"relations": [{"gene_id", "relation_type", "path_depth", "via"}]}. Depth defaults to ${defaults.defaultDepth} (direct neighbours), at most ${defaults.maxDepth}.`,
      inputSchema: {
        gene_id: geneIdParam,
        depth: z.number().int().min(1).max(defaults.maxDepth).optional()
          .describe(`Number of interaction hops to follow (default ${defaults.defaultDepth})`),
      },
    },
    async ({ gene_id, depth }) => run(ToolNames.DownstreamAnalysis, () =>
      downstreamAnalysis(store, gene_id, { depth: depth ?? defaults.defaultDepth, maxDepth: defaults.maxDepth })),
  );
}
