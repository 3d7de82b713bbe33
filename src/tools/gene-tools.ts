import { type GeneStore } from '../storage/store.js';
import { logger } from '../utils/logger.js';

const log = logger.child('tools');

/** Joins edge labels along a multi-hop path. */
export const PATH_SEPARATOR = ' > ';

export interface DiseaseResult {
  diseases: string[];
}

export interface GoTermResult {
  go_terms: Array<{ id: string; description: string }>;
}

export interface DownstreamRelation {
  gene_id: string;
  /** Edge labels from the seed to this gene, joined by " > ". */
  relation_type: string;
  path_depth: number;
  /** The gene this one was reached from. */
  via: string;
}

export interface DownstreamResult {
  relations: DownstreamRelation[];
}

export interface DownstreamOptions {
  depth?: number;
  /** Hard cap on depth, whatever the caller asks for. */
  maxDepth?: number;
}

export const DEFAULT_DEPTH = 1;
export const DEFAULT_MAX_DEPTH = 5;

/**
 * Gene ids a caller's identifier refers to. Unknown or blank identifiers
 * resolve to nothing; that is an answer, not a failure.
 */
export function resolveGene(store: GeneStore, geneId: string): string[] {
  const normalized = geneId.trim();
  if (!normalized) return [];
  const ids = store.resolveGeneIds(normalized);
  if (ids.length === 0) log.debug(`No gene matches "${normalized}"`);
  return ids;
}

/** Distinct disease labels carried by the pathways the gene belongs to. */
export function geneDiseaseAssociation(store: GeneStore, geneId: string): DiseaseResult {
  return { diseases: store.diseasesForGenes(resolveGene(store, geneId)) };
}

/** Distinct GO terms annotated to the gene. Terms without a name are described by their namespace. */
export function geneGoTerms(store: GeneStore, geneId: string): GoTermResult {
  const terms = store.goTermsForGenes(resolveGene(store, geneId));
  return {
    go_terms: terms.map(t => ({ id: t.id, description: t.description ?? t.namespace })),
  };
}

export function clampDepth(depth: number | undefined, maxDepth = DEFAULT_MAX_DEPTH): number {
  if (depth === undefined || !Number.isFinite(depth)) return Math.min(DEFAULT_DEPTH, maxDepth);
  return Math.min(Math.max(1, Math.floor(depth)), Math.max(1, maxDepth));
}

/**
 * Breadth-first walk over outgoing interaction edges from the gene.
 *
 * Each gene is reported once, at the depth it is first reached; the seed
 * genes are never reported. Edges are followed in (target, relation type)
 * order, so when two edges reach the same gene at the same depth the first
 * in that order supplies the label.
 */
export function downstreamAnalysis(
  store: GeneStore,
  geneId: string,
  opts: DownstreamOptions = {},
): DownstreamResult {
  const seeds = resolveGene(store, geneId);
  if (seeds.length === 0) return { relations: [] };

  const depth = clampDepth(opts.depth, opts.maxDepth);
  const visited = new Set<string>(seeds);
  const labels = new Map<string, string>(seeds.map(s => [s, '']));
  const relations: DownstreamRelation[] = [];

  let frontier = seeds;
  for (let level = 1; level <= depth && frontier.length > 0; level++) {
    const next: string[] = [];
    const edges = store.outgoingRelations(frontier);
    // Process by target so the first label per target is deterministic across sources
    edges.sort((a, b) =>
      compare(a.targetGeneId, b.targetGeneId)
      || compare(a.relationType, b.relationType)
      || compare(a.sourceGeneId, b.sourceGeneId));

    for (const edge of edges) {
      if (visited.has(edge.targetGeneId)) continue;
      visited.add(edge.targetGeneId);

      const prefix = labels.get(edge.sourceGeneId) ?? '';
      const label = prefix ? `${prefix}${PATH_SEPARATOR}${edge.relationType}` : edge.relationType;
      labels.set(edge.targetGeneId, label);

      relations.push({
        gene_id: edge.targetGeneId,
        relation_type: label,
        path_depth: level,
        via: edge.sourceGeneId,
      });
      next.push(edge.targetGeneId);
    }
    frontier = next;
  }

  return { relations };
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
