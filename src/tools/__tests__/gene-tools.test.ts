/**
 * Query tool tests, run against a store loaded from the fixture maps
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { fileURLToPath } from 'node:url';

import { GeneStore } from '../../storage/store.js';
import { IngestPipeline } from '../../ingest/pipeline.js';
import {
  clampDepth,
  downstreamAnalysis,
  geneDiseaseAssociation,
  geneGoTerms,
} from '../gene-tools.js';

const FIXTURES = fileURLToPath(new URL('../../../test/fixtures/', import.meta.url));

async function loadStore(dir: string, name: string, kgml: Array<{ path: string; disease?: string }>, withAnnotations: boolean): Promise<GeneStore> {
  const store = new GeneStore({ path: path.join(dir, name) }).open();
  await new IngestPipeline(store).run({
    kgml,
    gaf: withAnnotations ? path.join(FIXTURES, 'sample.gaf') : null,
    obo: withAnnotations ? path.join(FIXTURES, 'go.obo') : null,
  });
  return store;
}

describe('gene query tools', () => {
  let tempDir: string;
  let full: GeneStore;
  let diseaseOnly: GeneStore;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'genekb-tools-test-'));
    full = await loadStore(tempDir, 'full.sqlite', [
      { path: path.join(FIXTURES, 'kgml', 'hsa05990.xml') },
      { path: path.join(FIXTURES, 'kgml', 'hsa04999.xml'), disease: 'Disease Y' },
    ], true);
    diseaseOnly = await loadStore(tempDir, 'disease.sqlite', [
      { path: path.join(FIXTURES, 'kgml', 'hsa05990.xml') },
    ], false);
  });

  afterAll(async () => {
    full.close();
    diseaseOnly.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('geneDiseaseAssociation', () => {
    it('returns the disease of the single pathway a gene belongs to', () => {
      expect(geneDiseaseAssociation(diseaseOnly, 'hsa:10213')).toEqual({ diseases: ['Disease X'] });
    });

    it('returns each disease once, sorted, across pathways', () => {
      expect(geneDiseaseAssociation(full, 'hsa:10213')).toEqual({ diseases: ['Disease X', 'Disease Y'] });
    });

    it('accepts a gene symbol in any case', () => {
      expect(geneDiseaseAssociation(full, 'psmd14')).toEqual({ diseases: ['Disease X', 'Disease Y'] });
    });

    it('leaves out pathways without a disease label', () => {
      expect(geneDiseaseAssociation(full, 'NUDT4B')).toEqual({ diseases: [] });
    });

    it('answers an unknown or blank gene with an empty list', () => {
      expect(geneDiseaseAssociation(full, 'hsa:0')).toEqual({ diseases: [] });
      expect(geneDiseaseAssociation(full, '   ')).toEqual({ diseases: [] });
    });
  });

  describe('geneGoTerms', () => {
    it('lists annotated terms, falling back to the namespace for unnamed terms', () => {
      expect(geneGoTerms(full, 'NUDT4B')).toEqual({
        go_terms: [
          { id: 'GO:0003723', description: 'RNA binding' },
          { id: 'GO:0046872', description: 'molecular_function' },
        ],
      });
    });

    it('reaches annotations through the symbol a KGML gene carries', () => {
      const expected = {
        go_terms: [
          { id: 'GO:0000165', description: 'MAPK cascade' },
          { id: 'GO:0005829', description: 'cellular_component' },
        ],
      };
      expect(geneGoTerms(full, 'hsa:5594')).toEqual(expected);
      expect(geneGoTerms(full, 'mapk1')).toEqual(expected);
    });

    it('skips annotations qualified with NOT', () => {
      expect(geneGoTerms(full, 'TP53')).toEqual({ go_terms: [] });
    });

    it('returns nothing when no annotations were loaded', () => {
      expect(geneGoTerms(diseaseOnly, 'hsa:10213')).toEqual({ go_terms: [] });
    });
  });

  describe('downstreamAnalysis', () => {
    it('returns direct neighbours at depth 1', () => {
      expect(downstreamAnalysis(full, 'hsa:10213', { depth: 1 })).toEqual({
        relations: [
          { gene_id: 'hsa:2000', relation_type: 'binding/association', path_depth: 1, via: 'hsa:10213' },
          { gene_id: 'hsa:5594', relation_type: 'activation', path_depth: 1, via: 'hsa:10213' },
          { gene_id: 'hsa:5595', relation_type: 'activation', path_depth: 1, via: 'hsa:10213' },
        ],
      });
    });

    it('expands group members and joins multiple subtypes', () => {
      expect(downstreamAnalysis(diseaseOnly, 'hsa:5594')).toEqual({
        relations: [
          { gene_id: 'hsa:1432', relation_type: 'inhibition,phosphorylation', path_depth: 1, via: 'hsa:5594' },
          { gene_id: 'hsa:7157', relation_type: 'inhibition,phosphorylation', path_depth: 1, via: 'hsa:5594' },
        ],
      });
    });

    it('chains relation labels along longer paths', () => {
      const { relations } = downstreamAnalysis(full, 'hsa:10213', { depth: 2 });
      expect(relations.slice(3)).toEqual([
        { gene_id: 'hsa:1432', relation_type: 'activation > inhibition,phosphorylation', path_depth: 2, via: 'hsa:5594' },
        { gene_id: 'hsa:7157', relation_type: 'activation > inhibition,phosphorylation', path_depth: 2, via: 'hsa:5594' },
      ]);
    });

    it('terminates on cycles and reports each gene once', () => {
      const { relations } = downstreamAnalysis(full, 'hsa:2000', { depth: 5 });
      expect(relations.map(r => [r.gene_id, r.path_depth])).toEqual([
        ['hsa:10213', 1],
        ['hsa:5594', 2],
        ['hsa:5595', 2],
        ['hsa:1432', 3],
        ['hsa:7157', 3],
      ]);
    });

    it('never lists the queried gene among its own targets', () => {
      const { relations } = downstreamAnalysis(full, 'hsa:2000', { depth: 5 });
      expect(relations.some(r => r.gene_id === 'hsa:2000')).toBe(false);
    });

    it('caps depth at the configured maximum', () => {
      const { relations } = downstreamAnalysis(full, 'hsa:2000', { depth: 10, maxDepth: 2 });
      expect(relations.map(r => r.gene_id)).toEqual(['hsa:10213', 'hsa:5594', 'hsa:5595']);
    });

    it('returns an empty list for an unknown gene or a gene without outgoing edges', () => {
      expect(downstreamAnalysis(full, 'hsa:0')).toEqual({ relations: [] });
      expect(downstreamAnalysis(full, 'NUDT4B')).toEqual({ relations: [] });
    });
  });

  describe('clampDepth', () => {
    it('defaults to one hop', () => {
      expect(clampDepth(undefined)).toBe(1);
    });

    it('keeps the depth within 1 and the maximum', () => {
      expect(clampDepth(0, 5)).toBe(1);
      expect(clampDepth(3.7, 5)).toBe(3);
      expect(clampDepth(9, 5)).toBe(5);
    });
  });
});
