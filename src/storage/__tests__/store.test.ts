/**
 * GeneStore tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';

import { GeneStore } from '../store.js';
import { ErrorCode, GeneKbError, ValidationError } from '../../errors.js';

describe('GeneStore', () => {
  let tempDir: string;
  let dbFile: string;
  let store: GeneStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'genekb-store-test-'));
    dbFile = path.join(tempDir, 'nested', 'genes.sqlite');
    store = new GeneStore({ path: dbFile }).open();
  });

  afterEach(async () => {
    store.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function seedPathway(): void {
    store.insertGene({ id: 'hsa:10213', symbol: 'PSMD14', name: null });
    store.insertGene({ id: 'hsa:5594', symbol: 'MAPK1', name: null });
    store.insertPathway({ id: 'hsa05990', name: 'Disease X', disease: 'Disease X' });
  }

  describe('schema', () => {
    it('creates all six tables empty', () => {
      expect(store.getCounts()).toEqual({
        genes: 0,
        pathways: 0,
        gene_pathways: 0,
        go_terms: 0,
        gene_go_associations: 0,
        gene_relations: 0,
      });
    });

    it('reopens an existing file without losing rows', () => {
      seedPathway();
      store.close();

      store = new GeneStore({ path: dbFile }).open();
      expect(store.getCounts().genes).toBe(2);
      expect(store.getPathway('hsa05990')).toEqual({ id: 'hsa05990', name: 'Disease X', disease: 'Disease X' });
    });
  });

  describe('inserts', () => {
    it('inserts a gene once and ignores repeats', () => {
      expect(store.insertGene({ id: 'hsa:10213', symbol: 'PSMD14', name: null })).toBe(true);
      expect(store.insertGene({ id: 'hsa:10213', symbol: 'OTHER', name: 'ignored' })).toBe(false);
      expect(store.getGene('hsa:10213')).toEqual({ id: 'hsa:10213', symbol: 'PSMD14', name: null });
      expect(store.getCounts().genes).toBe(1);
    });

    it('fills a missing symbol once, without replacing a stored one', () => {
      expect(store.insertGene({ id: 'hsa:5595', symbol: null, name: null })).toBe(true);
      expect(store.insertGene({ id: 'hsa:5595', symbol: null, name: null })).toBe(false);
      expect(store.insertGene({ id: 'hsa:5595', symbol: 'MAPK3', name: 'ignored' })).toBe(true);
      expect(store.insertGene({ id: 'hsa:5595', symbol: 'OTHER', name: null })).toBe(false);
      expect(store.getGene('hsa:5595')).toEqual({ id: 'hsa:5595', symbol: 'MAPK3', name: null });
    });

    it('keeps association pairs unique', () => {
      seedPathway();
      expect(store.insertMembership({ geneId: 'hsa:10213', pathwayId: 'hsa05990' })).toBe(true);
      expect(store.insertMembership({ geneId: 'hsa:10213', pathwayId: 'hsa05990' })).toBe(false);
      expect(store.insertRelation({ sourceGeneId: 'hsa:10213', targetGeneId: 'hsa:5594', relationType: 'activation' })).toBe(true);
      expect(store.insertRelation({ sourceGeneId: 'hsa:10213', targetGeneId: 'hsa:5594', relationType: 'activation' })).toBe(false);
      expect(store.getCounts()).toMatchObject({ gene_pathways: 1, gene_relations: 1 });
    });

    it('rejects memberships that reference missing parents', () => {
      seedPathway();
      expect(() => store.insertMembership({ geneId: 'hsa:1', pathwayId: 'hsa05990' })).toThrow(ValidationError);
      expect(() => store.insertMembership({ geneId: 'hsa:10213', pathwayId: 'hsa00000' })).toThrow('Unknown pathway hsa00000');
      expect(store.getCounts().gene_pathways).toBe(0);
    });

    it('rejects GO associations and relations that reference missing parents', () => {
      seedPathway();
      expect(() => store.insertGoAssociation({ geneId: 'hsa:10213', goId: 'GO:0003723' })).toThrow('Unknown GO term GO:0003723');
      expect(() => store.insertRelation({ sourceGeneId: 'hsa:10213', targetGeneId: 'hsa:404', relationType: 'activation' }))
        .toThrow('Unknown gene hsa:404');
      try {
        store.insertRelation({ sourceGeneId: 'hsa:404', targetGeneId: 'hsa:10213', relationType: 'activation' });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        expect(err).toMatchObject({ table: 'gene_relations', code: ErrorCode.VALIDATION_MISSING_PARENT });
      }
    });

    it('fills a missing GO term description but never overwrites one', () => {
      store.insertGoTerm({ id: 'GO:0003723', namespace: 'molecular_function', description: null });
      expect(store.describeGoTerm({ id: 'GO:0003723', namespace: 'molecular_function', description: 'RNA binding' })).toBe(true);
      expect(store.describeGoTerm({ id: 'GO:0003723', namespace: 'molecular_function', description: 'renamed' })).toBe(false);
      expect(store.getGoTerm('GO:0003723')).toEqual({ id: 'GO:0003723', namespace: 'molecular_function', description: 'RNA binding' });
    });
  });

  describe('transactions', () => {
    it('commits when the work succeeds', async () => {
      const written = await store.withTransaction(() => {
        seedPathway();
        return store.insertMembership({ geneId: 'hsa:5594', pathwayId: 'hsa05990' });
      });
      expect(written).toBe(true);
      expect(store.getCounts()).toMatchObject({ genes: 2, pathways: 1, gene_pathways: 1 });
    });

    it('rolls back everything when an insert violates referential integrity', async () => {
      await expect(store.withTransaction(async () => {
        store.insertGene({ id: 'hsa:10213', symbol: 'PSMD14', name: null });
        await Promise.resolve();
        store.insertMembership({ geneId: 'hsa:10213', pathwayId: 'hsa05990' });
      })).rejects.toThrow(ValidationError);

      expect(store.getCounts().genes).toBe(0);
    });
  });

  describe('reads', () => {
    beforeEach(() => {
      seedPathway();
      store.insertPathway({ id: 'hsa04999', name: 'Signaling', disease: null });
      store.insertGene({ id: 'MAPK1', symbol: 'MAPK1', name: 'Mitogen-activated protein kinase 1' });
      store.insertMembership({ geneId: 'hsa:10213', pathwayId: 'hsa05990' });
      store.insertMembership({ geneId: 'hsa:10213', pathwayId: 'hsa04999' });
      store.insertMembership({ geneId: 'hsa:5594', pathwayId: 'hsa05990' });
      store.insertGoTerm({ id: 'GO:0005829', namespace: 'cellular_component', description: null });
      store.insertGoTerm({ id: 'GO:0000165', namespace: 'biological_process', description: 'MAPK cascade' });
      store.insertGoAssociation({ geneId: 'MAPK1', goId: 'GO:0005829' });
      store.insertGoAssociation({ geneId: 'MAPK1', goId: 'GO:0000165' });
    });

    it('resolves ids exactly and symbols ignoring case, widened through symbols', () => {
      expect(store.resolveGeneIds('hsa:10213')).toEqual(['hsa:10213']);
      expect(store.resolveGeneIds('psmd14')).toEqual(['hsa:10213']);
      expect(store.resolveGeneIds('hsa:5594')).toEqual(['MAPK1', 'hsa:5594']);
      expect(store.resolveGeneIds('mapk1')).toEqual(['MAPK1', 'hsa:5594']);
      expect(store.resolveGeneIds('HSA:10213')).toEqual([]);
      expect(store.resolveGeneIds('unknown')).toEqual([]);
    });

    it('widens through symbols that differ only in case', () => {
      store.insertGene({ id: 'Mapk1', symbol: 'Mapk1', name: null });
      expect(store.resolveGeneIds('hsa:5594')).toEqual(['MAPK1', 'Mapk1', 'hsa:5594']);
    });

    it('lists distinct non-null disease labels', () => {
      expect(store.diseasesForGenes(['hsa:10213', 'hsa:5594'])).toEqual(['Disease X']);
      expect(store.diseasesForGenes([])).toEqual([]);
    });

    it('lists GO terms ordered by id', () => {
      expect(store.goTermsForGenes(['MAPK1', 'hsa:5594'])).toEqual([
        { id: 'GO:0000165', namespace: 'biological_process', description: 'MAPK cascade' },
        { id: 'GO:0005829', namespace: 'cellular_component', description: null },
      ]);
    });

    it('has no orphaned association rows', () => {
      expect(store.countOrphans()).toBe(0);
    });
  });

  describe('read-only mode', () => {
    it('serves queries but refuses writes', () => {
      seedPathway();
      store.close();

      store = new GeneStore({ path: dbFile, readonly: true }).open();
      expect(store.readonly).toBe(true);
      expect(store.hasGene('hsa:10213')).toBe(true);
      try {
        store.insertGene({ id: 'hsa:1', symbol: null, name: null });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(GeneKbError);
        expect(err).toMatchObject({ code: ErrorCode.STORE_NOT_WRITABLE });
      }
    });

    it('requires the database file to exist', () => {
      const missing = new GeneStore({ path: path.join(tempDir, 'missing.sqlite'), readonly: true });
      expect(() => missing.open()).toThrow();
    });
  });
});
