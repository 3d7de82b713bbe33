import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import {
  SCHEMA_SQL,
  Tables,
  type Gene,
  type GeneGoAssociation,
  type GenePathwayMembership,
  type GeneRelation,
  type GoTerm,
  type Pathway,
  type TableCounts,
  type TableName,
} from './schema.js';
import { ErrorCode, GeneKbError, ValidationError } from '../errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('store');

export interface StoreOptions {
  /** Database file, or ':memory:'. */
  path: string;
  /** Open for queries only. The file must already exist. */
  readonly?: boolean;
}

interface GeneRow {
  gene_id: string;
  symbol: string | null;
  name: string | null;
}

interface GoTermRow {
  go_id: string;
  namespace: string;
  description: string | null;
}

interface RelationRow {
  source_gene_id: string;
  target_gene_id: string;
  relation_type: string;
}

interface WriteStatements {
  insertGene: Database.Statement<[string, string | null, string | null]>;
  insertPathway: Database.Statement<[string, string, string | null]>;
  insertGoTerm: Database.Statement<[string, string, string | null]>;
  describeGoTerm: Database.Statement<[string, string, string]>;
  insertMembership: Database.Statement<[string, string]>;
  insertGoAssociation: Database.Statement<[string, string]>;
  insertRelation: Database.Statement<[string, string, string]>;
}

/**
 * Handle on one gene knowledge base file. Parsers, the ingest pipeline and
 * the query tools all receive it explicitly; nothing holds a global handle.
 */
export class GeneStore {
  private db: Database.Database | null = null;
  private writes: WriteStatements | null = null;
  private readonly options: StoreOptions;

  constructor(options: StoreOptions) {
    this.options = options;
  }

  get path(): string {
    return this.options.path;
  }

  get readonly(): boolean {
    return this.options.readonly ?? false;
  }

  open(): this {
    if (this.db) return this;

    if (this.readonly) {
      this.db = new Database(this.options.path, { readonly: true, fileMustExist: true });
    } else {
      if (this.options.path !== ':memory:') {
        mkdirSync(dirname(this.options.path), { recursive: true });
      }
      this.db = new Database(this.options.path);
      // WAL lets query processes read while nothing else writes
      this.db.pragma('journal_mode = WAL');
      this.db.exec(SCHEMA_SQL);
    }
    this.db.pragma('foreign_keys = ON');

    log.debug(`Opened ${this.options.path}${this.readonly ? ' (read-only)' : ''}`);
    return this;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.writes = null;
    }
  }

  private getDb(): Database.Database {
    if (!this.db) throw new Error('Gene store is not open');
    return this.db;
  }

  private getWrites(): WriteStatements {
    if (this.readonly) {
      throw new GeneKbError(`Store ${this.options.path} is open read-only`, ErrorCode.STORE_NOT_WRITABLE);
    }
    if (this.writes) return this.writes;

    const db = this.getDb();
    this.writes = {
      insertGene: db.prepare<[string, string | null, string | null]>(
        `INSERT INTO genes (gene_id, symbol, name) VALUES (?, ?, ?)
         ON CONFLICT (gene_id) DO UPDATE SET symbol = excluded.symbol
         WHERE genes.symbol IS NULL AND excluded.symbol IS NOT NULL`,
      ),
      insertPathway: db.prepare<[string, string, string | null]>('INSERT OR IGNORE INTO pathways (pathway_id, name, disease) VALUES (?, ?, ?)'),
      insertGoTerm: db.prepare<[string, string, string | null]>('INSERT OR IGNORE INTO go_terms (go_id, namespace, description) VALUES (?, ?, ?)'),
      describeGoTerm: db.prepare<[string, string, string]>(
        `INSERT INTO go_terms (go_id, namespace, description) VALUES (?, ?, ?)
         ON CONFLICT (go_id) DO UPDATE SET description = excluded.description
         WHERE go_terms.description IS NULL`,
      ),
      insertMembership: db.prepare<[string, string]>('INSERT OR IGNORE INTO gene_pathways (gene_id, pathway_id) VALUES (?, ?)'),
      insertGoAssociation: db.prepare<[string, string]>('INSERT OR IGNORE INTO gene_go_associations (gene_id, go_id) VALUES (?, ?)'),
      insertRelation: db.prepare<[string, string, string]>(
        'INSERT OR IGNORE INTO gene_relations (source_gene_id, target_gene_id, relation_type) VALUES (?, ?, ?)',
      ),
    };
    return this.writes;
  }

  /**
   * Run `fn` inside one transaction. Commits when it resolves, rolls back
   * when it throws. The work may await (the GAF reader streams), so this
   * uses explicit BEGIN/COMMIT rather than better-sqlite3's sync wrapper.
   */
  async withTransaction<T>(fn: () => Promise<T> | T): Promise<T> {
    const db = this.getDb();
    this.getWrites();
    db.exec('BEGIN');
    try {
      const result = await fn();
      db.exec('COMMIT');
      return result;
    } catch (err) {
      if (db.inTransaction) db.exec('ROLLBACK');
      throw err;
    }
  }

  // --- Insert primitives (insert-if-absent; true when a row was written) ---

  /** Insert a gene, or give a stored gene that has no symbol the incoming one. */
  insertGene(gene: Gene): boolean {
    return this.getWrites().insertGene.run(gene.id, gene.symbol, gene.name).changes > 0;
  }

  insertPathway(pathway: Pathway): boolean {
    return this.getWrites().insertPathway.run(pathway.id, pathway.name, pathway.disease).changes > 0;
  }

  insertGoTerm(term: GoTerm): boolean {
    return this.getWrites().insertGoTerm.run(term.id, term.namespace, term.description).changes > 0;
  }

  /** Insert a named term, or fill the description of a stored term that has none. */
  describeGoTerm(term: GoTerm & { description: string }): boolean {
    return this.getWrites().describeGoTerm.run(term.id, term.namespace, term.description).changes > 0;
  }

  insertMembership(m: GenePathwayMembership): boolean {
    this.requireGene(m.geneId, Tables.GenePathways);
    if (!this.hasPathway(m.pathwayId)) {
      throw new ValidationError(`Unknown pathway ${m.pathwayId}`, Tables.GenePathways, undefined, { ...m });
    }
    return this.guard(Tables.GenePathways, () => this.getWrites().insertMembership.run(m.geneId, m.pathwayId).changes > 0);
  }

  insertGoAssociation(a: GeneGoAssociation): boolean {
    this.requireGene(a.geneId, Tables.GeneGoAssociations);
    if (!this.hasGoTerm(a.goId)) {
      throw new ValidationError(`Unknown GO term ${a.goId}`, Tables.GeneGoAssociations, undefined, { ...a });
    }
    return this.guard(Tables.GeneGoAssociations, () => this.getWrites().insertGoAssociation.run(a.geneId, a.goId).changes > 0);
  }

  insertRelation(r: GeneRelation): boolean {
    this.requireGene(r.sourceGeneId, Tables.GeneRelations);
    this.requireGene(r.targetGeneId, Tables.GeneRelations);
    return this.guard(
      Tables.GeneRelations,
      () => this.getWrites().insertRelation.run(r.sourceGeneId, r.targetGeneId, r.relationType).changes > 0,
    );
  }

  private requireGene(geneId: string, table: TableName): void {
    if (!this.hasGene(geneId)) {
      throw new ValidationError(`Unknown gene ${geneId}`, table, undefined, { geneId });
    }
  }

  // Explicit parent checks run first; this catches anything the FK pragma still rejects
  private guard(table: TableName, write: () => boolean): boolean {
    try {
      return write();
    } catch (err) {
      if (err instanceof Database.SqliteError && err.code.startsWith('SQLITE_CONSTRAINT')) {
        throw new ValidationError(err.message, table, ErrorCode.VALIDATION_CONSTRAINT, { sqliteCode: err.code });
      }
      throw err;
    }
  }

  // --- Reads ---

  hasGene(geneId: string): boolean {
    return this.getDb().prepare<[string], { one: number }>('SELECT 1 AS one FROM genes WHERE gene_id = ?').get(geneId) !== undefined;
  }

  hasPathway(pathwayId: string): boolean {
    return this.getDb().prepare<[string], { one: number }>('SELECT 1 AS one FROM pathways WHERE pathway_id = ?').get(pathwayId) !== undefined;
  }

  hasGoTerm(goId: string): boolean {
    return this.getDb().prepare<[string], { one: number }>('SELECT 1 AS one FROM go_terms WHERE go_id = ?').get(goId) !== undefined;
  }

  getGene(geneId: string): Gene | null {
    const row = this.getDb()
      .prepare<[string], GeneRow>('SELECT gene_id, symbol, name FROM genes WHERE gene_id = ?')
      .get(geneId);
    return row ? toGene(row) : null;
  }

  getPathway(pathwayId: string): Pathway | null {
    const row = this.getDb()
      .prepare<[string], { pathway_id: string; name: string; disease: string | null }>(
        'SELECT pathway_id, name, disease FROM pathways WHERE pathway_id = ?',
      )
      .get(pathwayId);
    return row ? { id: row.pathway_id, name: row.name, disease: row.disease } : null;
  }

  getGoTerm(goId: string): GoTerm | null {
    const row = this.getDb()
      .prepare<[string], GoTermRow>('SELECT go_id, namespace, description FROM go_terms WHERE go_id = ?')
      .get(goId);
    return row ? toGoTerm(row) : null;
  }

  /**
   * Genes matching an identifier: by exact id, or by symbol ignoring case.
   * Matches are widened once through their symbols, so a KEGG id also
   * reaches the GAF row keyed by the same symbol and vice versa.
   */
  resolveGeneIds(idOrSymbol: string): string[] {
    const db = this.getDb();
    const direct = db
      .prepare<[string, string], GeneRow>(
        'SELECT gene_id, symbol, name FROM genes WHERE gene_id = ? OR symbol = ? COLLATE NOCASE',
      )
      .all(idOrSymbol, idOrSymbol);
    if (direct.length === 0) return [];

    const aliases = new Set<string>();
    for (const row of direct) {
      aliases.add(row.gene_id);
      if (row.symbol) aliases.add(row.symbol);
    }
    const json = JSON.stringify([...aliases]);

    return db
      .prepare<[string, string], { gene_id: string }>(
        `SELECT gene_id FROM genes
         WHERE gene_id IN (SELECT value FROM json_each(?))
            OR symbol COLLATE NOCASE IN (SELECT value FROM json_each(?))
         ORDER BY gene_id`,
      )
      .all(json, json)
      .map(r => r.gene_id);
  }

  diseasesForGenes(geneIds: string[]): string[] {
    if (geneIds.length === 0) return [];
    return this.getDb()
      .prepare<[string], { disease: string }>(
        `SELECT DISTINCT p.disease AS disease
         FROM gene_pathways gp
         JOIN pathways p ON p.pathway_id = gp.pathway_id
         WHERE gp.gene_id IN (SELECT value FROM json_each(?))
           AND p.disease IS NOT NULL
         ORDER BY p.disease`,
      )
      .all(JSON.stringify(geneIds))
      .map(r => r.disease);
  }

  goTermsForGenes(geneIds: string[]): GoTerm[] {
    if (geneIds.length === 0) return [];
    return this.getDb()
      .prepare<[string], GoTermRow>(
        `SELECT DISTINCT t.go_id, t.namespace, t.description
         FROM gene_go_associations ga
         JOIN go_terms t ON t.go_id = ga.go_id
         WHERE ga.gene_id IN (SELECT value FROM json_each(?))
         ORDER BY t.go_id`,
      )
      .all(JSON.stringify(geneIds))
      .map(toGoTerm);
  }

  /** Outgoing edges of a set of genes, ordered by source, target, then type. */
  outgoingRelations(geneIds: string[]): GeneRelation[] {
    if (geneIds.length === 0) return [];
    return this.getDb()
      .prepare<[string], RelationRow>(
        `SELECT source_gene_id, target_gene_id, relation_type
         FROM gene_relations
         WHERE source_gene_id IN (SELECT value FROM json_each(?))
         ORDER BY source_gene_id, target_gene_id, relation_type`,
      )
      .all(JSON.stringify(geneIds))
      .map(r => ({ sourceGeneId: r.source_gene_id, targetGeneId: r.target_gene_id, relationType: r.relation_type }));
  }

  getCounts(): TableCounts {
    const db = this.getDb();
    const count = (table: TableName): number =>
      db.prepare<[], { cnt: number }>(`SELECT COUNT(*) AS cnt FROM ${table}`).get()?.cnt ?? 0;
    return {
      genes: count(Tables.Genes),
      pathways: count(Tables.Pathways),
      gene_pathways: count(Tables.GenePathways),
      go_terms: count(Tables.GoTerms),
      gene_go_associations: count(Tables.GeneGoAssociations),
      gene_relations: count(Tables.GeneRelations),
    };
  }

  /** Association rows whose parent row is missing. Always zero for a healthy store. */
  countOrphans(): number {
    const row = this.getDb()
      .prepare<[], { cnt: number }>(
        `SELECT
           (SELECT COUNT(*) FROM gene_pathways gp
              WHERE NOT EXISTS (SELECT 1 FROM genes g WHERE g.gene_id = gp.gene_id)
                 OR NOT EXISTS (SELECT 1 FROM pathways p WHERE p.pathway_id = gp.pathway_id))
         + (SELECT COUNT(*) FROM gene_go_associations ga
              WHERE NOT EXISTS (SELECT 1 FROM genes g WHERE g.gene_id = ga.gene_id)
                 OR NOT EXISTS (SELECT 1 FROM go_terms t WHERE t.go_id = ga.go_id))
         + (SELECT COUNT(*) FROM gene_relations r
              WHERE NOT EXISTS (SELECT 1 FROM genes g WHERE g.gene_id = r.source_gene_id)
                 OR NOT EXISTS (SELECT 1 FROM genes g WHERE g.gene_id = r.target_gene_id)) AS cnt`,
      )
      .get();
    return row?.cnt ?? 0;
  }
}

function toGene(row: GeneRow): Gene {
  return { id: row.gene_id, symbol: row.symbol, name: row.name };
}

function toGoTerm(row: GoTermRow): GoTerm {
  return { id: row.go_id, namespace: row.namespace, description: row.description };
}
