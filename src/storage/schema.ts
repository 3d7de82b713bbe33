// Table names for the gene knowledge base
export const Tables = {
  Genes: 'genes',
  Pathways: 'pathways',
  GenePathways: 'gene_pathways',
  GoTerms: 'go_terms',
  GeneGoAssociations: 'gene_go_associations',
  GeneRelations: 'gene_relations',
} as const;

export type TableName = (typeof Tables)[keyof typeof Tables];

export const TABLE_NAMES: readonly TableName[] = Object.values(Tables);

// GAF aspect column → GO namespace
export const GoNamespaces = {
  P: 'biological_process',
  F: 'molecular_function',
  C: 'cellular_component',
} as const;

export type GoAspect = keyof typeof GoNamespaces;
export type GoNamespace = (typeof GoNamespaces)[GoAspect];

export interface Gene {
  id: string;
  symbol: string | null;
  name: string | null;
}

export interface Pathway {
  id: string;
  name: string;
  disease: string | null;
}

export interface GoTerm {
  id: string;
  namespace: string;
  description: string | null;
}

export interface GenePathwayMembership {
  geneId: string;
  pathwayId: string;
}

export interface GeneGoAssociation {
  geneId: string;
  goId: string;
}

/** Directed interaction edge, flattened from KGML group entries. */
export interface GeneRelation {
  sourceGeneId: string;
  targetGeneId: string;
  relationType: string;
}

export type TableCounts = Record<TableName, number>;

// Schema creation is idempotent; run on every writable open
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS genes (
  gene_id TEXT PRIMARY KEY,
  symbol TEXT,
  name TEXT
);

CREATE INDEX IF NOT EXISTS idx_genes_symbol ON genes(symbol COLLATE NOCASE);

CREATE TABLE IF NOT EXISTS pathways (
  pathway_id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  disease TEXT
);

CREATE TABLE IF NOT EXISTS gene_pathways (
  gene_id TEXT NOT NULL REFERENCES genes(gene_id),
  pathway_id TEXT NOT NULL REFERENCES pathways(pathway_id),
  PRIMARY KEY (gene_id, pathway_id)
);

CREATE INDEX IF NOT EXISTS idx_gene_pathways_pathway ON gene_pathways(pathway_id);

CREATE TABLE IF NOT EXISTS go_terms (
  go_id TEXT PRIMARY KEY,
  namespace TEXT NOT NULL,
  description TEXT
);

CREATE TABLE IF NOT EXISTS gene_go_associations (
  gene_id TEXT NOT NULL REFERENCES genes(gene_id),
  go_id TEXT NOT NULL REFERENCES go_terms(go_id),
  PRIMARY KEY (gene_id, go_id)
);

CREATE INDEX IF NOT EXISTS idx_gene_go_go ON gene_go_associations(go_id);

CREATE TABLE IF NOT EXISTS gene_relations (
  source_gene_id TEXT NOT NULL REFERENCES genes(gene_id),
  target_gene_id TEXT NOT NULL REFERENCES genes(gene_id),
  relation_type TEXT NOT NULL,
  PRIMARY KEY (source_gene_id, target_gene_id, relation_type)
);

CREATE INDEX IF NOT EXISTS idx_gene_relations_target ON gene_relations(target_gene_id);
`;
