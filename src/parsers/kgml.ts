import { readFile } from 'node:fs/promises';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { ErrorCode, ParseError } from '../errors.js';
import type { Gene, GenePathwayMembership, GeneRelation, Pathway } from '../storage/schema.js';

// KEGG map numbers 05xxx are the "Human Diseases" category
const DISEASE_MAP_RANGE = { from: 5000, to: 5999 } as const;

const GENE_ID_PATTERN = /^[A-Za-z0-9_]+:\S+$/;

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseAttributeValue: false,
  parseTagValue: false,
  isArray: (name) => ['entry', 'component', 'relation', 'subtype', 'graphics'].includes(name),
});

const SubtypeSchema = z.object({
  '@_name': z.string().min(1),
  '@_value': z.string().optional(),
});

const EntrySchema = z.object({
  '@_id': z.string().min(1),
  '@_name': z.string().default(''),
  '@_type': z.string().min(1),
  graphics: z.array(z.object({ '@_name': z.string().optional() }).or(z.literal(''))).optional(),
  component: z.array(z.object({ '@_id': z.string().min(1) })).optional(),
});

const RelationSchema = z.object({
  '@_entry1': z.string().min(1),
  '@_entry2': z.string().min(1),
  '@_type': z.string().min(1),
  subtype: z.array(SubtypeSchema).optional(),
});

const PathwaySchema = z.object({
  '@_name': z.string().optional(),
  '@_org': z.string().optional(),
  '@_number': z.string().optional(),
  '@_title': z.string().optional(),
  entry: z.array(EntrySchema),
  relation: z.array(RelationSchema),
});

type KgmlEntry = z.infer<typeof EntrySchema>;

export interface KgmlParseOptions {
  /** Overrides the id read from the document's `name` attribute. */
  pathwayId?: string;
  /** Disease label for this pathway; free text. */
  disease?: string | null;
}

export interface KgmlDocument {
  pathway: Pathway;
  genes: Gene[];
  memberships: GenePathwayMembership[];
  relations: GeneRelation[];
  /** Entries with no gene mapping (compounds, map links, orthologs). */
  skippedEntries: number;
  /** Relations where either side resolved to no gene. */
  skippedRelations: number;
}

/**
 * Parse one KGML pathway document.
 *
 * Relations in KGML often point at group entries; these are flattened to
 * individual gene-to-gene edges here, so the store never sees groups.
 */
export function parseKgml(xml: string, opts: KgmlParseOptions = {}): KgmlDocument {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new ParseError(`Not well-formed XML: ${valid.err.msg}`, ErrorCode.PARSE_FAILED, { line: valid.err.line });
  }

  const doc: unknown = xmlParser.parse(xml);
  const root = isRecord(doc) ? doc.pathway : undefined;
  if (!isRecord(root)) {
    throw new ParseError('Missing <pathway> root element', ErrorCode.PARSE_MISSING_ELEMENT);
  }
  if (root.entry === undefined) {
    throw new ParseError('Pathway has no <entry> elements', ErrorCode.PARSE_MISSING_ELEMENT);
  }
  if (root.relation === undefined) {
    throw new ParseError('Pathway has no <relation> elements', ErrorCode.PARSE_MISSING_ELEMENT);
  }

  const parsed = PathwaySchema.safeParse(root);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ParseError(
      `Malformed pathway element at ${issue.path.join('.')}: ${issue.message}`,
      ErrorCode.PARSE_MALFORMED_ELEMENT,
    );
  }
  const kgml = parsed.data;

  const pathwayId = opts.pathwayId
    ?? kgml['@_name']?.replace(/^path:/, '')
    ?? (kgml['@_org'] && kgml['@_number'] ? `${kgml['@_org']}${kgml['@_number']}` : undefined);
  if (!pathwayId) {
    throw new ParseError('Pathway has no identifier', ErrorCode.PARSE_MISSING_ELEMENT);
  }

  const title = kgml['@_title']?.trim();
  const pathway: Pathway = {
    id: pathwayId,
    name: title || pathwayId,
    disease: opts.disease ?? diseaseFromMetadata(kgml['@_number'], title),
  };

  const entries = new Map<string, KgmlEntry>();
  for (const entry of kgml.entry) entries.set(entry['@_id'], entry);

  const genes = new Map<string, Gene>();
  let skippedEntries = 0;
  for (const entry of kgml.entry) {
    if (entry['@_type'] !== 'gene') {
      if (entry['@_type'] !== 'group') skippedEntries++;
      continue;
    }
    const ids = geneIdsOf(entry);
    if (ids.length === 0) {
      skippedEntries++;
      continue;
    }
    // graphics@name lists the first gene's symbols
    const symbol = symbolOf(entry);
    ids.forEach((id, i) => {
      const existing = genes.get(id);
      const candidate: Gene = { id, symbol: i === 0 ? symbol : null, name: null };
      if (!existing || (existing.symbol === null && candidate.symbol !== null)) {
        genes.set(id, candidate);
      }
    });
  }

  const resolved = new Map<string, string[]>();
  const resolve = (entryId: string): string[] => {
    const cached = resolved.get(entryId);
    if (cached) return cached;
    const result = resolveEntry(entryId, entries, new Set());
    resolved.set(entryId, result);
    return result;
  };

  const relations = new Map<string, GeneRelation>();
  let skippedRelations = 0;
  for (const rel of kgml.relation) {
    const sources = resolve(rel['@_entry1']);
    const targets = resolve(rel['@_entry2']);
    if (sources.length === 0 || targets.length === 0) {
      skippedRelations++;
      continue;
    }
    const relationType = relationTypeOf(rel);
    for (const sourceGeneId of sources) {
      for (const targetGeneId of targets) {
        if (sourceGeneId === targetGeneId) continue;
        relations.set(`${sourceGeneId}\t${targetGeneId}\t${relationType}`, { sourceGeneId, targetGeneId, relationType });
      }
    }
  }

  return {
    pathway,
    genes: [...genes.values()],
    memberships: [...genes.keys()].map(geneId => ({ geneId, pathwayId })),
    relations: [...relations.values()],
    skippedEntries,
    skippedRelations,
  };
}

export async function parseKgmlFile(filePath: string, opts: KgmlParseOptions = {}): Promise<KgmlDocument> {
  const xml = await readFile(filePath, 'utf-8');
  try {
    return parseKgml(xml, opts);
  } catch (err) {
    if (err instanceof ParseError) throw err.withFile(filePath);
    throw err;
  }
}

function resolveEntry(entryId: string, entries: Map<string, KgmlEntry>, seen: Set<string>): string[] {
  const entry = entries.get(entryId);
  if (!entry || seen.has(entryId)) return [];
  seen.add(entryId);

  if (entry['@_type'] === 'gene') return geneIdsOf(entry);
  if (entry['@_type'] !== 'group') return [];

  const ids = new Set<string>();
  for (const component of entry.component ?? []) {
    for (const id of resolveEntry(component['@_id'], entries, seen)) ids.add(id);
  }
  return [...ids];
}

function geneIdsOf(entry: KgmlEntry): string[] {
  return [...new Set(entry['@_name'].split(/\s+/).filter(token => GENE_ID_PATTERN.test(token)))];
}

function symbolOf(entry: KgmlEntry): string | null {
  const graphics = entry.graphics?.[0];
  const label = graphics !== '' && graphics ? graphics['@_name'] : undefined;
  if (!label) return null;
  const first = label.split(',')[0].replace(/\.\.\.$/, '').trim();
  return first || null;
}

function relationTypeOf(rel: z.infer<typeof RelationSchema>): string {
  const names = (rel.subtype ?? []).map(s => s['@_name'].trim()).filter(Boolean);
  return names.length > 0 ? names.join(',') : rel['@_type'];
}

function diseaseFromMetadata(number: string | undefined, title: string | undefined): string | null {
  if (!number || !title) return null;
  const n = Number.parseInt(number, 10);
  return n >= DISEASE_MAP_RANGE.from && n <= DISEASE_MAP_RANGE.to ? title : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
