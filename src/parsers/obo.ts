import { open } from 'node:fs/promises';
import { createInterface } from 'node:readline';

export interface OboTerm {
  id: string;
  name: string;
  namespace: string;
  obsolete: boolean;
}

interface Stanza {
  kind: string;
  tags: Map<string, string>;
}

// Only the tags used for GO term descriptions are read
const WANTED_TAGS = new Set(['id', 'name', 'namespace', 'is_obsolete']);

/** Stream `[Term]` stanzas from an OBO 1.2/1.4 file such as go-basic.obo. */
export async function* readOboTerms(filePath: string): AsyncGenerator<OboTerm> {
  const handle = await open(filePath, 'r');
  const input = handle.createReadStream({ encoding: 'utf-8' });
  const rl = createInterface({ input, crlfDelay: Infinity });
  let stanza: Stanza | null = null;

  try {
    for await (const raw of rl) {
      const line = stripComment(raw).trim();
      if (!line) continue;

      const header = /^\[(\w+)\]$/.exec(line);
      if (header) {
        const term = stanza ? toTerm(stanza) : null;
        if (term) yield term;
        stanza = { kind: header[1], tags: new Map() };
        continue;
      }

      // Header tags before the first stanza are ignored
      if (!stanza) continue;
      const sep = line.indexOf(':');
      if (sep <= 0) continue;
      const tag = line.slice(0, sep).trim();
      if (WANTED_TAGS.has(tag) && !stanza.tags.has(tag)) {
        stanza.tags.set(tag, line.slice(sep + 1).trim());
      }
    }
    const last = stanza ? toTerm(stanza) : null;
    if (last) yield last;
  } finally {
    rl.close();
    input.destroy();
  }
}

function toTerm(stanza: Stanza): OboTerm | null {
  if (stanza.kind !== 'Term') return null;
  const id = stanza.tags.get('id');
  const name = stanza.tags.get('name');
  if (!id || !name) return null;
  return {
    id,
    name,
    namespace: stanza.tags.get('namespace') ?? 'unknown',
    obsolete: stanza.tags.get('is_obsolete') === 'true',
  };
}

// "!" starts a trailing comment unless escaped
function stripComment(line: string): string {
  for (let i = 0; i < line.length; i++) {
    if (line[i] === '\\') {
      i++;
    } else if (line[i] === '!') {
      return line.slice(0, i);
    }
  }
  return line;
}
