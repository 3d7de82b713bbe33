import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';

import { crawlKgml } from '../crawler.js';

async function collect(iter: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const item of iter) out.push(item);
  return out;
}

describe('crawlKgml', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'genekb-crawl-test-'));
    await fs.mkdir(path.join(tempDir, 'sub'));
    await fs.mkdir(path.join(tempDir, 'skipme'));
    await fs.writeFile(path.join(tempDir, 'b.kgml'), '<pathway/>');
    await fs.writeFile(path.join(tempDir, 'a.xml'), '<pathway/>');
    await fs.writeFile(path.join(tempDir, 'notes.txt'), 'not a map');
    await fs.writeFile(path.join(tempDir, 'empty.xml'), '');
    await fs.writeFile(path.join(tempDir, 'sub', 'c.XML'), '<pathway/>');
    await fs.writeFile(path.join(tempDir, 'skipme', 'd.xml'), '<pathway/>');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('finds non-empty KGML files in sorted order, honouring ignore patterns', async () => {
    const files = await collect(crawlKgml([tempDir], ['skipme']));
    expect(files).toEqual([
      path.join(tempDir, 'a.xml'),
      path.join(tempDir, 'b.kgml'),
      path.join(tempDir, 'sub', 'c.XML'),
    ]);
  });

  it('matches ignore globs against paths relative to the crawled directory', async () => {
    const files = await collect(crawlKgml([tempDir], ['sub/*.XML', '*.kgml']));
    expect(files).toEqual([
      path.join(tempDir, 'a.xml'),
      path.join(tempDir, 'skipme', 'd.xml'),
    ]);
  });

  it('passes over directories that do not exist', async () => {
    const files = await collect(crawlKgml([path.join(tempDir, 'missing'), path.join(tempDir, 'sub')], []));
    expect(files).toEqual([path.join(tempDir, 'sub', 'c.XML')]);
  });
});
