import { readdir, stat } from 'node:fs/promises';
import { join, extname } from 'node:path';
import { existsSync } from 'node:fs';
import ignore from 'ignore';
import { logger } from '../utils/logger.js';

const log = logger.child('crawler');

const KGML_EXTENSIONS = new Set(['.xml', '.kgml']);

/**
 * Streaming crawler for KGML files. Yields paths in sorted order within each
 * directory so ingestion order is stable between runs.
 */
export async function* crawlKgml(
  directories: string[],
  ignorePatterns: string[],
): AsyncGenerator<string> {
  const ig = ignore().add(ignorePatterns);

  for (const dir of directories) {
    if (!existsSync(dir)) {
      log.warn(`Directory does not exist: ${dir}`);
      continue;
    }

    yield* walkDir(dir, dir, ig);
  }
}

async function* walkDir(
  root: string,
  dir: string,
  ig: ignore.Ignore,
): AsyncGenerator<string> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    log.warn(`Cannot read directory ${dir}: ${err}`);
    return;
  }
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    const relativePath = fullPath.slice(root.length + 1);

    if (ig.ignores(relativePath) || ig.ignores(entry.name)) {
      continue;
    }

    if (entry.isDirectory()) {
      yield* walkDir(root, fullPath, ig);
    } else if (entry.isFile()) {
      if (!KGML_EXTENSIONS.has(extname(entry.name).toLowerCase())) continue;

      const stats = await stat(fullPath);
      if (stats.size === 0) {
        log.debug(`Skipping empty file: ${fullPath}`);
        continue;
      }
      yield fullPath;
    }
  }
}
