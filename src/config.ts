import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, isLogLevel } from './utils/logger.js';

dotenv.config();

const KgmlSourceSchema = z.object({
  path: z.string().min(1),
  disease: z.string().min(1).nullish(),
});

const ConfigSchema = z.object({
  sources: z.object({
    kgml: z.array(KgmlSourceSchema).default([]),
    kgml_dirs: z.array(z.string()).default([]),
    ignore: z.array(z.string()).default([]),
    gaf: z.string().min(1).nullish(),
    obo: z.string().min(1).nullish(),
  }),
  storage: z.object({
    data_dir: z.string().min(1),
    db_file: z.string().min(1).default('gene_pathway.sqlite'),
  }),
  ingest: z.object({
    include_negated: z.boolean().default(false),
  }).default({}),
  query: z.object({
    default_depth: z.number().int().min(1).default(1),
    max_depth: z.number().int().min(1).default(5),
  }).default({}),
  log_level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
}).refine(c => c.query.default_depth <= c.query.max_depth, {
  message: 'query.default_depth must not exceed query.max_depth',
  path: ['query', 'default_depth'],
});

export type KgmlSource = z.infer<typeof KgmlSourceSchema>;
export type Config = z.infer<typeof ConfigSchema>;

function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return join(homedir(), p.slice(2));
  }
  return p;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const from = source[key];
    const into = target[key];
    if (isPlainObject(from) && isPlainObject(into)) {
      result[key] = deepMerge(into, from);
    } else {
      result[key] = from;
    }
  }
  return result;
}

function readYaml(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read config ${path}: ${err instanceof Error ? err.message : String(err)}`, { path });
  }
  if (parsed == null) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config ${path} must be a YAML mapping`, { path });
  }
  return parsed;
}

// Project root, from src/ or dist/
export const PROJECT_ROOT = resolve(fileURLToPath(new URL('.', import.meta.url)), '..');

export interface LoadConfigOptions {
  /** Root against which relative paths in the config are resolved. */
  baseDir?: string;
  /** Skip ~/.genekb/config.yaml. */
  ignoreHomeConfig?: boolean;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(configPath?: string, opts: LoadConfigOptions = {}): Config {
  const baseDir = opts.baseDir ?? PROJECT_ROOT;
  const env = opts.env ?? process.env;

  // Defaults live beside the package, not in cwd
  const defaultPath = resolve(PROJECT_ROOT, 'config.default.yaml');
  let raw: Record<string, unknown> = existsSync(defaultPath) ? readYaml(defaultPath) : {};

  if (configPath) {
    const userPath = resolve(configPath);
    if (!existsSync(userPath)) {
      throw new ConfigError(`Config file not found: ${userPath}`, { path: userPath });
    }
    raw = deepMerge(raw, readYaml(userPath));
  } else if (!opts.ignoreHomeConfig) {
    const homeConfig = join(homedir(), '.genekb', 'config.yaml');
    if (existsSync(homeConfig)) {
      raw = deepMerge(raw, readYaml(homeConfig));
    }
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`, { issues: parsed.error.issues });
  }
  const config = parsed.data;

  // Env var overrides
  if (env.GENEKB_DATA_DIR) config.storage.data_dir = env.GENEKB_DATA_DIR;
  if (env.GENEKB_GAF) config.sources.gaf = env.GENEKB_GAF;
  if (env.GENEKB_LOG_LEVEL) {
    if (!isLogLevel(env.GENEKB_LOG_LEVEL)) {
      throw new ConfigError(`GENEKB_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
    }
    config.log_level = env.GENEKB_LOG_LEVEL;
  }

  const toAbsolute = (p: string): string => resolve(baseDir, expandHome(p));
  config.sources.kgml = config.sources.kgml.map(s => ({ ...s, path: toAbsolute(s.path) }));
  config.sources.kgml_dirs = config.sources.kgml_dirs.map(toAbsolute);
  if (config.sources.gaf) config.sources.gaf = toAbsolute(config.sources.gaf);
  if (config.sources.obo) config.sources.obo = toAbsolute(config.sources.obo);
  config.storage.data_dir = toAbsolute(config.storage.data_dir);

  return config;
}

export function dbPath(config: Config): string {
  return join(config.storage.data_dir, config.storage.db_file);
}
