import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getStarIndexDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  github: z
    .object({
      token: z.string().default(''),
      star_list_id: z.string().default(''),
      page_size: z.number().int().min(1).max(100).default(100),
      timeout_ms: z.number().default(30000),
    })
    .default({}),

  llm: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('gpt-4o-mini'),
      max_tokens: z.number().default(600),
      temperature: z.number().default(0.3),
      timeout_ms: z.number().default(30000),
    })
    .default({}),

  embedding: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('text-embedding-3-small'),
      dimensions: z.number().int().positive().default(768),
      batch_size: z.number().int().positive().default(256),
      timeout_ms: z.number().default(60000),
    })
    .default({}),

  enrich: z
    .object({
      concurrency: z.number().int().positive().default(5),
      progress_every: z.number().int().positive().default(10),
    })
    .default({}),

  cache: z
    .object({
      path: z.string().default('~/.star-index/stars.json'),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.star-index/star-index.db'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = raw[key];
  const value = isRecord(existing) ? existing : {};
  raw[key] = value;
  return value;
}

// [env var, config section, config key]
const ENV_OVERRIDES: ReadonlyArray<readonly [string, string, string]> = [
  ['GITHUB_TOKEN', 'github', 'token'],
  ['STAR_LIST_ID', 'github', 'star_list_id'],
  ['LLM_BASE_URL', 'llm', 'base_url'],
  ['LLM_API_KEY', 'llm', 'api_key'],
  ['LLM_MODEL', 'llm', 'model'],
  ['EMBEDDING_BASE_URL', 'embedding', 'base_url'],
  ['EMBEDDING_API_KEY', 'embedding', 'api_key'],
  ['EMBEDDING_MODEL', 'embedding', 'model'],
];

/**
 * Apply environment variable overrides onto a raw (unvalidated) config object in place.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  for (const [name, sectionKey, key] of ENV_OVERRIDES) {
    const value = env[name];
    if (value) section(rawConfig, sectionKey)[key] = value;
  }
  return rawConfig;
}

export function parseConfig(rawConfig: Record<string, unknown>): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('star-index', {
    searchPlaces: [
      'star-index.config.yaml',
      'star-index.config.yml',
      '.star-indexrc.yaml',
      '.star-indexrc.yml',
    ],
  });

  const envConfigPath = process.env['STAR_INDEX_CONFIG'];
  const defaultConfigPath = path.join(getStarIndexDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = isRecord(result?.config) ? result.config : {};
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = isRecord(result?.config) ? result.config : {};
  } else {
    const result = await explorer.search();
    if (result && isRecord(result.config)) {
      rawConfig = result.config;
      logger.debug({ path: result.filepath }, 'Using project config');
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
