import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getNewsfoldDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) ' +
  'AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

export const ConfigSchema = z.object({
  enrich: z
    .object({
      enabled: z.boolean().default(true),
      max_fetch_per_run: z.number().int().min(0).default(200),
      /** Seconds per article request. */
      request_timeout: z.number().positive().default(8),
      max_workers: z.number().int().min(1).default(8),
      miss_ttl_hours: z.number().min(0).default(24),
      /** Seconds for the whole enrichment phase; 0 disables the deadline. */
      phase_timeout: z.number().min(0).default(0),
      user_agent: z.string().default(DEFAULT_USER_AGENT),
      max_body_bytes: z.number().int().positive().default(800_000),
    })
    .default({}),

  cache: z
    .object({
      path: z.string().default('~/.newsfold/publish_time_cache.db'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type EnrichConfig = Config['enrich'];

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

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

/**
 * Apply NEWSFOLD_* environment overrides on top of the file config.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const result = { ...rawConfig };

  const enabled = env['NEWSFOLD_ENRICH_ENABLED'];
  if (enabled !== undefined && enabled !== '') {
    const normalized = enabled.trim().toLowerCase();
    if (normalized !== 'true' && normalized !== 'false') {
      throw new ConfigError(`NEWSFOLD_ENRICH_ENABLED must be "true" or "false", got "${enabled}"`);
    }
    result['enrich'] = { ...asRecord(result['enrich']), enabled: normalized === 'true' };
  }

  const cachePath = env['NEWSFOLD_CACHE_PATH'];
  if (cachePath) {
    result['cache'] = { ...asRecord(result['cache']), path: cachePath };
  }

  return result;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('newsfold', {
    searchPlaces: [
      'newsfold.config.yaml',
      'newsfold.config.yml',
      '.newsfoldrc.yaml',
      '.newsfoldrc.yml',
    ],
  });

  const envConfigPath = process.env['NEWSFOLD_CONFIG'];
  const defaultConfigPath = path.join(getNewsfoldDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = asRecord(result?.config);
  } else {
    logger.debug('No config file found, using defaults');
  }

  const parsed = ConfigSchema.safeParse(applyEnvOverrides(rawConfig));
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
