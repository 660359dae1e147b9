import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getRelaypostDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import { PlatformSchema } from './platform.js';

const PlatformSettingsSchema = z.object({
  posts_per_hour: z.number().int().min(0),
  posts_per_day: z.number().int().min(0),
  min_interval_seconds: z.number().min(0),
  dedup_lookback_hours: z.number().min(0),
  /** Scheduler spacing for this platform; falls back to `schedule.min_interval_hours`. */
  min_interval_hours: z.number().min(0).optional(),
});

export const ConfigSchema = z.object({
  db: z
    .object({
      path: z.string().default('~/.relaypost/relaypost.db'),
    })
    .default({}),

  platforms: z
    .record(PlatformSchema, PlatformSettingsSchema)
    .default({
      devto: { posts_per_hour: 2, posts_per_day: 5, min_interval_seconds: 1800, dedup_lookback_hours: 720 },
      mastodon: { posts_per_hour: 5, posts_per_day: 20, min_interval_seconds: 300, dedup_lookback_hours: 24 },
      reddit: { posts_per_hour: 5, posts_per_day: 20, min_interval_seconds: 300, dedup_lookback_hours: 2160 },
    }),

  dispatch: z
    .object({
      max_retries: z.number().int().min(1).default(3),
      retry_base_delay_ms: z.number().min(0).default(1000),
      post_timeout_ms: z.number().min(1).default(20000),
      concurrency: z.number().int().min(1).default(3),
    })
    .default({}),

  schedule: z
    .object({
      min_interval_hours: z.number().min(0).default(2),
      history_days: z.number().min(1).default(30),
      profile_timeout_ms: z.number().min(1).default(10000),
      business_start_hour: z.number().int().min(0).max(23).default(9),
      business_end_hour: z.number().int().min(0).max(23).default(17),
      business_penalty: z.number().min(0).max(1).default(0.7),
      lookahead_days: z.number().int().min(1).default(7),
    })
    .default({}),

  worker: z
    .object({
      dispatch_cron: z.string().default('*/5 * * * *'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type PlatformSettings = z.infer<typeof PlatformSettingsSchema>;

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

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('relaypost', {
    searchPlaces: [
      'relaypost.config.yaml',
      'relaypost.config.yml',
      '.relaypostrc.yaml',
      '.relaypostrc.yml',
    ],
  });

  const envConfigPath = process.env['RELAYPOST_CONFIG'];
  const defaultConfigPath = path.join(getRelaypostDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    if (isRecord(result?.config)) rawConfig = result.config;
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    if (isRecord(result?.config)) rawConfig = result.config;
  } else {
    const result = await explorer.search();
    if (isRecord(result?.config)) {
      rawConfig = result.config;
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const envDbPath = process.env['RELAYPOST_DB_PATH'];
  if (envDbPath) {
    const db = isRecord(rawConfig['db']) ? rawConfig['db'] : {};
    db['path'] = envDbPath;
    rawConfig['db'] = db;
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
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
