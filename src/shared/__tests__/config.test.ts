import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ConfigSchema,
  generateDefaultConfig,
  generateDefaultConfigYaml,
  loadConfig,
  resetConfigCache,
  writeDefaultConfig,
} from '../config.js';
import { ConfigError } from '../errors.js';

describe('ConfigSchema', () => {
  it('produces valid defaults from empty object', () => {
    const result = ConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.db.path).toBe('~/.relaypost/relaypost.db');
      expect(result.data.dispatch.max_retries).toBe(3);
      expect(result.data.schedule.min_interval_hours).toBe(2);
      expect(result.data.worker.dispatch_cron).toBe('*/5 * * * *');
    }
  });

  it('ships per-platform limits and lookback windows', () => {
    const config = generateDefaultConfig();
    expect(config.platforms.devto).toEqual({
      posts_per_hour: 2,
      posts_per_day: 5,
      min_interval_seconds: 1800,
      dedup_lookback_hours: 720,
    });
    expect(config.platforms.reddit?.dedup_lookback_hours).toBe(2160);
    expect(config.platforms.mastodon?.dedup_lookback_hours).toBe(24);
  });

  it('accepts valid overrides and keeps other defaults', () => {
    const result = ConfigSchema.safeParse({ dispatch: { max_retries: 5 } });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.dispatch.max_retries).toBe(5);
      expect(result.data.dispatch.post_timeout_ms).toBe(20000);
    }
  });

  it('rejects unknown platforms', () => {
    const result = ConfigSchema.safeParse({
      platforms: {
        myspace: { posts_per_hour: 1, posts_per_day: 1, min_interval_seconds: 0, dedup_lookback_hours: 1 },
      },
    });
    expect(result.success).toBe(false);
  });

  it('rejects invalid types', () => {
    const result = ConfigSchema.safeParse({ schedule: { min_interval_hours: 'two' } });
    expect(result.success).toBe(false);
  });
});

describe('generateDefaultConfigYaml', () => {
  it('returns a YAML string', () => {
    const yaml = generateDefaultConfigYaml();
    expect(yaml).toContain('dispatch_cron');
    expect(yaml).toContain('dedup_lookback_hours: 2160');
  });
});

describe('loadConfig', () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    delete process.env['RELAYPOST_CONFIG'];
    delete process.env['RELAYPOST_DB_PATH'];
    resetConfigCache();
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  it('reads the file named by RELAYPOST_CONFIG and applies the db override', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relaypost-config-'));
    const configPath = path.join(tmpDir, 'config.yaml');
    fs.writeFileSync(configPath, 'dispatch:\n  concurrency: 7\n', 'utf-8');
    process.env['RELAYPOST_CONFIG'] = configPath;
    process.env['RELAYPOST_DB_PATH'] = ':memory:';

    const config = await loadConfig(true);
    expect(config.dispatch.concurrency).toBe(7);
    expect(config.db.path).toBe(':memory:');
  });

  it('round-trips the generated default file', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relaypost-config-'));
    const configPath = path.join(tmpDir, 'nested', 'config.yaml');
    writeDefaultConfig(configPath);
    process.env['RELAYPOST_CONFIG'] = configPath;

    const config = await loadConfig(true);
    expect(config).toEqual(generateDefaultConfig());
  });

  it('throws ConfigError for a missing explicit file', async () => {
    process.env['RELAYPOST_CONFIG'] = '/nonexistent/relaypost.yaml';
    await expect(loadConfig(true)).rejects.toBeInstanceOf(ConfigError);
  });

  it('throws ConfigError for invalid values', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relaypost-config-'));
    const configPath = path.join(tmpDir, 'config.yaml');
    fs.writeFileSync(configPath, 'dispatch:\n  concurrency: 0\n', 'utf-8');
    process.env['RELAYPOST_CONFIG'] = configPath;

    await expect(loadConfig(true)).rejects.toBeInstanceOf(ConfigError);
  });
});
