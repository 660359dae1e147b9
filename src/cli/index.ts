#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import type { Config } from '../shared/config.js';
import { getRelaypostDir, resolvePath } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { PLATFORMS, parsePlatform } from '../shared/platform.js';
import type { Platform } from '../shared/platform.js';
import { openDatabase, closeDb } from '../db/db.js';
import type { OpenedDb } from '../db/db.js';
import { countByStatus, getPost, isPostStatus, queryPosts } from '../post/postStore.js';
import { getMetrics } from '../post/metrics.js';
import { ContentSchema } from '../post/types.js';
import type { Content, PostStatus } from '../post/types.js';
import { createPipeline } from '../pipeline.js';
import { dryRunAdapters } from '../publish/dryRunAdapter.js';
import { authenticateAll, checkStatuses } from '../publish/health.js';
import { startWorker, stopWorker, runDuePosts } from '../worker/scheduler.js';

const program = new Command();

program
  .name('relaypost')
  .description('Multi-platform publishing pipeline with dedup, rate limits and slot scheduling')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create config and database')
  .action(async () => {
    const configPath = path.join(getRelaypostDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log('✓ ~/.relaypost/config.yaml created');
    } else {
      log('✓ ~/.relaypost/config.yaml already exists');
    }

    const config = await loadConfig();
    const { migrations } = openDatabase(config.db.path, { create: true });
    const { applied } = migrations;
    if (applied.length > 0) {
      log(`✓ ${config.db.path} created (${applied.length} migrations applied)`);
    } else {
      log(`✓ ${config.db.path} already up to date`);
    }
    closeDb();
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, database and platform adapters')
  .action(async () => {
    const results: string[] = [];

    try {
      const config = await loadConfig();
      results.push('Config: ok');

      if (!fs.existsSync(resolvePath(config.db.path))) {
        results.push('DB: missing (run relaypost init)');
      } else {
        try {
          const { db } = openDatabase(config.db.path);
          const counts = countByStatus(db);
          results.push(`DB: ok (${counts.posted} posted, ${counts.scheduled} scheduled, ${counts.failed} failed)`);

          const adapters = dryRunAdapters(configuredPlatforms(config));
          const { rateLimiter } = createPipeline(db, config, adapters);
          const timeoutMs = config.dispatch.post_timeout_ms;
          const [auth, statuses] = await Promise.all([
            authenticateAll(adapters, timeoutMs),
            checkStatuses(adapters, timeoutMs),
          ]);
          for (const platform of configuredPlatforms(config)) {
            const wait = rateLimiter.waitSeconds(platform);
            const status = statuses[platform];
            const health = status?.healthy ? 'healthy' : `unhealthy${status?.detail ? ` (${status.detail})` : ''}`;
            results.push(
              `${platform}: ${auth[platform] ? 'auth ok' : 'auth failed'}, ${health}, ` +
                `${wait === 0 ? 'ready' : `rate limited ${wait}s`}`,
            );
          }
        } catch (err) {
          results.push(`DB: error (${errorMessage(err)})`);
        } finally {
          closeDb();
        }
      }
    } catch (err) {
      results.unshift(`Config: error (${errorMessage(err)})`);
      process.exitCode = 1;
    }

    log(`✓ ${results.join(' | ')}`);
  });

// === posts ===
const postsCmd = program.command('posts').description('Inspect stored posts');

postsCmd
  .command('list')
  .description('List recent posts')
  .option('-p, --platform <platform>', 'Filter by platform')
  .option('-s, --status <status>', 'Filter by status')
  .option('-n, --limit <n>', 'Maximum rows', '20')
  .action(async (opts: { platform?: string; status?: string; limit: string }) => {
    let status: PostStatus | undefined;
    if (opts.status !== undefined) {
      if (!isPostStatus(opts.status)) {
        log(`Unknown status: ${opts.status}`);
        process.exitCode = 1;
        return;
      }
      status = opts.status;
    }

    const { db, cleanup } = await openDb();
    try {
      const posts = queryPosts(db, {
        platform: opts.platform,
        status,
        limit: parseInt(opts.limit, 10) || 20,
      });
      if (posts.length === 0) {
        log('No posts.');
        return;
      }
      for (const p of posts) {
        const when = p.posted_at ?? p.scheduled_for ?? p.created_at;
        const note = p.skip_reason ?? p.error_message ?? p.remote_url ?? '';
        log(`${p.id}  ${p.platform.padEnd(9)} ${p.status.padEnd(10)} ${when}  ${p.title.slice(0, 50)}  ${note}`);
      }
    } finally {
      cleanup();
    }
  });

postsCmd
  .command('show <id>')
  .description('Show one post with its metrics')
  .action(async (id: string) => {
    const { db, cleanup } = await openDb();
    try {
      const post = getPost(db, id);
      if (!post) {
        log(`Post not found: ${id}`);
        process.exitCode = 1;
        return;
      }
      log(JSON.stringify({ post, metrics: getMetrics(db, id) ?? null }, null, 2));
    } finally {
      cleanup();
    }
  });

postsCmd
  .command('stats')
  .description('Count posts by status')
  .action(async () => {
    const { db, cleanup } = await openDb();
    try {
      for (const [status, count] of Object.entries(countByStatus(db))) {
        log(`${status.padEnd(10)} ${count}`);
      }
    } finally {
      cleanup();
    }
  });

// === publish / schedule (dry run) ===
program
  .command('publish <file>')
  .description('Publish a content JSON file through dry-run adapters')
  .option('-p, --platforms <list>', 'Comma-separated platforms (default: content targetPlatforms)')
  .action(async (file: string, opts: { platforms?: string }) => {
    const content = readContentFile(file);
    const { db, config, cleanup } = await openDb();
    try {
      const { dispatcher } = createPipeline(db, config, dryRunAdapters(configuredPlatforms(config)));
      const results = await dispatcher.publish(content, splitList(opts.platforms));
      for (const r of Object.values(results)) {
        if (!r) continue;
        log(`${r.platform.padEnd(9)} ${r.success ? `✓ ${r.url ?? ''}` : `✗ ${r.error ?? ''}`}`);
      }
    } finally {
      cleanup();
    }
  });

program
  .command('schedule <file>')
  .description('Reserve optimal slots for a content JSON file')
  .option('-p, --platforms <list>', 'Comma-separated platforms (default: content targetPlatforms)')
  .action(async (file: string, opts: { platforms?: string }) => {
    const content = readContentFile(file);
    const { db, config, cleanup } = await openDb();
    try {
      const { dispatcher } = createPipeline(db, config, dryRunAdapters(configuredPlatforms(config)));
      const results = await dispatcher.schedule(content, splitList(opts.platforms));
      for (const r of Object.values(results)) {
        if (!r) continue;
        log(`${r.platform.padEnd(9)} ${r.success ? `✓ ${r.scheduledFor?.toISOString() ?? ''}` : `✗ ${r.error ?? ''}`}`);
      }
    } finally {
      cleanup();
    }
  });

// === worker ===
program
  .command('worker')
  .description('Run the due-post worker (dry-run adapters)')
  .option('--once', 'Dispatch due posts once and exit')
  .action(async (opts: { once?: boolean }) => {
    const { db, config, cleanup } = await openDb();
    const { dispatcher } = createPipeline(db, config, dryRunAdapters(configuredPlatforms(config)));

    if (opts.once) {
      try {
        const stats = await runDuePosts(db, dispatcher);
        log(`✓ due ${stats.due} | posted ${stats.posted} | failed ${stats.failed} | deferred ${stats.deferred}`);
      } finally {
        cleanup();
      }
      return;
    }

    startWorker(db, config, dispatcher);
    const shutdown = (): void => {
      stopWorker();
      cleanup();
      process.exit(0);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

// === Helper to get DB connection ===
async function openDb(): Promise<{
  db: OpenedDb['db'];
  config: Config;
  cleanup: () => void;
}> {
  const config = await loadConfig();
  const { db } = openDatabase(config.db.path);
  return { db, config, cleanup: closeDb };
}

function configuredPlatforms(config: Config): Platform[] {
  return PLATFORMS.filter((p) => config.platforms[p] !== undefined);
}

function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => parsePlatform(s));
}

function readContentFile(file: string): Content {
  const resolved = resolvePath(file);
  if (!fs.existsSync(resolved)) {
    log(`File not found: ${resolved}`);
    process.exit(1);
  }
  const parsed = ContentSchema.safeParse(JSON.parse(fs.readFileSync(resolved, 'utf-8')));
  if (!parsed.success) {
    log(`Invalid content in ${resolved}: ${JSON.stringify(parsed.error.flatten().fieldErrors)}`);
    process.exit(1);
  }
  return parsed.data;
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`✗ ${errorMessage(err)}`);
  process.exitCode = 1;
});
