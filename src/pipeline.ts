import type Database from 'better-sqlite3';
import type { Config } from './shared/config.js';
import { RateLimiter } from './ratelimit/rateLimiter.js';
import { DedupEngine } from './dedup/dedupEngine.js';
import { SchedulingOptimizer } from './schedule/optimizer.js';
import { StoreEngagementSource } from './schedule/engagement.js';
import type { EngagementSource } from './schedule/engagement.js';
import { Dispatcher } from './publish/dispatcher.js';
import type { AdapterRegistry } from './publish/adapter.js';
import type { ContentFormatter } from './publish/formatter.js';

export interface Pipeline {
  rateLimiter: RateLimiter;
  dedup: DedupEngine;
  optimizer: SchedulingOptimizer;
  dispatcher: Dispatcher;
}

export interface PipelineOptions {
  engagementSource?: EngagementSource;
  formatter?: ContentFormatter;
}

/**
 * Wire the publishing components around one database handle. The rate
 * limiter is rebuilt from the last day of posts so restarts keep their caps.
 */
export function createPipeline(
  db: Database.Database,
  config: Config,
  adapters: AdapterRegistry,
  options: PipelineOptions = {},
): Pipeline {
  const rateLimiter = new RateLimiter(config.platforms);
  rateLimiter.rehydrate(db);

  const dedup = new DedupEngine(db);
  const optimizer = new SchedulingOptimizer(
    db,
    options.engagementSource ?? new StoreEngagementSource(db, config.schedule.history_days),
    config.schedule,
    config.platforms,
  );
  const dispatcher = new Dispatcher({
    db,
    config,
    adapters,
    rateLimiter,
    dedup,
    optimizer,
    formatter: options.formatter,
  });

  return { rateLimiter, dedup, optimizer, dispatcher };
}
