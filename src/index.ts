export * from './shared/errors.js';
export { PLATFORMS, PlatformSchema, isPlatform, parsePlatform } from './shared/platform.js';
export type { Platform } from './shared/platform.js';
export { ConfigSchema, loadConfig, generateDefaultConfig } from './shared/config.js';
export type { Config, PlatformSettings } from './shared/config.js';
export { openDatabase, getDb, closeDb } from './db/db.js';
export type { OpenedDb, OpenOptions } from './db/db.js';
export { runMigrations } from './db/migrate.js';

export * from './post/types.js';
export * from './post/postStore.js';
export * from './post/metrics.js';

export { contentHash, normalizeText, normalizeUrl } from './dedup/fingerprint.js';
export { jaccardSimilarity, jaccardTitleSimilarity, titleTokens } from './dedup/similarity.js';
export type { TitleSimilarity } from './dedup/similarity.js';
export { DedupEngine, DEFAULT_LOOKBACK_HOURS } from './dedup/dedupEngine.js';
export type { DedupCandidate, DuplicateMatch } from './dedup/dedupEngine.js';

export { RateLimiter, CONSERVATIVE_LIMITS } from './ratelimit/rateLimiter.js';
export type {
  RateDecision,
  RateLimits,
  RateLimitReason,
  RateReservation,
  ReserveResult,
} from './ratelimit/rateLimiter.js';

export * from './schedule/engagement.js';
export { SchedulingOptimizer, nextOccurrence } from './schedule/optimizer.js';
export type { PlatformScheduleSettings, ScheduleEntry, SlotChoice } from './schedule/optimizer.js';

export type { AdapterRegistry, AdapterResult, AdapterStatus, PlatformAdapter } from './publish/adapter.js';
export { DefaultFormatter } from './publish/formatter.js';
export type { ContentFormatter, FormattedPost, DevtoPost, MastodonPost, RedditPost } from './publish/formatter.js';
export { DryRunAdapter, dryRunAdapters } from './publish/dryRunAdapter.js';
export { authenticateAll, checkStatuses, DEFAULT_HEALTH_TIMEOUT_MS } from './publish/health.js';
export { Dispatcher, DUPLICATE_ERROR, CANCELLED_ERROR } from './publish/dispatcher.js';
export type { PublishResult, ScheduleResult, PublishOptions, DispatcherDeps } from './publish/dispatcher.js';

export { runDuePosts, startWorker, stopWorker } from './worker/scheduler.js';
export type { DueRunStats } from './worker/scheduler.js';

export { createPipeline } from './pipeline.js';
export type { Pipeline, PipelineOptions } from './pipeline.js';
