import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { Content, ContentInput, Post, SkipReason } from '../post/types.js';
import { ContentSchema } from '../post/types.js';
import {
  createPost,
  getPost,
  isTerminal,
  markFailed,
  markGenerated,
  markPosted,
  markScheduled,
  postContent,
} from '../post/postStore.js';
import { contentHash } from '../dedup/fingerprint.js';
import { DedupEngine, DEFAULT_LOOKBACK_HOURS } from '../dedup/dedupEngine.js';
import type { RateLimiter, RateReservation } from '../ratelimit/rateLimiter.js';
import { SchedulingOptimizer } from '../schedule/optimizer.js';
import { StoreEngagementSource } from '../schedule/engagement.js';
import { parsePlatform } from '../shared/platform.js';
import type { Platform } from '../shared/platform.js';
import { sleep, withConcurrency, withTimeout } from '../shared/utils.js';
import {
  AdapterAuthError,
  AdapterTransientError,
  DispatchError,
  ExhaustedRetriesError,
  errorMessage,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { AdapterRegistry, PlatformAdapter } from './adapter.js';
import { DefaultFormatter } from './formatter.js';
import type { ContentFormatter, FormattedPost } from './formatter.js';
import { KeyedMutex } from './keyedMutex.js';

export const DUPLICATE_ERROR = 'duplicate content detected';
export const CANCELLED_ERROR = 'cancelled';

export interface PublishResult {
  platform: Platform;
  success: boolean;
  postId?: string;
  remoteId?: string;
  url?: string;
  error?: string;
  waitSeconds?: number;
  skipped?: SkipReason;
  attempts: number;
}

export interface ScheduleResult {
  platform: Platform;
  success: boolean;
  postId?: string;
  scheduledFor?: Date;
  predictedEngagement?: number;
  error?: string;
  skipped?: SkipReason;
}

export interface PublishOptions {
  signal?: AbortSignal;
}

export interface DispatcherDeps {
  db: Database.Database;
  config: Config;
  adapters: AdapterRegistry;
  rateLimiter: RateLimiter;
  dedup?: DedupEngine;
  optimizer?: SchedulingOptimizer;
  formatter?: ContentFormatter;
}

export function rateLimitMessage(platform: Platform, waitSeconds: number): string {
  return `rate limit exceeded for ${platform}, retry in ${waitSeconds}s`;
}

export function unconfiguredMessage(platform: Platform): string {
  return `platform not configured: ${platform}`;
}

type Outcome = { kind: 'posted'; remoteId?: string; url?: string } | { kind: 'failed'; error: string };

/**
 * Drives content through dedup, rate limiting, formatting and the platform
 * adapter, recording every attempt in the post store.
 */
export class Dispatcher {
  private readonly db: Database.Database;
  private readonly config: Config;
  private readonly adapters: AdapterRegistry;
  private readonly rateLimiter: RateLimiter;
  private readonly dedup: DedupEngine;
  private readonly optimizer: SchedulingOptimizer;
  private readonly formatter: ContentFormatter;
  private readonly locks = new KeyedMutex();

  constructor(deps: DispatcherDeps) {
    this.db = deps.db;
    this.config = deps.config;
    this.adapters = deps.adapters;
    this.rateLimiter = deps.rateLimiter;
    this.dedup = deps.dedup ?? new DedupEngine(deps.db);
    this.optimizer =
      deps.optimizer ??
      new SchedulingOptimizer(
        deps.db,
        new StoreEngagementSource(deps.db, deps.config.schedule.history_days),
        deps.config.schedule,
        deps.config.platforms,
      );
    this.formatter = deps.formatter ?? new DefaultFormatter();
  }

  /**
   * Publish to each platform now. Per-platform failures come back as result
   * values; only an unknown platform identifier or invalid content throws.
   */
  async publish(
    input: ContentInput,
    platforms?: readonly string[],
    options: PublishOptions = {},
  ): Promise<Partial<Record<Platform, PublishResult>>> {
    const content = this.parseContent(input);
    const targets = this.resolveTargets(content, platforms);
    const results: Partial<Record<Platform, PublishResult>> = {};

    await withConcurrency(targets, this.config.dispatch.concurrency, async (platform) => {
      results[platform] = await this.publishOne(content, platform, options.signal);
    });

    const posted = targets.filter((p) => results[p]?.success).length;
    logger.info({ title: content.title, platforms: targets, posted }, 'Publish finished');
    return results;
  }

  /**
   * Reserve an optimal future slot on each platform and store the post as
   * `scheduled`. The due-post worker publishes it later.
   */
  async schedule(
    input: ContentInput,
    platforms?: readonly string[],
  ): Promise<Partial<Record<Platform, ScheduleResult>>> {
    const content = this.parseContent(input);
    const targets = this.resolveTargets(content, platforms);
    const results: Partial<Record<Platform, ScheduleResult>> = {};

    for (const platform of targets) {
      results[platform] = await this.locks.run<ScheduleResult>(this.lockKey(platform, content), async () => {
        try {
          return await this.scheduleOne(content, platform);
        } catch (err) {
          logger.error({ platform, error: errorMessage(err) }, 'Scheduling failed');
          return { platform, success: false, error: errorMessage(err) };
        }
      });
    }
    return results;
  }

  /**
   * Publish a row stored as `scheduled`. When the rate limiter says no the row
   * stays scheduled and the result carries the wait hint.
   */
  async dispatchScheduled(post: Post, options: PublishOptions = {}): Promise<PublishResult> {
    const platform = post.platform;
    if (post.status !== 'scheduled') {
      return {
        platform,
        success: false,
        postId: post.id,
        error: `post ${post.id} is ${post.status}, not scheduled`,
        attempts: post.attempts,
      };
    }

    return this.locks.run<PublishResult>(`${platform}:${post.content_hash}`, async () => {
      const current = getPost(this.db, post.id);
      if (!current || current.status !== 'scheduled') {
        return {
          platform,
          success: false,
          postId: post.id,
          error: `post ${post.id} is no longer scheduled`,
          attempts: current?.attempts ?? post.attempts,
        };
      }

      let reservation: RateReservation | null = null;
      try {
        const adapter = this.adapters[platform];
        if (!adapter) {
          const error = unconfiguredMessage(platform);
          markFailed(this.db, post.id, error, 0);
          return { platform, success: false, postId: post.id, error, skipped: 'unconfigured', attempts: 0 };
        }

        const { decision, reservation: held } = this.rateLimiter.reserve(platform);
        reservation = held;
        if (!reservation) {
          return {
            platform,
            success: false,
            postId: post.id,
            error: rateLimitMessage(platform, decision.waitSeconds),
            waitSeconds: decision.waitSeconds,
            skipped: 'rate_limited',
            attempts: current.attempts,
          };
        }

        const formatted = this.formatter.format(postContent(current), platform);
        return await this.deliver(current.id, platform, adapter, formatted, reservation, options.signal);
      } catch (err) {
        return this.failUnexpected(post.id, platform, err);
      } finally {
        if (reservation) this.rateLimiter.release(reservation);
      }
    });
  }

  private async publishOne(content: Content, platform: Platform, signal?: AbortSignal): Promise<PublishResult> {
    return this.locks.run<PublishResult>(this.lockKey(platform, content), async () => {
      let postId: string | undefined;
      let reservation: RateReservation | null = null;
      try {
        const adapter = this.adapters[platform];
        if (!adapter) {
          return this.skip(content, platform, 'unconfigured', unconfiguredMessage(platform));
        }

        if (this.isDuplicate(content, platform)) {
          return this.skip(content, platform, 'duplicate', DUPLICATE_ERROR);
        }

        const { decision, reservation: held } = this.rateLimiter.reserve(platform);
        reservation = held;
        if (!reservation) {
          const result = this.skip(content, platform, 'rate_limited', rateLimitMessage(platform, decision.waitSeconds));
          return { ...result, waitSeconds: decision.waitSeconds };
        }

        postId = createPost(this.db, { platform, content });
        const formatted = this.formatter.format(content, platform);
        markGenerated(this.db, postId, formatted);

        return await this.deliver(postId, platform, adapter, formatted, reservation, signal);
      } catch (err) {
        return this.failUnexpected(postId, platform, err);
      } finally {
        if (reservation) this.rateLimiter.release(reservation);
      }
    });
  }

  private async scheduleOne(content: Content, platform: Platform): Promise<ScheduleResult> {
    if (!this.adapters[platform]) {
      const { postId, error } = this.skip(content, platform, 'unconfigured', unconfiguredMessage(platform));
      return { platform, success: false, postId, error, skipped: 'unconfigured' };
    }
    if (this.isDuplicate(content, platform)) {
      const { postId } = this.skip(content, platform, 'duplicate', DUPLICATE_ERROR);
      return { platform, success: false, postId, error: DUPLICATE_ERROR, skipped: 'duplicate' };
    }

    const slot = await this.optimizer.optimalTime(platform, content);
    const postId = createPost(this.db, { platform, content });
    markGenerated(this.db, postId, this.formatter.format(content, platform));
    markScheduled(this.db, postId, slot.scheduledFor);

    logger.info({ postId, platform, scheduledFor: slot.scheduledFor.toISOString() }, 'Post scheduled');
    return {
      platform,
      success: true,
      postId,
      scheduledFor: slot.scheduledFor,
      predictedEngagement: slot.score,
    };
  }

  /**
   * Adapter call with bounded retries. Writes the terminal status of the row
   * and commits the rate reservation on success.
   */
  private async deliver(
    postId: string,
    platform: Platform,
    adapter: PlatformAdapter,
    formatted: FormattedPost,
    reservation: RateReservation,
    signal?: AbortSignal,
  ): Promise<PublishResult> {
    const { max_retries: maxRetries, retry_base_delay_ms: baseDelay, post_timeout_ms: timeoutMs } =
      this.config.dispatch;
    let attempts = 0;

    const outcome = await (async (): Promise<Outcome> => {
      let lastError = 'no attempt made';
      for (let attempt = 0; attempt < maxRetries; attempt++) {
        if (signal?.aborted) return { kind: 'failed', error: CANCELLED_ERROR };
        attempts++;

        try {
          const result = await withTimeout(
            adapter.postContent(formatted),
            timeoutMs,
            () => new AdapterTransientError(`${platform} post timed out after ${timeoutMs}ms`),
          );
          if (result.success) {
            return { kind: 'posted', remoteId: result.remoteId, url: result.url };
          }
          lastError = result.error ?? `${platform} rejected the post`;
          if (result.retryable === false) return { kind: 'failed', error: lastError };
        } catch (err) {
          lastError = errorMessage(err);
          if (err instanceof AdapterAuthError) return { kind: 'failed', error: lastError };
        }

        logger.warn({ postId, platform, attempt: attempts, error: lastError }, 'Post attempt failed');
        if (attempt < maxRetries - 1) {
          await sleep(baseDelay * 2 ** attempt, signal);
        }
      }
      if (signal?.aborted) return { kind: 'failed', error: CANCELLED_ERROR };
      return {
        kind: 'failed',
        error: new ExhaustedRetriesError(`${platform}: gave up after ${attempts} attempts: ${lastError}`).message,
      };
    })();

    if (outcome.kind === 'posted') {
      this.rateLimiter.commit(reservation);
      markPosted(this.db, postId, { remoteId: outcome.remoteId, url: outcome.url, attempts });
      logger.info({ postId, platform, remoteId: outcome.remoteId, attempts }, 'Post published');
      return {
        platform,
        success: true,
        postId,
        remoteId: outcome.remoteId,
        url: outcome.url,
        attempts,
      };
    }

    markFailed(this.db, postId, outcome.error, attempts);
    logger.error({ postId, platform, attempts, error: outcome.error }, 'Post failed');
    return { platform, success: false, postId, error: outcome.error, attempts };
  }

  private isDuplicate(content: Content, platform: Platform): boolean {
    const lookback =
      this.config.platforms[platform]?.dedup_lookback_hours ?? DEFAULT_LOOKBACK_HOURS[platform];
    return this.dedup.isDuplicate(
      platform,
      { content: content.body, title: content.title, url: content.sourceUrl },
      lookback,
    );
  }

  /** Record a skipped attempt as a failed row and build its result. */
  private skip(content: Content, platform: Platform, reason: SkipReason, error: string): PublishResult {
    const postId = createPost(this.db, {
      platform,
      content,
      status: 'failed',
      skipReason: reason,
      errorMessage: error,
    });
    logger.info({ postId, platform, reason }, 'Post skipped');
    return { platform, success: false, postId, error, skipped: reason, attempts: 0 };
  }

  private failUnexpected(postId: string | undefined, platform: Platform, err: unknown): PublishResult {
    const error = errorMessage(err);
    logger.error({ postId, platform, error }, 'Dispatch failed unexpectedly');
    if (postId) {
      const post = getPost(this.db, postId);
      if (post && !isTerminal(post.status)) {
        markFailed(this.db, postId, error);
      }
    }
    return { platform, success: false, postId, error, attempts: 0 };
  }

  private parseContent(input: ContentInput): Content {
    // Unknown platforms surface as InvalidPlatformError, not a schema error.
    for (const p of input.targetPlatforms ?? []) parsePlatform(p);
    const parsed = ContentSchema.safeParse(input);
    if (!parsed.success) {
      throw new DispatchError('Invalid content', { errors: parsed.error.flatten().fieldErrors });
    }
    return parsed.data;
  }

  private resolveTargets(content: Content, platforms?: readonly string[]): Platform[] {
    const requested = platforms ?? content.targetPlatforms;
    const targets = [...new Set(requested.map((p) => parsePlatform(p)))];
    if (targets.length === 0) {
      logger.warn({ title: content.title }, 'No target platforms given');
    }
    return targets;
  }

  private lockKey(platform: Platform, content: Content): string {
    return `${platform}:${contentHash(content)}`;
  }
}
