import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { PostMetrics } from './types.js';
import { getPost } from './postStore.js';
import { nowISO } from '../shared/utils.js';
import { PostStateError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const MetricCountersSchema = z.object({
  likes: z.number().int().min(0).optional(),
  comments: z.number().int().min(0).optional(),
  shares: z.number().int().min(0).optional(),
  views: z.number().int().min(0).optional(),
  clicks: z.number().int().min(0).optional(),
  platform: z.record(z.unknown()).optional(),
});

export type MetricCounters = z.infer<typeof MetricCountersSchema>;

const HistorySchema = z.array(z.unknown());
const PlatformMetricsSchema = z.record(z.unknown());

function parseStored<T>(schema: z.ZodType<T>, raw: string, fallback: T): T {
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : fallback;
  } catch {
    return fallback;
  }
}

type Counters = Pick<PostMetrics, 'likes' | 'comments' | 'shares' | 'views' | 'clicks'>;

const PERFORMANCE_WEIGHTS: Counters = {
  likes: 1.0,
  comments: 2.0,
  shares: 3.0,
  clicks: 1.5,
  views: 0.5,
};

/**
 * Weighted interactions per view. Comments count double, shares triple.
 */
export function computeEngagementRate(m: Counters): number {
  const weighted = m.likes + m.comments * 2 + m.shares * 3;
  return weighted / Math.max(1, m.views);
}

/** 0–100. */
export function computePerformanceScore(m: Counters): number {
  const weighted =
    m.likes * PERFORMANCE_WEIGHTS.likes +
    m.comments * PERFORMANCE_WEIGHTS.comments +
    m.shares * PERFORMANCE_WEIGHTS.shares +
    m.clicks * PERFORMANCE_WEIGHTS.clicks +
    m.views * PERFORMANCE_WEIGHTS.views;
  return Math.min(100, weighted / 100);
}

export function getMetrics(db: Database.Database, postId: string): PostMetrics | undefined {
  return db.prepare('SELECT * FROM post_metrics WHERE post_id = ?').get(postId) as
    | PostMetrics
    | undefined;
}

/**
 * Merge a polling snapshot into the metrics row of a posted post, creating the
 * row on first use. Every snapshot is appended to `history_json`.
 */
export function updateMetrics(
  db: Database.Database,
  postId: string,
  input: MetricCounters,
): PostMetrics {
  const parsed = MetricCountersSchema.safeParse(input);
  if (!parsed.success) {
    throw new PostStateError(`Invalid metrics for post ${postId}`, {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  const snapshot = parsed.data;

  const post = getPost(db, postId);
  if (!post) {
    throw new PostStateError(`Post not found: ${postId}`, { id: postId });
  }
  if (post.status !== 'posted') {
    throw new PostStateError(`Metrics can only be tracked for posted posts (post ${postId} is ${post.status})`, {
      id: postId,
      status: post.status,
    });
  }

  const existing = getMetrics(db, postId);
  const now = nowISO();
  const counters: Counters = {
    likes: snapshot.likes ?? existing?.likes ?? 0,
    comments: snapshot.comments ?? existing?.comments ?? 0,
    shares: snapshot.shares ?? existing?.shares ?? 0,
    views: snapshot.views ?? existing?.views ?? 0,
    clicks: snapshot.clicks ?? existing?.clicks ?? 0,
  };

  const history = existing ? parseStored(HistorySchema, existing.history_json, []) : [];
  history.push({ timestamp: now, metrics: snapshot });

  const platformMetrics = {
    ...(existing ? parseStored(PlatformMetricsSchema, existing.platform_metrics_json, {}) : {}),
    ...(snapshot.platform ?? {}),
  };

  db.prepare(
    `INSERT INTO post_metrics
     (post_id, likes, comments, shares, views, clicks, engagement_rate, performance_score,
      platform_metrics_json, history_json, first_tracked_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(post_id) DO UPDATE SET
       likes = excluded.likes,
       comments = excluded.comments,
       shares = excluded.shares,
       views = excluded.views,
       clicks = excluded.clicks,
       engagement_rate = excluded.engagement_rate,
       performance_score = excluded.performance_score,
       platform_metrics_json = excluded.platform_metrics_json,
       history_json = excluded.history_json,
       updated_at = excluded.updated_at`,
  ).run(
    postId,
    counters.likes,
    counters.comments,
    counters.shares,
    counters.views,
    counters.clicks,
    computeEngagementRate(counters),
    computePerformanceScore(counters),
    JSON.stringify(platformMetrics),
    JSON.stringify(history),
    existing?.first_tracked_at ?? now,
    now,
  );

  logger.debug({ postId, ...counters }, 'Metrics updated');

  const row = getMetrics(db, postId);
  if (!row) {
    throw new PostStateError(`Metrics row missing after update for post ${postId}`, { id: postId });
  }
  return row;
}
