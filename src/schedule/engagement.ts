import type Database from 'better-sqlite3';
import type { Platform } from '../shared/platform.js';
import { HOUR_MS } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export const POST_KINDS = ['link', 'hashtag', 'mention', 'long_form', 'text'] as const;
export type PostKind = (typeof POST_KINDS)[number];

/**
 * Coarse shape of a post body, used to weigh time slots by how well that
 * kind of post has performed before.
 */
export function classifyPost(text: string): PostKind {
  const lower = text.toLowerCase();
  if (['http://', 'https://', 'www.'].some((p) => lower.includes(p))) return 'link';
  if (text.includes('#')) return 'hashtag';
  if (text.includes('@')) return 'mention';
  if (text.length > 280) return 'long_form';
  return 'text';
}

export interface HourBucket {
  /** UTC hour of day, 0–23. */
  hour: number;
  meanEngagement: number;
  sampleCount: number;
}

export interface WeekdayStats {
  mean: number;
  max: number;
  count: number;
}

export interface KindStats {
  mean: number;
  successRate: number;
  count: number;
}

export interface EngagementProfile {
  hourly: HourBucket[];
  /** Keyed by UTC weekday, 0 = Sunday. */
  weekdays: Partial<Record<number, WeekdayStats>>;
  kinds: Partial<Record<PostKind, KindStats>>;
}

/**
 * Supplies historical engagement aggregates for a platform.
 */
export interface EngagementSource {
  getProfile(platform: Platform): Promise<EngagementProfile>;
}

export function emptyProfile(): EngagementProfile {
  return { hourly: [], weekdays: {}, kinds: {} };
}

interface EngagementRow {
  body: string;
  posted_at: string;
  engagement_rate: number;
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((s, v) => s + v, 0) / values.length;
}

function pushTo<K>(map: Map<K, number[]>, key: K, value: number): void {
  const list = map.get(key);
  if (list) list.push(value);
  else map.set(key, [value]);
}

/**
 * Aggregate engagement of posted posts with metrics over the last `days`,
 * bucketed by UTC posting hour, UTC weekday and post kind.
 */
export function analyzeEngagement(
  db: Database.Database,
  platform: Platform,
  days: number,
  now: Date = new Date(),
): EngagementProfile {
  const since = new Date(now.getTime() - days * 24 * HOUR_MS).toISOString();
  const rows = db
    .prepare(
      `SELECT p.body, p.posted_at, m.engagement_rate
       FROM posts p
       JOIN post_metrics m ON m.post_id = p.id
       WHERE p.platform = ?
         AND p.status = 'posted'
         AND p.posted_at IS NOT NULL
         AND p.posted_at >= ?`,
    )
    .all(platform, since) as EngagementRow[];

  if (rows.length === 0) return emptyProfile();

  const byHour = new Map<number, number[]>();
  const byWeekday = new Map<number, number[]>();
  const byKind = new Map<PostKind, number[]>();

  for (const row of rows) {
    const postedAt = new Date(row.posted_at);
    pushTo(byHour, postedAt.getUTCHours(), row.engagement_rate);
    pushTo(byWeekday, postedAt.getUTCDay(), row.engagement_rate);
    pushTo(byKind, classifyPost(row.body), row.engagement_rate);
  }

  const profile = emptyProfile();

  for (const [hour, rates] of byHour) {
    profile.hourly.push({ hour, meanEngagement: mean(rates), sampleCount: rates.length });
  }
  profile.hourly.sort((a, b) => b.meanEngagement - a.meanEngagement);

  for (const [weekday, rates] of byWeekday) {
    profile.weekdays[weekday] = { mean: mean(rates), max: Math.max(...rates), count: rates.length };
  }

  for (const [kind, rates] of byKind) {
    profile.kinds[kind] = {
      mean: mean(rates),
      successRate: rates.filter((r) => r > 0).length / rates.length,
      count: rates.length,
    };
  }

  logger.debug({ platform, posts: rows.length, buckets: profile.hourly.length }, 'Engagement analyzed');
  return profile;
}

/**
 * Default engagement source: the post store's own history.
 */
export class StoreEngagementSource implements EngagementSource {
  constructor(
    private readonly db: Database.Database,
    private readonly historyDays: number,
  ) {}

  async getProfile(platform: Platform): Promise<EngagementProfile> {
    return analyzeEngagement(this.db, platform, this.historyDays);
  }
}
