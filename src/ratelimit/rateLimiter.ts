import type Database from 'better-sqlite3';
import type { PlatformSettings } from '../shared/config.js';
import type { Platform } from '../shared/platform.js';
import { PLATFORMS } from '../shared/platform.js';
import { HOUR_MS, hoursAgoISO } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

const DAY_MS = 24 * HOUR_MS;
const MAX_HISTORY = 1000;

export interface RateLimits {
  postsPerHour: number;
  postsPerDay: number;
  minIntervalSeconds: number;
}

/** Used for any platform without configured limits. */
export const CONSERVATIVE_LIMITS: RateLimits = {
  postsPerHour: 1,
  postsPerDay: 24,
  minIntervalSeconds: 3600,
};

export type RateLimitReason = 'min_interval' | 'hourly_cap' | 'daily_cap';

export interface RateDecision {
  allowed: boolean;
  reason?: RateLimitReason;
  waitSeconds: number;
}

/** An admitted post whose adapter call has not finished yet. */
export interface RateReservation {
  readonly platform: Platform;
  readonly reservedAt: number;
}

export interface ReserveResult {
  decision: RateDecision;
  reservation: RateReservation | null;
}

interface RateWindow {
  /** Oldest first, nothing older than 24h after a roll. */
  postTimestamps: number[];
  hourlyCount: number;
  dailyCount: number;
  hourWindowStartedAt: number | null;
  dayWindowStartedAt: number | null;
}

function emptyWindow(): RateWindow {
  return {
    postTimestamps: [],
    hourlyCount: 0,
    dailyCount: 0,
    hourWindowStartedAt: null,
    dayWindowStartedAt: null,
  };
}

/**
 * Per-platform rolling-window post accounting. One instance is created at
 * start-up and shared by reference; `rehydrate` rebuilds it from the store.
 *
 * Windows are anchored at the first post recorded after the previous window
 * expired, not at calendar hours or days.
 */
export class RateLimiter {
  private readonly windows = new Map<Platform, RateWindow>();
  private readonly pending = new Map<Platform, RateReservation[]>();

  constructor(private readonly settings: Partial<Record<Platform, PlatformSettings>> = {}) {}

  limitsFor(platform: Platform): RateLimits {
    const s = this.settings[platform];
    if (!s) return CONSERVATIVE_LIMITS;
    return {
      postsPerHour: s.posts_per_hour,
      postsPerDay: s.posts_per_day,
      minIntervalSeconds: s.min_interval_seconds,
    };
  }

  canPost(platform: Platform, now: Date = new Date()): boolean {
    return this.check(platform, now).allowed;
  }

  waitSeconds(platform: Platform, now: Date = new Date()): number {
    return this.check(platform, now).waitSeconds;
  }

  /**
   * Evaluate min interval, hourly cap and daily cap in that order. The reason
   * is the first rule that blocks; the wait covers every blocking rule.
   * Outstanding reservations count as posts made at their reservation time.
   */
  check(platform: Platform, now: Date = new Date()): RateDecision {
    const limits = this.limitsFor(platform);
    const window = this.roll(platform, now.getTime());
    const t = now.getTime();
    const inFlight = this.pending.get(platform) ?? [];
    const firstInFlight = inFlight[0]?.reservedAt;

    const blocks: Array<{ reason: RateLimitReason; waitMs: number }> = [];

    const last = Math.max(
      window.postTimestamps[window.postTimestamps.length - 1] ?? -Infinity,
      ...inFlight.map((r) => r.reservedAt),
    );
    if (last !== -Infinity) {
      const elapsed = t - last;
      const minIntervalMs = limits.minIntervalSeconds * 1000;
      if (elapsed < minIntervalMs) {
        blocks.push({ reason: 'min_interval', waitMs: minIntervalMs - elapsed });
      }
    }

    if (window.hourlyCount + inFlight.length >= limits.postsPerHour) {
      const start = window.hourWindowStartedAt ?? firstInFlight ?? t;
      blocks.push({ reason: 'hourly_cap', waitMs: start + HOUR_MS - t });
    }

    if (window.dailyCount + inFlight.length >= limits.postsPerDay) {
      const start = window.dayWindowStartedAt ?? firstInFlight ?? t;
      blocks.push({ reason: 'daily_cap', waitMs: start + DAY_MS - t });
    }

    const first = blocks[0];
    if (!first) return { allowed: true, waitSeconds: 0 };

    const waitMs = Math.max(...blocks.map((b) => b.waitMs));
    const decision: RateDecision = {
      allowed: false,
      reason: first.reason,
      waitSeconds: Math.max(1, Math.ceil(waitMs / 1000)),
    };
    logger.warn({ platform, ...decision }, 'Rate limit reached');
    return decision;
  }

  /**
   * Check and, when allowed, hold a slot in the same synchronous step so that
   * concurrent callers see each other. The holder must `commit` on success or
   * `release` otherwise.
   */
  reserve(platform: Platform, now: Date = new Date()): ReserveResult {
    const decision = this.check(platform, now);
    if (!decision.allowed) return { decision, reservation: null };

    const reservation: RateReservation = { platform, reservedAt: now.getTime() };
    const inFlight = this.pending.get(platform) ?? [];
    inFlight.push(reservation);
    this.pending.set(platform, inFlight);
    return { decision, reservation };
  }

  /** Turn a reservation into a recorded post. */
  commit(reservation: RateReservation, at: Date = new Date()): void {
    if (this.drop(reservation)) {
      this.recordPost(reservation.platform, at);
    }
  }

  /** Give back a reservation that did not end in a post. No-op once committed. */
  release(reservation: RateReservation): void {
    this.drop(reservation);
  }

  /**
   * Count one successful post. Only call after the platform confirmed it.
   */
  recordPost(platform: Platform, at: Date = new Date()): void {
    const t = at.getTime();
    const window = this.roll(platform, t);

    window.postTimestamps.push(t);
    if (window.postTimestamps.length > MAX_HISTORY) {
      window.postTimestamps.shift();
    }

    if (window.hourWindowStartedAt === null) window.hourWindowStartedAt = t;
    if (window.dayWindowStartedAt === null) window.dayWindowStartedAt = t;
    window.hourlyCount++;
    window.dailyCount++;
  }

  /**
   * Discard recorded windows and replay the last 24h of posted rows.
   * Reservations still in flight are kept.
   */
  rehydrate(db: Database.Database, now: Date = new Date()): void {
    this.windows.clear();
    const rows = db
      .prepare(
        `SELECT platform, posted_at FROM posts
         WHERE status = 'posted' AND posted_at IS NOT NULL AND posted_at >= ?
         ORDER BY posted_at ASC`,
      )
      .all(hoursAgoISO(24, now)) as Array<{ platform: string; posted_at: string }>;

    let replayed = 0;
    for (const row of rows) {
      const platform = PLATFORMS.find((p) => p === row.platform);
      if (!platform) continue;
      this.recordPost(platform, new Date(row.posted_at));
      replayed++;
    }
    logger.info({ replayed }, 'Rate limiter rehydrated');
  }

  snapshot(platform: Platform, now: Date = new Date()): Readonly<Omit<RateWindow, 'postTimestamps'>> & {
    recentPosts: number;
    inFlight: number;
  } {
    const window = this.roll(platform, now.getTime());
    return {
      inFlight: this.pending.get(platform)?.length ?? 0,
      hourlyCount: window.hourlyCount,
      dailyCount: window.dailyCount,
      hourWindowStartedAt: window.hourWindowStartedAt,
      dayWindowStartedAt: window.dayWindowStartedAt,
      recentPosts: window.postTimestamps.length,
    };
  }

  private drop(reservation: RateReservation): boolean {
    const inFlight = this.pending.get(reservation.platform);
    const index = inFlight ? inFlight.indexOf(reservation) : -1;
    if (!inFlight || index < 0) return false;
    inFlight.splice(index, 1);
    if (inFlight.length === 0) this.pending.delete(reservation.platform);
    return true;
  }

  private roll(platform: Platform, t: number): RateWindow {
    let window = this.windows.get(platform);
    if (!window) {
      window = emptyWindow();
      this.windows.set(platform, window);
    }

    if (window.hourWindowStartedAt !== null && t - window.hourWindowStartedAt >= HOUR_MS) {
      window.hourlyCount = 0;
      window.hourWindowStartedAt = null;
    }
    if (window.dayWindowStartedAt !== null && t - window.dayWindowStartedAt >= DAY_MS) {
      window.dailyCount = 0;
      window.dayWindowStartedAt = null;
    }

    const cutoff = t - DAY_MS;
    while (window.postTimestamps.length > 0 && (window.postTimestamps[0] ?? t) < cutoff) {
      window.postTimestamps.shift();
    }
    return window;
  }
}
