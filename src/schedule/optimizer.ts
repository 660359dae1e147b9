import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { Content } from '../post/types.js';
import type { Platform } from '../shared/platform.js';
import { HOUR_MS, withTimeout } from '../shared/utils.js';
import { ScheduleError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { classifyPost, emptyProfile } from './engagement.js';
import type { EngagementProfile, EngagementSource, HourBucket } from './engagement.js';

const DAY_MS = 24 * HOUR_MS;
const MAX_SLOT_ADVANCES = 24 * 60;

export type ScheduleOptions = Config['schedule'];
export type PlatformScheduleSettings = Partial<Record<Platform, { min_interval_hours?: number }>>;

export interface SlotChoice {
  scheduledFor: Date;
  /** Adjusted engagement score of the chosen slot; 0 for the fallback slot. */
  score: number;
}

export interface ScheduleEntry {
  content: Content;
  platform: Platform;
  priority: number;
  scheduledFor: Date;
  predictedEngagement: number;
}

/**
 * Next instant strictly after `now` at `hour`:00 UTC, shifted by `dayOffset` days.
 */
export function nextOccurrence(hour: number, now: Date, dayOffset = 0): Date {
  const d = new Date(now.getTime());
  d.setUTCHours(hour, 0, 0, 0);
  if (d.getTime() <= now.getTime()) {
    d.setTime(d.getTime() + DAY_MS);
  }
  return new Date(d.getTime() + dayOffset * DAY_MS);
}

function isSpaced(candidate: Date, taken: readonly Date[], gapMs: number): boolean {
  return taken.every((t) => Math.abs(candidate.getTime() - t.getTime()) >= gapMs);
}

export class SchedulingOptimizer {
  constructor(
    private readonly db: Database.Database,
    private readonly source: EngagementSource,
    private readonly options: ScheduleOptions,
    private readonly platforms: PlatformScheduleSettings = {},
  ) {}

  /** Spacing between slots on one platform, in hours. */
  minIntervalHours(platform: Platform): number {
    return this.platforms[platform]?.min_interval_hours ?? this.options.min_interval_hours;
  }

  async optimalTime(platform: Platform, content: Content, now: Date = new Date()): Promise<SlotChoice> {
    const profile = await this.loadProfile(platform);
    return this.chooseSlot(platform, content, profile, this.existingSlots(platform, now), now);
  }

  /**
   * Greedy batch assignment: highest priority first, each item takes its best
   * slot and is pushed back an hour at a time past slots already handed out
   * on the same platform.
   */
  async buildSchedule(contents: Content[], now: Date = new Date()): Promise<ScheduleEntry[]> {
    const ordered = [...contents].sort((a, b) => b.priority - a.priority);
    const profiles = new Map<Platform, EngagementProfile>();
    const existing = new Map<Platform, Date[]>();
    const assigned = new Map<Platform, Date[]>();
    const entries: ScheduleEntry[] = [];

    for (const content of ordered) {
      if (content.targetPlatforms.length === 0) {
        logger.warn({ title: content.title }, 'Content has no target platforms, not scheduled');
        continue;
      }

      for (const platform of content.targetPlatforms) {
        let profile = profiles.get(platform);
        if (!profile) {
          profile = await this.loadProfile(platform);
          profiles.set(platform, profile);
        }
        let taken = existing.get(platform);
        if (!taken) {
          taken = this.existingSlots(platform, now);
          existing.set(platform, taken);
        }
        const slots = assigned.get(platform) ?? [];
        const minIntervalMs = this.minIntervalHours(platform) * HOUR_MS;
        const batchGapMs = Math.max(1, this.minIntervalHours(platform)) * HOUR_MS;

        const choice = this.chooseSlot(platform, content, profile, taken, now);
        let scheduledFor = choice.scheduledFor;
        let advances = 0;
        while (!isSpaced(scheduledFor, slots, batchGapMs) || !isSpaced(scheduledFor, taken, minIntervalMs)) {
          if (++advances > MAX_SLOT_ADVANCES) {
            throw new ScheduleError(`No free slot found for ${platform}`, { platform, title: content.title });
          }
          scheduledFor = new Date(scheduledFor.getTime() + HOUR_MS);
        }

        slots.push(scheduledFor);
        assigned.set(platform, slots);
        entries.push({
          content,
          platform,
          priority: content.priority,
          scheduledFor,
          predictedEngagement: choice.score,
        });
      }
    }

    entries.sort((a, b) => a.scheduledFor.getTime() - b.scheduledFor.getTime());
    logger.info({ entries: entries.length, platforms: [...assigned.keys()] }, 'Schedule built');
    return entries;
  }

  scoreSlot(slot: Date, bucket: HourBucket, content: Content, profile: EngagementProfile): number {
    let score = bucket.meanEngagement;

    const day = profile.weekdays[slot.getUTCDay()];
    if (day && day.max > 0) {
      score *= day.mean / day.max;
    }

    const kind = profile.kinds[classifyPost(content.body)];
    if (kind) {
      score *= kind.successRate;
    }

    const hour = slot.getUTCHours();
    if (
      content.audience === 'b2b' &&
      (hour < this.options.business_start_hour || hour > this.options.business_end_hour)
    ) {
      score *= this.options.business_penalty;
    }

    return score;
  }

  private chooseSlot(
    platform: Platform,
    content: Content,
    profile: EngagementProfile,
    taken: Date[],
    now: Date,
  ): SlotChoice {
    const minIntervalMs = this.minIntervalHours(platform) * HOUR_MS;

    if (profile.hourly.length > 0) {
      for (let offset = 0; offset < this.options.lookahead_days; offset++) {
        const candidates = profile.hourly
          .map((bucket) => {
            const slot = nextOccurrence(bucket.hour, now, offset);
            return { slot, score: this.scoreSlot(slot, bucket, content, profile) };
          })
          .sort((a, b) => b.score - a.score);

        for (const candidate of candidates) {
          if (candidate.slot.getTime() > now.getTime() && isSpaced(candidate.slot, taken, minIntervalMs)) {
            return { scheduledFor: candidate.slot, score: candidate.score };
          }
        }
      }
    }

    let fallback = new Date(now.getTime() + HOUR_MS);
    for (let i = 0; i < MAX_SLOT_ADVANCES && !isSpaced(fallback, taken, minIntervalMs); i++) {
      fallback = new Date(fallback.getTime() + HOUR_MS);
    }
    return { scheduledFor: fallback, score: 0 };
  }

  private async loadProfile(platform: Platform): Promise<EngagementProfile> {
    try {
      return await withTimeout(
        this.source.getProfile(platform),
        this.options.profile_timeout_ms,
        () => new ScheduleError(`Engagement profile for ${platform} timed out after ${this.options.profile_timeout_ms}ms`),
      );
    } catch (err) {
      logger.warn({ platform, error: errorMessage(err) }, 'Engagement profile unavailable, using fallback slot');
      return emptyProfile();
    }
  }

  /**
   * Times already taken on a platform: recent posts and upcoming scheduled slots.
   */
  private existingSlots(platform: Platform, now: Date): Date[] {
    const since = new Date(now.getTime() - Math.max(this.minIntervalHours(platform), 1) * HOUR_MS).toISOString();
    const rows = this.db
      .prepare(
        `SELECT posted_at, scheduled_for FROM posts
         WHERE platform = ?
           AND ((status = 'posted' AND posted_at >= ?)
             OR (status = 'scheduled' AND scheduled_for >= ?))`,
      )
      .all(platform, since, since) as Array<{ posted_at: string | null; scheduled_for: string | null }>;

    const slots: Date[] = [];
    for (const row of rows) {
      const at = row.posted_at ?? row.scheduled_for;
      if (at) slots.push(new Date(at));
    }
    return slots;
  }
}
