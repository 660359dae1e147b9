import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { createPost, markGenerated, markPosted } from '../../post/postStore.js';
import { updateMetrics } from '../../post/metrics.js';
import { ContentSchema } from '../../post/types.js';
import { analyzeEngagement, classifyPost, StoreEngagementSource } from '../engagement.js';

const NOW = new Date('2025-06-10T12:00:00.000Z');

let db: Database.Database;

function postedWithMetrics(
  body: string,
  postedAt: string,
  counters: { likes: number; views: number },
  platform: 'devto' | 'mastodon' = 'mastodon',
): void {
  const id = createPost(db, { platform, content: ContentSchema.parse({ title: body.slice(0, 10), body }) });
  markGenerated(db, id, {});
  markPosted(db, id, { attempts: 1 });
  db.prepare('UPDATE posts SET posted_at = ? WHERE id = ?').run(postedAt, id);
  updateMetrics(db, id, counters);
}

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
});

afterEach(() => {
  db.close();
});

describe('classifyPost', () => {
  it('recognizes links first', () => {
    expect(classifyPost('Read more at https://example.com #rust')).toBe('link');
    expect(classifyPost('see www.example.com')).toBe('link');
  });

  it('recognizes hashtags and mentions', () => {
    expect(classifyPost('Shipping today #typescript')).toBe('hashtag');
    expect(classifyPost('Thanks @someone')).toBe('mention');
  });

  it('treats long bodies as long form', () => {
    expect(classifyPost('x'.repeat(281))).toBe('long_form');
    expect(classifyPost('x'.repeat(280))).toBe('text');
  });
});

describe('analyzeEngagement', () => {
  it('returns an empty profile without history', () => {
    expect(analyzeEngagement(db, 'mastodon', 30, NOW)).toEqual({ hourly: [], weekdays: {}, kinds: {} });
  });

  it('buckets by UTC hour, weekday and kind', () => {
    // 2025-06-09 is a Monday
    postedWithMetrics('morning one', '2025-06-09T09:05:00.000Z', { likes: 8, views: 10 });
    postedWithMetrics('morning two', '2025-06-09T09:40:00.000Z', { likes: 4, views: 10 });
    postedWithMetrics('afternoon #tag', '2025-06-08T14:00:00.000Z', { likes: 0, views: 10 });

    const profile = analyzeEngagement(db, 'mastodon', 30, NOW);

    expect(profile.hourly).toHaveLength(2);
    expect(profile.hourly[0]?.hour).toBe(9);
    expect(profile.hourly[0]?.meanEngagement).toBeCloseTo(0.6, 10);
    expect(profile.hourly[0]?.sampleCount).toBe(2);
    expect(profile.hourly[1]).toEqual({ hour: 14, meanEngagement: 0, sampleCount: 1 });

    expect(profile.weekdays[1]?.max).toBeCloseTo(0.8, 10);
    expect(profile.weekdays[0]?.mean).toBe(0);

    expect(profile.kinds.text?.successRate).toBe(1);
    expect(profile.kinds.hashtag?.successRate).toBe(0);
  });

  it('ignores other platforms and old posts', () => {
    postedWithMetrics('recent devto', '2025-06-09T09:00:00.000Z', { likes: 5, views: 10 }, 'devto');
    postedWithMetrics('too old', '2025-04-01T09:00:00.000Z', { likes: 5, views: 10 });

    expect(analyzeEngagement(db, 'mastodon', 30, NOW).hourly).toEqual([]);
    expect(analyzeEngagement(db, 'devto', 30, NOW).hourly).toHaveLength(1);
  });
});

describe('StoreEngagementSource', () => {
  it('reads the profile from the store', async () => {
    const source = new StoreEngagementSource(db, 30);
    await expect(source.getProfile('reddit')).resolves.toEqual({ hourly: [], weekdays: {}, kinds: {} });
  });
});
