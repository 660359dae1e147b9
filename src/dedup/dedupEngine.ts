import type Database from 'better-sqlite3';
import type { Post } from '../post/types.js';
import { LIVE_STATUSES } from '../post/types.js';
import { findRecentByPlatform } from '../post/postStore.js';
import type { Platform } from '../shared/platform.js';
import { hoursAgoISO } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import { contentHash, normalizeUrl } from './fingerprint.js';
import { jaccardTitleSimilarity } from './similarity.js';
import type { TitleSimilarity } from './similarity.js';

export interface DedupCandidate {
  content?: string;
  title?: string;
  url?: string;
}

export type DuplicateMatch = 'url' | 'title' | 'content';

/** Used when a platform has no `dedup_lookback_hours` configured. */
export const DEFAULT_LOOKBACK_HOURS: Record<Platform, number> = {
  devto: 720,
  mastodon: 24,
  reddit: 2160,
};

export interface DedupEngineOptions {
  similarity?: TitleSimilarity;
  titleThreshold?: number;
}

export class DedupEngine {
  private readonly similarity: TitleSimilarity;
  private readonly titleThreshold: number;

  constructor(
    private readonly db: Database.Database,
    options: DedupEngineOptions = {},
  ) {
    this.similarity = options.similarity ?? jaccardTitleSimilarity;
    this.titleThreshold = options.titleThreshold ?? 0.8;
  }

  isDuplicate(platform: Platform, candidate: DedupCandidate, lookbackHours: number): boolean {
    return this.findDuplicate(platform, candidate, lookbackHours) !== null;
  }

  /**
   * Return the first live post on `platform` inside the lookback window that
   * matches the candidate by URL, then title, then content fingerprint.
   */
  findDuplicate(
    platform: Platform,
    candidate: DedupCandidate,
    lookbackHours: number,
  ): { post: Post; match: DuplicateMatch } | null {
    const { content, title, url } = candidate;
    if (!content && !title && !url) return null;

    const since = new Date(hoursAgoISO(lookbackHours));
    const pool = findRecentByPlatform(this.db, platform, since).filter((p) =>
      LIVE_STATUSES.includes(p.status),
    );
    if (pool.length === 0) return null;

    const normalizedUrl = url ? normalizeUrl(url) : null;
    const hash = content ? contentHash({ title, body: content }) : null;

    for (const post of pool) {
      const match = this.matchPost(post, normalizedUrl, title, hash);
      if (match) {
        logger.debug({ platform, postId: post.id, match }, 'Duplicate content found');
        return { post, match };
      }
    }
    return null;
  }

  private matchPost(
    post: Post,
    normalizedUrl: string | null,
    title: string | undefined,
    hash: string | null,
  ): DuplicateMatch | null {
    if (normalizedUrl) {
      if (post.source_url && normalizeUrl(post.source_url) === normalizedUrl) return 'url';
      if (post.remote_url && normalizeUrl(post.remote_url) === normalizedUrl) return 'url';
    }
    if (title && post.title) {
      if (post.title.toLowerCase() === title.toLowerCase()) return 'title';
      if (this.similarity.score(post.title, title) >= this.titleThreshold) return 'title';
    }
    if (hash && post.content_hash === hash) return 'content';
    return null;
  }
}
