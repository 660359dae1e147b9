import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { Content, Post, PostStatus, SkipReason } from './types.js';
import { ContentSchema, POST_STATUSES, TERMINAL_STATUSES } from './types.js';
import { contentHash } from '../dedup/fingerprint.js';
import { parsePlatform } from '../shared/platform.js';
import type { Platform } from '../shared/platform.js';
import { generateId, nowISO } from '../shared/utils.js';
import { DbError, PostStateError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

// ================================================================
// Lifecycle
// ================================================================

const FORWARD_TRANSITIONS: Record<PostStatus, readonly PostStatus[]> = {
  pending: ['generated', 'failed'],
  generated: ['scheduled', 'posted', 'failed'],
  scheduled: ['posted', 'failed'],
  posted: [],
  failed: [],
};

export function isPostStatus(value: string): value is PostStatus {
  return (POST_STATUSES as readonly string[]).includes(value);
}

export function isTerminal(status: PostStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Check a status change. Terminal rows never move again; any other
 * out-of-order step is logged and allowed, since callers are trusted.
 */
export function checkTransition(post: Pick<Post, 'id' | 'status'>, next: PostStatus): void {
  if (post.status === next) return;

  if (isTerminal(post.status)) {
    throw new PostStateError(`Post ${post.id} is ${post.status}; terminal posts cannot move to ${next}`, {
      id: post.id,
      from: post.status,
      to: next,
    });
  }

  if (!FORWARD_TRANSITIONS[post.status].includes(next)) {
    logger.warn({ id: post.id, from: post.status, to: next }, 'Out-of-order post status transition');
  }
}

// ================================================================
// Posts CRUD
// ================================================================

export interface CreatePostInput {
  platform: string;
  content: Content;
  status?: PostStatus;
  skipReason?: SkipReason;
  errorMessage?: string;
  scheduledFor?: Date;
}

export function createPost(db: Database.Database, input: CreatePostInput): string {
  const platform = parsePlatform(input.platform);
  const status = input.status ?? 'pending';
  const now = nowISO();
  const id = generateId();
  const errorHistory = input.errorMessage ? [input.errorMessage] : [];

  try {
    db.prepare(
      `INSERT INTO posts
       (id, platform, content_hash, title, body, source_url, content_type, content_json,
        status, skip_reason, scheduled_for, posted_at, error_message, error_history_json,
        created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    ).run(
      id,
      platform,
      contentHash(input.content),
      input.content.title,
      input.content.body,
      input.content.sourceUrl ?? null,
      input.content.contentType,
      JSON.stringify(input.content),
      status,
      input.skipReason ?? null,
      input.scheduledFor?.toISOString() ?? null,
      status === 'posted' ? now : null,
      input.errorMessage ?? null,
      JSON.stringify(errorHistory),
      now,
      now,
    );
  } catch (err) {
    throw new DbError(`Failed to create post: ${err instanceof Error ? err.message : String(err)}`, {
      platform,
    });
  }

  logger.debug({ id, platform, status }, 'Post created');
  return id;
}

export function getPost(db: Database.Database, id: string): Post | undefined {
  return db.prepare('SELECT * FROM posts WHERE id = ?').get(id) as Post | undefined;
}

function requirePost(db: Database.Database, id: string): Post {
  const post = getPost(db, id);
  if (!post) {
    throw new PostStateError(`Post not found: ${id}`, { id });
  }
  return post;
}

const ErrorHistorySchema = z.array(z.string());

function appendError(post: Post, message: string): string {
  let history: string[] = [];
  try {
    const parsed = ErrorHistorySchema.safeParse(JSON.parse(post.error_history_json));
    if (parsed.success) history = parsed.data;
  } catch {
    logger.warn({ id: post.id }, 'Unreadable error history, starting a new one');
  }
  history.push(message);
  return JSON.stringify(history);
}

/**
 * Move a post to `status`, optionally recording an error message.
 * Returns false when the post does not exist.
 */
export function updatePostStatus(
  db: Database.Database,
  id: string,
  status: string,
  errorMessage?: string,
): boolean {
  if (!isPostStatus(status)) {
    throw new PostStateError(`Invalid status: ${status}. Must be one of: ${POST_STATUSES.join(', ')}`, {
      status,
    });
  }

  const post = getPost(db, id);
  if (!post) return false;
  checkTransition(post, status);

  const now = nowISO();
  const sets = ['status = ?', 'updated_at = ?'];
  const values: unknown[] = [status, now];

  if (status === 'posted' && !post.posted_at) {
    sets.push('posted_at = ?');
    values.push(now);
  }
  if (errorMessage) {
    sets.push('error_message = ?', 'error_history_json = ?');
    values.push(errorMessage, appendError(post, errorMessage));
  }

  values.push(id);
  const result = db.prepare(`UPDATE posts SET ${sets.join(', ')} WHERE id = ?`).run(...values);
  return result.changes > 0;
}

export function markGenerated(db: Database.Database, id: string, formatted: unknown): void {
  const post = requirePost(db, id);
  checkTransition(post, 'generated');
  db.prepare(
    `UPDATE posts SET status = 'generated', formatted_json = ?, updated_at = ? WHERE id = ?`,
  ).run(JSON.stringify(formatted), nowISO(), id);
}

export function markScheduled(db: Database.Database, id: string, scheduledFor: Date): void {
  const post = requirePost(db, id);
  checkTransition(post, 'scheduled');
  db.prepare(
    `UPDATE posts SET status = 'scheduled', scheduled_for = ?, updated_at = ? WHERE id = ?`,
  ).run(scheduledFor.toISOString(), nowISO(), id);
}

export function markPosted(
  db: Database.Database,
  id: string,
  result: { remoteId?: string; url?: string; attempts: number },
): void {
  const post = requirePost(db, id);
  checkTransition(post, 'posted');
  const now = nowISO();
  db.prepare(
    `UPDATE posts
     SET status = 'posted', posted_at = ?, remote_post_id = ?, remote_url = ?, attempts = ?, updated_at = ?
     WHERE id = ?`,
  ).run(now, result.remoteId ?? null, result.url ?? null, result.attempts, now, id);
}

export function markFailed(db: Database.Database, id: string, errorMessage: string, attempts?: number): void {
  const post = requirePost(db, id);
  checkTransition(post, 'failed');
  db.prepare(
    `UPDATE posts
     SET status = 'failed', error_message = ?, error_history_json = ?, attempts = ?, updated_at = ?
     WHERE id = ?`,
  ).run(errorMessage, appendError(post, errorMessage), attempts ?? post.attempts, nowISO(), id);
}

// ================================================================
// Queries
// ================================================================

export interface PostQuery {
  platform?: string;
  status?: PostStatus | readonly PostStatus[];
  since?: Date;
  limit?: number;
}

export function queryPosts(db: Database.Database, filters: PostQuery = {}): Post[] {
  const where: string[] = [];
  const values: unknown[] = [];

  if (filters.platform !== undefined) {
    where.push('platform = ?');
    values.push(parsePlatform(filters.platform));
  }
  if (filters.status !== undefined) {
    const statuses: readonly PostStatus[] =
      typeof filters.status === 'string' ? [filters.status] : filters.status;
    if (statuses.length === 0) return [];
    where.push(`status IN (${statuses.map(() => '?').join(', ')})`);
    values.push(...statuses);
  }
  if (filters.since) {
    where.push('created_at >= ?');
    values.push(filters.since.toISOString());
  }

  const whereSql = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
  const limitSql = filters.limit ? `LIMIT ${Math.floor(filters.limit)}` : '';
  return db
    .prepare(`SELECT * FROM posts ${whereSql} ORDER BY created_at DESC ${limitSql}`)
    .all(...values) as Post[];
}

export function findRecentByPlatform(db: Database.Database, platform: Platform, since: Date): Post[] {
  return queryPosts(db, { platform, since });
}

/**
 * Scheduled posts whose slot has arrived, oldest slot first.
 */
export function findDueScheduled(db: Database.Database, now: Date = new Date()): Post[] {
  return db
    .prepare(
      `SELECT * FROM posts
       WHERE status = 'scheduled' AND scheduled_for IS NOT NULL AND scheduled_for <= ?
       ORDER BY scheduled_for ASC`,
    )
    .all(now.toISOString()) as Post[];
}

export function countByStatus(db: Database.Database): Record<PostStatus, number> {
  const counts: Record<PostStatus, number> = {
    pending: 0,
    generated: 0,
    scheduled: 0,
    posted: 0,
    failed: 0,
  };
  const rows = db
    .prepare('SELECT status, COUNT(*) as count FROM posts GROUP BY status')
    .all() as Array<{ status: string; count: number }>;
  for (const row of rows) {
    if (isPostStatus(row.status)) counts[row.status] = row.count;
  }
  return counts;
}

/**
 * Rebuild the Content a post was created from.
 */
export function postContent(post: Post): Content {
  let raw: unknown;
  try {
    raw = JSON.parse(post.content_json);
  } catch (err) {
    throw new DbError(`Stored content for post ${post.id} is not valid JSON`, {
      id: post.id,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  const parsed = ContentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DbError(`Stored content for post ${post.id} is invalid`, {
      id: post.id,
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}
