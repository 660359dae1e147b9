import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { createPost, markGenerated, markPosted } from '../../post/postStore.js';
import { ContentSchema } from '../../post/types.js';
import type { Content, PostStatus } from '../../post/types.js';
import type { Platform } from '../../shared/platform.js';
import { hoursAgoISO } from '../../shared/utils.js';
import { DedupEngine } from '../dedupEngine.js';
import type { TitleSimilarity } from '../similarity.js';

let db: Database.Database;
let engine: DedupEngine;

function content(overrides: Partial<Content> = {}): Content {
  return ContentSchema.parse({
    title: 'Rust 2.0 Released',
    body: 'The new edition is out with async closures.',
    sourceUrl: 'https://example.com/rust-2',
    ...overrides,
  });
}

function insertPost(
  platform: Platform,
  c: Content,
  opts: { status?: PostStatus; hoursAgo?: number } = {},
): string {
  const id = createPost(db, { platform, content: c });
  const status = opts.status ?? 'posted';
  if (status === 'generated' || status === 'posted') markGenerated(db, id, {});
  if (status === 'posted') markPosted(db, id, { remoteId: `r-${id}`, attempts: 1 });
  if (status === 'failed') {
    db.prepare(`UPDATE posts SET status = 'failed' WHERE id = ?`).run(id);
  }
  if (opts.hoursAgo !== undefined) {
    db.prepare('UPDATE posts SET created_at = ? WHERE id = ?').run(hoursAgoISO(opts.hoursAgo), id);
  }
  return id;
}

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  engine = new DedupEngine(db);
});

afterEach(() => {
  db.close();
});

describe('DedupEngine', () => {
  it('flags a devto post with the same title and URL from 500h ago inside the 720h window', () => {
    const id = insertPost('devto', content(), { hoursAgo: 500 });

    const match = engine.findDuplicate(
      'devto',
      { title: 'Rust 2.0 Released', url: 'https://example.com/rust-2', content: 'anything' },
      720,
    );
    expect(match?.post.id).toBe(id);
    expect(match?.match).toBe('url');
  });

  it('ignores posts older than the lookback window', () => {
    insertPost('devto', content(), { hoursAgo: 800 });
    expect(engine.isDuplicate('devto', { title: 'Rust 2.0 Released' }, 720)).toBe(false);
  });

  it('only compares against the same platform', () => {
    insertPost('reddit', content());
    expect(engine.isDuplicate('devto', { title: 'Rust 2.0 Released' }, 720)).toBe(false);
  });

  it('matches URLs after normalization', () => {
    insertPost('mastodon', content({ sourceUrl: 'https://www.example.com/rust-2/?utm_source=feed' }));
    const match = engine.findDuplicate('mastodon', { url: 'https://example.com/rust-2' }, 24);
    expect(match?.match).toBe('url');
  });

  it('matches near-identical titles above the threshold', () => {
    insertPost('devto', content({ title: 'Rust 2.0 Released Today For Everyone' }));
    // Tokens: {rust, 2, 0, released, today, everyone} vs the same plus nothing: 1.0
    const match = engine.findDuplicate('devto', { title: 'The Rust 2.0 released today for everyone!' }, 720);
    expect(match?.match).toBe('title');
  });

  it('does not match titles below the threshold', () => {
    insertPost('devto', content({ title: 'Rust 2.0 Released', sourceUrl: undefined }));
    expect(engine.isDuplicate('devto', { title: 'Go 1.30 Released' }, 720)).toBe(false);
  });

  it('checks the title before the content fingerprint', () => {
    insertPost('reddit', content({ sourceUrl: undefined }));
    const match = engine.findDuplicate(
      'reddit',
      { title: 'RUST 2.0 released', content: 'the new edition is out with async closures.' },
      2160,
    );
    expect(match?.match).toBe('title');
  });

  it('matches content by fingerprint when title and body differ only cosmetically', () => {
    insertPost('reddit', content({ sourceUrl: undefined }));
    // A threshold above 1 disables fuzzy title matching.
    const strict = new DedupEngine(db, { titleThreshold: 2 });
    const match = strict.findDuplicate(
      'reddit',
      { title: 'RUST  2.0   released', content: '  the new edition is out with   async closures. ' },
      2160,
    );
    expect(match?.match).toBe('content');

    const edited = strict.findDuplicate(
      'reddit',
      { title: 'RUST  2.0   released', content: 'the new edition is out with sync closures.' },
      2160,
    );
    expect(edited).toBeNull();
  });

  it('does not let pending or failed rows block', () => {
    insertPost('devto', content(), { status: 'pending' });
    insertPost('devto', content(), { status: 'failed' });
    expect(
      engine.isDuplicate('devto', { title: 'Rust 2.0 Released', url: 'https://example.com/rust-2' }, 720),
    ).toBe(false);
  });

  it('treats generated and scheduled rows as live', () => {
    insertPost('devto', content(), { status: 'generated' });
    expect(engine.isDuplicate('devto', { url: 'https://example.com/rust-2' }, 720)).toBe(true);
  });

  it('returns false for an empty candidate or an empty pool', () => {
    expect(engine.isDuplicate('devto', { title: 'Anything' }, 720)).toBe(false);
    insertPost('devto', content());
    expect(engine.isDuplicate('devto', {}, 720)).toBe(false);
  });

  it('is idempotent while the store does not change', () => {
    insertPost('devto', content());
    const candidate = { title: 'Rust 2.0 Released' };
    const first = engine.isDuplicate('devto', candidate, 720);
    const second = engine.isDuplicate('devto', candidate, 720);
    expect(first).toBe(true);
    expect(second).toBe(first);
  });

  it('accepts a pluggable similarity', () => {
    insertPost('devto', content({ sourceUrl: undefined }));
    const always: TitleSimilarity = { score: () => 1 };
    const custom = new DedupEngine(db, { similarity: always });
    expect(custom.isDuplicate('devto', { title: 'Completely different' }, 720)).toBe(true);
  });
});
