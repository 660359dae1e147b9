import type { Content } from '../post/types.js';
import type { Platform } from '../shared/platform.js';

export const MASTODON_STATUS_LIMIT = 500;
export const REDDIT_TITLE_LIMIT = 300;
export const DEVTO_MAX_TAGS = 4;

export interface DevtoPost {
  platform: 'devto';
  title: string;
  bodyMarkdown: string;
  tags: string[];
  canonicalUrl?: string;
  published: boolean;
}

export interface MastodonPost {
  platform: 'mastodon';
  status: string;
}

export interface RedditPost {
  platform: 'reddit';
  title: string;
  subreddit?: string;
  /** Link post when set, self post otherwise. */
  url?: string;
  text?: string;
}

export type FormattedPost = DevtoPost | MastodonPost | RedditPost;

/**
 * Turns platform-agnostic content into the payload one adapter expects.
 */
export interface ContentFormatter {
  format(content: Content, platform: Platform): FormattedPost;
}

/** Cut to at most `max` code points, so surrogate pairs are never split. */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  if (max <= 1) return chars.slice(0, max).join('');
  return `${chars.slice(0, max - 1).join('').trimEnd()}…`;
}

function devtoTag(tag: string): string {
  return tag.toLowerCase().replace(/[^a-z0-9]/g, '');
}

function stringField(payload: Record<string, unknown>, key: string): string | undefined {
  const value = payload[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export class DefaultFormatter implements ContentFormatter {
  format(content: Content, platform: Platform): FormattedPost {
    switch (platform) {
      case 'devto':
        return this.devto(content);
      case 'mastodon':
        return this.mastodon(content);
      case 'reddit':
        return this.reddit(content);
    }
  }

  private devto(content: Content): DevtoPost {
    const tags = [...new Set(content.tags.map(devtoTag).filter((t) => t.length > 0))].slice(0, DEVTO_MAX_TAGS);
    const post: DevtoPost = {
      platform: 'devto',
      title: content.title,
      bodyMarkdown: content.body,
      tags: tags.length > 0 ? tags : ['technology'],
      published: content.payload['published'] !== false,
    };
    if (content.sourceUrl) post.canonicalUrl = content.sourceUrl;
    return post;
  }

  private mastodon(content: Content): MastodonPost {
    const body = content.body.trim();
    if (!content.sourceUrl) {
      return { platform: 'mastodon', status: truncate(body, MASTODON_STATUS_LIMIT) };
    }
    const suffix = `\n\n${content.sourceUrl}`;
    const room = Math.max(0, MASTODON_STATUS_LIMIT - suffix.length);
    return { platform: 'mastodon', status: `${truncate(body, room)}${suffix}` };
  }

  private reddit(content: Content): RedditPost {
    const post: RedditPost = {
      platform: 'reddit',
      title: truncate(content.title, REDDIT_TITLE_LIMIT),
    };
    const subreddit = stringField(content.payload, 'subreddit');
    if (subreddit) post.subreddit = subreddit;
    if (content.sourceUrl) {
      post.url = content.sourceUrl;
    } else {
      post.text = content.body;
    }
    return post;
  }
}
