import { z } from 'zod';
import { isPlatform } from '../shared/platform.js';
import type { Platform } from '../shared/platform.js';

export const POST_STATUSES = ['pending', 'generated', 'scheduled', 'posted', 'failed'] as const;
export type PostStatus = (typeof POST_STATUSES)[number];

export const TERMINAL_STATUSES: readonly PostStatus[] = ['posted', 'failed'];

/** Rows that count as "already out there" for dedup and spacing. */
export const LIVE_STATUSES: readonly PostStatus[] = ['generated', 'scheduled', 'posted'];

export type SkipReason = 'duplicate' | 'rate_limited' | 'unconfigured';

/** Same leniency as `parsePlatform`: surrounding space and case are ignored. */
const TargetPlatformSchema = z.string().transform((value, ctx): Platform => {
  const normalized = value.trim().toLowerCase();
  if (isPlatform(normalized)) return normalized;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown platform: ${value}` });
  return z.NEVER;
});

export const ContentSchema = z.object({
  title: z.string(),
  body: z.string(),
  sourceUrl: z.string().url().optional(),
  targetPlatforms: z.array(TargetPlatformSchema).default([]),
  contentType: z.string().min(1).default('news'),
  audience: z.enum(['general', 'b2b']).default('general'),
  tags: z.array(z.string()).default([]),
  priority: z.number().default(0),
  payload: z.record(z.unknown()).default({}),
});

/**
 * A unit to be published. Produced by an upstream generator, never mutated here.
 */
export type Content = z.infer<typeof ContentSchema>;
export type ContentInput = z.input<typeof ContentSchema>;

/**
 * Database row shape for the posts table.
 */
export interface Post {
  id: string;
  platform: Platform;
  content_hash: string;
  title: string;
  body: string;
  source_url: string | null;
  content_type: string;
  content_json: string;
  formatted_json: string | null;
  status: PostStatus;
  skip_reason: SkipReason | null;
  scheduled_for: string | null;
  posted_at: string | null;
  remote_post_id: string | null;
  remote_url: string | null;
  error_message: string | null;
  error_history_json: string;
  attempts: number;
  created_at: string;
  updated_at: string;
}

/**
 * Database row shape for the post_metrics table.
 */
export interface PostMetrics {
  post_id: string;
  likes: number;
  comments: number;
  shares: number;
  views: number;
  clicks: number;
  engagement_rate: number;
  performance_score: number;
  platform_metrics_json: string;
  history_json: string;
  first_tracked_at: string;
  updated_at: string;
}
