import { z } from 'zod';
import { InvalidPlatformError } from './errors.js';

/**
 * Platforms this deployment publishes to. Adding one means adding an
 * adapter and a formatter branch, never touching the dispatcher.
 */
export const PLATFORMS = ['devto', 'mastodon', 'reddit'] as const;

export const PlatformSchema = z.enum(PLATFORMS);

export type Platform = z.infer<typeof PlatformSchema>;

export function isPlatform(value: string): value is Platform {
  return (PLATFORMS as readonly string[]).includes(value);
}

export function parsePlatform(value: string): Platform {
  const normalized = value.trim().toLowerCase();
  if (!isPlatform(normalized)) {
    throw new InvalidPlatformError(`Invalid platform: ${value}. Must be one of: ${PLATFORMS.join(', ')}`, {
      platform: value,
    });
  }
  return normalized;
}
