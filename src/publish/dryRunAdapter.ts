import type { Platform } from '../shared/platform.js';
import { logger } from '../shared/logger.js';
import type { AdapterResult, AdapterStatus, AdapterRegistry, PlatformAdapter } from './adapter.js';
import type { FormattedPost } from './formatter.js';

/**
 * Logs what would be posted and reports success. Lets an operator run the
 * whole pipeline without platform credentials.
 */
export class DryRunAdapter implements PlatformAdapter {
  readonly posted: FormattedPost[] = [];

  constructor(
    readonly platform: Platform,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async authenticate(): Promise<boolean> {
    return true;
  }

  async postContent(formatted: FormattedPost): Promise<AdapterResult> {
    const remoteId = `dryrun-${this.platform}-${this.now().getTime()}`;
    this.posted.push(formatted);
    logger.info({ platform: this.platform, remoteId, post: formatted }, 'Dry run: post not sent');
    return {
      success: true,
      remoteId,
      url: `https://dry-run.invalid/${this.platform}/${remoteId}`,
    };
  }

  async checkStatus(): Promise<AdapterStatus> {
    return { healthy: true, detail: 'dry run' };
  }
}

export function dryRunAdapters(platforms: readonly Platform[]): AdapterRegistry {
  const registry: AdapterRegistry = {};
  for (const platform of platforms) {
    registry[platform] = new DryRunAdapter(platform);
  }
  return registry;
}
