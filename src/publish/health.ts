import type { Platform } from '../shared/platform.js';
import { AdapterTransientError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { withTimeout } from '../shared/utils.js';
import type { AdapterRegistry, AdapterStatus, PlatformAdapter } from './adapter.js';

export const DEFAULT_HEALTH_TIMEOUT_MS = 10_000;

async function eachAdapter<T>(
  adapters: AdapterRegistry,
  fn: (adapter: PlatformAdapter) => Promise<T>,
): Promise<Partial<Record<Platform, T>>> {
  const results: Partial<Record<Platform, T>> = {};
  await Promise.all(
    Object.values(adapters).map(async (adapter) => {
      if (!adapter) return;
      results[adapter.platform] = await fn(adapter);
    }),
  );
  return results;
}

/**
 * Authenticate every registered adapter. A throw or timeout counts as `false`
 * for that platform only.
 */
export async function authenticateAll(
  adapters: AdapterRegistry,
  timeoutMs = DEFAULT_HEALTH_TIMEOUT_MS,
): Promise<Partial<Record<Platform, boolean>>> {
  return eachAdapter(adapters, async (adapter) => {
    try {
      const ok = await withTimeout(
        adapter.authenticate(),
        timeoutMs,
        () => new AdapterTransientError(`${adapter.platform} authentication timed out after ${timeoutMs}ms`),
      );
      if (!ok) logger.warn({ platform: adapter.platform }, 'Authentication failed');
      return ok;
    } catch (err) {
      logger.error({ platform: adapter.platform, error: errorMessage(err) }, 'Authentication error');
      return false;
    }
  });
}

export async function checkStatuses(
  adapters: AdapterRegistry,
  timeoutMs = DEFAULT_HEALTH_TIMEOUT_MS,
): Promise<Partial<Record<Platform, AdapterStatus>>> {
  return eachAdapter(adapters, async (adapter): Promise<AdapterStatus> => {
    try {
      return await withTimeout(
        adapter.checkStatus(),
        timeoutMs,
        () => new AdapterTransientError(`${adapter.platform} status check timed out after ${timeoutMs}ms`),
      );
    } catch (err) {
      logger.warn({ platform: adapter.platform, error: errorMessage(err) }, 'Status check failed');
      return { healthy: false, detail: errorMessage(err) };
    }
  });
}
