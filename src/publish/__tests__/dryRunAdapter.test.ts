import { describe, it, expect } from 'vitest';
import { DryRunAdapter, dryRunAdapters } from '../dryRunAdapter.js';

describe('DryRunAdapter', () => {
  it('reports success with a synthetic id and url', async () => {
    const adapter = new DryRunAdapter('mastodon', () => new Date(1_700_000_000_000));

    const result = await adapter.postContent({ platform: 'mastodon', status: 'hello' });

    expect(result).toEqual({
      success: true,
      remoteId: 'dryrun-mastodon-1700000000000',
      url: 'https://dry-run.invalid/mastodon/dryrun-mastodon-1700000000000',
    });
    expect(adapter.posted).toEqual([{ platform: 'mastodon', status: 'hello' }]);
    await expect(adapter.authenticate()).resolves.toBe(true);
    await expect(adapter.checkStatus()).resolves.toEqual({ healthy: true, detail: 'dry run' });
  });

  it('builds a registry for the given platforms', () => {
    const registry = dryRunAdapters(['devto', 'reddit']);
    expect(Object.keys(registry).sort()).toEqual(['devto', 'reddit']);
    expect(registry.reddit?.platform).toBe('reddit');
  });
});
