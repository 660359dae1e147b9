import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import { homedir } from 'node:os';
import path from 'node:path';
import {
  resolvePath,
  sha256,
  generateId,
  nowISO,
  hoursAgoISO,
  getPackageRoot,
  withTimeout,
  withConcurrency,
  sleep,
} from '../utils.js';

describe('resolvePath', () => {
  it('expands ~ to home directory', () => {
    expect(resolvePath('~/test')).toBe(path.join(homedir(), 'test'));
  });

  it('resolves relative paths', () => {
    expect(path.isAbsolute(resolvePath('./foo/bar'))).toBe(true);
  });

  it('returns absolute paths as-is', () => {
    expect(resolvePath('/absolute/path')).toBe('/absolute/path');
  });
});

describe('sha256', () => {
  it('produces consistent 64-char hex', () => {
    const hash = sha256('hello');
    expect(hash).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
  });

  it('produces different hash for different input', () => {
    expect(sha256('a')).not.toBe(sha256('b'));
  });
});

describe('generateId', () => {
  it('generates string of default length', () => {
    expect(generateId()).toHaveLength(21);
  });

  it('generates string of custom length', () => {
    expect(generateId(10)).toHaveLength(10);
  });

  it('generates unique IDs', () => {
    expect(generateId()).not.toBe(generateId());
  });
});

describe('timestamps', () => {
  it('nowISO returns a UTC ISO-8601 string', () => {
    expect(nowISO()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('hoursAgoISO subtracts whole hours', () => {
    expect(hoursAgoISO(2, new Date('2025-03-10T12:00:00.000Z'))).toBe('2025-03-10T10:00:00.000Z');
  });
});

describe('getPackageRoot', () => {
  it('returns a directory containing package.json', () => {
    expect(fs.existsSync(path.join(getPackageRoot(), 'package.json'))).toBe(true);
  });
});

describe('withTimeout', () => {
  it('resolves with the value when the promise wins', async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, () => new Error('late'))).resolves.toBe(42);
  });

  it('rejects with the timeout error when the promise hangs', async () => {
    const never = new Promise<number>(() => undefined);
    await expect(withTimeout(never, 5, () => new Error('timed out'))).rejects.toThrow('timed out');
  });
});

describe('sleep', () => {
  it('returns immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();
    await sleep(10_000, controller.signal);
    expect(Date.now() - started).toBeLessThan(1000);
  });
});

describe('withConcurrency', () => {
  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];

    await withConcurrency([1, 2, 3, 4, 5], 2, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      seen.push(n);
      active--;
    });

    expect(peak).toBe(2);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
  });
});
