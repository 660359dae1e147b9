import { describe, it, expect } from 'vitest';
import { isPlatform, parsePlatform, PLATFORMS } from '../platform.js';
import { InvalidPlatformError, RelaypostError } from '../errors.js';

describe('parsePlatform', () => {
  it('accepts every known platform', () => {
    for (const p of PLATFORMS) expect(parsePlatform(p)).toBe(p);
  });

  it('trims and lower-cases', () => {
    expect(parsePlatform('  Reddit ')).toBe('reddit');
  });

  it('throws InvalidPlatformError with a code for anything else', () => {
    try {
      parsePlatform('myspace');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidPlatformError);
      expect(err).toBeInstanceOf(RelaypostError);
      if (err instanceof RelaypostError) {
        expect(err.code).toBe('INVALID_PLATFORM');
        expect(err.details).toEqual({ platform: 'myspace' });
      }
    }
  });
});

describe('isPlatform', () => {
  it('is exact', () => {
    expect(isPlatform('devto')).toBe(true);
    expect(isPlatform('DevTo')).toBe(false);
  });
});
