import { describe, it, expect } from 'vitest';
import { contentHash, normalizeText, normalizeUrl } from '../fingerprint.js';
import { jaccardSimilarity, jaccardTitleSimilarity, titleTokens } from '../similarity.js';

describe('normalizeText', () => {
  it('lower-cases, collapses whitespace and trims', () => {
    expect(normalizeText('  Hello\n\tWORLD  again ')).toBe('hello world again');
  });

  it('applies NFKC so full-width letters fold', () => {
    expect(normalizeText('Ｒｕｓｔ')).toBe('rust');
  });
});

describe('contentHash', () => {
  it('hashes cosmetic variants identically', () => {
    const a = contentHash({ title: 'Rust 2.0 Released', body: 'The  new\nedition is out.' });
    const b = contentHash({ title: '  rust 2.0 RELEASED', body: 'the new edition is out.  ' });
    expect(a).toBe(b);
  });

  it('differs when the words differ', () => {
    expect(contentHash({ title: 'Rust 2.0', body: 'out' })).not.toBe(contentHash({ title: 'Rust 3.0', body: 'out' }));
  });

  it('keeps title and body apart', () => {
    expect(contentHash({ title: 'a b', body: '' })).not.toBe(contentHash({ title: 'a', body: 'b' }));
  });

  it('is a 64-char hex digest', () => {
    expect(contentHash({ title: 't', body: 'b' })).toMatch(/^[a-f0-9]{64}$/);
  });
});

describe('normalizeUrl', () => {
  it('strips trailing slashes', () => {
    expect(normalizeUrl('https://example.com/')).toBe('https://example.com');
    expect(normalizeUrl('https://example.com/path/')).toBe('https://example.com/path');
  });

  it('removes www. prefix and lowercases the host', () => {
    expect(normalizeUrl('https://WWW.Example.com/Path')).toBe('https://example.com/Path');
  });

  it('removes tracking params and sorts the rest', () => {
    expect(normalizeUrl('https://example.com/p?utm_source=x&z=1&a=2')).toBe('https://example.com/p?a=2&z=1');
  });

  it('strips the fragment', () => {
    expect(normalizeUrl('https://example.com/page#section')).toBe('https://example.com/page');
  });

  it('returns unparseable input trimmed', () => {
    expect(normalizeUrl(' not a url ')).toBe('not a url');
  });
});

describe('title similarity', () => {
  it('drops stop words and punctuation', () => {
    expect([...titleTokens('The State of Rust, in 2025!')]).toEqual(['state', 'of', 'rust', '2025']);
  });

  it('scores identical token sets as 1', () => {
    expect(jaccardTitleSimilarity.score('Rust 2.0 Released', 'rust 2.0 released')).toBe(1);
  });

  it('computes Jaccard over token sets', () => {
    expect(jaccardSimilarity(new Set(['a', 'b', 'c']), new Set(['b', 'c', 'd']))).toBe(0.5);
  });

  it('returns 0 when either side is empty', () => {
    expect(jaccardSimilarity(new Set(), new Set(['a']))).toBe(0);
    expect(jaccardTitleSimilarity.score('the and', 'the and')).toBe(0);
  });
});
