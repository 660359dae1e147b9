import { sha256 } from '../shared/utils.js';

/**
 * Normalize text for fingerprinting: NFKC, lower-case, collapse whitespace.
 */
export function normalizeText(text: string): string {
  return text.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Content fingerprint shared by the posts table and the dedup engine.
 * Case and whitespace variants of the same title/body hash identically.
 */
export function contentHash(input: { title?: string; body?: string }): string {
  return sha256(`${normalizeText(input.title ?? '')}\n${normalizeText(input.body ?? '')}`);
}

/**
 * Normalize a URL for dedup comparison:
 * - Lowercase scheme + host, strip www.
 * - Remove common tracking params (utm_*, ref, fbclid, ...)
 * - Sort remaining query params
 * - Strip trailing slashes and the fragment
 */
export function normalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return raw.trim();
  }

  url.protocol = url.protocol.toLowerCase();
  url.hostname = url.hostname.toLowerCase();
  if (url.hostname.startsWith('www.')) {
    url.hostname = url.hostname.slice(4);
  }

  const trackingPrefixes = ['utm_', 'ref', 'fbclid', 'gclid', 'mc_', 'mkt_'];
  const keysToRemove: string[] = [];
  for (const key of url.searchParams.keys()) {
    if (trackingPrefixes.some((p) => key.toLowerCase().startsWith(p))) {
      keysToRemove.push(key);
    }
  }
  for (const key of keysToRemove) {
    url.searchParams.delete(key);
  }
  url.searchParams.sort();

  let pathname = url.pathname;
  while (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }
  if (pathname === '/') {
    pathname = '';
  }

  const search = url.searchParams.toString();
  return `${url.protocol}//${url.hostname}${url.port ? ':' + url.port : ''}${pathname}${search ? '?' + search : ''}`;
}
