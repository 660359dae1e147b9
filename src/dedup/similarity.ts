/**
 * Title similarity in [0, 1]. Swap the implementation to change how
 * near-duplicate titles are detected without touching the dedup engine.
 */
export interface TitleSimilarity {
  score(a: string, b: string): number;
}

const STOP_WORDS = new Set(['the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'with', 'by']);

/**
 * Lower-case, strip punctuation, drop stop words.
 */
export function titleTokens(title: string): Set<string> {
  const normalized = title
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return new Set(normalized.split(' ').filter((t) => t.length > 0 && !STOP_WORDS.has(t)));
}

export function jaccardSimilarity(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

export const jaccardTitleSimilarity: TitleSimilarity = {
  score(a, b) {
    return jaccardSimilarity(titleTokens(a), titleTokens(b));
  },
};
