import type { AdRecord } from '../core/types.js';

const STOPWORDS = new Set([
  'about', 'best', 'buy', 'cheap', 'from', 'free', 'here', 'more', 'most', 'online', 'only',
  'order', 'over', 'sale', 'shop', 'that', 'this', 'today', 'with', 'your', 'what', 'when',
]);

const MIN_WORD_LENGTH = 4;

/**
 * Guess the product / search term a batch of ads is about.
 *
 * Picks the most frequent title word (at least four letters, not a
 * stopword); ties go to the word seen first. Empty when nothing qualifies.
 */
export function detectContext(records: readonly AdRecord[]): string {
  const counts = new Map<string, number>();

  for (const record of records) {
    const words = record.title.toLowerCase().match(/\p{L}[\p{L}\p{N}-]*/gu) ?? [];
    for (const word of words) {
      if (word.length < MIN_WORD_LENGTH || STOPWORDS.has(word)) continue;
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }

  let best = '';
  let bestCount = 0;
  for (const [word, count] of counts) {
    if (count > bestCount) {
      best = word;
      bestCount = count;
    }
  }

  return best;
}
