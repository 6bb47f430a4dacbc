export type KeywordCount = readonly [word: string, count: number];

/**
 * Count whitespace-separated words across titles, skipping stop words.
 * The map keeps words in the order they were first seen.
 */
export function countKeywords(
  titles: Iterable<string>,
  stopWords: ReadonlySet<string>
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const title of titles) {
    for (const word of title.split(/\s+/)) {
      if (word === '' || stopWords.has(word)) continue;
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Highest counts first; equal counts keep first-seen order.
 */
export function rankKeywords(
  counts: ReadonlyMap<string, number>,
  limit: number
): KeywordCount[] {
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit);
}
