import type { NewsItem } from "../types";

/** Keeps the first item seen for every URL, in input order. */
export function dedupeByUrl(items: readonly NewsItem[]): NewsItem[] {
  const seen = new Set<string>();
  const unique: NewsItem[] = [];
  for (const item of items) {
    if (seen.has(item.url)) continue;
    seen.add(item.url);
    unique.push(item);
  }
  return unique;
}

/** Highest score first; equal scores keep their relative order. */
export function rankByRelevance(items: readonly NewsItem[]): NewsItem[] {
  return [...items].sort((a, b) => b.relevanceScore - a.relevanceScore);
}

export function dedupeAndRank(items: readonly NewsItem[]): NewsItem[] {
  return rankByRelevance(dedupeByUrl(items));
}
