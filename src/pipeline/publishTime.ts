/**
 * Publish time of a feed entry. Entries without a parseable date are treated
 * as published `now`, so undated items always pass the age window.
 */
export function resolvePublishTime(published: string | undefined, now: Date): Date {
  if (!published || !published.trim()) return now;
  const parsed = new Date(published);
  return Number.isNaN(parsed.getTime()) ? now : parsed;
}

export function isOlderThan(published: Date, maxAgeHours: number, now: Date): boolean {
  return now.getTime() - published.getTime() > maxAgeHours * 60 * 60 * 1000;
}
