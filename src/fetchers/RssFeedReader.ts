import Parser from "rss-parser";
import type { FeedEntry } from "../types";
import type { PageFetch } from "./ContentFetcher";
import { createPageFetch } from "./ContentFetcher";
import { createLogger, type Logger } from "../common/logger";

export interface FeedReader {
  read(url: string): Promise<FeedEntry[]>;
}

export interface RssFeedReaderOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  backoffMs?: number;
  allowInsecureTls?: boolean;
  fetchFeed?: PageFetch;
  logger?: Logger;
}

const FEED_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  Accept: "application/rss+xml, application/atom+xml, application/xml, text/xml, */*",
  "Accept-Language": "ru-RU,ru;q=0.8,en-US;q=0.5,en;q=0.3",
};

// Fields rss-parser fills for RSS 2.0 and Atom items.
export interface RawFeedItem {
  title?: string;
  link?: string;
  guid?: string;
  content?: string;
  summary?: string;
  contentSnippet?: string;
  isoDate?: string;
  pubDate?: string;
}

export function normalizeFeedItems(items: RawFeedItem[]): FeedEntry[] {
  return items.map((item) => ({
    title: (item.title ?? "").trim(),
    summary: item.content ?? item.summary ?? item.contentSnippet ?? "",
    link: (item.link ?? item.guid ?? "").trim(),
    published: item.isoDate ?? item.pubDate,
  }));
}

/**
 * RSS/Atom reader. Fetches with undici, retrying rate-limited answers, and
 * parses with rss-parser. Rejects on HTTP errors and unparseable XML.
 */
export class RssFeedReader implements FeedReader {
  private readonly parser = new Parser();
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly fetchFeed: PageFetch;
  private readonly logger: Logger;

  public constructor(options: RssFeedReaderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.backoffMs = options.backoffMs ?? 5_000;
    this.fetchFeed = options.fetchFeed ?? createPageFetch(options.allowInsecureTls);
    this.logger = options.logger ?? createLogger("info", "RssFeedReader");
  }

  public async read(url: string): Promise<FeedEntry[]> {
    const xml = await this.fetchWithRetry(url);
    const feed = await this.parser.parseString(xml);
    const entries = normalizeFeedItems(feed.items ?? []);
    this.logger.info(`Feed ${url} has ${entries.length} entries`);
    return entries;
  }

  private async fetchWithRetry(url: string, attempt = 1): Promise<string> {
    const res = await this.fetchFeed(url, {
      headers: FEED_HEADERS,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (res.status === 429) {
      if (attempt >= this.maxAttempts) throw new Error(`Feed rate limit exceeded after ${attempt} attempts: ${url}`);
      const waitMs = this.backoffMs * attempt; // linear backoff
      this.logger.warn(`Rate limited by ${url}, retrying in ${waitMs}ms`);
      await new Promise((r) => setTimeout(r, waitMs));
      return this.fetchWithRetry(url, attempt + 1);
    }
    if (!res.ok) {
      throw new Error(`Feed request failed with HTTP ${res.status}: ${url}`);
    }
    return res.text();
  }
}
