import * as cheerio from "cheerio";
import { Agent, fetch } from "undici";
import { describeError } from "../common/errors";
import { createLogger, type Logger } from "../common/logger";

export interface PageResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type PageFetch = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<PageResponse>;

export const BROWSER_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "ru-RU,ru;q=0.8,en-US;q=0.5,en;q=0.3",
};

// Pages on these paths render client-side and never yield article text.
export const DEFAULT_DENYLIST = ["finam.ru/publications/item"];

export const CONTENT_SELECTORS = [
  "article",
  ".article-body",
  ".article-content",
  ".news-content",
  ".text",
  ".content",
  ".post-content",
  '[itemprop="articleBody"]',
  ".js-mediator-article",
  ".article__text",
];

const NON_CONTENT_TAGS = "script, style, nav, header, footer, aside";
const BLOCK_TAGS = "p, div, li, h1, h2, h3, h4, h5, h6, td, blockquote";

export const MAX_CONTENT_LENGTH = 2500;

export interface ContentFetcherOptions {
  denylist?: string[];
  timeoutMs?: number;
  maxLength?: number;
  allowInsecureTls?: boolean;
  fetchPage?: PageFetch;
  logger?: Logger;
}

/**
 * Undici-backed page fetch. With `allowInsecureTls` certificate validation is
 * disabled for page requests only (NOT recommended for production).
 */
export function createPageFetch(allowInsecureTls = false): PageFetch {
  const dispatcher = allowInsecureTls
    ? new Agent({ connect: { rejectUnauthorized: false } })
    : undefined;
  return (url, init) => fetch(url, dispatcher ? { ...init, dispatcher } : init);
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Plain text of an HTML fragment such as a feed summary. */
export function stripMarkup(html: string): string {
  if (!html) return "";
  return collapse(cheerio.load(html).root().text());
}

/**
 * Main article text of an HTML page, or "" when nothing usable is found.
 */
export function extractMainText(html: string, maxLength = MAX_CONTENT_LENGTH): string {
  const $ = cheerio.load(html);
  $(NON_CONTENT_TAGS).remove();
  // keep adjacent blocks from gluing their words together
  $(BLOCK_TAGS).append(" ");

  let content = "";
  for (const selector of CONTENT_SELECTORS) {
    const elements = $(selector);
    if (elements.length) {
      content = elements
        .map((_i, el) => collapse($(el).text()))
        .get()
        .filter(Boolean)
        .join(" ");
      break;
    }
  }

  if (!content) {
    content = $("p")
      .map((_i, el) => collapse($(el).text()))
      .get()
      .filter(Boolean)
      .join(" ");
  }

  return content.slice(0, maxLength);
}

export class ContentFetcher {
  private readonly denylist: string[];
  private readonly timeoutMs: number;
  private readonly maxLength: number;
  private readonly fetchPage: PageFetch;
  private readonly logger: Logger;

  constructor(options: ContentFetcherOptions = {}) {
    this.denylist = options.denylist ?? DEFAULT_DENYLIST;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxLength = options.maxLength ?? MAX_CONTENT_LENGTH;
    this.fetchPage = options.fetchPage ?? createPageFetch(options.allowInsecureTls);
    this.logger = options.logger ?? createLogger("info", "ContentFetcher");
  }

  public shouldSkip(url: string): boolean {
    return this.denylist.some((fragment) => url.includes(fragment));
  }

  /** Never rejects: every failure degrades to an empty string. */
  public async extract(url: string): Promise<string> {
    try {
      if (this.shouldSkip(url)) {
        this.logger.debug(`Skipping denylisted URL ${url}`);
        return "";
      }
      const res = await this.fetchPage(url, {
        headers: BROWSER_HEADERS,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!res.ok) {
        this.logger.debug(`HTTP ${res.status} for ${url}`);
        return "";
      }
      return extractMainText(await res.text(), this.maxLength);
    } catch (e) {
      this.logger.debug(`Content extraction failed for ${url}: ${describeError(e)}`);
      return "";
    }
  }
}
