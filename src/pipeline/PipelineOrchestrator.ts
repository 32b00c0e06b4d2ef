import type { KeywordFilter } from "../classifiers/KeywordFilter";
import type { RelevanceClassifier } from "../classifiers/RelevanceClassifier";
import type { ContentFetcher } from "../fetchers/ContentFetcher";
import { stripMarkup } from "../fetchers/ContentFetcher";
import type { FeedReader } from "../fetchers/RssFeedReader";
import { SUMMARY_MAX_LENGTH } from "../classifiers/replyStrategies";
import { describeError } from "../common/errors";
import { createLogger, type Logger } from "../common/logger";
import type {
  ClassificationResult,
  FeedEntry,
  FeedSource,
  MetalCategory,
  NewsItem,
  ProcessingStats,
} from "../types";
import { ProcessingStatsAccumulator } from "./ProcessingStatsAccumulator";
import { isOlderThan, resolvePublishTime } from "./publishTime";
import { dedupeAndRank } from "./ranking";

export interface PipelineDelays {
  afterClassificationMs: number;
  betweenFeedsMs: number;
}

export const DEFAULT_DELAYS: PipelineDelays = {
  afterClassificationMs: 1500,
  betweenFeedsMs: 2000,
};

export interface PipelineDependencies {
  keywordFilter: Pick<KeywordFilter, "preFilter">;
  contentFetcher: Pick<ContentFetcher, "extract">;
  classifier: Pick<RelevanceClassifier, "classify">;
  feedReader: FeedReader;
  logger?: Logger;
  delays?: Partial<PipelineDelays>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface RunOptions {
  /** Checked between entries and feeds; an aborted run returns what already completed. */
  signal?: AbortSignal;
}

const defaultSleep = (ms: number) =>
  ms > 0 ? new Promise<void>((resolve) => setTimeout(resolve, ms)) : Promise.resolve();

export function createNewsItem(
  entry: { title: string; link: string },
  sourceName: string,
  published: Date,
  result: ClassificationResult,
  preliminaryMetals: MetalCategory[]
): NewsItem {
  if (!result.isRelevant) {
    throw new Error(`Refusing to build a news item from a non-relevant result: ${entry.link}`);
  }
  return Object.freeze({
    title: entry.title.trim(),
    url: entry.link,
    source: sourceName,
    metals: Object.freeze(result.metals.length ? [...result.metals] : [...preliminaryMetals]),
    published: published.toISOString(),
    aiSummary: result.summary.slice(0, SUMMARY_MAX_LENGTH),
    relevanceScore: result.score,
  });
}

/**
 * Walks every feed of every source: pre-filters entries by keyword, and only
 * spends a page fetch and a classifier call on entries that pass.
 */
export class PipelineOrchestrator {
  private readonly stats = new ProcessingStatsAccumulator();
  private readonly logger: Logger;
  private readonly delays: PipelineDelays;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDependencies) {
    this.logger = deps.logger ?? createLogger("info", "Pipeline");
    this.delays = { ...DEFAULT_DELAYS, ...deps.delays };
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  public getStats(): ProcessingStats {
    return this.stats.snapshot();
  }

  public async run(sources: FeedSource[], maxAgeHours: number, options: RunOptions = {}): Promise<NewsItem[]> {
    const collected: NewsItem[] = [];
    this.logger.info(`Starting run over ${sources.length} sources (max age ${maxAgeHours}h)`);

    for (const source of sources) {
      if (options.signal?.aborted) break;
      this.logger.info(`Source: ${source.name}`);
      let sourceCount = 0;
      for (const feedUrl of source.feedUrls) {
        if (options.signal?.aborted) break;
        const accepted = await this.processFeed(feedUrl, source, maxAgeHours, options.signal);
        collected.push(...accepted);
        sourceCount += accepted.length;
        if (options.signal?.aborted) break;
        await this.sleep(this.delays.betweenFeedsMs);
      }
      this.logger.info(`Source ${source.name}: ${sourceCount} relevant items`);
    }

    if (options.signal?.aborted) {
      this.logger.warn("Run interrupted; ranking the items completed so far");
    }

    const ranked = dedupeAndRank(collected);
    this.logStats();
    this.logger.info(`Unique relevant items: ${ranked.length}`);
    return ranked;
  }

  private async processFeed(
    feedUrl: string,
    source: FeedSource,
    maxAgeHours: number,
    signal?: AbortSignal
  ): Promise<NewsItem[]> {
    let entries: FeedEntry[];
    try {
      entries = await this.deps.feedReader.read(feedUrl);
    } catch (e) {
      this.logger.error(`Feed ${feedUrl} failed: ${describeError(e)}`);
      return [];
    }

    const accepted: NewsItem[] = [];
    let tooOld = 0;
    for (const entry of entries) {
      if (signal?.aborted) break;
      try {
        const outcome = await this.processEntry(entry, source, maxAgeHours);
        if (outcome === "too-old") tooOld += 1;
        else if (outcome) accepted.push(outcome);
      } catch (e) {
        this.logger.error(`Entry "${entry.title.slice(0, 60)}" failed: ${describeError(e)}`, { url: entry.link });
      }
    }
    this.logger.info(`Feed ${feedUrl}: entries=${entries.length} too_old=${tooOld} relevant=${accepted.length}`);
    return accepted;
  }

  private async processEntry(
    entry: FeedEntry,
    source: FeedSource,
    maxAgeHours: number
  ): Promise<NewsItem | "too-old" | null> {
    this.stats.increment("total_processed");

    const now = this.now();
    const published = resolvePublishTime(entry.published, now);
    if (isOlderThan(published, maxAgeHours, now)) return "too-old";
    if (!entry.title || !entry.link) return null;

    const summary = stripMarkup(entry.summary);
    const gate = this.deps.keywordFilter.preFilter(entry.title, summary);
    if (!gate.pass) {
      this.stats.increment("pre_filtered_out");
      return null;
    }
    this.logger.info(`Pre-filter passed: ${entry.title.slice(0, 50)} (${gate.metals.join(", ")})`);

    const fullContent = await this.deps.contentFetcher.extract(entry.link);
    const content = `${entry.title} ${summary} ${fullContent}`;

    this.stats.increment("ai_analyzed");
    const result = await this.deps.classifier.classify(entry.title, content, gate.metals);
    await this.sleep(this.delays.afterClassificationMs);

    if (!result.isRelevant) {
      this.logger.info(`Rejected: ${entry.title.slice(0, 50)} (${result.reason || "not relevant"})`);
      return null;
    }

    const item = createNewsItem(entry, source.name, published, result, gate.metals);
    this.stats.increment("relevant_found");
    this.logger.info(`Accepted: ${entry.title.slice(0, 60)} (score ${item.relevanceScore.toFixed(2)}, ${result.tier})`);
    return item;
  }

  private logStats(): void {
    const s = this.stats.snapshot();
    this.logger.info("Processing stats", { ...s });
    if (s.ai_analyzed > 0) {
      this.logger.info(`Classifier acceptance rate: ${((s.relevant_found / s.ai_analyzed) * 100).toFixed(1)}%`);
    }
  }
}
