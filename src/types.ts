export type MetalCategory = 'gold' | 'silver' | 'platinum' | 'palladium';

export const METAL_CATEGORIES: readonly MetalCategory[] = ['gold', 'silver', 'platinum', 'palladium'];

export interface MetalKeywords {
  metal: MetalCategory;
  label: string; // display name used in classifier prompts
  keywords: readonly string[]; // lower-cased inflections, tickers, synonyms
}

export type MetalKeywordTable = ReadonlyArray<MetalKeywords>;

export interface KeywordMatch {
  matched: boolean;
  metals: MetalCategory[];
}

export interface PreFilterResult {
  pass: boolean;
  metals: MetalCategory[];
  reason: string;
}

// Raw feed record as handed over by a feed reader.
export interface FeedEntry {
  title: string;
  summary: string; // may contain markup
  link: string;
  published?: string; // raw date string from the feed
}

export interface FeedSource {
  id: string;
  name: string;
  feedUrls: string[];
}

export type ClassificationTier = 'structured' | 'salvaged' | 'keyword-fallback';

export interface ClassificationResult {
  isRelevant: boolean;
  metals: MetalCategory[];
  summary: string;
  score: number; // 0..1
  reason: string;
  tier: ClassificationTier;
}

// Accepted, enriched record. Only built from a relevant ClassificationResult.
export interface NewsItem {
  readonly title: string;
  readonly url: string;
  readonly source: string;
  readonly metals: readonly MetalCategory[];
  readonly published: string; // ISO timestamp
  readonly aiSummary: string;
  readonly relevanceScore: number;
}

export interface ProcessingStats {
  total_processed: number;
  pre_filtered_out: number;
  ai_analyzed: number;
  relevant_found: number;
}

export interface ReportNewsEntry {
  title: string;
  url: string;
  source: string;
  published: string;
  ai_summary: string;
  relevance_score: number;
  metals: MetalCategory[]; // as assigned by the classifier
}

export interface NewsReport {
  metadata: {
    parsed_at: string;
    total_news: number;
    ai_provider: string;
    model: string;
    sources_count: number;
    metals_distribution: Record<string, number>;
    average_relevance: number;
    processing_stats: ProcessingStats;
  };
  news: ReportNewsEntry[];
}
