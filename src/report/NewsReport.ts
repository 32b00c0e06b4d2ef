import { mkdirSync, readFileSync, readdirSync, statSync, writeFileSync, existsSync } from "fs";
import path from "path";
import { z } from "zod";
import { METAL_CATEGORIES, type MetalCategory, type NewsItem, type NewsReport, type ProcessingStats } from "../types";

export const REPORT_PREFIX = "metals-news-";

export interface ReportContext {
  stats: ProcessingStats;
  provider: string;
  model: string;
  parsedAt?: Date;
}

export function metalsDistribution(items: readonly NewsItem[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    for (const metal of item.metals) {
      counts[metal] = (counts[metal] ?? 0) + 1;
    }
  }
  return counts;
}

export function buildReport(items: readonly NewsItem[], ctx: ReportContext): NewsReport {
  const total = items.length;
  return {
    metadata: {
      parsed_at: (ctx.parsedAt ?? new Date()).toISOString(),
      total_news: total,
      ai_provider: ctx.provider,
      model: ctx.model,
      sources_count: new Set(items.map((i) => i.source)).size,
      metals_distribution: metalsDistribution(items),
      average_relevance: total ? items.reduce((s, i) => s + i.relevanceScore, 0) / total : 0,
      processing_stats: { ...ctx.stats },
    },
    news: items.map((item) => ({
      title: item.title,
      url: item.url,
      source: item.source,
      published: item.published,
      ai_summary: item.aiSummary,
      relevance_score: item.relevanceScore,
      metals: [...item.metals],
    })),
  };
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, sortKeys(v)])
    );
  }
  return value;
}

/** Two-space indented JSON with keys sorted at every level; non-ASCII stays literal. */
export function serializeReport(report: NewsReport): string {
  return JSON.stringify(sortKeys(report), null, 2);
}

export function reportFileName(date: Date): string {
  const dateStr = `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, "0")}-${String(
    date.getDate()
  ).padStart(2, "0")}`;
  return `${REPORT_PREFIX}${dateStr}.json`;
}

export function writeReport(report: NewsReport, outDir: string, date: Date = new Date()): string {
  mkdirSync(outDir, { recursive: true });
  const filePath = path.join(outDir, reportFileName(date));
  writeFileSync(filePath, serializeReport(report), "utf-8");
  return filePath;
}

const MetalSchema = z.string().refine(
  (value): value is MetalCategory => METAL_CATEGORIES.some((m) => m === value),
  { message: "unknown metal" }
);

const ProcessingStatsSchema = z.object({
  total_processed: z.number(),
  pre_filtered_out: z.number(),
  ai_analyzed: z.number(),
  relevant_found: z.number(),
});

export const NewsReportSchema = z.object({
  metadata: z.object({
    parsed_at: z.string(),
    total_news: z.number(),
    ai_provider: z.string(),
    model: z.string(),
    sources_count: z.number(),
    metals_distribution: z.record(z.number()),
    average_relevance: z.number(),
    processing_stats: ProcessingStatsSchema,
  }),
  news: z.array(
    z.object({
      title: z.string(),
      url: z.string(),
      source: z.string(),
      published: z.string(),
      ai_summary: z.string(),
      relevance_score: z.number(),
      metals: z.array(MetalSchema),
    })
  ),
});

/**
 * Load the most recent report from the output directory, or null when there
 * is none. A file that does not match the report shape throws.
 */
export function loadLatestReport(outDir: string): { file: string; report: NewsReport } | null {
  if (!existsSync(outDir) || !statSync(outDir).isDirectory()) {
    return null;
  }
  const files = readdirSync(outDir)
    .filter((f) => f.startsWith(REPORT_PREFIX) && f.endsWith(".json"))
    .map((f) => ({
      name: f,
      path: path.join(outDir, f),
      mtime: statSync(path.join(outDir, f)).mtime,
    }))
    .sort((a, b) => b.mtime.getTime() - a.mtime.getTime() || b.name.localeCompare(a.name));

  const latest = files[0];
  if (!latest) return null;
  const report = NewsReportSchema.parse(JSON.parse(readFileSync(latest.path, "utf-8")));
  return { file: latest.path, report };
}
