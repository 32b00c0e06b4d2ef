import type { NewsReport } from "../types";

const RULE = "— — —";

/**
 * Human-readable digest of a report: funnel counts, per-metal and per-source
 * breakdown and the top items.
 */
export function formatSummary(report: NewsReport, topCount = 3): string[] {
  const { metadata, news } = report;
  const s = metadata.processing_stats;
  const lines: string[] = [
    RULE,
    "Precious Metals News Summary",
    `AI: ${metadata.model} via ${metadata.ai_provider}`,
    `Relevant news: ${metadata.total_news}`,
  ];
  if (news.length) {
    lines.push(`Avg relevance: ${metadata.average_relevance.toFixed(2)}`);
  }

  lines.push(
    RULE,
    `Checked: ${s.total_processed}`,
    `Removed by pre-filter: ${s.pre_filtered_out}`,
    `Sent to AI: ${s.ai_analyzed}`,
    `Relevant: ${s.relevant_found}`
  );
  if (s.ai_analyzed > 0) {
    const precision = (s.relevant_found / s.ai_analyzed) * 100;
    const savings = 100 - (s.ai_analyzed / s.total_processed) * 100;
    lines.push(`AI acceptance: ${precision.toFixed(1)}%`, `AI calls saved: ${savings.toFixed(1)}%`);
  }

  const metals = Object.entries(metadata.metals_distribution);
  if (metals.length) {
    lines.push(RULE, "By metal:");
    for (const [metal, count] of metals) lines.push(`  ${metal}: ${count}`);
  }

  const bySource = new Map<string, number>();
  for (const item of news) bySource.set(item.source, (bySource.get(item.source) ?? 0) + 1);
  if (bySource.size) {
    lines.push(RULE, "By source:");
    for (const [source, count] of bySource) lines.push(`  ${source}: ${count}`);
  }

  if (news.length) {
    lines.push(RULE, `Top ${Math.min(topCount, news.length)}:`);
    news.slice(0, topCount).forEach((item, i) => {
      lines.push(`${i + 1}. ${item.title}`, `   relevance ${item.relevance_score.toFixed(2)} | ${item.source}`);
      if (item.ai_summary) lines.push(`   ${item.ai_summary}`);
    });
  }
  lines.push(RULE);
  return lines;
}

export function printSummary(report: NewsReport): void {
  for (const line of formatSummary(report)) console.log(line);
}
