#!/usr/bin/env node
import { KeywordFilter } from "./classifiers/KeywordFilter";
import { RelevanceClassifier } from "./classifiers/RelevanceClassifier";
import { ConfigError, describeError } from "./common/errors";
import { createLogger } from "./common/logger";
import { getConfig, requireApiKey } from "./config";
import { ContentFetcher } from "./fetchers/ContentFetcher";
import { RssFeedReader } from "./fetchers/RssFeedReader";
import { PipelineOrchestrator } from "./pipeline/PipelineOrchestrator";
import { buildReport, loadLatestReport, writeReport } from "./report/NewsReport";
import { printSummary } from "./report/printSummary";
import { OpenAIService } from "./services/OpenAIService";
import { loadSources } from "./sources";
import type { FeedSource } from "./types";

async function main() {
  console.log("— — —");
  console.log("Metals News Radar");
  console.log("Keyword pre-filter and AI relevance classification for precious-metals news.");
  console.log("— — —");

  const cfg = getConfig();
  const log = (scope: string) => createLogger(cfg.logLevel, scope);
  const logger = log("main");

  if (cfg.reportOnly) {
    logger.info("REPORT_ONLY=true, loading latest report...");
    const latest = loadLatestReport(cfg.outputDir);
    if (!latest) {
      logger.error(`No report found in ${cfg.outputDir}. Run without REPORT_ONLY first.`);
      return;
    }
    logger.info(`Loaded ${latest.file}`);
    printSummary(latest.report);
    return;
  }

  const apiKey = requireApiKey(cfg);
  const ai = new OpenAIService({
    apiKey,
    baseURL: cfg.apiBaseUrl,
    model: cfg.model,
    allowInsecureTls: cfg.allowInsecureTls,
    logger: log("OpenAIService"),
  });
  if (!(await ai.testConnection())) {
    logger.warn("Classifier endpoint check failed; keyword fallback will be used where calls fail");
  }

  const keywordFilter = new KeywordFilter();
  const orchestrator = new PipelineOrchestrator({
    keywordFilter,
    contentFetcher: new ContentFetcher({ allowInsecureTls: cfg.allowInsecureTls, logger: log("ContentFetcher") }),
    classifier: new RelevanceClassifier(ai, { keywordFilter, logger: log("RelevanceClassifier") }),
    feedReader: new RssFeedReader({ allowInsecureTls: cfg.allowInsecureTls, logger: log("RssFeedReader") }),
    logger: log("Pipeline"),
  });

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted; finishing the current entry");
    controller.abort();
  });

  let sources: FeedSource[];
  try {
    sources = loadSources(cfg.sourcesFile);
  } catch (e) {
    throw new ConfigError(`Invalid SOURCES_FILE ${cfg.sourcesFile}: ${describeError(e)}`);
  }

  const startedAt = Date.now();
  const news = await orchestrator.run(sources, cfg.maxAgeHours, { signal: controller.signal });

  const report = buildReport(news, {
    stats: orchestrator.getStats(),
    provider: ai.provider,
    model: ai.model,
  });

  try {
    const filePath = writeReport(report, cfg.outputDir);
    logger.info(`Report written to ${filePath}`);
  } catch (e) {
    logger.warn(`Failed to write report: ${describeError(e)}`);
  }

  printSummary(report);
  logger.info(`Duration: ${((Date.now() - startedAt) / 1000).toFixed(2)}s`);
  if (!news.length) logger.warn("No relevant news found");
}

main()
  .then(() => process.exit(0))
  .catch((err) => {
    if (err instanceof ConfigError) {
      console.error(`[config] ${err.message}`);
    } else {
      console.error("Error:", err);
    }
    process.exit(1);
  });
