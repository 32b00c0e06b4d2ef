import express from "express";
import cors from "cors";
import { describeError } from "./common/errors";
import type { Logger } from "./common/logger";
import { loadLatestReport } from "./report/NewsReport";
import { METAL_CATEGORIES, type MetalCategory } from "./types";

export interface AppOptions {
  outputDir: string;
  logger: Logger;
}

function parseMetal(value: unknown): MetalCategory | undefined {
  return METAL_CATEGORIES.find((m) => m === value);
}

/**
 * Read-only API over the newest report in the output directory.
 */
export function createApp({ outputDir, logger }: AppOptions): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  const latest = () => {
    try {
      return loadLatestReport(outputDir);
    } catch (e) {
      logger.error(`Failed to load report: ${describeError(e)}`);
      return null;
    }
  };

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/report", (_req, res) => {
    const found = latest();
    if (!found) {
      res.status(404).json({ error: "No report found. Run the pipeline first." });
      return;
    }
    res.json(found.report);
  });

  app.get("/api/report/news", (req, res) => {
    const found = latest();
    if (!found) {
      res.status(404).json({ error: "No report found. Run the pipeline first." });
      return;
    }
    const { metal: rawMetal, limit } = req.query;
    const metal = parseMetal(rawMetal);
    if (rawMetal !== undefined && !metal) {
      res.status(400).json({ error: `Unknown metal: ${String(rawMetal)}` });
      return;
    }
    const max = Number(limit);
    let news = found.report.news;
    if (metal) {
      news = news.filter((n) => n.metals.includes(metal));
    }
    if (Number.isInteger(max) && max > 0) news = news.slice(0, max);
    res.json({ total: news.length, news });
  });

  return app;
}
