import { createApp } from "./app";
import { getConfig } from "./config";
import { createLogger } from "./common/logger";

const cfg = getConfig();
const logger = createLogger(cfg.logLevel, "server");
const app = createApp({ outputDir: cfg.outputDir, logger });

app.listen(cfg.port, () => {
  logger.info(`Metals News Radar API running at http://localhost:${cfg.port}`);
  logger.info(`Serving reports from ${cfg.outputDir}`);
});
