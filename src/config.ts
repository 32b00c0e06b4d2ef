// Centralized configuration & environment variable access.
// Loads .env at startup using dotenv.
import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { ConfigError } from "./common/errors";
import { isLogLevel, type LogLevel } from "./common/logger";

// Load .env if present. Warn if only .env.example exists.
const envPath = path.resolve(process.cwd(), ".env");
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
} else if (process.env.NODE_ENV !== "test") {
  const examplePath = path.resolve(process.cwd(), ".env.example");
  if (fs.existsSync(examplePath)) {
    console.warn(
      "[config] .env file not found. Copy .env.example to .env and set OPENROUTER_API_KEY."
    );
  } else {
    console.warn(
      "[config] No .env file present. Environment variables must be set externally."
    );
  }
}

const API_KEY_PLACEHOLDER = "your_openrouter_api_key_here";

export interface AppConfig {
  apiKey?: string;
  apiBaseUrl: string;
  model: string;
  maxAgeHours: number;
  outputDir: string;
  sourcesFile?: string;
  logLevel: LogLevel;
  allowInsecureTls: boolean;
  reportOnly: boolean; // print the latest saved report instead of running the pipeline
  port: number;
}

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value == null || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = (env.LOG_LEVEL ?? "info").trim().toLowerCase();
  return {
    apiKey: env.OPENROUTER_API_KEY?.trim() || undefined,
    apiBaseUrl: env.OPENROUTER_BASE_URL?.trim() || "https://openrouter.ai/api/v1",
    model: env.OPENROUTER_MODEL?.trim() || "deepseek/deepseek-chat",
    maxAgeHours: numberFromEnv(env.MAX_AGE_HOURS, 168),
    outputDir: path.resolve(process.cwd(), env.OUTPUT_DIR?.trim() || "output"),
    sourcesFile: env.SOURCES_FILE?.trim() || undefined,
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    allowInsecureTls: env.ALLOW_INSECURE_TLS === "true",
    reportOnly: env.REPORT_ONLY === "true",
    port: numberFromEnv(env.PORT, 3000),
  };
}

/**
 * The classifier cannot run without a credential; a missing or placeholder
 * key aborts startup.
 */
export function requireApiKey(cfg: AppConfig): string {
  if (!cfg.apiKey || cfg.apiKey === API_KEY_PLACEHOLDER) {
    throw new ConfigError(
      "Missing required config key OPENROUTER_API_KEY. Add it to .env (see .env.example)."
    );
  }
  return cfg.apiKey;
}
