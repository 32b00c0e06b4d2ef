import { readFileSync } from "fs";
import { z } from "zod";
import defaultSources from "./data/sources.json";
import type { FeedSource } from "./types";

const FeedSourceSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  feedUrls: z.array(z.string().url()).min(1),
});

export const FeedSourcesSchema = z.array(FeedSourceSchema);

export const DEFAULT_SOURCES: FeedSource[] = FeedSourcesSchema.parse(defaultSources);

/** Sources from a JSON file when one is configured, otherwise the bundled list. */
export function loadSources(file?: string): FeedSource[] {
  if (!file) return DEFAULT_SOURCES;
  return FeedSourcesSchema.parse(JSON.parse(readFileSync(file, "utf-8")));
}
