import type { ProcessingStats } from "../types";

export type StatCounter = keyof ProcessingStats;

// Counters for one orchestrator; they only ever go up.
export class ProcessingStatsAccumulator {
  private readonly counters: ProcessingStats = {
    total_processed: 0,
    pre_filtered_out: 0,
    ai_analyzed: 0,
    relevant_found: 0,
  };

  public increment(counter: StatCounter): void {
    this.counters[counter] += 1;
  }

  public snapshot(): ProcessingStats {
    return { ...this.counters };
  }
}
