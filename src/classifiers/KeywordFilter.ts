import lexicon from "../data/lexicon.json";
import {
  METAL_CATEGORIES,
  type KeywordMatch,
  type MetalCategory,
  type MetalKeywordTable,
  type PreFilterResult,
} from "../types";

export const DEFAULT_METAL_KEYWORDS: MetalKeywordTable = METAL_CATEGORIES.map((metal) => ({
  metal,
  label: lexicon.metals[metal].label,
  keywords: lexicon.metals[metal].keywords,
}));

interface CompiledMetal {
  metal: MetalCategory;
  patterns: RegExp[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// `\b` only knows ASCII word characters, so Cyrillic needs explicit lookarounds.
function wholeWord(keyword: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}_])`, "u");
}

/**
 * Cheap lexical gate: finds which precious metals a text mentions.
 */
export class KeywordFilter {
  public readonly table: MetalKeywordTable;
  private readonly compiled: readonly CompiledMetal[];

  constructor(table: MetalKeywordTable = DEFAULT_METAL_KEYWORDS) {
    this.table = Object.freeze(
      table.map((entry) =>
        Object.freeze({
          metal: entry.metal,
          label: entry.label,
          keywords: Object.freeze(entry.keywords.map((k) => k.toLowerCase())),
        })
      )
    );
    this.compiled = this.table.map((entry) => ({
      metal: entry.metal,
      patterns: entry.keywords.map(wholeWord),
    }));
  }

  public match(text: string): KeywordMatch {
    const lower = text.toLowerCase();
    const metals: MetalCategory[] = [];
    for (const { metal, patterns } of this.compiled) {
      if (!metals.includes(metal) && patterns.some((p) => p.test(lower))) {
        metals.push(metal);
      }
    }
    return { matched: metals.length > 0, metals };
  }

  public preFilter(title: string, summary: string): PreFilterResult {
    const { matched, metals } = this.match(`${title} ${summary}`);
    if (!matched) {
      return { pass: false, metals: [], reason: "no metal mentions" };
    }
    return { pass: true, metals, reason: "passed pre-filter" };
  }

  /** Maps metal names as a model writes them ("Золото", "XAU") onto categories. */
  public normalizeMetals(names: readonly string[]): MetalCategory[] {
    const metals: MetalCategory[] = [];
    for (const name of names) {
      for (const metal of this.match(name).metals) {
        if (!metals.includes(metal)) metals.push(metal);
      }
    }
    return metals;
  }

  public labelOf(metal: MetalCategory): string {
    return this.table.find((entry) => entry.metal === metal)?.label ?? metal;
  }
}
