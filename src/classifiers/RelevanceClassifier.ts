import type { ClassificationResult, MetalCategory } from "../types";
import type { CompletionClient } from "../services/OpenAIService";
import { KeywordFilter } from "./KeywordFilter";
import {
  DEFAULT_REPLY_STRATEGIES,
  type ReplyStrategy,
  keywordFallback,
  runReplyStrategies,
} from "./replyStrategies";
import { describeError } from "../common/errors";
import { createLogger, type Logger } from "../common/logger";

export const PROMPT_CONTENT_LIMIT = 1000;

export interface RelevanceClassifierOptions {
  keywordFilter?: KeywordFilter;
  strategies?: readonly ReplyStrategy[];
  logger?: Logger;
}

export class RelevanceClassifier {
  private readonly keywordFilter: KeywordFilter;
  private readonly strategies: readonly ReplyStrategy[];
  private readonly logger: Logger;

  constructor(private readonly ai: CompletionClient, options: RelevanceClassifierOptions = {}) {
    this.keywordFilter = options.keywordFilter ?? new KeywordFilter();
    this.strategies = options.strategies ?? DEFAULT_REPLY_STRATEGIES;
    this.logger = options.logger ?? createLogger("info", "RelevanceClassifier");
  }

  /**
   * Decides whether an item is about precious metals as commodities or
   * investments. Always resolves: structured reply first, then a salvaged
   * text reply, then a keyword decision when the endpoint is unreachable.
   */
  public async classify(
    title: string,
    content: string,
    preliminaryMetals: MetalCategory[]
  ): Promise<ClassificationResult> {
    let reply: string;
    try {
      reply = await this.ai.complete(this.buildPrompt(title, content, preliminaryMetals));
    } catch (e) {
      this.logger.error(`Classification request failed: ${describeError(e)}`);
      return keywordFallback(title, content, preliminaryMetals);
    }

    const { result, skipped } = runReplyStrategies(
      reply,
      { title, content, preliminaryMetals, keywordFilter: this.keywordFilter },
      this.strategies
    );
    if (skipped.length) {
      this.logger.debug("Reply strategies skipped", { skipped });
    }
    if (!result) {
      this.logger.warn("No reply strategy produced a decision; using keyword fallback");
      return keywordFallback(title, content, preliminaryMetals);
    }
    return result;
  }

  public buildPrompt(title: string, content: string, preliminaryMetals: MetalCategory[]): string {
    const labels = preliminaryMetals.map((m) => this.keywordFilter.labelOf(m)).join(", ");
    return `Проанализируй новость о возможном упоминании драгоценных металлов.

Предварительно найдены упоминания: ${labels}

Заголовок: ${title}
Содержание: ${content.slice(0, PROMPT_CONTENT_LIMIT)}

Определи:
1. Относится ли новость к драгоценным металлам (золото, серебро, платина, палладий) как к ТОВАРАМ, ИНВЕСТИЦИЯМ или ПРОМЫШЛЕННОМУ СЫРЬЮ?
2. Какие конкретно металлы упоминаются в контексте торговли/инвестиций?
3. Краткий пересказ (2-3 предложения) с важной экономической информацией.

ВАЖНО:
- Игнорируй переносные значения ("золотая медаль", "серебряный призер", "золотой ключ")
- Учитывай только прямые упоминания металлов как товаров или активов
- Новости о ценах, курсах, добыче, инвестициях = релевантны
- Новости о наградах, юбилеях, цветах = нерелевантны

Ответь СТРОГО в JSON:
{"is_relevant": true/false, "metals": ["золото"], "summary": "краткий пересказ", "score": 0.9, "reason": "объяснение"}`;
  }
}
