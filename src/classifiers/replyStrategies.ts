import { z } from "zod";
import lexicon from "../data/lexicon.json";
import { describeError } from "../common/errors";
import type { ClassificationResult, MetalCategory } from "../types";
import type { KeywordFilter } from "./KeywordFilter";

export const SUMMARY_MAX_LENGTH = 500;
export const SALVAGED_SCORE = 0.7;
export const KEYWORD_FALLBACK_SCORE = 0.6;

export interface ReplyContext {
  title: string;
  content: string;
  preliminaryMetals: MetalCategory[];
  keywordFilter: KeywordFilter;
}

export type ReplyParse =
  | { kind: "parsed"; result: ClassificationResult }
  | { kind: "next"; reason: string };

export type ReplyStrategy = (reply: string, ctx: ReplyContext) => ReplyParse;

const flexibleBoolean = z.union([
  z.boolean(),
  z.number().transform((n) => n !== 0),
  z
    .string()
    .transform((s) => s.trim().toLowerCase())
    .refine((s) => s === "true" || s === "false", { message: "not a boolean string" })
    .transform((s) => s === "true"),
]);

const flexibleText = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((v) => (v === null ? "" : String(v)));

// null counts as absent and takes the field's default
const AiReplySchema = z.object({
  is_relevant: flexibleBoolean.nullish().transform((v) => v ?? false),
  metals: z.preprocess((v) => (typeof v === "string" ? [v] : v), z.array(z.unknown()).nullish()),
  summary: flexibleText.default(""),
  score: z
    .union([z.number(), z.string().trim().min(1)])
    .pipe(z.coerce.number().finite())
    .nullish()
    .transform((v) => v ?? 0),
  reason: flexibleText.default(""),
});

export function clamp01(n: number): number {
  return Math.max(0, Math.min(1, n));
}

function coerceReply(payload: unknown, ctx: ReplyContext): ReplyParse {
  const parsed = AiReplySchema.safeParse(payload);
  if (!parsed.success) {
    return { kind: "next", reason: `reply shape rejected: ${parsed.error.issues[0]?.message ?? "invalid"}` };
  }
  const reply = parsed.data;
  let metals = ctx.preliminaryMetals;
  if (reply.metals) {
    const names = reply.metals.filter((m): m is string => typeof m === "string");
    const normalized = ctx.keywordFilter.normalizeMetals(names);
    metals = normalized.length || !reply.is_relevant ? normalized : ctx.preliminaryMetals;
  }
  return {
    kind: "parsed",
    result: {
      isRelevant: reply.is_relevant,
      metals,
      summary: reply.summary.slice(0, SUMMARY_MAX_LENGTH),
      score: clamp01(reply.score),
      reason: reply.reason,
      tier: "structured",
    },
  };
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; reason: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e) {
    return { ok: false, reason: describeError(e) };
  }
}

/** The whole reply is the JSON object. */
export const strictJson: ReplyStrategy = (reply, ctx) => {
  const json = parseJson(reply.trim());
  if (!json.ok) return { kind: "next", reason: `strict parse failed: ${json.reason}` };
  return coerceReply(json.value, ctx);
};

/** The model wrapped the object in prose or code fences: take first "{" to last "}". */
export const embeddedJson: ReplyStrategy = (reply, ctx) => {
  const start = reply.indexOf("{");
  const end = reply.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return { kind: "next", reason: "no JSON object in reply" };
  }
  const json = parseJson(reply.slice(start, end + 1));
  if (!json.ok) return { kind: "next", reason: `embedded parse failed: ${json.reason}` };
  return coerceReply(json.value, ctx);
};

/** Salvages a non-JSON reply: needs an affirmative token and a market-context word. */
export const replyHeuristic: ReplyStrategy = (reply, ctx) => {
  const text = reply.toLowerCase();
  const isRelevant =
    lexicon.replyAffirmativeTokens.some((token) => text.includes(token)) &&
    lexicon.replyContextTerms.some((term) => text.includes(term));
  return {
    kind: "parsed",
    result: {
      isRelevant,
      metals: isRelevant ? ctx.preliminaryMetals : [],
      summary: isRelevant ? reply.slice(0, 200) : "",
      score: isRelevant ? SALVAGED_SCORE : 0,
      reason: "parsed from non-JSON response",
      tier: "salvaged",
    },
  };
};

export const DEFAULT_REPLY_STRATEGIES: readonly ReplyStrategy[] = [strictJson, embeddedJson, replyHeuristic];

/**
 * Runs the strategies in order and returns the first parsed result. The last
 * default strategy always parses; `null` only comes back for custom chains.
 */
export function runReplyStrategies(
  reply: string,
  ctx: ReplyContext,
  strategies: readonly ReplyStrategy[] = DEFAULT_REPLY_STRATEGIES
): { result: ClassificationResult | null; skipped: string[] } {
  const skipped: string[] = [];
  for (const strategy of strategies) {
    const outcome = strategy(reply, ctx);
    if (outcome.kind === "parsed") return { result: outcome.result, skipped };
    skipped.push(outcome.reason);
  }
  return { result: null, skipped };
}

/**
 * Decision used when the AI endpoint cannot be reached at all: relevant only
 * if a pre-filter metal is present and the text carries economic vocabulary.
 */
export function keywordFallback(
  title: string,
  content: string,
  preliminaryMetals: MetalCategory[]
): ClassificationResult {
  const text = `${title} ${content}`.toLowerCase();
  const hasEconomicContext = lexicon.economicTerms.some((term) => text.includes(term));
  if (hasEconomicContext && preliminaryMetals.length > 0) {
    return {
      isRelevant: true,
      metals: preliminaryMetals,
      summary: `${title.slice(0, 150)}...`,
      score: KEYWORD_FALLBACK_SCORE,
      reason: "fallback: economic terms found",
      tier: "keyword-fallback",
    };
  }
  return {
    isRelevant: false,
    metals: [],
    summary: "",
    score: 0,
    reason: "fallback: no economic context",
    tier: "keyword-fallback",
  };
}
