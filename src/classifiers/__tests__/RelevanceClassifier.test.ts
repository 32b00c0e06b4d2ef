import { describe, expect, it, vi } from 'vitest';
import type { Logger } from '../../common/logger';
import type { CompletionClient } from '../../services/OpenAIService';
import { KeywordFilter } from '../KeywordFilter';
import { RelevanceClassifier, type RelevanceClassifierOptions } from '../RelevanceClassifier';
import { strictJson } from '../replyStrategies';

const silentLogger = (): Logger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

const replying = (reply: string): CompletionClient => ({ complete: vi.fn().mockResolvedValue(reply) });
const failing = (): CompletionClient => ({ complete: vi.fn().mockRejectedValue(new Error('Request timed out.')) });

const build = (ai: CompletionClient, options: RelevanceClassifierOptions = {}) =>
  new RelevanceClassifier(ai, { logger: silentLogger(), ...options });

describe('RelevanceClassifier structured replies', () => {
  it('uses a strict JSON reply', async () => {
    const ai = replying(
      '{"is_relevant": true, "metals": ["золото"], "summary": "Золото подорожало", "score": 0.9, "reason": "рост цены"}'
    );
    const result = await build(ai).classify('Золото дорожает', 'Цена золота выросла', ['gold']);
    expect(result).toEqual({
      isRelevant: true,
      metals: ['gold'],
      summary: 'Золото подорожало',
      score: 0.9,
      reason: 'рост цены',
      tier: 'structured',
    });
  });

  it('digs the object out of prose and code fences and coerces numeric strings', async () => {
    const ai = replying('Вот ответ:\n```json\n{"is_relevant": false, "score": "0.2"}\n```');
    const result = await build(ai).classify('Серебряный призер', 'Спорт', ['silver']);
    expect(result).toEqual({
      isRelevant: false,
      metals: ['silver'],
      summary: '',
      score: 0.2,
      reason: '',
      tier: 'structured',
    });
  });

  it('clamps the score and keeps only known metals', async () => {
    const ai = replying('{"is_relevant": true, "metals": ["gold", "медь"], "score": 1.7}');
    const result = await build(ai).classify('t', 'c', ['gold', 'silver']);
    expect(result.score).toBe(1);
    expect(result.metals).toEqual(['gold']);
  });

  it('falls back to the pre-filter metals when none of the named metals are known', async () => {
    const ai = replying('{"is_relevant": true, "metals": ["медь"], "score": 0.8}');
    const result = await build(ai).classify('t', 'c', ['platinum']);
    expect(result.metals).toEqual(['platinum']);
  });

  it('truncates long summaries to 500 characters', async () => {
    const ai = replying(JSON.stringify({ is_relevant: true, summary: 'я'.repeat(800), score: 0.5 }));
    const result = await build(ai).classify('t', 'c', ['gold']);
    expect(result.summary).toHaveLength(500);
  });

  it('treats null metals as absent and keeps the structured decision', async () => {
    const ai = replying(
      '{"is_relevant": true, "metals": null, "summary": "Золото подорожало", "score": 0.95, "reason": "цена"}'
    );
    const result = await build(ai).classify('Золото дорожает', 'Цена золота выросла', ['gold']);
    expect(result).toEqual({
      isRelevant: true,
      metals: ['gold'],
      summary: 'Золото подорожало',
      score: 0.95,
      reason: 'цена',
      tier: 'structured',
    });
  });

  it('treats null score and relevance as their defaults', async () => {
    const ai = replying('{"is_relevant": false, "metals": [], "summary": null, "score": null, "reason": "true medal"}');
    const result = await build(ai).classify('Золотая медаль', 'Спорт', ['gold']);
    expect(result).toEqual({
      isRelevant: false,
      metals: [],
      summary: '',
      score: 0,
      reason: 'true medal',
      tier: 'structured',
    });

    const undecided = await build(replying('{"is_relevant": null, "score": 0.3}')).classify('t', 'c', ['gold']);
    expect(undecided.isRelevant).toBe(false);
    expect(undecided.tier).toBe('structured');
  });
});

describe('RelevanceClassifier salvaged replies', () => {
  it('accepts a textual reply with an affirmative token and market vocabulary', async () => {
    const reply = 'Да, true: новость релевантна, цена на золото растет';
    const result = await build(replying(reply)).classify('t', 'c', ['gold']);
    expect(result).toEqual({
      isRelevant: true,
      metals: ['gold'],
      summary: reply,
      score: 0.7,
      reason: 'parsed from non-JSON response',
      tier: 'salvaged',
    });
  });

  it('rejects an object whose fields cannot be coerced and has no affirmative token', async () => {
    const result = await build(replying('{"is_relevant": "maybe", "score": 0.4}')).classify('t', 'c', ['gold']);
    expect(result).toEqual({
      isRelevant: false,
      metals: [],
      summary: '',
      score: 0,
      reason: 'parsed from non-JSON response',
      tier: 'salvaged',
    });
  });

  it('rejects an empty reply', async () => {
    const result = await build(replying('')).classify('t', 'c', ['gold']);
    expect(result.isRelevant).toBe(false);
    expect(result.tier).toBe('salvaged');
  });
});

describe('RelevanceClassifier keyword fallback', () => {
  it('accepts a price story when the endpoint is unreachable', async () => {
    const title = 'Цена на золото выросла на 2%';
    const result = await build(failing()).classify(title, `${title} Котировки обновили максимум`, ['gold']);
    expect(result).toEqual({
      isRelevant: true,
      metals: ['gold'],
      summary: 'Цена на золото выросла на 2%...',
      score: 0.6,
      reason: 'fallback: economic terms found',
      tier: 'keyword-fallback',
    });
  });

  it('rejects a figurative mention without economic context', async () => {
    const title = 'Золотая медаль Олимпиады';
    const result = await build(failing()).classify(title, `${title} Спортсмен выиграл финал`, ['gold']);
    expect(result).toEqual({
      isRelevant: false,
      metals: [],
      summary: '',
      score: 0,
      reason: 'fallback: no economic context',
      tier: 'keyword-fallback',
    });
  });

  it('needs pre-filter metals even when economic terms are present', async () => {
    const result = await build(failing()).classify('Биржа', 'торги закрылись', []);
    expect(result.isRelevant).toBe(false);
  });

  it('is used when a custom strategy chain gives up', async () => {
    const classifier = build(replying('not json, торги'), { strategies: [strictJson] });
    const result = await classifier.classify('Цена серебра', 'Цена серебра', ['silver']);
    expect(result.tier).toBe('keyword-fallback');
    expect(result.isRelevant).toBe(true);
  });
});

describe('RelevanceClassifier prompt', () => {
  it('embeds metal labels, title and at most 1000 characters of content', async () => {
    const ai = replying('{}');
    await build(ai).classify('Заголовок новости', 'x'.repeat(1500), ['gold', 'silver']);
    const prompt = vi.mocked(ai.complete).mock.calls[0][0];
    expect(prompt).toContain('Предварительно найдены упоминания: золото, серебро');
    expect(prompt).toContain('Заголовок: Заголовок новости');
    expect(prompt).toContain(`Содержание: ${'x'.repeat(1000)}\n`);
    expect(prompt).not.toContain('x'.repeat(1001));
  });
});

describe('RelevanceClassifier score range', () => {
  const replies = [
    '{"is_relevant": true, "score": -3}',
    '{"is_relevant": true, "score": "12"}',
    'true relevant',
    'nothing useful',
  ];

  it.each(replies)('keeps the score within [0, 1] for %j', async (reply) => {
    const result = await build(replying(reply)).classify('t', 'c', ['gold']);
    expect(result.score).toBeGreaterThanOrEqual(0);
    expect(result.score).toBeLessThanOrEqual(1);
  });

  it('keeps the score within [0, 1] when the endpoint fails', async () => {
    const result = await build(failing()).classify('Цена золота', 'цена', ['gold']);
    expect(result.score).toBe(0.6);
  });
});

describe('RelevanceClassifier with an injected filter', () => {
  it('normalizes metals through the supplied filter', async () => {
    const keywordFilter = new KeywordFilter([{ metal: 'gold', label: 'gold', keywords: ['au'] }]);
    const classifier = new RelevanceClassifier(replying('{"is_relevant": true, "metals": ["AU"], "score": 0.5}'), {
      keywordFilter,
      logger: silentLogger(),
    });
    const result = await classifier.classify('t', 'c', ['gold']);
    expect(result.metals).toEqual(['gold']);
  });
});
