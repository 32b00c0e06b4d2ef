import OpenAI from 'openai';
import { describeError, errorCode } from '../common/errors';
import { createLogger, type Logger } from '../common/logger';

export interface CompletionClient {
  /** Resolves with the reply text; rejects on network errors, timeouts and non-2xx answers. */
  complete(prompt: string): Promise<string>;
}

export interface OpenAIServiceOptions {
  apiKey: string;
  baseURL?: string;
  model?: string;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  allowInsecureTls?: boolean;
  logger?: Logger;
}

export const DEFAULT_MODEL = 'deepseek/deepseek-chat';
export const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Chat-completion client for an OpenAI-compatible endpoint (OpenRouter by default).
 */
export class OpenAIService implements CompletionClient {
  private readonly client: OpenAI;
  private readonly logger: Logger;
  public readonly model: string;
  public readonly provider: string;
  public readonly timeoutMs: number;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly topP: number;

  constructor(options: OpenAIServiceOptions) {
    this.logger = options.logger ?? createLogger('info', 'OpenAIService');
    if (options.allowInsecureTls) {
      // Disables TLS verification globally for this process. Use ONLY for debugging.
      process.env.NODE_TLS_REJECT_UNAUTHORIZED = '0';
      this.logger.warn('WARNING: TLS verification disabled (ALLOW_INSECURE_TLS=true). Do not use in production.');
    }
    const baseURL = options.baseURL ?? 'https://openrouter.ai/api/v1';
    this.model = options.model ?? DEFAULT_MODEL;
    this.provider = providerName(baseURL);
    this.temperature = options.temperature ?? 0.1;
    this.maxTokens = options.maxTokens ?? 400;
    this.topP = options.topP ?? 0.9;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL,
      timeout: this.timeoutMs,
      // a timeout goes straight to the keyword fallback instead of being retried
      maxRetries: 0,
      defaultHeaders: {
        'HTTP-Referer': 'https://github.com/metals-news-radar',
        'X-Title': 'Metals News Radar',
      },
    });
    this.logger.info(`Classifier endpoint ${baseURL} with model ${this.model}`);
  }

  public async complete(prompt: string): Promise<string> {
    let completion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        top_p: this.topP,
      });
    } catch (e) {
      if (isTlsIssuerError(e)) {
        throw new Error(formatTlsGuidance(this.provider, e));
      }
      throw e;
    }
    return completion.choices?.[0]?.message?.content ?? '';
  }

  /**
   * Checks the endpoint answers and lists the configured model. Never throws;
   * a failed check only means classification will lean on the fallbacks.
   */
  public async testConnection(): Promise<boolean> {
    try {
      const page = await this.client.models.list();
      if (page.data.some((m) => m.id === this.model)) {
        this.logger.info(`Connected to ${this.provider}`);
        return true;
      }
      this.logger.warn(`Model ${this.model} is not available at ${this.provider}`);
      return false;
    } catch (e) {
      this.logger.error(`Connection check failed: ${describeError(e)}`);
      return false;
    }
  }
}

function providerName(baseURL: string): string {
  try {
    return new URL(baseURL).hostname;
  } catch {
    return baseURL;
  }
}

function isTlsIssuerError(e: unknown): boolean {
  return errorCode(e) === 'UNABLE_TO_GET_ISSUER_CERT_LOCALLY';
}

function formatTlsGuidance(context: string, e: unknown): string {
  return `${context} TLS certificate chain not trusted. Steps:\n1. Export corporate/proxy root certificate as Base64 PEM.\n2. Save to certs/corporate-root.pem inside project.\n3. Set NODE_EXTRA_CA_CERTS=full\\path\\to\\corporate-root.pem before running.\n4. (Temporary) set ALLOW_INSECURE_TLS=true to bypass verification.\nError: ${describeError(e)}`;
}
