import OpenAI from 'openai';
import {
  ApiThrottler,
  RateLimitedError,
  logger,
  withBackoff,
  withTimeout,
  type BotConfig,
} from '@banterbot/shared';

export interface GenerateOptions {
  /** Overrides the configured chat model (fact extraction uses a cheaper one) */
  model?: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
}

/**
 * The only door to the language model. Everything above this line deals in
 * prompts and strings; everything below it deals in HTTP.
 */
export interface ResponseGenerator {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export type LlmSettings = BotConfig['llm'];

const QUOTA_PATTERN = /quota|resource.?exhausted|rate.?limit/i;

/**
 * Translate SDK failures into the shared error taxonomy. 429s and quota
 * messages become `RateLimitedError`; everything else passes through.
 */
export function toGeneratorError(error: unknown): unknown {
  if (error instanceof OpenAI.APIError) {
    const quotaHit = error.status === 429 || QUOTA_PATTERN.test(error.message);
    if (quotaHit) {
      const retryAfter = Number(error.headers?.['retry-after']);
      const retryAfterMs = Number.isFinite(retryAfter) ? retryAfter * 1000 : 0;
      return new RateLimitedError('LLM provider is rate limiting us', retryAfterMs, {
        status: error.status,
      });
    }
  }
  return error;
}

export class OpenAIResponseGenerator implements ResponseGenerator {
  private client: OpenAI;
  private throttler: ApiThrottler;

  constructor(
    private readonly settings: LlmSettings,
    deps: { client?: OpenAI; throttler?: ApiThrottler } = {}
  ) {
    this.client =
      deps.client ??
      new OpenAI({
        apiKey: settings.apiKey,
        baseURL: settings.baseUrl,
        // retries are ours, see withBackoff below
        maxRetries: 0,
      });
    this.throttler =
      deps.throttler ??
      new ApiThrottler({
        requestsPerMinute: settings.requestsPerMinute,
        burstLimit: settings.burstLimit,
      });

    logger.info(`🤖 LLM client ready: ${settings.model} via ${settings.baseUrl}`);
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const model = options.model ?? this.settings.model;

    return withBackoff(
      () =>
        this.throttler.run(() =>
          withTimeout((signal) => this.complete(prompt, model, options, signal), this.settings.timeoutMs)
        ),
      {
        maxAttempts: this.settings.maxRetries,
        baseDelayMs: this.settings.backoffBaseMs,
        maxDelayMs: this.settings.backoffMaxMs,
        label: model,
      }
    );
  }

  private async complete(
    prompt: string,
    model: string,
    options: GenerateOptions,
    signal: AbortSignal
  ): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model,
          messages: [{ role: 'user', content: prompt }],
          temperature: options.temperature ?? 0.7,
          top_p: options.topP ?? 0.85,
          max_tokens: options.maxTokens ?? 250,
        },
        { signal }
      );

      return completion.choices[0]?.message?.content?.trim() ?? '';
    } catch (error) {
      throw toGeneratorError(error);
    }
  }
}
