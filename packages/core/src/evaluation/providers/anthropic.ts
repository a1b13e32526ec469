import { createAnthropic } from '@ai-sdk/anthropic';
import { generateText } from 'ai';

import { JudgeApiError, JudgeResponseError } from '../errors.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy, extractStatus, withRetry } from './retry.js';
import type { Transport, TransportRequest, TransportResponse } from './transport.js';

/**
 * The subset of a `generateText` result the transport reads.
 */
export interface GeneratedText {
  readonly content: ReadonlyArray<{ readonly type: string; readonly text?: string }>;
  readonly usage: { readonly inputTokens?: number; readonly outputTokens?: number };
  readonly response: { readonly modelId: string };
}

export type GenerateFn = (
  options: Parameters<typeof generateText>[0],
) => PromiseLike<GeneratedText>;

export interface AnthropicTransportOptions {
  readonly apiKey: string;
  readonly baseURL?: string;
  readonly retryPolicy?: RetryPolicy;
  /** Swapped in tests */
  readonly generate?: GenerateFn;
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Transport over the Anthropic Messages API via the AI SDK. The SDK's own
 * retries are disabled; `RetryPolicy` governs them instead.
 */
export class AnthropicTransport implements Transport {
  readonly id = 'anthropic';

  private readonly provider: ReturnType<typeof createAnthropic>;
  private readonly retryPolicy: RetryPolicy;
  private readonly generate: GenerateFn;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: AnthropicTransportOptions) {
    this.provider = createAnthropic({
      apiKey: options.apiKey,
      ...(options.baseURL ? { baseURL: options.baseURL } : {}),
    });
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.generate = options.generate ?? generateText;
    this.sleep = options.sleep;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    let result: GeneratedText;
    try {
      result = await withRetry(
        async () =>
          this.generate({
            model: this.provider(request.model),
            system: request.systemPrompt,
            messages: [{ role: 'user', content: request.userPrompt }],
            temperature: request.temperature,
            maxOutputTokens: request.maxTokens,
            maxRetries: 0,
            abortSignal: request.signal,
          }),
        this.retryPolicy,
        { signal: request.signal, sleep: this.sleep },
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new JudgeApiError(message, extractStatus(error), { cause: error });
    }

    return mapResponse(result, request.model);
  }
}

function mapResponse(result: GeneratedText, requestedModel: string): TransportResponse {
  const texts = result.content.flatMap((part) =>
    part.type === 'text' && typeof part.text === 'string' ? [part.text] : [],
  );
  if (texts.length === 0) {
    throw new JudgeResponseError('Provider returned no text content');
  }

  return {
    text: texts.join('\n'),
    inputTokens: result.usage.inputTokens ?? 0,
    outputTokens: result.usage.outputTokens ?? 0,
    model: result.response.modelId || requestedModel,
  };
}
