import { type JudgeConfigInput, createJudgeConfig } from '../config.js';
import type { PromptProvider } from '../prompts/prompt-provider.js';
import { createTransport } from '../providers/index.js';
import type { RetryPolicy } from '../providers/retry.js';
import type { EnvLookup } from '../providers/transport.js';
import type { TraceCollector } from '../trace.js';
import { LlmJudge } from './llm-judge.js';

export interface AnthropicJudgeOptions {
  /** Falls back to `ANTHROPIC_API_KEY` */
  readonly apiKey?: string;
  readonly config?: JudgeConfigInput;
  readonly traceCollector?: TraceCollector;
  readonly maxConcurrency?: number;
  readonly timeoutMs?: number;
  readonly retryPolicy?: RetryPolicy;
  readonly promptProvider?: PromptProvider;
  readonly env?: EnvLookup;
}

/**
 * Build a judge backed by Claude. Throws when no API key can be resolved.
 */
export function createAnthropicJudge(options: AnthropicJudgeOptions = {}): LlmJudge {
  const transport = createTransport(
    { kind: 'anthropic', apiKey: options.apiKey, retryPolicy: options.retryPolicy },
    options.env ?? process.env,
  );
  return new LlmJudge({
    transport,
    config: createJudgeConfig(options.config),
    traceCollector: options.traceCollector,
    maxConcurrency: options.maxConcurrency,
    timeoutMs: options.timeoutMs,
    promptProvider: options.promptProvider,
  });
}
