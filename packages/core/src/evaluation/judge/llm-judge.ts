import pLimit from 'p-limit';

import { type JudgeConfig, createJudgeConfig, DEFAULT_MAX_JUDGE_CONCURRENCY } from '../config.js';
import { describeError } from '../errors.js';
import {
  type PromptOperation,
  type PromptProvider,
  YamlPromptProvider,
} from '../prompts/prompt-provider.js';
import type { Transport, TransportResponse } from '../providers/transport.js';
import { type TraceCollector, createJudgeTrace } from '../trace.js';
import type {
  AnswerResult,
  ClaimVerdict,
  ClaimsResult,
  Judge,
  JudgeResult,
  QuestionsResult,
} from './judge.js';
import {
  parseJudgeJson,
  readAnswer,
  readOptionalText,
  readScore,
  readStringList,
  readVerdict,
} from './parsing.js';

export interface LlmJudgeOptions {
  readonly transport: Transport;
  readonly config?: JudgeConfig;
  readonly promptProvider?: PromptProvider;
  readonly traceCollector?: TraceCollector;
  /** Concurrent transport calls from this judge (default: 20) */
  readonly maxConcurrency?: number;
  /** Per-call timeout; unset means no timeout */
  readonly timeoutMs?: number;
}

interface CallResult {
  readonly text: string;
  readonly tokensUsed: number;
}

/**
 * Judge that renders YAML prompt templates, sends them through a transport
 * and validates the JSON that comes back.
 */
export class LlmJudge implements Judge {
  readonly config: JudgeConfig;

  private readonly transport: Transport;
  private readonly prompts: PromptProvider;
  private readonly traceCollector?: TraceCollector;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly timeoutMs?: number;

  constructor(options: LlmJudgeOptions) {
    this.transport = options.transport;
    this.config = options.config ?? createJudgeConfig();
    this.prompts = options.promptProvider ?? new YamlPromptProvider();
    this.traceCollector = options.traceCollector;
    this.limit = pLimit(options.maxConcurrency ?? DEFAULT_MAX_JUDGE_CONCURRENCY);
    this.timeoutMs = options.timeoutMs;
  }

  async scoreFaithfulness(response: string, context: readonly string[]): Promise<JudgeResult> {
    if (context.length === 0) {
      return {
        score: 0,
        reasoning: 'No context provided; faithfulness cannot be assessed.',
        tokensUsed: 0,
      };
    }

    const { text, tokensUsed } = await this.run('faithfulness', {
      context: this.prompts.formatContext(context),
      response,
    });
    const parsed = parseJudgeJson(text);
    return {
      score: readScore(parsed),
      reasoning: readOptionalText(parsed, 'reasoning'),
      tokensUsed,
    };
  }

  async scoreRelevance(query: string, response: string): Promise<JudgeResult> {
    const { text, tokensUsed } = await this.run('relevance', { query, response });
    const parsed = parseJudgeJson(text);
    return {
      score: readScore(parsed),
      reasoning: readOptionalText(parsed, 'reasoning'),
      tokensUsed,
    };
  }

  async extractClaims(response: string): Promise<ClaimsResult> {
    if (response.trim().length === 0) {
      return { claims: [], tokensUsed: 0 };
    }

    const { text, tokensUsed } = await this.run('extract_claims', { response });
    return { claims: readStringList(parseJudgeJson(text), 'claims'), tokensUsed };
  }

  async verifyClaim(claim: string, context: readonly string[]): Promise<ClaimVerdict> {
    if (context.length === 0) {
      return {
        verdict: 'NOT_ENOUGH_INFO',
        evidence: 'No context provided for verification.',
        tokensUsed: 0,
      };
    }

    const { text, tokensUsed } = await this.run('verify_claim', {
      claim,
      context: this.prompts.formatContext(context),
    });
    const parsed = parseJudgeJson(text);
    return {
      verdict: readVerdict(parsed),
      evidence: readOptionalText(parsed, 'evidence'),
      tokensUsed,
    };
  }

  async generateQuestions(documents: readonly string[], n: number): Promise<QuestionsResult> {
    if (documents.length === 0 || n < 1) {
      return { questions: [], tokensUsed: 0 };
    }

    const { text, tokensUsed } = await this.run('generate_questions', {
      context: this.prompts.formatContext(documents),
      n: String(n),
    });
    return { questions: readStringList(parseJudgeJson(text), 'questions'), tokensUsed };
  }

  async generateAnswer(question: string, context: readonly string[]): Promise<AnswerResult> {
    if (context.length === 0) {
      return { answer: '', tokensUsed: 0 };
    }

    const { text, tokensUsed } = await this.run('generate_answer', {
      question,
      context: this.prompts.formatContext(context),
    });
    return { answer: readAnswer(parseJudgeJson(text)), tokensUsed };
  }

  private async run(
    operation: PromptOperation,
    variables: Readonly<Record<string, string>>,
  ): Promise<CallResult> {
    const prompt = await this.prompts.getPrompt(operation);
    const userPrompt = this.prompts.formatUserPrompt(prompt.userTemplate, variables);
    return this.limit(() => this.call(operation, prompt.systemPrompt, userPrompt));
  }

  private async call(
    operation: PromptOperation,
    systemPrompt: string,
    userPrompt: string,
  ): Promise<CallResult> {
    const startedAt = performance.now();
    let response: TransportResponse;
    try {
      response = await this.transport.send({
        systemPrompt,
        userPrompt,
        model: this.config.model,
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
        ...(this.timeoutMs !== undefined ? { signal: AbortSignal.timeout(this.timeoutMs) } : {}),
      });
    } catch (error) {
      await this.traceCollector?.add(
        createJudgeTrace({
          operation,
          model: this.config.model,
          inputTokens: 0,
          outputTokens: 0,
          latencyMs: Math.round(performance.now() - startedAt),
          success: false,
          error: describeError(error),
        }),
      );
      throw error;
    }

    await this.traceCollector?.add(
      createJudgeTrace({
        operation,
        model: response.model,
        inputTokens: response.inputTokens,
        outputTokens: response.outputTokens,
        latencyMs: Math.round(performance.now() - startedAt),
        success: true,
      }),
    );

    return { text: response.text, tokensUsed: response.inputTokens + response.outputTokens };
  }
}
