import pLimit from 'p-limit';

import {
  DEFAULT_EVALUATORS,
  DEFAULT_MAX_CONCURRENCY,
  DEFAULT_MAX_JUDGE_CONCURRENCY,
  type JudgeConfigInput,
  type RunnerConfig,
  defineConfig,
} from './config.js';
import { EvaluatorUsageError, describeError } from './errors.js';
import { assertHasExpectedFacts } from './evaluators/context-recall.js';
import type { Evaluator } from './evaluators/types.js';
import { type AnthropicJudgeOptions, createAnthropicJudge } from './judge/anthropic.js';
import type { Judge } from './judge/judge.js';
import { getDefaultRegistry } from './registry/builtin-evaluators.js';
import type { EvaluatorRegistry } from './registry/evaluator-registry.js';
import type { TraceCollector } from './trace.js';
import {
  type EvaluationResult,
  type EvaluatorDetail,
  type TestCase,
  type TestResult,
  createTestResult,
  deriveStatus,
} from './types.js';

type MaybePromise<T> = T | Promise<T>;

export interface ProgressEvent {
  readonly workerId: number;
  readonly testCaseId: string;
  readonly status: 'pending' | 'running' | 'completed' | 'failed';
  readonly startedAt?: number;
  readonly completedAt?: number;
  readonly error?: string;
}

export interface RagEvaluationRunnerOptions {
  /** A judge instance, or `'anthropic'` to build one lazily (default) */
  readonly judge?: Judge | 'anthropic';
  readonly judgeConfig?: JudgeConfigInput;
  /** Falls back to `ANTHROPIC_API_KEY` */
  readonly apiKey?: string;
  /** Evaluator names (default: faithfulness, relevance) */
  readonly evaluators?: readonly string[];
  /** Threshold applied to every evaluator when set */
  readonly defaultThreshold?: number;
  /** Per-evaluator thresholds; take precedence over `defaultThreshold` */
  readonly thresholds?: Readonly<Record<string, number>>;
  /** Concurrent test cases in batch mode (default: 5) */
  readonly maxConcurrency?: number;
  /** Concurrent judge calls, used when the runner builds the judge (default: 20) */
  readonly maxJudgeConcurrency?: number;
  /** Per-call judge timeout, used when the runner builds the judge */
  readonly timeoutMs?: number;
  /** Propagate evaluator and case failures instead of recording error results */
  readonly failFast?: boolean;
  readonly registry?: EvaluatorRegistry;
  readonly traceCollector?: TraceCollector;
  readonly verbose?: boolean;
  /** Builds the judge when `judge` is `'anthropic'` */
  readonly judgeFactory?: (options: AnthropicJudgeOptions) => Judge;
}

/**
 * Errors thrown by `onResult` or `onProgress` are not contained: they reject
 * the batch and cancel cases that have not started.
 */
export interface EvaluateBatchOptions {
  /** Overrides the runner's `maxConcurrency` for this batch */
  readonly maxConcurrency?: number;
  readonly onResult?: (result: TestResult) => MaybePromise<void>;
  readonly onProgress?: (event: ProgressEvent) => MaybePromise<void>;
}

interface Initialized {
  readonly judge: Judge;
  readonly evaluators: readonly Evaluator[];
}

const CONTEXT_RECALL = 'context_recall';

/**
 * Runs the configured evaluators over test cases with an LLM judge.
 *
 * Evaluators for one case run concurrently; cases in a batch run under a
 * concurrency budget. A failing evaluator or case becomes an `error` result
 * unless `failFast` is set.
 */
export class RagEvaluationRunner {
  readonly evaluatorNames: readonly string[];
  readonly maxConcurrency: number;
  readonly traceCollector?: TraceCollector;

  private readonly options: RagEvaluationRunnerOptions;
  private readonly registry: EvaluatorRegistry;
  private initialization?: Promise<Initialized>;

  constructor(options: RagEvaluationRunnerOptions = {}) {
    const validated = defineConfig({
      ...(options.judgeConfig ? { judge: options.judgeConfig } : {}),
      ...(options.evaluators ? { evaluators: [...options.evaluators] } : {}),
      ...(options.defaultThreshold !== undefined
        ? { defaultThreshold: options.defaultThreshold }
        : {}),
      ...(options.thresholds ? { thresholds: { ...options.thresholds } } : {}),
      execution: {
        ...(options.maxConcurrency !== undefined ? { maxConcurrency: options.maxConcurrency } : {}),
        ...(options.maxJudgeConcurrency !== undefined
          ? { maxJudgeConcurrency: options.maxJudgeConcurrency }
          : {}),
        ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
        ...(options.failFast !== undefined ? { failFast: options.failFast } : {}),
      },
      ...(options.verbose !== undefined ? { verbose: options.verbose } : {}),
    });

    this.options = options;
    this.evaluatorNames = validated.evaluators ?? [...DEFAULT_EVALUATORS];
    this.maxConcurrency = validated.execution?.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
    this.registry = options.registry ?? getDefaultRegistry();
    this.traceCollector = options.traceCollector;
  }

  /**
   * Build a runner from a validated configuration, such as the result of
   * `defineConfig()` or `loadRunnerConfigFromEnv()`. Values in `overrides`
   * take precedence.
   */
  static fromConfig(
    config: RunnerConfig,
    overrides: RagEvaluationRunnerOptions = {},
  ): RagEvaluationRunner {
    const { execution } = config;
    return new RagEvaluationRunner({
      judgeConfig: config.judge,
      evaluators: config.evaluators,
      defaultThreshold: config.defaultThreshold,
      thresholds: config.thresholds,
      maxConcurrency: execution?.maxConcurrency,
      maxJudgeConcurrency: execution?.maxJudgeConcurrency,
      timeoutMs: execution?.timeoutMs,
      failFast: execution?.failFast,
      verbose: config.verbose,
      ...overrides,
    });
  }

  /**
   * Evaluate one test case with every configured evaluator.
   */
  async evaluate(testCase: TestCase): Promise<TestResult> {
    this.assertPrerequisites([testCase]);
    const startedAt = performance.now();
    const { judge, evaluators } = await this.initialize();

    const results = await Promise.all(
      evaluators.map((evaluator) => this.runEvaluator(evaluator, testCase, judge)),
    );

    const scores: Record<string, number> = {};
    const details: Record<string, EvaluatorDetail> = {};
    let judgeTokensUsed = 0;
    for (const result of results) {
      scores[result.evaluatorName] = result.score;
      details[result.evaluatorName] = {
        reasoning: result.reasoning,
        passed: result.passed,
        raw: result.rawResponse,
        ...(result.error !== undefined ? { error: result.error } : {}),
      };
      judgeTokensUsed += result.tokensUsed;
    }

    return createTestResult({
      testCase,
      status: deriveStatus(results),
      scores,
      details,
      executionTimeMs: Math.round(performance.now() - startedAt),
      judgeTokensUsed,
    });
  }

  /**
   * Evaluate test cases concurrently. Results keep input order.
   */
  async evaluateBatch(
    testCases: readonly TestCase[],
    options: EvaluateBatchOptions = {},
  ): Promise<TestResult[]> {
    this.assertPrerequisites(testCases);

    const { onProgress, onResult } = options;
    const limit = pLimit(options.maxConcurrency ?? this.maxConcurrency);

    const guarded = async (run: () => MaybePromise<void>): Promise<void> => {
      try {
        await run();
      } catch (error) {
        limit.clearQueue();
        throw error;
      }
    };
    const emitProgress = (event: ProgressEvent) => guarded(() => onProgress?.(event));
    const emitResult = (result: TestResult) => guarded(() => onResult?.(result));

    for (let i = 0; i < testCases.length; i++) {
      await emitProgress({ workerId: i + 1, testCaseId: testCases[i].id, status: 'pending' });
    }

    let nextWorkerId = 1;

    const promises = testCases.map((testCase) =>
      limit(async () => {
        const workerId = nextWorkerId++;
        const startedAt = performance.now();

        await emitProgress({
          workerId,
          testCaseId: testCase.id,
          status: 'running',
          startedAt: Date.now(),
        });

        let result: TestResult;
        try {
          result = await this.evaluate(testCase);
        } catch (error) {
          await emitProgress({
            workerId,
            testCaseId: testCase.id,
            status: 'failed',
            completedAt: Date.now(),
            error: describeError(error),
          });
          if (this.options.failFast || error instanceof EvaluatorUsageError) {
            limit.clearQueue();
            throw error;
          }
          this.warn(`Test case '${testCase.id}' failed: ${describeError(error)}`);
          result = buildErrorResult(testCase, error, Math.round(performance.now() - startedAt));
          await emitResult(result);
          return result;
        }

        await emitProgress({
          workerId,
          testCaseId: testCase.id,
          status: result.status === 'error' ? 'failed' : 'completed',
          completedAt: Date.now(),
        });
        await emitResult(result);
        return result;
      }),
    );

    return Promise.all(promises);
  }

  /**
   * Build the judge and evaluators once, however many callers race here.
   * A failed initialization is retried on the next call.
   */
  private initialize(): Promise<Initialized> {
    if (!this.initialization) {
      const pending = Promise.resolve().then(() => this.buildComponents());
      this.initialization = pending;
      void pending.catch(() => {
        if (this.initialization === pending) {
          this.initialization = undefined;
        }
      });
    }
    return this.initialization;
  }

  private buildComponents(): Initialized {
    const evaluators = this.evaluatorNames.map((name) => {
      const threshold = this.options.thresholds?.[name] ?? this.options.defaultThreshold;
      return this.registry.create(name, threshold !== undefined ? { threshold } : {});
    });
    return { judge: this.resolveJudge(), evaluators };
  }

  private resolveJudge(): Judge {
    const { judge } = this.options;
    if (judge !== undefined && judge !== 'anthropic') {
      return judge;
    }
    const factory = this.options.judgeFactory ?? createAnthropicJudge;
    return factory({
      apiKey: this.options.apiKey,
      config: this.options.judgeConfig,
      traceCollector: this.traceCollector,
      maxConcurrency: this.options.maxJudgeConcurrency ?? DEFAULT_MAX_JUDGE_CONCURRENCY,
      timeoutMs: this.options.timeoutMs,
    });
  }

  private async runEvaluator(
    evaluator: Evaluator,
    testCase: TestCase,
    judge: Judge,
  ): Promise<EvaluationResult> {
    try {
      return await evaluator.evaluate(testCase, judge);
    } catch (error) {
      if (this.options.failFast || error instanceof EvaluatorUsageError) {
        throw error;
      }
      const message = describeError(error);
      this.warn(`Evaluator '${evaluator.name}' failed on test case '${testCase.id}': ${message}`);
      return {
        evaluatorName: evaluator.name,
        score: 0,
        passed: false,
        reasoning: `Evaluation failed: ${message}`,
        rawResponse: {},
        tokensUsed: 0,
        error: message,
      };
    }
  }

  /**
   * Usage errors surface before any judge call is made.
   */
  private assertPrerequisites(testCases: readonly TestCase[]): void {
    if (!this.evaluatorNames.includes(CONTEXT_RECALL)) {
      return;
    }
    for (const testCase of testCases) {
      assertHasExpectedFacts(testCase);
    }
  }

  private warn(message: string): void {
    if (this.options.verbose) {
      console.warn(message);
    }
  }
}

function buildErrorResult(testCase: TestCase, error: unknown, executionTimeMs: number): TestResult {
  const message = describeError(error);
  return createTestResult({
    testCase,
    status: 'error',
    scores: {},
    details: {
      runner: {
        reasoning: `Evaluation failed: ${message}`,
        passed: false,
        raw: {},
        error: message,
      },
    },
    executionTimeMs,
    judgeTokensUsed: 0,
  });
}
