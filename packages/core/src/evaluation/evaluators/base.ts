import type { Judge } from '../judge/judge.js';
import type { EvaluationResult, JsonObject, TestCase } from '../types.js';
import type { Evaluator, EvaluatorOptions } from './types.js';

export const DEFAULT_THRESHOLD = 0.7;

/**
 * Whole-number percentage, as shown in reasoning strings.
 */
export function formatPercent(score: number): string {
  return `${(score * 100).toFixed(0)}%`;
}

export abstract class BaseEvaluator implements Evaluator {
  abstract readonly name: string;
  abstract readonly description: string;
  protected readonly defaultThreshold: number = DEFAULT_THRESHOLD;

  private readonly thresholdOverride?: number;

  constructor(options: EvaluatorOptions = {}) {
    const { threshold } = options;
    if (threshold !== undefined && !(threshold >= 0 && threshold <= 1)) {
      throw new RangeError(`threshold must be between 0 and 1, got ${threshold}`);
    }
    this.thresholdOverride = threshold;
  }

  get threshold(): number {
    return this.thresholdOverride ?? this.defaultThreshold;
  }

  isPassing(score: number): boolean {
    return score >= this.threshold;
  }

  abstract evaluate(testCase: TestCase, judge: Judge): Promise<EvaluationResult>;

  protected buildResult(
    score: number,
    reasoning: string,
    rawResponse: JsonObject,
    tokensUsed: number,
  ): EvaluationResult {
    return {
      evaluatorName: this.name,
      score,
      passed: this.isPassing(score),
      reasoning,
      rawResponse,
      tokensUsed,
    };
  }
}
