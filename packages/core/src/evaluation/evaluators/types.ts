import type { Judge } from '../judge/judge.js';
import type { EvaluationResult, TestCase } from '../types.js';

export interface EvaluatorOptions {
  /** Minimum passing score in [0, 1]; overrides the evaluator's default */
  readonly threshold?: number;
}

/**
 * Scores one quality dimension of a test case using a judge.
 */
export interface Evaluator {
  readonly name: string;
  readonly description: string;
  readonly threshold: number;
  evaluate(testCase: TestCase, judge: Judge): Promise<EvaluationResult>;
  isPassing(score: number): boolean;
}

export type EvaluatorConstructor = new (options?: EvaluatorOptions) => Evaluator;
