import type { Judge } from '../judge/judge.js';
import type { EvaluationResult, TestCase } from '../types.js';
import { BaseEvaluator } from './base.js';

export class RelevanceEvaluator extends BaseEvaluator {
  readonly name = 'relevance';
  readonly description = 'Measures if the response answers the query';

  async evaluate(testCase: TestCase, judge: Judge): Promise<EvaluationResult> {
    const result = await judge.scoreRelevance(testCase.query, testCase.response);
    return this.buildResult(
      result.score,
      result.reasoning,
      { score: result.score, reasoning: result.reasoning, tokens_used: result.tokensUsed },
      result.tokensUsed,
    );
  }
}
