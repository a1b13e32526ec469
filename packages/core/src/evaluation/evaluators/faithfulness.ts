import { verifyAllClaims } from '../claims.js';
import type { Judge } from '../judge/judge.js';
import type { EvaluationResult, TestCase } from '../types.js';
import { BaseEvaluator, formatPercent } from './base.js';

/**
 * Fraction of the response's claims that the context supports.
 */
export class FaithfulnessEvaluator extends BaseEvaluator {
  readonly name = 'faithfulness';
  readonly description = 'Measures if the response is grounded in the provided context';

  async evaluate(testCase: TestCase, judge: Judge): Promise<EvaluationResult> {
    const verification = await verifyAllClaims(testCase.response, testCase.context, judge);

    if (verification.claimsEmpty) {
      return this.buildResult(
        1,
        'No claims to verify; response is vacuously faithful.',
        { claims: [], total_claims: 0, supported_claims: 0 },
        verification.totalTokens,
      );
    }

    const total = verification.claimDetails.length;
    const supported = verification.claimDetails.filter(
      (detail) => detail.verdict === 'SUPPORTED',
    ).length;
    const score = supported / total;

    return this.buildResult(
      score,
      buildReasoning(supported, total, score),
      {
        claims: verification.claimDetails.map((detail) => ({ ...detail })),
        total_claims: total,
        supported_claims: supported,
      },
      verification.totalTokens,
    );
  }
}

function buildReasoning(supported: number, total: number, score: number): string {
  if (supported === total) {
    return `All ${total} claims are supported by the context.`;
  }
  if (supported === 0) {
    return `None of the ${total} claims are supported by the context.`;
  }
  return (
    `${supported} of ${total} claims are supported (${formatPercent(score)}). ` +
    `${total - supported} claim(s) not grounded in context.`
  );
}
