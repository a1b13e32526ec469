import type { Judge } from '../judge/judge.js';
import type { EvaluationResult, JsonObject, TestCase } from '../types.js';
import { BaseEvaluator, formatPercent } from './base.js';

/**
 * Penalizes claims the context does not support. Contradicted and
 * unverifiable claims both count as hallucinated.
 */
export class HallucinationEvaluator extends BaseEvaluator {
  readonly name = 'hallucination';
  readonly description = 'Detects claims in the response that the context does not support';
  protected readonly defaultThreshold = 0.8;

  async evaluate(testCase: TestCase, judge: Judge): Promise<EvaluationResult> {
    const extracted = await judge.extractClaims(testCase.response);
    const { claims } = extracted;

    if (claims.length === 0) {
      return this.buildResult(
        1,
        'No claims to verify; no hallucinations detected.',
        { claims: [], total_claims: 0, hallucinated_claims: [], hallucination_count: 0 },
        extracted.tokensUsed,
      );
    }

    const verdicts = await Promise.all(
      claims.map((claim) => judge.verifyClaim(claim, testCase.context)),
    );

    let tokensUsed = extracted.tokensUsed;
    const details: JsonObject[] = [];
    const hallucinated: JsonObject[] = [];
    verdicts.forEach((verdict, index) => {
      tokensUsed += verdict.tokensUsed;
      const detail = {
        claim: claims[index],
        verdict: verdict.verdict,
        evidence: verdict.evidence,
      };
      details.push(detail);
      if (verdict.verdict !== 'SUPPORTED') {
        hallucinated.push(detail);
      }
    });

    const total = claims.length;
    const score = 1 - hallucinated.length / total;

    return this.buildResult(
      score,
      buildReasoning(hallucinated.length, total, score),
      {
        claims: details,
        total_claims: total,
        hallucinated_claims: hallucinated,
        hallucination_count: hallucinated.length,
      },
      tokensUsed,
    );
  }
}

function buildReasoning(hallucinated: number, total: number, score: number): string {
  if (hallucinated === 0) {
    return `All ${total} claims are grounded in the context. No hallucinations detected.`;
  }
  if (hallucinated === total) {
    return `All ${total} claims are hallucinated; none are supported by the context.`;
  }
  return (
    `Found ${hallucinated} hallucinated claim(s) out of ${total} ` +
    `(${formatPercent(score)} grounded). ` +
    `${total - hallucinated} claim(s) are supported by the context.`
  );
}
