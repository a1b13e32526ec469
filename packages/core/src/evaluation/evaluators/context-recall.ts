import { EvaluatorUsageError } from '../errors.js';
import type { Judge } from '../judge/judge.js';
import type { EvaluationResult, TestCase } from '../types.js';
import { BaseEvaluator, formatPercent } from './base.js';

/**
 * Throw unless `testCase` carries the expected facts context recall needs.
 */
export function assertHasExpectedFacts(testCase: TestCase): readonly string[] {
  if (testCase.expectedFacts === undefined) {
    throw new EvaluatorUsageError(
      `context_recall requires 'expectedFacts' in test case '${testCase.id}'. ` +
        "Add the ground-truth facts the context should contain, e.g. expectedFacts: ['Paris is the capital of France']. " +
        "Without ground truth, use 'context_precision' to evaluate retrieval quality instead.",
    );
  }
  return testCase.expectedFacts;
}

/**
 * Fraction of the expected facts that the retrieved context supports.
 */
export class ContextRecallEvaluator extends BaseEvaluator {
  readonly name = 'context_recall';
  readonly description = 'Measures if the retrieved context covers the expected facts';

  async evaluate(testCase: TestCase, judge: Judge): Promise<EvaluationResult> {
    const facts = assertHasExpectedFacts(testCase);

    if (facts.length === 0) {
      return this.buildResult(
        1,
        'No expected facts to verify; context is vacuously complete.',
        { fact_coverage: [], total_facts: 0, covered_facts: 0 },
        0,
      );
    }

    const verdicts = await Promise.all(
      facts.map((fact) => judge.verifyClaim(fact, testCase.context)),
    );

    const coverage = verdicts.map((verdict, index) => ({
      fact: facts[index],
      verdict: verdict.verdict,
      evidence: verdict.evidence,
    }));
    const covered = verdicts.filter((verdict) => verdict.verdict === 'SUPPORTED').length;
    const tokensUsed = verdicts.reduce((total, verdict) => total + verdict.tokensUsed, 0);
    const score = covered / facts.length;

    return this.buildResult(
      score,
      buildReasoning(covered, facts.length, score),
      { fact_coverage: coverage, total_facts: facts.length, covered_facts: covered },
      tokensUsed,
    );
  }
}

function buildReasoning(covered: number, total: number, score: number): string {
  if (covered === total) {
    return `All ${total} expected facts are covered by the context.`;
  }
  if (covered === 0) {
    return `None of the ${total} expected facts are covered by the context.`;
  }
  return (
    `${covered} of ${total} expected facts are covered (${formatPercent(score)}). ` +
    `${total - covered} fact(s) missing from context.`
  );
}
