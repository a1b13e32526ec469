import type { Judge } from '../judge/judge.js';
import type { EvaluationResult, TestCase } from '../types.js';
import { BaseEvaluator, formatPercent } from './base.js';

/** Documents scoring at least this are counted as relevant in reasoning. */
const RELEVANT_DOC_SCORE = 0.7;
const DOCUMENT_PREVIEW_LENGTH = 200;

interface DocScore {
  readonly rank: number;
  readonly document: string;
  readonly score: number;
  readonly reasoning: string;
}

/**
 * Rank-weighted relevance of the retrieved documents:
 * sum(score_i / rank_i) / sum(1 / rank_i), with 1-based ranks.
 */
export class ContextPrecisionEvaluator extends BaseEvaluator {
  readonly name = 'context_precision';
  readonly description = 'Measures if retrieved documents are relevant to the query';

  async evaluate(testCase: TestCase, judge: Judge): Promise<EvaluationResult> {
    if (testCase.context.length === 0) {
      return this.buildResult(
        1,
        'No context documents to evaluate; vacuously precise.',
        { doc_scores: [], total_docs: 0, weighted_precision: 1 },
        0,
      );
    }

    const results = await Promise.all(
      testCase.context.map((doc) => judge.scoreRelevance(testCase.query, doc)),
    );

    const docScores: DocScore[] = results.map((result, index) => ({
      rank: index + 1,
      document: testCase.context[index].slice(0, DOCUMENT_PREVIEW_LENGTH),
      score: result.score,
      reasoning: result.reasoning,
    }));
    const tokensUsed = results.reduce((total, result) => total + result.tokensUsed, 0);

    let weightedSum = 0;
    let weightTotal = 0;
    for (const doc of docScores) {
      weightedSum += doc.score / doc.rank;
      weightTotal += 1 / doc.rank;
    }
    const score = weightedSum / weightTotal;

    return this.buildResult(
      score,
      buildReasoning(docScores, score),
      {
        doc_scores: docScores.map((doc) => ({ ...doc })),
        total_docs: docScores.length,
        weighted_precision: score,
      },
      tokensUsed,
    );
  }
}

function buildReasoning(docScores: readonly DocScore[], score: number): string {
  const total = docScores.length;
  const relevant = docScores.filter((doc) => doc.score >= RELEVANT_DOC_SCORE).length;
  const precision = `${formatPercent(score)} weighted precision`;

  if (relevant === total) {
    return `All ${total} retrieved documents are relevant to the query (${precision}).`;
  }
  if (relevant === 0) {
    return `None of the ${total} retrieved documents are relevant to the query (${precision}).`;
  }
  return (
    `${relevant} of ${total} retrieved documents are relevant (${precision}). ` +
    'Higher-ranked documents are weighted more heavily.'
  );
}
