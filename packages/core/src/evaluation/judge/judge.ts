import type { JudgeConfig } from '../config.js';
import type { Verdict } from '../types.js';

export interface JudgeResult {
  /** Clamped to [0, 1] */
  readonly score: number;
  readonly reasoning: string;
  readonly tokensUsed: number;
}

export interface ClaimVerdict {
  readonly verdict: Verdict;
  readonly evidence: string;
  readonly tokensUsed: number;
}

export interface ClaimsResult {
  readonly claims: readonly string[];
  readonly tokensUsed: number;
}

export interface QuestionsResult {
  readonly questions: readonly string[];
  readonly tokensUsed: number;
}

export interface AnswerResult {
  readonly answer: string;
  readonly tokensUsed: number;
}

/**
 * An LLM acting as evaluator. Every operation returns a typed result carrying
 * the tokens it spent; failures surface as `JudgeApiError` or
 * `JudgeResponseError`.
 */
export interface Judge {
  readonly config: JudgeConfig;

  scoreFaithfulness(response: string, context: readonly string[]): Promise<JudgeResult>;
  scoreRelevance(query: string, response: string): Promise<JudgeResult>;
  extractClaims(response: string): Promise<ClaimsResult>;
  verifyClaim(claim: string, context: readonly string[]): Promise<ClaimVerdict>;
  generateQuestions(documents: readonly string[], n: number): Promise<QuestionsResult>;
  generateAnswer(question: string, context: readonly string[]): Promise<AnswerResult>;
}
