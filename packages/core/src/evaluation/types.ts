import { z } from 'zod';

import { TestCaseValidationError } from './errors.js';

/**
 * JSON primitive values appearing in diagnostic payloads.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Immutable JSON object representation for raw evaluator output.
 */
export type JsonObject = { readonly [key: string]: JsonValue };

/**
 * Recursive JSON value type.
 */
export type JsonValue = JsonPrimitive | JsonObject | readonly JsonValue[];

/**
 * Overall status of one test case after every configured evaluator has run.
 */
export type EvalStatus = 'passed' | 'failed' | 'skipped' | 'error';

/**
 * Three-way classification of whether context supports a claim or fact.
 */
export type Verdict = 'SUPPORTED' | 'CONTRADICTED' | 'NOT_ENOUGH_INFO';

export const VERDICTS: readonly Verdict[] = ['SUPPORTED', 'CONTRADICTED', 'NOT_ENOUGH_INFO'];

export function isVerdict(value: unknown): value is Verdict {
  return VERDICTS.some((verdict) => verdict === value);
}

const trimmedNonEmpty = (field: string) =>
  z
    .string()
    .transform((value) => value.trim())
    .pipe(z.string().min(1, `${field} must not be empty`));

const TestCaseSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    query: trimmedNonEmpty('query'),
    context: z.array(z.string()),
    response: trimmedNonEmpty('response'),
    expectedAnswer: z.string().optional(),
    expectedFacts: z.array(z.string()).optional(),
    tags: z.array(z.string()).default([]),
  })
  .strict();

export type TestCaseInput = z.input<typeof TestCaseSchema>;

/**
 * A single RAG interaction to score: the query, the retrieved documents and the
 * generated response, plus optional ground truth.
 */
export interface TestCase {
  readonly id: string;
  readonly name: string;
  readonly query: string;
  readonly context: readonly string[];
  readonly response: string;
  readonly expectedAnswer?: string;
  readonly expectedFacts?: readonly string[];
  readonly tags: readonly string[];
}

/**
 * Validate and normalize a test case. Query and response are trimmed and must
 * be non-empty afterwards; unknown keys are rejected.
 */
export function createTestCase(input: TestCaseInput): TestCase {
  const parsed = TestCaseSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new TestCaseValidationError(`Invalid test case: ${issues.join('; ')}`, issues);
  }

  const data = parsed.data;
  return Object.freeze({
    id: data.id,
    name: data.name,
    query: data.query,
    context: Object.freeze([...data.context]),
    response: data.response,
    ...(data.expectedAnswer !== undefined ? { expectedAnswer: data.expectedAnswer } : {}),
    ...(data.expectedFacts !== undefined
      ? { expectedFacts: Object.freeze([...data.expectedFacts]) }
      : {}),
    tags: Object.freeze([...data.tags]),
  });
}

/**
 * Output of one evaluator for one test case. A present `error` marks an
 * evaluator-level failure, not the absence of a score.
 */
export interface EvaluationResult {
  readonly evaluatorName: string;
  readonly score: number;
  readonly passed: boolean;
  readonly reasoning: string;
  readonly rawResponse: JsonObject;
  readonly tokensUsed: number;
  readonly error?: string;
}

export interface EvaluatorDetail {
  readonly reasoning: string;
  readonly passed: boolean;
  readonly raw: JsonObject;
  readonly error?: string;
}

/**
 * Aggregated result of running every configured evaluator on one test case.
 */
export interface TestResult {
  readonly testCase: TestCase;
  readonly status: EvalStatus;
  readonly scores: Readonly<Record<string, number>>;
  readonly details: Readonly<Record<string, EvaluatorDetail>>;
  readonly executionTimeMs: number;
  readonly judgeTokensUsed: number;
  /** True iff `status` is `passed`. */
  readonly passed: boolean;
}

export function createTestResult(options: Omit<TestResult, 'passed'>): TestResult {
  return {
    ...options,
    passed: options.status === 'passed',
  };
}

export function getScore(result: TestResult, evaluatorName: string): number | undefined {
  return Object.hasOwn(result.scores, evaluatorName) ? result.scores[evaluatorName] : undefined;
}

/**
 * Derive the overall status from per-evaluator results: any error wins, then
 * any failing score, otherwise passed.
 */
export function deriveStatus(results: readonly EvaluationResult[]): EvalStatus {
  if (results.some((result) => result.error !== undefined)) {
    return 'error';
  }
  if (results.some((result) => !result.passed)) {
    return 'failed';
  }
  return 'passed';
}
