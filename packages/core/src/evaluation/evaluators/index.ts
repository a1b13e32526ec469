export type { Evaluator, EvaluatorConstructor, EvaluatorOptions } from './types.js';
export { BaseEvaluator, DEFAULT_THRESHOLD, formatPercent } from './base.js';
export { FaithfulnessEvaluator } from './faithfulness.js';
export { HallucinationEvaluator } from './hallucination.js';
export { RelevanceEvaluator } from './relevance.js';
export { ContextPrecisionEvaluator } from './context-precision.js';
export { ContextRecallEvaluator, assertHasExpectedFacts } from './context-recall.js';
