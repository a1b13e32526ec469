import {
  ContextPrecisionEvaluator,
  ContextRecallEvaluator,
  FaithfulnessEvaluator,
  HallucinationEvaluator,
  RelevanceEvaluator,
} from '../evaluators/index.js';
import { EvaluatorRegistry } from './evaluator-registry.js';

/**
 * A fresh registry holding the five built-in evaluators.
 */
export function createBuiltinRegistry(): EvaluatorRegistry {
  const registry = new EvaluatorRegistry();

  registry
    .register('faithfulness', FaithfulnessEvaluator)
    .register('relevance', RelevanceEvaluator)
    .register('hallucination', HallucinationEvaluator)
    .register('context_precision', ContextPrecisionEvaluator)
    .register('context_recall', ContextRecallEvaluator);

  return registry;
}

let defaultRegistry: EvaluatorRegistry | undefined;

/**
 * Process-wide registry, built on first use.
 */
export function getDefaultRegistry(): EvaluatorRegistry {
  defaultRegistry ??= createBuiltinRegistry();
  return defaultRegistry;
}
