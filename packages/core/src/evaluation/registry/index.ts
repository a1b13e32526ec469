/**
 * Evaluator registry: name-based evaluator lookup.
 *
 * @module
 */
export { EvaluatorRegistry } from './evaluator-registry.js';
export { createBuiltinRegistry, getDefaultRegistry } from './builtin-evaluators.js';
