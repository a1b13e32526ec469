export * from './evaluation/types.js';
export * from './evaluation/errors.js';
export * from './evaluation/config.js';
export * from './evaluation/trace.js';
export * from './evaluation/providers/index.js';
export * from './evaluation/prompts/index.js';
export * from './evaluation/judge/index.js';
export * from './evaluation/claims.js';
export * from './evaluation/evaluators/index.js';
export * from './evaluation/registry/index.js';
export * from './evaluation/orchestrator.js';
export * from './evaluation/generators/index.js';
