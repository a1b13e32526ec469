/**
 * Typed configuration for the judge and the evaluation runner.
 *
 * Provides `defineConfig()` for declaring runner settings in code, and
 * `loadRunnerConfigFromEnv()` for the environment-variable overrides used in CI.
 *
 * @example
 * ```typescript
 * import { defineConfig } from '@ragjudge/core';
 *
 * export default defineConfig({
 *   judge: { model: 'claude-sonnet-4-20250514', temperature: 0 },
 *   evaluators: ['faithfulness', 'relevance', 'context_precision'],
 *   execution: { maxConcurrency: 5, maxJudgeConcurrency: 20 },
 * });
 * ```
 *
 * @module
 */

import { z } from 'zod';

import { ConfigValidationError } from './errors.js';
import type { EnvLookup } from './providers/transport.js';

export const DEFAULT_JUDGE_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_MAX_CONCURRENCY = 5;
export const DEFAULT_MAX_JUDGE_CONCURRENCY = 20;
export const DEFAULT_EVALUATORS: readonly string[] = ['faithfulness', 'relevance'];

export const JudgeConfigSchema = z
  .object({
    /** Model identifier sent to the provider */
    model: z.string().min(1).default(DEFAULT_JUDGE_MODEL),
    /** Sampling temperature (0 = deterministic) */
    temperature: z.number().min(0).max(1).default(0),
    /** Maximum tokens in the judge response */
    maxTokens: z.number().int().min(1).max(4096).default(1024),
  })
  .strict();

/**
 * Judge configuration. Immutable once created.
 */
export type JudgeConfig = Readonly<z.infer<typeof JudgeConfigSchema>>;
export type JudgeConfigInput = z.input<typeof JudgeConfigSchema>;

export const RunnerConfigSchema = z
  .object({
    judge: JudgeConfigSchema.optional(),
    /** Evaluator names resolved through the registry */
    evaluators: z
      .array(z.string().min(1))
      .min(1)
      .refine((names) => new Set(names).size === names.length, {
        message: 'evaluator names must be unique',
      })
      .optional(),
    /** Threshold applied to every evaluator, overriding their defaults */
    defaultThreshold: z.number().min(0).max(1).optional(),
    /** Per-evaluator threshold overrides */
    thresholds: z.record(z.number().min(0).max(1)).optional(),
    execution: z
      .object({
        /** Concurrent test cases in batch mode (default: 5) */
        maxConcurrency: z.number().int().min(1).optional(),
        /** Concurrent outbound calls per judge instance (default: 20) */
        maxJudgeConcurrency: z.number().int().min(1).optional(),
        /** Per-call judge timeout in milliseconds (default: none) */
        timeoutMs: z.number().int().min(1).optional(),
        /** Propagate evaluator exceptions instead of recording error results */
        failFast: z.boolean().optional(),
      })
      .strict()
      .optional(),
    verbose: z.boolean().optional(),
  })
  .strict();

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;
export type RunnerConfigInput = z.input<typeof RunnerConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate judge settings, filling defaults. Out-of-range values throw.
 */
export function createJudgeConfig(input: JudgeConfigInput = {}): JudgeConfig {
  const parsed = JudgeConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigValidationError(`Invalid judge config: ${issues.join('; ')}`, issues);
  }
  return Object.freeze(parsed.data);
}

/**
 * Define a typed runner configuration. The configuration is validated
 * immediately.
 */
export function defineConfig(config: RunnerConfigInput): RunnerConfig {
  const parsed = RunnerConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigValidationError(`Invalid runner config: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

function readNumber(env: EnvLookup, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim().length === 0) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigValidationError(`${key} must be a number, got '${raw}'`, [
      `${key}: expected number`,
    ]);
  }
  return value;
}

/**
 * Build a runner configuration from `RAGJUDGE_*` environment variables.
 * Unset variables are left out so that defaults apply.
 */
export function loadRunnerConfigFromEnv(env: EnvLookup = process.env): RunnerConfig {
  const model = env.RAGJUDGE_MODEL?.trim();
  const temperature = readNumber(env, 'RAGJUDGE_TEMPERATURE');
  const maxTokens = readNumber(env, 'RAGJUDGE_MAX_TOKENS');
  const maxConcurrency = readNumber(env, 'RAGJUDGE_MAX_CONCURRENCY');
  const maxJudgeConcurrency = readNumber(env, 'RAGJUDGE_MAX_JUDGE_CONCURRENCY');

  const hasJudge = Boolean(model) || temperature !== undefined || maxTokens !== undefined;
  const hasExecution = maxConcurrency !== undefined || maxJudgeConcurrency !== undefined;

  return defineConfig({
    ...(hasJudge
      ? {
          judge: {
            ...(model ? { model } : {}),
            ...(temperature !== undefined ? { temperature } : {}),
            ...(maxTokens !== undefined ? { maxTokens } : {}),
          },
        }
      : {}),
    ...(hasExecution
      ? {
          execution: {
            ...(maxConcurrency !== undefined ? { maxConcurrency } : {}),
            ...(maxJudgeConcurrency !== undefined ? { maxJudgeConcurrency } : {}),
          },
        }
      : {}),
  });
}
