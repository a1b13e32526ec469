import { describe, expect, it } from 'vitest';

import {
  DEFAULT_JUDGE_MODEL,
  createJudgeConfig,
  defineConfig,
  loadRunnerConfigFromEnv,
} from '../../src/evaluation/config.js';
import { ConfigValidationError } from '../../src/evaluation/errors.js';

describe('createJudgeConfig', () => {
  it('fills defaults and freezes the result', () => {
    const config = createJudgeConfig();

    expect(config).toEqual({ model: DEFAULT_JUDGE_MODEL, temperature: 0, maxTokens: 1024 });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('keeps given values', () => {
    expect(createJudgeConfig({ model: 'claude-test', temperature: 0.5, maxTokens: 200 })).toEqual({
      model: 'claude-test',
      temperature: 0.5,
      maxTokens: 200,
    });
  });

  it.each([
    [{ temperature: 1.5 }],
    [{ temperature: -0.1 }],
    [{ maxTokens: 0 }],
    [{ maxTokens: 5000 }],
    [{ model: '' }],
  ])('rejects %j', (input) => {
    expect(() => createJudgeConfig(input)).toThrow(ConfigValidationError);
  });

  it('lists the offending fields', () => {
    try {
      createJudgeConfig({ temperature: 2 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^temperature: /);
      }
    }
  });
});

describe('defineConfig', () => {
  it('accepts a full configuration', () => {
    const config = defineConfig({
      judge: { model: 'claude-test' },
      evaluators: ['faithfulness', 'context_precision'],
      defaultThreshold: 0.6,
      thresholds: { faithfulness: 0.9 },
      execution: { maxConcurrency: 2, maxJudgeConcurrency: 8, timeoutMs: 30_000, failFast: true },
      verbose: true,
    });

    expect(config.judge).toEqual({ model: 'claude-test', temperature: 0, maxTokens: 1024 });
    expect(config.execution?.maxJudgeConcurrency).toBe(8);
    expect(config.thresholds).toEqual({ faithfulness: 0.9 });
  });

  it('rejects unknown keys and out-of-range thresholds', () => {
    expect(() => defineConfig({ thresholds: { relevance: 1.2 } })).toThrow(
      /^Invalid runner config: thresholds\.relevance: /,
    );
    expect(() => defineConfig({ execution: { maxConcurrency: 1.5 } })).toThrow(
      ConfigValidationError,
    );
    expect(() => defineConfig({ evaluators: ['relevance', 'relevance'] })).toThrow(
      'Invalid runner config: evaluators: evaluator names must be unique',
    );
  });
});

describe('loadRunnerConfigFromEnv', () => {
  it('returns an empty config when nothing is set', () => {
    expect(loadRunnerConfigFromEnv({})).toEqual({});
  });

  it('reads judge and execution settings', () => {
    const config = loadRunnerConfigFromEnv({
      RAGJUDGE_MODEL: ' claude-test ',
      RAGJUDGE_TEMPERATURE: '0.2',
      RAGJUDGE_MAX_CONCURRENCY: '3',
      RAGJUDGE_MAX_JUDGE_CONCURRENCY: '10',
    });

    expect(config).toEqual({
      judge: { model: 'claude-test', temperature: 0.2, maxTokens: 1024 },
      execution: { maxConcurrency: 3, maxJudgeConcurrency: 10 },
    });
  });

  it('ignores blank values', () => {
    expect(loadRunnerConfigFromEnv({ RAGJUDGE_MAX_TOKENS: '  ' })).toEqual({});
  });

  it('rejects non-numeric values', () => {
    expect(() => loadRunnerConfigFromEnv({ RAGJUDGE_MAX_TOKENS: 'lots' })).toThrow(
      "RAGJUDGE_MAX_TOKENS must be a number, got 'lots'",
    );
  });
});
