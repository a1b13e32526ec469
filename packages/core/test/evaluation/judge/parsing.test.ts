import { describe, expect, it } from 'vitest';

import { JudgeResponseError } from '../../../src/evaluation/errors.js';
import {
  clampScore,
  parseJudgeJson,
  readAnswer,
  readScore,
  readStringList,
  readVerdict,
  stripCodeFence,
} from '../../../src/evaluation/judge/parsing.js';

describe('clampScore', () => {
  it('clamps into [0, 1]', () => {
    expect(clampScore(0.42)).toBe(0.42);
    expect(clampScore(1.7)).toBe(1);
    expect(clampScore(-3)).toBe(0);
  });

  it('sends infinities to the nearest bound and NaN to 0', () => {
    expect(clampScore(Number.POSITIVE_INFINITY)).toBe(1);
    expect(clampScore(Number.NEGATIVE_INFINITY)).toBe(0);
    expect(clampScore(Number.NaN)).toBe(0);
  });
});

describe('stripCodeFence', () => {
  it('removes fences with and without a language tag', () => {
    expect(stripCodeFence('```json\n{"score": 1}\n```')).toBe('{"score": 1}');
    expect(stripCodeFence('  ```\n{"a": 1}\n```  ')).toBe('{"a": 1}');
  });

  it('leaves unfenced text trimmed', () => {
    expect(stripCodeFence('  {"a": 1}\n')).toBe('{"a": 1}');
  });
});

describe('parseJudgeJson', () => {
  it('rejects arrays and scalars', () => {
    expect(() => parseJudgeJson('[1, 2]')).toThrow(
      'Expected a JSON object in judge response. Raw text: [1, 2]',
    );
    expect(() => parseJudgeJson('42')).toThrow(JudgeResponseError);
  });

  it('keeps only the first 200 characters of bad output', () => {
    const text = `not json ${'x'.repeat(300)}`;

    try {
      parseJudgeJson(text);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(JudgeResponseError);
      if (error instanceof Error) {
        expect(error.message.endsWith(`Raw text: ${text.slice(0, 200)}`)).toBe(true);
      }
    }
  });
});

describe('field readers', () => {
  it('reads numeric and string scores', () => {
    expect(readScore({ score: 0.3 })).toBe(0.3);
    expect(readScore({ score: ' 0.8 ' })).toBe(0.8);
    expect(readScore({ score: 2 })).toBe(1);
    expect(readScore(parseJudgeJson('{"score": 1e999}'))).toBe(1);
  });

  it('rejects missing and non-numeric scores', () => {
    expect(() => readScore({ reasoning: 'ok' })).toThrow(
      `Response missing 'score' field: {"reasoning":"ok"}`,
    );
    expect(() => readScore({ score: null })).toThrow('Invalid score value: null');
    expect(() => readScore({ score: '' })).toThrow('Invalid score value: ""');
  });

  it('drops falsy list entries and stringifies the rest', () => {
    expect(readStringList({ claims: ['a', '', null, 3] }, 'claims')).toEqual(['a', '3']);
    expect(() => readStringList({ claims: null }, 'claims')).toThrow(
      `Expected 'claims' to be a list, got null: {"claims":null}`,
    );
  });

  it('normalizes verdict case and whitespace', () => {
    expect(readVerdict({ verdict: ' supported ' })).toBe('SUPPORTED');
    expect(readVerdict({ verdict: 'not_enough_info' })).toBe('NOT_ENOUGH_INFO');
    expect(() => readVerdict({ verdict: 1 })).toThrow("Invalid verdict '1'.");
  });

  it('requires a string answer', () => {
    expect(readAnswer({ answer: 'Paris.' })).toBe('Paris.');
    expect(() => readAnswer({ answer: 5 })).toThrow(`Expected 'answer' to be a string: {"answer":5}`);
  });
});
