import { describe, expect, it } from 'vitest';

import { TestCaseValidationError } from '../../../src/evaluation/errors.js';
import {
  TestCaseGenerator,
  deriveTestCaseName,
} from '../../../src/evaluation/generators/test-case-generator.js';
import { createStubJudge } from '../../support/stub-judge.js';

const DOCUMENTS = [
  'The Eiffel Tower was completed in 1889.',
  'It is 330 metres tall and located in Paris.',
];

function sequentialIds() {
  let next = 0;
  return () => `generated-${++next}`;
}

describe('deriveTestCaseName', () => {
  it('numbers the question and drops the question mark', () => {
    expect(deriveTestCaseName('When was the Eiffel Tower completed?', 1)).toBe(
      '1. When was the Eiffel Tower completed',
    );
  });

  it('cuts long questions at a word boundary', () => {
    const question = `${'abcde '.repeat(15)}end?`;

    expect(deriveTestCaseName(question, 2)).toBe(`2. ${'abcde '.repeat(10).trim()}...`);
  });

  it('cuts long questions without spaces at 60 characters', () => {
    expect(deriveTestCaseName('x'.repeat(70), 3)).toBe(`3. ${'x'.repeat(60)}...`);
  });
});

describe('TestCaseGenerator', () => {
  it('builds one test case per generated question', async () => {
    const judge = createStubJudge({
      generateQuestions: async () => ({
        questions: ['When was the Eiffel Tower completed?', 'How tall is the Eiffel Tower?'],
        tokensUsed: 20,
      }),
      generateAnswer: async (question) => ({
        answer: question.startsWith('When') ? 'In 1889.' : '330 metres.',
        tokensUsed: 10,
      }),
    });
    const generator = new TestCaseGenerator({ idFactory: sequentialIds() });

    const cases = await generator.generateFromDocuments(DOCUMENTS, 2, judge);

    expect(cases).toEqual([
      {
        id: 'generated-1',
        name: '1. When was the Eiffel Tower completed',
        query: 'When was the Eiffel Tower completed?',
        context: DOCUMENTS,
        response: 'In 1889.',
        tags: ['generated'],
      },
      {
        id: 'generated-2',
        name: '2. How tall is the Eiffel Tower',
        query: 'How tall is the Eiffel Tower?',
        context: DOCUMENTS,
        response: '330 metres.',
        tags: ['generated'],
      },
    ]);
    expect(judge.generateQuestions).toHaveBeenCalledWith(DOCUMENTS, 2);
    expect(judge.generateAnswer).toHaveBeenCalledWith('How tall is the Eiffel Tower?', DOCUMENTS);
  });

  it('keeps at most n questions', async () => {
    const judge = createStubJudge({
      generateQuestions: async () => ({ questions: ['One?', 'Two?', 'Three?'], tokensUsed: 0 }),
      generateAnswer: async () => ({ answer: 'An answer.', tokensUsed: 0 }),
    });

    const cases = await new TestCaseGenerator().generateFromDocuments(DOCUMENTS, 2, judge);

    expect(cases.map((testCase) => testCase.query)).toEqual(['One?', 'Two?']);
    expect(judge.generateAnswer).toHaveBeenCalledTimes(2);
    expect(cases[0].id).not.toBe(cases[1].id);
  });

  it('returns fewer cases when the judge returns fewer questions', async () => {
    const judge = createStubJudge({
      generateQuestions: async () => ({ questions: ['Only one?'], tokensUsed: 0 }),
      generateAnswer: async () => ({ answer: 'Yes.', tokensUsed: 0 }),
    });

    const cases = await new TestCaseGenerator().generateFromDocuments(DOCUMENTS, 5, judge);

    expect(cases).toHaveLength(1);
  });

  it('rejects empty documents and invalid counts without calling the judge', async () => {
    const judge = createStubJudge();
    const generator = new TestCaseGenerator();

    await expect(generator.generateFromDocuments([], 2, judge)).rejects.toThrow(
      'documents must not be empty',
    );
    await expect(generator.generateFromDocuments(DOCUMENTS, 0, judge)).rejects.toThrow(
      'n must be a positive integer',
    );
    await expect(generator.generateFromDocuments(DOCUMENTS, 1.5, judge)).rejects.toThrow(
      RangeError,
    );
    expect(judge.generateQuestions).not.toHaveBeenCalled();
  });

  it('rejects a blank generated answer', async () => {
    const judge = createStubJudge({
      generateQuestions: async () => ({ questions: ['Anything?'], tokensUsed: 0 }),
    });

    await expect(
      new TestCaseGenerator().generateFromDocuments(DOCUMENTS, 1, judge),
    ).rejects.toBeInstanceOf(TestCaseValidationError);
  });
});
