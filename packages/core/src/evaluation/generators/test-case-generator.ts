import { randomUUID } from 'node:crypto';

import type { Judge } from '../judge/judge.js';
import { type TestCase, createTestCase } from '../types.js';

const MAX_NAME_LENGTH = 60;

/**
 * Short display name: `"<index>. <question>"`, without the trailing `?` and
 * cut at a word boundary when longer than 60 characters.
 */
export function deriveTestCaseName(question: string, index: number): string {
  let name = question.replace(/\?+$/, '').trim();
  if (name.length > MAX_NAME_LENGTH) {
    const cut = name.slice(0, MAX_NAME_LENGTH);
    const lastSpace = cut.lastIndexOf(' ');
    name = `${lastSpace > 0 ? cut.slice(0, lastSpace) : cut}...`;
  }
  return `${index}. ${name}`;
}

export interface TestCaseGeneratorOptions {
  /** Swapped in tests */
  readonly idFactory?: () => string;
}

/**
 * Synthesizes test cases from raw documents: the judge writes questions
 * grounded in the documents, then answers each one from them.
 */
export class TestCaseGenerator {
  private readonly idFactory: () => string;

  constructor(options: TestCaseGeneratorOptions = {}) {
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Generate up to `n` test cases. Fewer come back when the judge returns
   * fewer questions than requested.
   */
  async generateFromDocuments(
    documents: readonly string[],
    n: number,
    judge: Judge,
  ): Promise<TestCase[]> {
    if (documents.length === 0) {
      throw new RangeError('documents must not be empty');
    }
    if (!Number.isInteger(n) || n < 1) {
      throw new RangeError('n must be a positive integer');
    }

    const { questions } = await judge.generateQuestions(documents, n);
    const selected = questions.slice(0, n);

    const answers = await Promise.all(
      selected.map((question) => judge.generateAnswer(question, documents)),
    );

    return selected.map((question, index) =>
      createTestCase({
        id: this.idFactory(),
        name: deriveTestCaseName(question, index + 1),
        query: question,
        context: [...documents],
        response: answers[index].answer,
        tags: ['generated'],
      }),
    );
  }
}
