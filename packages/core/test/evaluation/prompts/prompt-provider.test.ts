import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { PromptTemplateError } from '../../../src/evaluation/errors.js';
import {
  PROMPT_OPERATIONS,
  YamlPromptProvider,
  formatContext,
  formatUserPrompt,
} from '../../../src/evaluation/prompts/prompt-provider.js';

describe('formatContext', () => {
  it('numbers documents and separates them with rules', () => {
    expect(formatContext(['Alpha.', 'Beta.'])).toBe(
      'Document 1:\nAlpha.\n\n---\n\nDocument 2:\nBeta.',
    );
  });

  it('renders a single document without a separator', () => {
    expect(formatContext(['Only one.'])).toBe('Document 1:\nOnly one.');
  });
});

describe('formatUserPrompt', () => {
  it('substitutes named placeholders', () => {
    expect(formatUserPrompt('Q: {query}\nA: {response}', { query: 'why', response: 'because' })).toBe(
      'Q: why\nA: because',
    );
  });

  it('renders doubled braces literally', () => {
    expect(formatUserPrompt('Return {{"score": {n}}}', { n: '1' })).toBe('Return {"score": 1}');
  });

  it('throws when a variable is missing', () => {
    expect(() => formatUserPrompt('Hello {name}', {})).toThrow(PromptTemplateError);
    expect(() => formatUserPrompt('Hello {name}', {})).toThrow("Missing template variable 'name'");
  });

  it('does not re-expand placeholders inside substituted values', () => {
    expect(formatUserPrompt('{a}', { a: '{b}', b: 'x' })).toBe('{b}');
  });
});

describe('YamlPromptProvider', () => {
  it('loads every bundled template', async () => {
    const provider = new YamlPromptProvider();

    for (const operation of PROMPT_OPERATIONS) {
      const prompt = await provider.getPrompt(operation);
      expect(prompt.systemPrompt.length).toBeGreaterThan(0);
      expect(prompt.userTemplate.length).toBeGreaterThan(0);
    }
  });

  it('bundled templates render with the variables the judge supplies', async () => {
    const provider = new YamlPromptProvider();
    const variables: Record<string, Record<string, string>> = {
      faithfulness: { context: 'ctx', response: 'resp' },
      relevance: { query: 'q', response: 'resp' },
      extract_claims: { response: 'resp' },
      verify_claim: { claim: 'c', context: 'ctx' },
      generate_questions: { context: 'ctx', n: '3' },
      generate_answer: { question: 'q', context: 'ctx' },
    };

    for (const operation of PROMPT_OPERATIONS) {
      const prompt = await provider.getPrompt(operation);
      expect(() => provider.formatUserPrompt(prompt.userTemplate, variables[operation])).not.toThrow();
    }
  });

  it('reads templates from a custom directory', async () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'prompts-'));
    writeFileSync(
      path.join(dir, 'relevance.yaml'),
      'name: relevance\nsystem_prompt: Be strict.\nuser_template: "Q: {query}"\n',
    );

    const provider = new YamlPromptProvider({ templatesDir: dir });

    await expect(provider.getPrompt('relevance')).resolves.toEqual({
      systemPrompt: 'Be strict.',
      userTemplate: 'Q: {query}',
    });
  });

  it('reports missing and malformed templates', async () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'prompts-'));
    writeFileSync(path.join(dir, 'relevance.yaml'), 'name: relevance\n');
    const provider = new YamlPromptProvider({ templatesDir: dir });

    await expect(provider.getPrompt('faithfulness')).rejects.toThrow(
      'Prompt template not found: faithfulness',
    );
    await expect(provider.getPrompt('relevance')).rejects.toThrow(
      /Invalid prompt template relevance: system_prompt: Required/,
    );
  });
});
