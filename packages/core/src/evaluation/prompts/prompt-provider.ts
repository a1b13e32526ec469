import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse } from 'yaml';
import { z } from 'zod';

import { PromptTemplateError } from '../errors.js';

export const PROMPT_OPERATIONS = [
  'faithfulness',
  'relevance',
  'extract_claims',
  'verify_claim',
  'generate_questions',
  'generate_answer',
] as const;

export type PromptOperation = (typeof PROMPT_OPERATIONS)[number];

export interface Prompt {
  readonly systemPrompt: string;
  readonly userTemplate: string;
}

/**
 * Supplies prompts for each judge operation and formats template inputs.
 */
export interface PromptProvider {
  getPrompt(operation: PromptOperation): Promise<Prompt>;
  formatUserPrompt(template: string, variables: Readonly<Record<string, string>>): string;
  formatContext(documents: readonly string[]): string;
}

const PromptTemplateSchema = z.object({
  name: z.string().min(1),
  version: z.coerce.string().default('1.0'),
  description: z.string().default(''),
  system_prompt: z.string().min(1),
  user_template: z.string().min(1),
});

export type PromptTemplate = z.infer<typeof PromptTemplateSchema>;

const PLACEHOLDER_PATTERN = /\{\{|\}\}|\{(\w+)\}/g;

/**
 * Substitute `{name}` placeholders. `{{` and `}}` render as literal braces so
 * templates can show JSON. A placeholder with no matching variable throws.
 */
export function formatUserPrompt(
  template: string,
  variables: Readonly<Record<string, string>>,
): string {
  return template.replace(PLACEHOLDER_PATTERN, (match, name: string | undefined) => {
    if (name === undefined) {
      return match === '{{' ? '{' : '}';
    }
    if (!Object.hasOwn(variables, name)) {
      throw new PromptTemplateError(`Missing template variable '${name}'`);
    }
    return variables[name];
  });
}

export function formatContext(documents: readonly string[]): string {
  return documents.map((doc, index) => `Document ${index + 1}:\n${doc}`).join('\n\n---\n\n');
}

function defaultTemplatesDir(): string {
  return fileURLToPath(new URL('./templates/', import.meta.url));
}

/**
 * Loads `<operation>.yaml` templates from disk, caching each after first use.
 */
export class YamlPromptProvider implements PromptProvider {
  private readonly templatesDir: string;
  private readonly cache = new Map<PromptOperation, Promise<Prompt>>();

  constructor(options: { readonly templatesDir?: string } = {}) {
    this.templatesDir = options.templatesDir ?? defaultTemplatesDir();
  }

  getPrompt(operation: PromptOperation): Promise<Prompt> {
    const cached = this.cache.get(operation);
    if (cached) {
      return cached;
    }
    const loading = this.loadTemplate(operation);
    this.cache.set(operation, loading);
    // Failed loads are not cached
    void loading.catch(() => this.cache.delete(operation));
    return loading;
  }

  formatUserPrompt(template: string, variables: Readonly<Record<string, string>>): string {
    return formatUserPrompt(template, variables);
  }

  formatContext(documents: readonly string[]): string {
    return formatContext(documents);
  }

  private async loadTemplate(operation: PromptOperation): Promise<Prompt> {
    const filePath = path.join(this.templatesDir, `${operation}.yaml`);

    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      throw new PromptTemplateError(`Prompt template not found: ${operation}`, { cause: error });
    }

    let data: unknown;
    try {
      data = parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new PromptTemplateError(`Invalid YAML in prompt template ${operation}: ${message}`, {
        cause: error,
      });
    }

    const parsed = PromptTemplateSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new PromptTemplateError(`Invalid prompt template ${operation}: ${issues}`);
    }

    return {
      systemPrompt: parsed.data.system_prompt,
      userTemplate: parsed.data.user_template,
    };
  }
}
