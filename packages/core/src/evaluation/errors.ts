/**
 * Base class for failures raised by a judge operation.
 */
export class JudgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JudgeError';
  }
}

/**
 * Error thrown when the LLM provider call fails, after any retries.
 */
export class JudgeApiError extends JudgeError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JudgeApiError';
    this.statusCode = statusCode;
  }
}

/**
 * Error thrown when a provider call succeeded but its content is unusable:
 * malformed JSON, a missing required field, or an invalid enum value.
 */
export class JudgeResponseError extends JudgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JudgeResponseError';
  }
}

/**
 * Error thrown when an evaluator is used on input it cannot handle, such as
 * context recall on a test case without expected facts. Never converted into
 * an error result by the runner.
 */
export class EvaluatorUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluatorUsageError';
  }
}

/**
 * Error thrown for invalid evaluator registrations and unknown lookups.
 */
export class EvaluatorRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluatorRegistryError';
  }
}

/**
 * Error thrown when a prompt template cannot be loaded or rendered.
 */
export class PromptTemplateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PromptTemplateError';
  }
}

export class TestCaseValidationError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[]) {
    super(message);
    this.name = 'TestCaseValidationError';
    this.issues = issues;
  }
}

export class ConfigValidationError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * Render an unknown thrown value as `"<ErrorName>: <message>"`.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
