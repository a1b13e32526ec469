import { JudgeResponseError } from '../errors.js';
import { type Verdict, isVerdict } from '../types.js';

/**
 * Clamp to [0, 1]. Infinities go to the nearest bound; NaN scores 0.
 */
export function clampScore(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Strip a surrounding markdown code fence, if any, from model output.
 */
export function stripCodeFence(text: string): string {
  const cleaned = text.trim();
  if (!cleaned.startsWith('```')) {
    return cleaned;
  }
  const lines = cleaned.split('\n').slice(1);
  if (lines.length > 0 && lines[lines.length - 1].trim() === '```') {
    lines.pop();
  }
  return lines.join('\n');
}

/**
 * Parse the JSON object a judge operation returns.
 */
export function parseJudgeJson(text: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(text));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new JudgeResponseError(
      `Failed to parse JSON response: ${message}. Raw text: ${text.slice(0, 200)}`,
      { cause: error },
    );
  }
  if (!isRecord(parsed)) {
    throw new JudgeResponseError(
      `Expected a JSON object in judge response. Raw text: ${text.slice(0, 200)}`,
    );
  }
  return parsed;
}

function requireField(payload: Record<string, unknown>, field: string): unknown {
  if (!Object.hasOwn(payload, field)) {
    throw new JudgeResponseError(`Response missing '${field}' field: ${JSON.stringify(payload)}`);
  }
  return payload[field];
}

/**
 * Read and clamp the `score` field. Numeric strings are accepted.
 */
export function readScore(payload: Record<string, unknown>): number {
  const raw = requireField(payload, 'score');
  const value =
    typeof raw === 'number'
      ? raw
      : typeof raw === 'string' && raw.trim().length > 0
        ? Number(raw)
        : Number.NaN;
  if (Number.isNaN(value)) {
    throw new JudgeResponseError(`Invalid score value: ${JSON.stringify(raw)}`);
  }
  return clampScore(value);
}

export function readOptionalText(payload: Record<string, unknown>, field: string): string {
  const value = payload[field];
  return typeof value === 'string' ? value : '';
}

/**
 * Read a list of non-empty strings (claims or questions). Falsy entries are
 * dropped and other scalars are stringified.
 */
export function readStringList(payload: Record<string, unknown>, field: string): string[] {
  const raw = requireField(payload, field);
  if (!Array.isArray(raw)) {
    throw new JudgeResponseError(
      `Expected '${field}' to be a list, got ${raw === null ? 'null' : typeof raw}: ${JSON.stringify(payload)}`,
    );
  }
  return raw.filter((item) => Boolean(item)).map((item) => String(item));
}

export function readVerdict(payload: Record<string, unknown>): Verdict {
  const raw = requireField(payload, 'verdict');
  const verdict = typeof raw === 'string' ? raw.trim().toUpperCase() : '';
  if (!isVerdict(verdict)) {
    throw new JudgeResponseError(
      `Invalid verdict '${String(raw)}'. Expected one of SUPPORTED, CONTRADICTED, NOT_ENOUGH_INFO`,
    );
  }
  return verdict;
}

export function readAnswer(payload: Record<string, unknown>): string {
  const raw = requireField(payload, 'answer');
  if (typeof raw !== 'string') {
    throw new JudgeResponseError(`Expected 'answer' to be a string: ${JSON.stringify(payload)}`);
  }
  return raw;
}
