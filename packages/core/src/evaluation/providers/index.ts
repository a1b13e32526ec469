import { AnthropicTransport, type AnthropicTransportOptions } from './anthropic.js';
import { MockTransport, type MockTransportOptions } from './mock.js';
import type { EnvLookup, Transport } from './transport.js';

export type { EnvLookup, Transport, TransportRequest, TransportResponse } from './transport.js';
export {
  AnthropicTransport,
  type AnthropicTransportOptions,
  type GenerateFn,
  type GeneratedText,
} from './anthropic.js';
export { MockTransport, type MockReply, type MockTransportOptions } from './mock.js';
export {
  DEFAULT_RETRY_POLICY,
  calculateRetryDelay,
  extractStatus,
  isAbortError,
  isNetworkError,
  isRetryableError,
  withRetry,
  type RetryPolicy,
  type WithRetryOptions,
} from './retry.js';

export const ANTHROPIC_API_KEY_ENV = 'ANTHROPIC_API_KEY';

export type TransportDefinition =
  | ({ readonly kind: 'anthropic' } & Partial<AnthropicTransportOptions>)
  | ({ readonly kind: 'mock' } & MockTransportOptions);

/**
 * Resolve the Anthropic API key, preferring an explicit value over the
 * environment. Throws when neither is set.
 */
export function resolveApiKey(apiKey?: string, env: EnvLookup = process.env): string {
  const resolved = apiKey?.trim() || env[ANTHROPIC_API_KEY_ENV]?.trim();
  if (!resolved) {
    throw new Error(
      `Anthropic API key is required. Pass apiKey or set the ${ANTHROPIC_API_KEY_ENV} environment variable.`,
    );
  }
  return resolved;
}

export function createTransport(
  definition: TransportDefinition,
  env: EnvLookup = process.env,
): Transport {
  switch (definition.kind) {
    case 'anthropic': {
      const { kind: _kind, apiKey, ...rest } = definition;
      return new AnthropicTransport({ ...rest, apiKey: resolveApiKey(apiKey, env) });
    }
    case 'mock': {
      const { kind: _kind, ...options } = definition;
      return new MockTransport(options);
    }
    default: {
      // Exhaustive check
      const unknownDefinition: never = definition;
      throw new Error(`Unsupported transport kind ${JSON.stringify(unknownDefinition)}`);
    }
  }
}
