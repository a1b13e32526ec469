/**
 * Environment variable lookup. `process.env` satisfies it; tests pass plain
 * objects.
 */
export type EnvLookup = Readonly<Record<string, string | undefined>>;

/**
 * One (system, user) prompt pair sent to the judge model.
 */
export interface TransportRequest {
  readonly systemPrompt: string;
  readonly userPrompt: string;
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly signal?: AbortSignal;
}

/**
 * Normalized provider reply: concatenated text plus token accounting.
 */
export interface TransportResponse {
  readonly text: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  /** Model id reported by the provider, or the requested model when absent */
  readonly model: string;
}

/**
 * Sends a single prompt to an LLM. Implementations own retries and must throw
 * `JudgeApiError` or `JudgeResponseError` on failure.
 */
export interface Transport {
  readonly id: string;
  send(request: TransportRequest): Promise<TransportResponse>;
}
