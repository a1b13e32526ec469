import type { Transport, TransportRequest, TransportResponse } from './transport.js';

const DEFAULT_MOCK_RESPONSE = '{"score": 1.0, "reasoning": "Mock judge response."}';

export type MockReply = string | ((request: TransportRequest) => string | Promise<string>);

export interface MockTransportOptions {
  readonly response?: MockReply;
  readonly delayMs?: number;
  readonly delayMinMs?: number;
  readonly delayMaxMs?: number;
  readonly inputTokens?: number;
  readonly outputTokens?: number;
}

/**
 * Transport returning canned text, for deterministic runs and tests.
 * Records every request it receives.
 */
export class MockTransport implements Transport {
  readonly id = 'mock';
  readonly requests: TransportRequest[] = [];

  private readonly reply: MockReply;
  private readonly delayMs: number;
  private readonly delayMinMs: number;
  private readonly delayMaxMs: number;
  private readonly inputTokens: number;
  private readonly outputTokens: number;

  constructor(options: MockTransportOptions = {}) {
    this.reply = options.response ?? DEFAULT_MOCK_RESPONSE;
    this.delayMs = options.delayMs ?? 0;
    this.delayMinMs = options.delayMinMs ?? 0;
    this.delayMaxMs = options.delayMaxMs ?? 0;
    this.inputTokens = options.inputTokens ?? 0;
    this.outputTokens = options.outputTokens ?? 0;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);

    const delay = this.calculateDelay();
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }

    const text = typeof this.reply === 'string' ? this.reply : await this.reply(request);
    return {
      text,
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      model: request.model,
    };
  }

  private calculateDelay(): number {
    // Uniform random within the range when one is given
    if (this.delayMinMs > 0 || this.delayMaxMs > 0) {
      const min = Math.max(0, this.delayMinMs);
      const max = Math.max(min, this.delayMaxMs);
      return Math.floor(Math.random() * (max - min + 1)) + min;
    }
    return this.delayMs;
  }
}
