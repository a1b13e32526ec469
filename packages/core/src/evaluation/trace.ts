/**
 * Per-call telemetry for judge requests.
 */

import { Mutex } from 'async-mutex';

const INPUT_COST_PER_MILLION_USD = 3;
const OUTPUT_COST_PER_MILLION_USD = 15;

/**
 * One judge call: which operation, which model, token usage and latency.
 */
export interface JudgeTrace {
  /** ISO-8601 UTC */
  readonly timestamp: string;
  readonly operation: string;
  readonly model: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly latencyMs: number;
  readonly success: boolean;
  readonly error?: string;
}

export interface TraceSummary {
  readonly totalCalls: number;
  readonly successfulCalls: number;
  readonly failedCalls: number;
  readonly totalInputTokens: number;
  readonly totalOutputTokens: number;
  readonly totalTokens: number;
  readonly totalLatencyMs: number;
  readonly averageLatencyMs: number;
  readonly estimatedCostUsd: number;
}

export function createJudgeTrace(
  fields: Omit<JudgeTrace, 'timestamp'> & { readonly timestamp?: string },
): JudgeTrace {
  return Object.freeze({
    ...fields,
    timestamp: fields.timestamp ?? new Date().toISOString(),
  });
}

export function estimateCostUsd(inputTokens: number, outputTokens: number): number {
  return (
    (inputTokens / 1_000_000) * INPUT_COST_PER_MILLION_USD +
    (outputTokens / 1_000_000) * OUTPUT_COST_PER_MILLION_USD
  );
}

export function summarizeTraces(traces: readonly JudgeTrace[]): TraceSummary {
  let successfulCalls = 0;
  let totalInputTokens = 0;
  let totalOutputTokens = 0;
  let totalLatencyMs = 0;

  for (const trace of traces) {
    if (trace.success) successfulCalls++;
    totalInputTokens += trace.inputTokens;
    totalOutputTokens += trace.outputTokens;
    totalLatencyMs += trace.latencyMs;
  }

  return {
    totalCalls: traces.length,
    successfulCalls,
    failedCalls: traces.length - successfulCalls,
    totalInputTokens,
    totalOutputTokens,
    totalTokens: totalInputTokens + totalOutputTokens,
    totalLatencyMs,
    averageLatencyMs: traces.length > 0 ? totalLatencyMs / traces.length : 0,
    estimatedCostUsd: estimateCostUsd(totalInputTokens, totalOutputTokens),
  };
}

/**
 * Append-only sink for judge traces. Shared across every concurrent judge
 * call, so reads and writes are serialized.
 */
export class TraceCollector {
  private readonly traces: JudgeTrace[] = [];
  private readonly mutex = new Mutex();

  async add(trace: JudgeTrace): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.traces.push(trace);
    });
  }

  async getTraces(): Promise<readonly JudgeTrace[]> {
    return this.mutex.runExclusive(() => [...this.traces]);
  }

  async summary(): Promise<TraceSummary> {
    return this.mutex.runExclusive(() => summarizeTraces(this.traces));
  }

  async byOperation(operation: string): Promise<readonly JudgeTrace[]> {
    return this.mutex.runExclusive(() =>
      this.traces.filter((trace) => trace.operation === operation),
    );
  }

  async failures(): Promise<readonly JudgeTrace[]> {
    return this.mutex.runExclusive(() => this.traces.filter((trace) => !trace.success));
  }

  async clear(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.traces.length = 0;
    });
  }
}
