export type {
  AnswerResult,
  ClaimVerdict,
  ClaimsResult,
  Judge,
  JudgeResult,
  QuestionsResult,
} from './judge.js';
export { LlmJudge, type LlmJudgeOptions } from './llm-judge.js';
export { createAnthropicJudge, type AnthropicJudgeOptions } from './anthropic.js';
export { clampScore, parseJudgeJson, stripCodeFence } from './parsing.js';
