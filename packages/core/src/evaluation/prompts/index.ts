export {
  PROMPT_OPERATIONS,
  YamlPromptProvider,
  formatContext,
  formatUserPrompt,
  type Prompt,
  type PromptOperation,
  type PromptProvider,
  type PromptTemplate,
} from './prompt-provider.js';
