export { GeminiClient, type GeminiClientConfig } from './client.js';
export {
  loadPromptTemplate,
  renderPrompt,
  promptPath,
  PLACEHOLDERS,
  type PromptName,
  type PromptValues,
} from './prompts.js';
