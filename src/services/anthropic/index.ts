/**
 * Anthropic service - model provider over the Messages API, and prompts.
 */

export {
  AnthropicModelProvider,
  getClient,
  resetClient,
  toMessageParams,
  fromResponseContent,
  type AnthropicProviderSettings,
} from './provider.js';
export { buildSystemPrompt } from './prompts/system.js';
