/**
 * Multi-Provider Module
 */

export { ProviderFactory } from './ProviderFactory.js';
export { ClaudeClient } from './ClaudeClient.js';
export { OllamaClient } from './OllamaClient.js';
export { PROVIDERS } from './types.js';
export type {
  Provider,
  ProviderConfig,
  Message,
  GenerateOptions,
  LLMResponse,
  LLMClient
} from './types.js';
