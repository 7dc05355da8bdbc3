/**
 * Multi-Provider Types
 *
 * Abstraction layer for the LLMs that write new insight banks:
 * - Claude (Anthropic API)
 * - Ollama (local models)
 */

export const PROVIDERS = ['claude', 'ollama'] as const;

export type Provider = (typeof PROVIDERS)[number];

export interface ProviderConfig {
  provider: Provider;
  model: string;
  apiKey?: string;
  apiEndpoint?: string;  // For Ollama: http://localhost:11434
  maxTokens?: number;
}

export interface Message {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface GenerateOptions {
  maxTokens?: number;
  temperature?: number;
  stopSequences?: string[];
}

export interface LLMResponse {
  content: string;
  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence';
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LLMClient {
  generate(messages: Message[], options?: GenerateOptions): Promise<LLMResponse>;
  readonly name: Provider;
  readonly model: string;
}
