/**
 * ClaudeClient - Anthropic API provider
 *
 * System messages are lifted out of the message list into the API's
 * dedicated system field.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { GenerateOptions, LLMClient, LLMResponse, Message, ProviderConfig } from './types.js';

export class ClaudeClient implements LLMClient {
  readonly name = 'claude' as const;
  readonly model: string;
  private client: Anthropic;
  private defaultMaxTokens: number;

  constructor(config: ProviderConfig) {
    if (!config.apiKey) {
      throw new Error('ANTHROPIC_API_KEY not set');
    }
    this.client = new Anthropic({ apiKey: config.apiKey });
    this.model = config.model;
    this.defaultMaxTokens = config.maxTokens ?? 8192;
  }

  async generate(messages: Message[], options?: GenerateOptions): Promise<LLMResponse> {
    const system = messages
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');

    const conversation: Anthropic.MessageParam[] = [];
    for (const message of messages) {
      if (message.role === 'user' || message.role === 'assistant') {
        conversation.push({ role: message.role, content: message.content });
      }
    }

    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: options?.maxTokens ?? this.defaultMaxTokens,
      temperature: options?.temperature,
      stop_sequences: options?.stopSequences,
      system: system || undefined,
      messages: conversation
    });

    const content = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');

    return {
      content,
      stopReason: response.stop_reason === 'max_tokens'
        ? 'max_tokens'
        : response.stop_reason === 'stop_sequence' ? 'stop_sequence' : 'end_turn',
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens
      }
    };
  }
}
