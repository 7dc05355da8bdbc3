/**
 * OllamaClient - Local LLM provider via Ollama
 *
 * Ollama provides a simple REST API for local model inference.
 * Default endpoint: http://localhost:11434
 */

import { z } from 'zod';
import type { LLMClient, Message, LLMResponse, ProviderConfig, GenerateOptions } from './types.js';

interface OllamaChatRequest {
  model: string;
  messages: Array<{ role: string; content: string }>;
  stream: boolean;
  options?: {
    num_predict?: number;
    temperature?: number;
    stop?: string[];
  };
}

const OllamaChatResponseSchema = z.object({
  model: z.string(),
  message: z.object({
    role: z.string(),
    content: z.string()
  }),
  done: z.boolean(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional()
});

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).optional()
});

export class OllamaClient implements LLMClient {
  readonly name = 'ollama' as const;
  readonly model: string;
  private endpoint: string;

  constructor(config: ProviderConfig) {
    this.endpoint = (config.apiEndpoint || 'http://localhost:11434').replace(/\/+$/, '');
    this.model = config.model;
  }

  async generate(messages: Message[], options?: GenerateOptions): Promise<LLMResponse> {
    const request: OllamaChatRequest = {
      model: this.model,
      messages: messages.map(m => ({
        role: m.role,
        content: m.content
      })),
      stream: false,
      options: {
        num_predict: options?.maxTokens,
        temperature: options?.temperature,
        stop: options?.stopSequences
      }
    };

    let response: Response;
    try {
      response = await fetch(`${this.endpoint}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request)
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (message.includes('ECONNREFUSED') || message.includes('fetch failed')) {
        throw new Error(`Ollama not running at ${this.endpoint}. Start with: ollama serve`);
      }
      throw new Error(`Ollama error: ${message}`);
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Ollama API error ${response.status}: ${errorText}`);
    }

    const parsed = OllamaChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected Ollama response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }
    const data = parsed.data;

    return {
      content: data.message.content,
      stopReason: data.done_reason === 'length' ? 'max_tokens' : 'end_turn',
      model: data.model,
      usage: {
        inputTokens: data.prompt_eval_count || 0,
        outputTokens: data.eval_count || 0
      }
    };
  }

  /**
   * Check if Ollama is available and the model is pulled
   */
  async healthCheck(): Promise<{ available: boolean; modelLoaded: boolean; error?: string }> {
    try {
      const tagsResponse = await fetch(`${this.endpoint}/api/tags`);
      if (!tagsResponse.ok) {
        return { available: false, modelLoaded: false, error: 'Ollama not responding' };
      }

      const tags = OllamaTagsSchema.safeParse(await tagsResponse.json());
      const models = tags.success ? tags.data.models ?? [] : [];
      const modelLoaded = models.some(m => m.name === this.model || m.name.startsWith(this.model));

      return {
        available: true,
        modelLoaded,
        error: modelLoaded ? undefined : `Model ${this.model} not found. Run: ollama pull ${this.model}`
      };
    } catch {
      return {
        available: false,
        modelLoaded: false,
        error: `Cannot connect to Ollama at ${this.endpoint}`
      };
    }
  }
}
