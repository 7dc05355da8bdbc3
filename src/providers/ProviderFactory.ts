/**
 * ProviderFactory - Creates LLM clients for different providers
 *
 * Supports:
 * - claude: Anthropic Claude models via the SDK
 * - ollama: Local models via Ollama
 */

import { ClaudeClient } from './ClaudeClient.js';
import { OllamaClient } from './OllamaClient.js';
import type { LLMClient, ProviderConfig } from './types.js';

export class ProviderFactory {
  private static clients: Map<string, LLMClient> = new Map();

  /**
   * Create or get cached client for a provider config
   */
  static createClient(config: ProviderConfig): LLMClient {
    const cacheKey = `${config.provider}:${config.model}:${config.apiEndpoint || 'default'}`;

    const cached = this.clients.get(cacheKey);
    if (cached) {
      return cached;
    }

    let client: LLMClient;

    switch (config.provider) {
      case 'ollama':
        client = new OllamaClient(config);
        break;

      case 'claude':
        client = new ClaudeClient(config);
        break;
    }

    this.clients.set(cacheKey, client);
    return client;
  }

  /**
   * Check if a provider is available
   */
  static async checkAvailability(config: ProviderConfig): Promise<{
    available: boolean;
    error?: string;
  }> {
    switch (config.provider) {
      case 'ollama': {
        const client = new OllamaClient(config);
        const health = await client.healthCheck();
        return {
          available: health.available && health.modelLoaded,
          error: health.error
        };
      }

      case 'claude':
        // Claude availability depends on API key being set
        return {
          available: !!config.apiKey,
          error: config.apiKey ? undefined : 'ANTHROPIC_API_KEY not set'
        };
    }
  }

  /**
   * Clear cached clients (for testing or reconfiguration)
   */
  static clearCache(): void {
    this.clients.clear();
  }
}
