/**
 * ProviderFactory and OllamaClient Tests
 *
 * fetch is stubbed; nothing leaves the process.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { ClaudeClient } from './ClaudeClient.js';
import { OllamaClient } from './OllamaClient.js';
import { ProviderFactory } from './ProviderFactory.js';

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

describe('ProviderFactory', () => {
  afterEach(() => {
    ProviderFactory.clearCache();
    vi.unstubAllGlobals();
  });

  it('caches clients per provider, model and endpoint', () => {
    const config = { provider: 'ollama' as const, model: 'llama3.1', apiEndpoint: 'http://localhost:11434' };
    const first = ProviderFactory.createClient(config);

    expect(first).toBeInstanceOf(OllamaClient);
    expect(ProviderFactory.createClient(config)).toBe(first);
    expect(ProviderFactory.createClient({ ...config, model: 'mistral' })).not.toBe(first);

    ProviderFactory.clearCache();
    expect(ProviderFactory.createClient(config)).not.toBe(first);
  });

  it('creates a Claude client only with an API key', () => {
    expect(() => ProviderFactory.createClient({ provider: 'claude', model: 'claude-test' })).toThrow('ANTHROPIC_API_KEY not set');
    expect(ProviderFactory.createClient({ provider: 'claude', model: 'claude-test', apiKey: 'test-secret' }))
      .toBeInstanceOf(ClaudeClient);
  });

  it('reports Claude as unavailable without a key', async () => {
    await expect(ProviderFactory.checkAvailability({ provider: 'claude', model: 'claude-test' })).resolves.toEqual({
      available: false,
      error: 'ANTHROPIC_API_KEY not set'
    });
  });

  it('checks that the Ollama model is pulled', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ models: [{ name: 'llama3.1:latest' }] })));

    await expect(ProviderFactory.checkAvailability({ provider: 'ollama', model: 'llama3.1' })).resolves.toEqual({
      available: true,
      error: undefined
    });
    await expect(ProviderFactory.checkAvailability({ provider: 'ollama', model: 'mistral' })).resolves.toEqual({
      available: false,
      error: 'Model mistral not found. Run: ollama pull mistral'
    });
  });
});

describe('OllamaClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the chat and maps the reply', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => jsonResponse({
      model: 'llama3.1',
      message: { role: 'assistant', content: '{"number": 7}' },
      done: true,
      done_reason: 'length',
      prompt_eval_count: 12,
      eval_count: 34
    }));
    vi.stubGlobal('fetch', fetchMock);

    const client = new OllamaClient({ provider: 'ollama', model: 'llama3.1', apiEndpoint: 'http://localhost:11434/' });
    const response = await client.generate([{ role: 'user', content: 'Write a bank' }], { maxTokens: 100, temperature: 0.5 });

    expect(response).toEqual({
      content: '{"number": 7}',
      stopReason: 'max_tokens',
      model: 'llama3.1',
      usage: { inputTokens: 12, outputTokens: 34 }
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:11434/api/chat');
  });

  it('turns HTTP failures into errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('model not found', { status: 404 })));

    const client = new OllamaClient({ provider: 'ollama', model: 'missing' });
    await expect(client.generate([{ role: 'user', content: 'hi' }])).rejects.toThrow('Ollama API error 404: model not found');
  });

  it('rejects replies with an unexpected shape', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ nope: true })));

    const client = new OllamaClient({ provider: 'ollama', model: 'llama3.1' });
    await expect(client.generate([{ role: 'user', content: 'hi' }])).rejects.toThrow(/^Unexpected Ollama response/);
  });
});
