/**
 * LLM Client Unit Tests
 *
 * Tests for the OpenRouter client and its capability adapters
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import {
  createLLMClient,
  createQueryEmbedder,
  createTextGenerator,
} from '@/orchestrator/llm-client.js';
import type { LLMClient, LLMRequest } from '@/types/index.js';

const { mockCreate, mockEmbed, mockConstructor } = vi.hoisted(() => {
  const mockCreate = vi.fn();
  const mockEmbed = vi.fn();
  const mockConstructor = vi.fn().mockImplementation(() => ({
    chat: { completions: { create: mockCreate } },
    embeddings: { create: mockEmbed },
  }));
  return { mockCreate, mockEmbed, mockConstructor };
});

// Mock the OpenAI SDK
vi.mock('openai', () => ({ default: mockConstructor }));

describe('LLM Client', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('createLLMClient', () => {
    it('should throw if API key is missing', () => {
      expect(() => createLLMClient({ apiKey: '' })).toThrow('API key is required');
      expect(() => createLLMClient({ apiKey: '   ' })).toThrow('API key is required');
    });

    it('should default to OpenRouter with attribution headers', () => {
      createLLMClient({
        apiKey: 'test-api-key',
        siteUrl: 'https://advisor.test',
        siteName: 'Restaurant Advisor',
      });

      expect(mockConstructor).toHaveBeenCalledWith({
        apiKey: 'test-api-key',
        baseURL: 'https://openrouter.ai/api/v1',
        defaultHeaders: {
          'HTTP-Referer': 'https://advisor.test',
          'X-Title': 'Restaurant Advisor',
        },
        timeout: 120000,
      });
    });

    it('should allow custom base URL and timeout', () => {
      createLLMClient({
        apiKey: 'test-api-key',
        baseURL: 'https://custom.api.com/v1',
        timeout: 5000,
      });

      expect(mockConstructor).toHaveBeenCalledWith(
        expect.objectContaining({
          baseURL: 'https://custom.api.com/v1',
          defaultHeaders: {},
          timeout: 5000,
        })
      );
    });
  });

  describe('complete()', () => {
    it('should send a chat completion request and map the response', async () => {
      mockCreate.mockResolvedValue({
        id: 'chatcmpl-123',
        model: 'openai/gpt-4o-mini',
        choices: [
          {
            index: 0,
            message: { role: 'assistant', content: 'Try T Nagar.' },
            finish_reason: 'stop',
          },
        ],
        usage: { prompt_tokens: 10, completion_tokens: 8, total_tokens: 18 },
      });

      const client = createLLMClient({ apiKey: 'test-api-key' });
      const request: LLMRequest = {
        model: 'openai/gpt-4o-mini',
        messages: [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: 'Where in Chennai?' },
        ],
        temperature: 0,
        max_tokens: 300,
      };

      const response = await client.complete(request);

      expect(mockCreate).toHaveBeenCalledWith({
        model: 'openai/gpt-4o-mini',
        messages: [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: 'Where in Chennai?' },
        ],
        max_tokens: 300,
        temperature: 0,
        stream: false,
      });
      expect(response).toEqual({
        id: 'chatcmpl-123',
        model: 'openai/gpt-4o-mini',
        content: 'Try T Nagar.',
        finishReason: 'stop',
        usage: { prompt_tokens: 10, completion_tokens: 8, total_tokens: 18 },
      });
    });

    it('should omit unset sampling options', async () => {
      mockCreate.mockResolvedValue({ id: 'c', model: 'm', choices: [] });

      const client = createLLMClient({ apiKey: 'test-api-key' });
      const response = await client.complete({
        model: 'm',
        messages: [{ role: 'user', content: 'hi' }],
      });

      expect(mockCreate).toHaveBeenCalledWith({
        model: 'm',
        messages: [{ role: 'user', content: 'hi' }],
        stream: false,
      });
      expect(response.content).toBe('');
      expect(response.finishReason).toBeNull();
      expect(response.usage.total_tokens).toBe(0);
    });

    it('should propagate API errors', async () => {
      mockCreate.mockRejectedValue(new Error('Rate limit exceeded'));

      const client = createLLMClient({ apiKey: 'test-api-key' });

      await expect(
        client.complete({ model: 'm', messages: [{ role: 'user', content: 'hi' }] })
      ).rejects.toThrow('Rate limit exceeded');
    });
  });

  describe('embed()', () => {
    it('should return the first vector', async () => {
      mockEmbed.mockResolvedValue({ data: [{ embedding: [0.1, 0.2, 0.3] }] });

      const client = createLLMClient({ apiKey: 'test-api-key' });
      const vector = await client.embed({ model: 'embed-model', input: 'thali' });

      expect(mockEmbed).toHaveBeenCalledWith({ model: 'embed-model', input: 'thali' });
      expect(vector).toEqual([0.1, 0.2, 0.3]);
    });

    it('should throw when no vector comes back', async () => {
      mockEmbed.mockResolvedValue({ data: [] });

      const client = createLLMClient({ apiKey: 'test-api-key' });

      await expect(client.embed({ model: 'embed-model', input: 'x' })).rejects.toThrow(
        'Embedding response contained no vectors'
      );
    });
  });
});

describe('capability adapters', () => {
  function fakeClient(): LLMClient {
    return {
      complete: vi.fn().mockResolvedValue({
        id: 'c',
        model: 'm',
        content: 'generated',
        finishReason: 'stop',
        usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
      }),
      embed: vi.fn().mockResolvedValue([1, 0]),
    };
  }

  it('should generate with a default temperature', async () => {
    const client = fakeClient();
    const generator = createTextGenerator(client, { model: 'writer' });

    const text = await generator.generate([{ role: 'user', content: 'hello' }]);

    expect(text).toBe('generated');
    expect(client.complete).toHaveBeenCalledWith({
      model: 'writer',
      messages: [{ role: 'user', content: 'hello' }],
      temperature: 0.3,
    });
  });

  it('should pass max tokens when configured', async () => {
    const client = fakeClient();
    const generator = createTextGenerator(client, {
      model: 'writer',
      temperature: 0.7,
      maxTokens: 800,
    });

    await generator.generate([]);

    expect(client.complete).toHaveBeenCalledWith({
      model: 'writer',
      messages: [],
      temperature: 0.7,
      max_tokens: 800,
    });
  });

  it('should embed queries with the configured model', async () => {
    const client = fakeClient();
    const embedder = createQueryEmbedder(client, 'embed-model');

    expect(await embedder.embed('biryani')).toEqual([1, 0]);
    expect(client.embed).toHaveBeenCalledWith({ model: 'embed-model', input: 'biryani' });
  });
});
