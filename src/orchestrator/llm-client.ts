/**
 * LLM Client Implementation
 *
 * Wraps the OpenAI SDK to talk to OpenRouter: chat completions for
 * classification and handlers, embeddings for semantic search.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import type {
  EmbeddingRequest,
  LLMClient,
  LLMMessage,
  LLMRequest,
  LLMResponse,
  TextGenerator,
} from '../types/index.js';

/**
 * OpenRouter base URL
 */
const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

/**
 * LLM Client configuration options
 */
export interface LLMClientConfig {
  /** OpenRouter API key (required) */
  apiKey: string;

  /** Base URL override (default: OpenRouter) */
  baseURL?: string | undefined;

  /** Site URL for OpenRouter attribution */
  siteUrl?: string;

  /** Site name for OpenRouter attribution */
  siteName?: string;

  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Create an LLM client for OpenRouter
 */
export function createLLMClient(config: LLMClientConfig): LLMClient {
  if (!config.apiKey || config.apiKey.trim() === '') {
    throw new Error('API key is required');
  }

  const defaultHeaders: Record<string, string> = {};
  if (config.siteUrl) {
    defaultHeaders['HTTP-Referer'] = config.siteUrl;
  }
  if (config.siteName) {
    defaultHeaders['X-Title'] = config.siteName;
  }

  const openai = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL ?? OPENROUTER_BASE_URL,
    defaultHeaders,
    timeout: config.timeout ?? 120000,
  });

  function toOpenAIMessage(msg: LLMMessage): ChatCompletionMessageParam {
    switch (msg.role) {
      case 'system':
        return { role: 'system', content: msg.content };
      case 'user':
        return { role: 'user', content: msg.content };
      case 'assistant':
        return { role: 'assistant', content: msg.content };
    }
  }

  return {
    /**
     * Send a non-streaming chat completion request
     */
    async complete(request: LLMRequest): Promise<LLMResponse> {
      const response = await openai.chat.completions.create({
        model: request.model,
        messages: request.messages.map(toOpenAIMessage),
        ...(request.max_tokens && { max_tokens: request.max_tokens }),
        ...(request.temperature !== undefined && {
          temperature: request.temperature,
        }),
        stream: false,
      });

      const choice = response.choices[0];

      return {
        id: response.id,
        model: response.model,
        content: choice?.message.content ?? '',
        finishReason: choice?.finish_reason ?? null,
        usage: {
          prompt_tokens: response.usage?.prompt_tokens ?? 0,
          completion_tokens: response.usage?.completion_tokens ?? 0,
          total_tokens: response.usage?.total_tokens ?? 0,
        },
      };
    },

    /**
     * Embed a single input string
     */
    async embed(request: EmbeddingRequest): Promise<number[]> {
      const response = await openai.embeddings.create({
        model: request.model,
        input: request.input,
      });

      const first = response.data[0];
      if (first === undefined) {
        throw new Error('Embedding response contained no vectors');
      }
      return first.embedding;
    },
  };
}

// ─────────────────────────────────────────────────────────────
// CAPABILITY ADAPTERS
// ─────────────────────────────────────────────────────────────

export interface TextGeneratorOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Free-text generation over a fixed model
 */
export function createTextGenerator(
  llmClient: LLMClient,
  options: TextGeneratorOptions
): TextGenerator {
  return {
    async generate(messages: LLMMessage[]): Promise<string> {
      const response = await llmClient.complete({
        model: options.model,
        messages,
        temperature: options.temperature ?? 0.3,
        ...(options.maxTokens !== undefined && { max_tokens: options.maxTokens }),
      });
      return response.content;
    },
  };
}

/**
 * Query embeddings for semantic search
 */
export function createQueryEmbedder(
  llmClient: LLMClient,
  model: string
): { embed(text: string): Promise<number[]> } {
  return {
    embed(text: string): Promise<number[]> {
      return llmClient.embed({ model, input: text });
    },
  };
}
