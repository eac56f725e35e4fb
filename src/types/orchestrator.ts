/**
 * Orchestrator Domain Types
 *
 * SCOPE: model client, intent handlers, request state machine
 */

import type { Authorization, User } from './auth.js';
import type { ContextBundle } from './context.js';
import type { Message, RelevantMemories, UserContextSummary } from './memory.js';
import type { Intent, RoutingDecision, RoutingParameters } from './routing.js';

// ─────────────────────────────────────────────────────────────
// LLM CLIENT TYPES
// ─────────────────────────────────────────────────────────────

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMRequest {
  model: string;
  messages: LLMMessage[];
  max_tokens?: number;
  temperature?: number;
}

export interface LLMResponse {
  id: string;
  model: string;
  content: string;
  finishReason: string | null;
  usage: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

export interface EmbeddingRequest {
  model: string;
  input: string;
}

/**
 * LLM Client for OpenRouter (OpenAI-compatible)
 */
export interface LLMClient {
  complete(request: LLMRequest): Promise<LLMResponse>;
  embed(request: EmbeddingRequest): Promise<number[]>;
}

/**
 * Free-text generation capability used by handlers
 */
export interface TextGenerator {
  generate(messages: LLMMessage[]): Promise<string>;
}

/**
 * Raw classification capability; output may be noisy
 */
export interface Classifier {
  classify(query: string): Promise<string>;
}

// ─────────────────────────────────────────────────────────────
// HANDLERS
// ─────────────────────────────────────────────────────────────

/**
 * Everything a handler may read besides parameters and context
 */
export interface HandlerRequest {
  query: string;
  user: User;
  requestedIntent: Intent;
  accessDenied: boolean;
  history: readonly Message[];
  memories: RelevantMemories;
  profile: UserContextSummary | null;
}

export interface IntentHandler {
  /** Must not reject on missing or invalid parameters */
  handle(
    parameters: RoutingParameters,
    context: ContextBundle,
    request: HandlerRequest
  ): Promise<string>;
}

export type HandlerRegistry = Readonly<Record<Intent, IntentHandler>>;

// ─────────────────────────────────────────────────────────────
// STATE MACHINE
// ─────────────────────────────────────────────────────────────

export type DispatchState =
  | 'Init'
  | 'Route'
  | 'Authorize'
  | 'BuildContext'
  | 'Fallback'
  | 'Dispatch'
  | 'Done';

/**
 * Immutable per-request state; each step returns a new copy
 */
export interface RequestState {
  readonly requestId: string;
  readonly query: string;
  readonly user: User;
  readonly states: readonly DispatchState[];
  /** Conversation window as it stood before this request */
  readonly history: readonly Message[];
  readonly routing: RoutingDecision | null;
  readonly authorization: Authorization | null;
  readonly parameters: RoutingParameters;
  readonly context: ContextBundle | null;
  readonly content: string | null;
  readonly handlerFailed: boolean;
}

export interface OrchestratorInput {
  query: string;
  user: User;
  requestId?: string;
}

export interface OrchestratorResult {
  requestId: string;
  content: string;
  intent: Intent;
  requestedIntent: Intent;
  accessDenied: boolean;
  handlerFailed: boolean;
  routing: RoutingDecision;
  context: ContextBundle;
  states: readonly DispatchState[];
}

export interface OrchestratorConfig {
  handlerTimeoutMs: number;
  historyWindow: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  handlerTimeoutMs: 60_000,
  historyWindow: 6,
};
