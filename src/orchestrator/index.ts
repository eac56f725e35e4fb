/**
 * Orchestrator Exports
 *
 * LLM PROVIDER: OpenRouter (https://openrouter.ai)
 * - OpenAI-compatible API via the 'openai' package
 * - Required env: OPENROUTER_API_KEY
 */

export {
  createLLMClient,
  createQueryEmbedder,
  createTextGenerator,
} from './llm-client.js';
export type { LLMClientConfig } from './llm-client.js';
export { buildClassifierPrompt, createLLMClassifier } from './classifier.js';
export {
  createPromptBuilder,
  CORE_INSTRUCTIONS,
  INTENT_INSTRUCTIONS,
} from './prompt-builder.js';
export type { PromptBuilder, PromptBuilderInput } from './prompt-builder.js';
export { createIntentHandlers, detectSpecialistDomain } from './handlers.js';
export type { IntentHandlersDeps } from './handlers.js';
export {
  accessNotice,
  createOrchestrator,
  handlerFailureMessage,
} from './orchestrator.js';
export type { Orchestrator, OrchestratorDeps } from './orchestrator.js';
