/**
 * Orchestrator
 *
 * Dispatch state machine for one advisor request:
 *   Init → Route → Authorize → BuildContext → Dispatch → Done
 * with Fallback entered between Authorize and BuildContext on denial.
 *
 * Each step returns a new RequestState; nothing but the memory service
 * outlives a request.
 *
 * GUARDRAILS:
 * - Exactly one handler runs per request
 * - Handler errors and timeouts become a reply, never a rejection
 * - The user and assistant messages are both recorded, even on failure
 */

import { titleCase } from '../config/vocabulary.js';
import { createLogger, TimeoutError, withTimeout } from '../lib/index.js';
import type { Logger } from '../lib/index.js';
import type {
  Authorization,
  BuildContextParams,
  ContextBundle,
  DispatchState,
  HandlerRegistry,
  Intent,
  Message,
  OrchestratorConfig,
  OrchestratorInput,
  OrchestratorResult,
  PreferenceKey,
  RelevantMemories,
  RequestState,
  Result,
  RoutingDecision,
  RoutingParameters,
  UserContextSummary,
} from '../types/index.js';
import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  EMPTY_CONTEXT,
  errorMessage,
  failure,
  FALLBACK_INTENT,
  success,
} from '../types/index.js';

// ─────────────────────────────────────────────────────────────
// DEPENDENCIES
// ─────────────────────────────────────────────────────────────

export interface OrchestratorRouterDep {
  route(query: string): Promise<RoutingDecision>;
}

export interface OrchestratorPermissionDep {
  authorize(role: string, intent: Intent): Authorization;
}

export interface OrchestratorContextDep {
  buildContext(params: BuildContextParams): Promise<ContextBundle>;
}

export interface OrchestratorMemoryDep {
  touch(userId: string): Promise<unknown>;
  append(userId: string, message: Message): Promise<void>;
  extractAndMergePreferences(
    userId: string,
    text: string
  ): Promise<Partial<Record<PreferenceKey, string>>>;
  getPreferences(userId: string): Partial<Record<PreferenceKey, string>>;
  getConversation(userId: string, max?: number): Message[];
  getRelevantMemories(userId: string, query: string): RelevantMemories;
  getUserContext(userId: string): UserContextSummary | null;
}

export interface OrchestratorDeps {
  routerService: OrchestratorRouterDep;
  permissionService: OrchestratorPermissionDep;
  contextService: OrchestratorContextDep;
  memoryService: OrchestratorMemoryDep;
  handlers: HandlerRegistry;
  config?: Partial<OrchestratorConfig>;
  logger?: Logger;
}

/**
 * Orchestrator interface
 */
export interface Orchestrator {
  run(input: OrchestratorInput): Promise<Result<OrchestratorResult>>;
}

/** Preferences that may stand in for parameters the router did not extract */
const PREFERENCE_PARAMETERS: readonly PreferenceKey[] = ['city', 'cuisine'];

// ─────────────────────────────────────────────────────────────
// REPLY TEXT
// ─────────────────────────────────────────────────────────────

export function capabilityLabel(intent: Intent): string {
  return titleCase(intent.replace(/_/g, ' '));
}

export function accessNotice(requestedIntent: Intent, reply: string): string {
  const label = capabilityLabel(requestedIntent);
  return `I'm sorry, but you don't have access to that functionality with your current permissions. (${label} is not available for your role.)

Your query has been processed with limited access. Here's what I can tell you:

${reply}

For more detailed information, please contact your administrator to upgrade your access level.`;
}

export function handlerFailureMessage(intent: Intent, timedOut: boolean): string {
  const label = capabilityLabel(intent);
  return timedOut
    ? `I'm sorry, the ${label} advisor took too long to respond. Please try again in a moment.`
    : `I'm sorry, the ${label} advisor ran into a problem while answering. Please try again or rephrase your question.`;
}

// ─────────────────────────────────────────────────────────────
// STATE HELPERS
// ─────────────────────────────────────────────────────────────

function enter(
  state: RequestState,
  next: DispatchState,
  changes: Partial<Omit<RequestState, 'requestId' | 'states'>> = {}
): RequestState {
  return { ...state, ...changes, states: [...state.states, next] };
}

function effectiveIntentOf(state: RequestState): Intent {
  return state.authorization?.effectiveIntent ?? FALLBACK_INTENT;
}

function generateRequestId(): string {
  return `orch-${Date.now()}-${Math.random().toString(36).slice(2)}`;
}

/**
 * Create an orchestrator instance
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { routerService, permissionService, contextService, memoryService, handlers } =
    deps;
  const config: OrchestratorConfig = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...deps.config };
  const baseLog = deps.logger ?? createLogger('orchestrator');

  // ─── Steps ───

  async function init(state: RequestState): Promise<RequestState> {
    const userId = state.user.id;
    await memoryService.touch(userId);
    const history = memoryService.getConversation(userId, config.historyWindow);
    await memoryService.append(userId, { role: 'user', content: state.query });
    await memoryService.extractAndMergePreferences(userId, state.query);
    return enter(state, 'Init', { history });
  }

  async function route(state: RequestState): Promise<RequestState> {
    const routing = await routerService.route(state.query);
    return enter(state, 'Route', { routing, parameters: routing.parameters });
  }

  function authorize(state: RequestState, intent: Intent): RequestState {
    const authorization = permissionService.authorize(state.user.role, intent);
    const next = enter(state, 'Authorize', { authorization });
    return authorization.allowed ? next : enter(next, 'Fallback');
  }

  function withPreferences(state: RequestState): RoutingParameters {
    if (effectiveIntentOf(state) === FALLBACK_INTENT) {
      return state.parameters;
    }
    const preferences = memoryService.getPreferences(state.user.id);
    const filled: Record<string, string> = { ...state.parameters };
    for (const key of PREFERENCE_PARAMETERS) {
      const stored = preferences[key];
      if (filled[key] === undefined && stored !== undefined) {
        filled[key] = key === 'city' ? titleCase(stored) : stored;
      }
    }
    return filled;
  }

  async function buildContext(state: RequestState): Promise<RequestState> {
    const parameters = withPreferences(state);
    const context = await contextService.buildContext({
      intent: effectiveIntentOf(state),
      parameters,
      role: state.user.role,
      userId: state.user.id,
      query: state.query,
    });
    return enter(state, 'BuildContext', { parameters, context });
  }

  async function dispatch(
    state: RequestState,
    requestedIntent: Intent,
    log: Logger
  ): Promise<RequestState> {
    const intent = effectiveIntentOf(state);
    const accessDenied = state.authorization?.allowed === false;
    const context = state.context ?? { ...EMPTY_CONTEXT, query: state.query };

    const handler = handlers[intent];
    let content: string;
    let handlerFailed = false;

    try {
      const reply = await withTimeout(
        () =>
          handler.handle(state.parameters, context, {
            query: state.query,
            user: state.user,
            requestedIntent,
            accessDenied,
            history: state.history,
            memories: memoryService.getRelevantMemories(state.user.id, state.query),
            profile: memoryService.getUserContext(state.user.id),
          }),
        config.handlerTimeoutMs,
        `handler:${intent}`
      );
      content = accessDenied ? accessNotice(requestedIntent, reply) : reply;
    } catch (err) {
      handlerFailed = true;
      const timedOut = err instanceof TimeoutError;
      log.error(
        { intent, timedOut, reason: errorMessage(err) },
        'Handler failed'
      );
      const failureMessage = handlerFailureMessage(intent, timedOut);
      content = accessDenied ? accessNotice(requestedIntent, failureMessage) : failureMessage;
    }

    return enter(state, 'Dispatch', { content, handlerFailed });
  }

  async function done(state: RequestState): Promise<RequestState> {
    await memoryService.append(state.user.id, {
      role: 'assistant',
      content: state.content ?? '',
    });
    return enter(state, 'Done');
  }

  // ─── Run ───

  return {
    async run(input: OrchestratorInput): Promise<Result<OrchestratorResult>> {
      const query = input.query.trim();
      if (query === '') {
        return failure('VALIDATION_ERROR', 'Query must not be empty');
      }

      const requestId = input.requestId ?? generateRequestId();
      const log = baseLog.child({ requestId, userId: input.user.id });

      let state: RequestState = {
        requestId,
        query,
        user: input.user,
        states: [],
        history: [],
        routing: null,
        authorization: null,
        parameters: {},
        context: null,
        content: null,
        handlerFailed: false,
      };

      try {
        // Step 1: Record the incoming message
        state = await init(state);

        // Step 2: Route (never throws)
        state = await route(state);
        const routing: RoutingDecision = state.routing ?? {
          intent: FALLBACK_INTENT,
          parameters: {},
          rationale: 'No routing decision',
          source: 'keyword_fallback',
        };

        // Step 3: Authorize, falling back on denial
        state = authorize(state, routing.intent);
        if (state.authorization?.allowed === false) {
          log.info(
            { role: state.user.role, intent: routing.intent },
            'Intent denied; using fallback'
          );
        }

        // Step 4: Gather evidence
        state = await buildContext(state);

        // Step 5: Exactly one handler
        state = await dispatch(state, routing.intent, log);

        // Step 6: Record the reply
        state = await done(state);

        const intent = effectiveIntentOf(state);
        log.info(
          {
            intent,
            requestedIntent: routing.intent,
            source: routing.source,
            degraded: state.context?.degraded ?? [],
            handlerFailed: state.handlerFailed,
          },
          'Request completed'
        );

        return success({
          requestId,
          content: state.content ?? '',
          intent,
          requestedIntent: routing.intent,
          accessDenied: state.authorization?.allowed === false,
          handlerFailed: state.handlerFailed,
          routing,
          context: state.context ?? { ...EMPTY_CONTEXT, query },
          states: state.states,
        });
      } catch (err) {
        log.error({ err, states: state.states }, 'Orchestration failed');
        return failure('INTERNAL_ERROR', errorMessage(err), { states: state.states });
      }
    },
  };
}
