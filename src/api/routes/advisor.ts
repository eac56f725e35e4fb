/**
 * Advisor Routes
 * Single entry point into the dispatch state machine
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { OrchestratorInput, OrchestratorResult, Result } from '../../types/index.js';
import { getRequestId, getUser } from '../utils/actor.js';
import { errorResponse, successResponse } from '../utils/response.js';

/**
 * Orchestrator interface (minimal for routes)
 */
interface OrchestratorDep {
  run(input: OrchestratorInput): Promise<Result<OrchestratorResult>>;
}

interface AdvisorRoutesDeps {
  orchestrator: OrchestratorDep;
}

export const MAX_QUERY_LENGTH = 2000;

const queryBodySchema = z.object({
  query: z.string().trim().min(1, 'Query is required').max(MAX_QUERY_LENGTH),
});

/**
 * Create advisor routes
 */
export function createAdvisorRoutes(deps: AdvisorRoutesDeps): Hono {
  const { orchestrator } = deps;
  const app = new Hono();

  /**
   * POST /advisor/query
   * Route, authorize, gather context and answer one question
   */
  app.post('/advisor/query', async (c) => {
    const requestId = getRequestId(c);
    const user = getUser(c);
    if (user === null) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Authentication required' },
        requestId
      );
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'Request body must be JSON' },
        requestId
      );
    }

    const parsed = queryBodySchema.safeParse(body);
    if (!parsed.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: parsed.error.issues[0]?.message ?? 'Invalid request body',
        },
        requestId
      );
    }

    const result = await orchestrator.run({
      query: parsed.data.query,
      user,
      requestId,
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const outcome = result.data;
    return successResponse(
      c,
      {
        content: outcome.content,
        intent: outcome.intent,
        requestedIntent: outcome.requestedIntent,
        accessDenied: outcome.accessDenied,
        handlerFailed: outcome.handlerFailed,
        routing: outcome.routing,
        sources: outcome.context.sources,
        degraded: outcome.context.degraded,
      },
      requestId
    );
  });

  return app;
}
