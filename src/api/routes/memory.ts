/**
 * Memory Routes
 * The caller's own conversational memory
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type {
  Message,
  Permission,
  Role,
  UserContextSummary,
} from '../../types/index.js';
import { getRequestId, getUser } from '../utils/actor.js';
import { errorResponse, successResponse } from '../utils/response.js';

/**
 * Memory service interface (minimal for routes)
 */
interface MemoryRoutesMemoryDep {
  getUserContext(userId: string): UserContextSummary | null;
  getConversation(userId: string, max?: number): Message[];
  addFact(userId: string, fact: string): Promise<void>;
}

interface MemoryRoutesPermissionDep {
  canUseMemory(role: Role, permission: Permission): boolean;
}

interface MemoryRoutesSessionDep {
  logout(userId: string): Promise<boolean>;
}

interface MemoryRoutesDeps {
  memoryService: MemoryRoutesMemoryDep;
  permissionService: MemoryRoutesPermissionDep;
  sessionService: MemoryRoutesSessionDep;
}

export const MAX_FACT_LENGTH = 500;

const factBodySchema = z.object({
  fact: z.string().trim().min(1, 'Fact is required').max(MAX_FACT_LENGTH),
});

/**
 * Create memory routes
 */
export function createMemoryRoutes(deps: MemoryRoutesDeps): Hono {
  const { memoryService, permissionService, sessionService } = deps;
  const app = new Hono();

  /**
   * GET /memory
   * Summary and recent conversation; needs memory read
   */
  app.get('/memory', (c) => {
    const requestId = getRequestId(c);
    const user = getUser(c);
    if (user === null) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Authentication required' },
        requestId
      );
    }

    if (!permissionService.canUseMemory(user.role, 'read')) {
      return errorResponse(
        c,
        { code: 'PERMISSION_DENIED', message: 'Memory access is not available for your role' },
        requestId
      );
    }

    return successResponse(
      c,
      {
        summary: memoryService.getUserContext(user.id),
        conversation: memoryService.getConversation(user.id),
      },
      requestId
    );
  });

  /**
   * POST /memory/facts
   * Remember a fact about the caller's plans; needs memory write
   */
  app.post('/memory/facts', async (c) => {
    const requestId = getRequestId(c);
    const user = getUser(c);
    if (user === null) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Authentication required' },
        requestId
      );
    }

    if (!permissionService.canUseMemory(user.role, 'write')) {
      return errorResponse(
        c,
        { code: 'PERMISSION_DENIED', message: 'Saving memories is not available for your role' },
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

    const parsed = factBodySchema.safeParse(body);
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

    await memoryService.addFact(user.id, parsed.data.fact);
    return successResponse(
      c,
      { facts: memoryService.getUserContext(user.id)?.facts ?? [] },
      requestId,
      201
    );
  });

  /**
   * DELETE /memory/session
   * Clear session scratch (logout); history and preferences are kept
   */
  app.delete('/memory/session', async (c) => {
    const requestId = getRequestId(c);
    const user = getUser(c);
    if (user === null) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Authentication required' },
        requestId
      );
    }

    const cleared = await sessionService.logout(user.id);
    return successResponse(c, { cleared }, requestId);
  });

  return app;
}
